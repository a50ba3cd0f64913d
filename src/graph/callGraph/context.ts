import { NodeId } from '../../parser/types';

/**
 * The callable whose body is currently being walked.
 *
 * `enter` saves the previous caller, runs the walk and restores it even if
 * the walk throws, so depth follows syntactic nesting.
 */
export class TraversalContext {
    private caller: NodeId | undefined;

    get current(): NodeId | undefined {
        return this.caller;
    }

    enter<T>(id: NodeId, walk: () => T): T {
        const previous = this.caller;
        this.caller = id;
        try {
            return walk();
        } finally {
            this.caller = previous;
        }
    }
}
