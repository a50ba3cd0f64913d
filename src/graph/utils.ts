import * as path from 'path';

/**
 * Normalizes a file path to a canonical repo-relative format (forward slashes).
 * e.g., "src\foo\bar.ts" -> "src/foo/bar.ts"
 */
export function normalizePath(filePath: string): string {
    return filePath.split(path.sep).join('/');
}

/**
 * Derives a consistent FileID from a path under `root`.
 */
export function deriveFileId(root: string, absolutePath: string): string {
    return normalizePath(path.relative(path.resolve(root), path.resolve(absolutePath)));
}

/**
 * Qualified display name of a callable or declaration.
 * e.g., ("src/shapes.ts", ["Circle", "area"]) -> "src/shapes.ts::Circle.area"
 */
export function deriveQualifiedName(fileId: string, segments: readonly string[]): string {
    return `${fileId}::${segments.join('.')}`;
}
