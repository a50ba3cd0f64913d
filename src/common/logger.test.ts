import { strict as assert } from 'assert';
import { test, describe, afterEach } from 'node:test';

import { configureLogger, createLogger, getLogLevel, resetLogger, setLogLevel } from './logger';

function collect(): string[] {
    const lines: string[] = [];
    configureLogger({ output: (line) => lines.push(line), format: 'json', timestamps: false });
    return lines;
}

describe('Logger', () => {
    afterEach(() => resetLogger());

    test('drops entries below the configured level', () => {
        const lines = collect();
        setLogLevel('warn');
        const log = createLogger('builder');

        log.info('hidden');
        log.warn('shown');

        assert.equal(getLogLevel(), 'warn');
        assert.equal(lines.length, 1);
        assert.equal(JSON.parse(lines[0]).msg, 'shown');
    });

    test('json entries carry scope and data', () => {
        const lines = collect();
        createLogger('analyze').child('builder').info('Call graph built', { callables: 3 });

        const entry = JSON.parse(lines[0]);
        assert.equal(entry.level, 'info');
        assert.equal(entry.scope, 'analyze:builder');
        assert.equal(entry.callables, 3);
    });

    test('timeSync returns the result and rethrows failures', () => {
        const lines = collect();
        setLogLevel('debug');
        const log = createLogger('stage');

        assert.equal(log.timeSync('Load', () => 42), 42);
        assert.throws(() => log.timeSync('Write', () => {
            throw new Error('disk full');
        }), /disk full/);

        const entries = lines.map(line => JSON.parse(line));
        assert.deepEqual(entries.map(e => [e.level, e.msg]), [['debug', 'Load'], ['error', 'Write (failed)']]);
        assert.equal(entries[1].error, 'disk full');
    });

    test('silent suppresses everything', () => {
        const lines = collect();
        setLogLevel('silent');

        createLogger('x').error('nope');

        assert.deepEqual(lines, []);
    });
});
