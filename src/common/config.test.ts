import { strict as assert } from 'assert';
import { test, describe } from 'node:test';
import * as path from 'path';

import { DEFAULT_GENERATED_MARKERS, loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
    test('applies defaults', () => {
        const config = loadConfig({}, {});

        assert.deepEqual(config, {
            projectRoot: process.cwd(),
            tsconfig: undefined,
            outFile: 'out.dot',
            format: 'dot',
            logLevel: 'info',
            logFormat: 'pretty',
            generatedMarkers: DEFAULT_GENERATED_MARKERS,
        });
    });

    test('reads environment variables', () => {
        const root = path.resolve('fixtures', 'proj');
        const config = loadConfig({}, {
            CALLGRAPH_PROJECT: root,
            CALLGRAPH_TSCONFIG: 'tsconfig.build.json',
            CALLGRAPH_FORMAT: 'html',
            CALLGRAPH_GENERATED_MARKERS: ' @autogen , ,DO NOT EDIT',
            LOG_LEVEL: 'debug',
            LOG_FORMAT: 'json',
        });

        assert.equal(config.projectRoot, root);
        assert.equal(config.tsconfig, path.join(root, 'tsconfig.build.json'));
        assert.equal(config.format, 'html');
        assert.equal(config.outFile, 'out.html');
        assert.deepEqual(config.generatedMarkers, ['@autogen', 'DO NOT EDIT']);
        assert.equal(config.logLevel, 'debug');
        assert.equal(config.logFormat, 'json');
    });

    test('overrides win over the environment', () => {
        const config = loadConfig(
            { format: 'dot', outFile: 'graph.dot', logLevel: undefined },
            { CALLGRAPH_FORMAT: 'html', CALLGRAPH_OUT: 'env.html', LOG_LEVEL: 'warn' }
        );

        assert.equal(config.format, 'dot');
        assert.equal(config.outFile, 'graph.dot');
        assert.equal(config.logLevel, 'warn');
    });

    test('blank environment values count as unset', () => {
        const config = loadConfig({}, { CALLGRAPH_FORMAT: '   ', CALLGRAPH_OUT: '' });

        assert.equal(config.format, 'dot');
        assert.equal(config.outFile, 'out.dot');
    });

    test('rejects invalid values with the offending key', () => {
        assert.throws(() => loadConfig({}, { CALLGRAPH_FORMAT: 'svg' }), (err: unknown) => {
            assert.ok(err instanceof ConfigError);
            assert.equal(err.code, 'CONFIG');
            assert.match(err.message, /^Invalid configuration: format: /);
            return true;
        });
        assert.throws(() => loadConfig({}, { LOG_LEVEL: 'verbose' }), /logLevel: /);
    });
});
