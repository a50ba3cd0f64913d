import { strict as assert } from 'assert';
import { test, describe } from 'node:test';

import { toDiagram } from '../export/diagram';
import { CallGraph } from '../types';
import { generatePlotHtml, toInlineJson } from './generator';
import { escapeHtml } from './template';

describe('toInlineJson', () => {
    test('escapes < so a label cannot close the script element', () => {
        assert.equal(toInlineJson({ label: '</script>' }), '{"label":"\\u003c/script>"}');
    });
});

describe('escapeHtml', () => {
    test('escapes markup characters', () => {
        assert.equal(escapeHtml('a < b && "c" > d'), 'a &lt; b &amp;&amp; &quot;c&quot; &gt; d');
    });
});

describe('generatePlotHtml', () => {
    const graph: CallGraph = {
        callables: new Map([
            [1, 'src/a.ts::main'],
            [2, 'src/a.ts::Impl.run'],
        ]),
        declarations: new Map([[3, 'src/a.ts::Runner.run']]),
        implementations: new Map([[3, [2]]]),
        definiteCalls: [],
        potentialCalls: [{ caller: 1, callee: 2 }],
    };

    test('embeds vis nodes with tooltips and dashed potential edges', () => {
        const html = generatePlotHtml(toDiagram(graph, 'a'), 'Call graph: <a>');

        assert.ok(html.includes('<title>Call graph: &lt;a&gt;</title>'));
        assert.ok(html.includes(
            'var data = {"nodes":[{"id":1,"label":"src/a.ts::main","title":"src/a.ts::main (#1)"},'
            + '{"id":2,"label":"src/a.ts::Impl.run","title":"src/a.ts::Impl.run (#2)"}],'
            + '"edges":[{"from":1,"to":2,"dashes":true,"title":"Potential"}]};'
        ));
    });
});
