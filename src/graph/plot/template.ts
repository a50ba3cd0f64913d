export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

/**
 * Self-contained vis-network page. `graphDataJson` must already be safe to
 * inline in a script element.
 */
export function getHtmlTemplate(graphDataJson: string, title: string): string {
    const safeTitle = escapeHtml(title);
    return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <title>${safeTitle}</title>
    <script type="text/javascript" src="https://unpkg.com/vis-network/standalone/umd/vis-network.min.js"></script>
    <style type="text/css">
        #callgraph {
            width: 100%;
            height: 90vh;
            border: 1px solid lightgray;
        }
        body { font-family: sans-serif; margin: 0; padding: 10px; }
        .legend span { margin-right: 16px; }
    </style>
</head>
<body>
    <h2>${safeTitle}</h2>
    <div class="legend">
        <span>&#8594; definite call</span>
        <span>&#8674; potential call (dynamic dispatch)</span>
    </div>
    <div id="callgraph"></div>
    <script type="text/javascript">
        var data = ${graphDataJson};
        var container = document.getElementById('callgraph');
        var options = {
            layout: { hierarchical: { enabled: true, direction: 'LR', sortMethod: 'directed' } },
            nodes: { shape: 'box', font: { size: 14 } },
            edges: {
                arrows: { to: { enabled: true, scaleFactor: 0.5 } },
                smooth: { type: 'cubicBezier' }
            },
            physics: false,
            interaction: { hover: true, tooltipDelay: 200 }
        };
        new vis.Network(container, data, options);
    </script>
</body>
</html>
`;
}
