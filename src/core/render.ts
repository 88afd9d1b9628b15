// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Serializer
// Source slices for untouched nodes, rebuilt syntax otherwise
// ─────────────────────────────────────────────────────────────

import { MATH_CLOSERS, type Arg, type Node } from './ast';

export function render(node: Node): string {
    if (node.span) return node.span.source.slice(node.span.start, node.span.end);

    switch (node.tag) {
        case 'Text':
            return node.text;

        case 'Comment':
            return `%${node.text}${node.trailing}`;

        case 'Command':
            return `\\${node.name}${node.starred ? '*' : ''}${node.args.map(renderArg).join('')}`;

        case 'Group':
            return `{${renderNodes(node.children)}}`;

        case 'Environment':
            return `\\begin{${node.name}}${node.args.map(renderArg).join('')}` +
                `${renderNodes(node.body)}\\end{${node.name}}`;

        case 'Math':
            return `${node.delimiter}${renderNodes(node.body)}${MATH_CLOSERS[node.delimiter]}`;

        case 'Parameter':
            return `${'#'.repeat(node.hashes)}${node.index}`;

        case 'Document':
            return renderNodes(node.children);
    }
}

export function renderNodes(nodes: readonly Node[]): string {
    return nodes.map(render).join('');
}

function renderArg(arg: Arg): string {
    const inner = renderNodes(arg.children);
    if (!arg.braced) return `${arg.leading}${inner}`;
    return arg.kind === 'optional' ? `${arg.leading}[${inner}]` : `${arg.leading}{${inner}}`;
}
