// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Lossless LaTeX Syntax Tree
// ─────────────────────────────────────────────────────────────

// ── Source spans ────────────────────────────────────────────

export interface Span {
    readonly source: string;
    readonly start: number;
    readonly end: number;
}

// ── Nodes ───────────────────────────────────────────────────

export type Node =
    | TextNode
    | CommentNode
    | CommandNode
    | GroupNode
    | EnvironmentNode
    | MathNode
    | ParameterNode
    | DocumentNode;

export interface TextNode {
    readonly tag: 'Text';
    readonly text: string;
    readonly span?: Span;
}

export interface CommentNode {
    readonly tag: 'Comment';
    /** Characters after `%` up to, not including, the end of line. */
    readonly text: string;
    /** The line break and the next line's leading blanks. */
    readonly trailing: string;
    readonly span?: Span;
}

export interface Arg {
    readonly kind: 'optional' | 'mandatory';
    /** Whitespace between the previous piece of the command and this argument. */
    readonly leading: string;
    readonly braced: boolean;
    readonly children: readonly Node[];
}

export interface CommandNode {
    readonly tag: 'Command';
    readonly name: string;
    readonly starred: boolean;
    readonly args: readonly Arg[];
    readonly span?: Span;
}

export interface GroupNode {
    readonly tag: 'Group';
    readonly children: readonly Node[];
    readonly span?: Span;
}

export interface EnvironmentNode {
    readonly tag: 'Environment';
    readonly name: string;
    readonly args: readonly Arg[];
    readonly body: readonly Node[];
    readonly span?: Span;
}

export type MathKind = 'inline' | 'display' | 'explicit';
export type MathDelimiter = '$' | '$$' | '\\[' | '\\(';

export interface MathNode {
    readonly tag: 'Math';
    readonly kind: MathKind;
    readonly delimiter: MathDelimiter;
    readonly body: readonly Node[];
    readonly span?: Span;
}

export interface ParameterNode {
    readonly tag: 'Parameter';
    readonly hashes: number;
    readonly index: number;
    readonly span?: Span;
}

export interface DocumentNode {
    readonly tag: 'Document';
    readonly children: readonly Node[];
    readonly span?: Span;
}

// ── Math delimiters ─────────────────────────────────────────

export const MATH_CLOSERS: Record<MathDelimiter, string> = {
    '$': '$',
    '$$': '$$',
    '\\[': '\\]',
    '\\(': '\\)',
};

export function mathKindOf(delimiter: MathDelimiter): MathKind {
    switch (delimiter) {
        case '$': return 'inline';
        case '$$':
        case '\\[': return 'display';
        case '\\(': return 'explicit';
    }
}

// ── Smart constructors ──────────────────────────────────────

export const mk = {
    text: (text: string, span?: Span): TextNode => ({ tag: 'Text', text, span }),
    comment: (text: string, trailing = '\n', span?: Span): CommentNode => ({ tag: 'Comment', text, trailing, span }),
    command: (name: string, args: readonly Arg[] = [], starred = false, span?: Span): CommandNode =>
        ({ tag: 'Command', name, starred, args, span }),
    group: (children: readonly Node[], span?: Span): GroupNode => ({ tag: 'Group', children, span }),
    environment: (name: string, body: readonly Node[], args: readonly Arg[] = [], span?: Span): EnvironmentNode =>
        ({ tag: 'Environment', name, args, body, span }),
    math: (delimiter: MathDelimiter, body: readonly Node[], span?: Span): MathNode =>
        ({ tag: 'Math', kind: mathKindOf(delimiter), delimiter, body, span }),
    parameter: (index: number, hashes = 1, span?: Span): ParameterNode => ({ tag: 'Parameter', hashes, index, span }),
    document: (children: readonly Node[], span?: Span): DocumentNode => ({ tag: 'Document', children, span }),
    optional: (children: readonly Node[], leading = ''): Arg => ({ kind: 'optional', leading, braced: true, children }),
    mandatory: (children: readonly Node[], leading = ''): Arg => ({ kind: 'mandatory', leading, braced: true, children }),
};

// ── Argument access ─────────────────────────────────────────

export function optionalArgs(node: CommandNode | EnvironmentNode): Arg[] {
    return node.args.filter(a => a.kind === 'optional');
}

export function mandatoryArgs(node: CommandNode | EnvironmentNode): Arg[] {
    return node.args.filter(a => a.kind === 'mandatory');
}

// ── Child lists ─────────────────────────────────────────────

/** Every sibling list directly owned by a node, in source order. */
export function childLists(node: Node): (readonly Node[])[] {
    switch (node.tag) {
        case 'Text':
        case 'Comment':
        case 'Parameter':
            return [];
        case 'Command':
            return node.args.map(a => a.children);
        case 'Environment':
            return [...node.args.map(a => a.children), node.body];
        case 'Group':
        case 'Document':
            return [node.children];
        case 'Math':
            return [node.body];
    }
}

/**
 * Rebuild a node around new child lists, in the order `childLists` returns
 * them. The result carries no span.
 */
export function withChildLists(node: Node, lists: readonly (readonly Node[])[]): Node {
    switch (node.tag) {
        case 'Text':
        case 'Comment':
        case 'Parameter':
            return { ...node, span: undefined };
        case 'Command':
            return mk.command(node.name, node.args.map((a, i) => ({ ...a, children: lists[i] })), node.starred);
        case 'Environment': {
            const args = node.args.map((a, i) => ({ ...a, children: lists[i] }));
            return mk.environment(node.name, lists[node.args.length], args);
        }
        case 'Group':
            return mk.group(lists[0]);
        case 'Document':
            return mk.document(lists[0]);
        case 'Math':
            return mk.math(node.delimiter, lists[0]);
    }
}

export function sameNodes(a: readonly Node[], b: readonly Node[]): boolean {
    return a.length === b.length && a.every((n, i) => n === b[i]);
}

// ── Copying ─────────────────────────────────────────────────

/** Deep copy. Spans are kept, since a copy renders the same text. */
export function cloneNode(node: Node): Node {
    const lists = childLists(node);
    if (lists.length === 0) return { ...node };
    const copy = withChildLists(node, lists.map(cloneNodes));
    return { ...copy, span: node.span };
}

export function cloneNodes(nodes: readonly Node[]): Node[] {
    return nodes.map(cloneNode);
}

// ── Queries ─────────────────────────────────────────────────

export function isBlank(node: Node): boolean {
    return node.tag === 'Comment' || (node.tag === 'Text' && /^\s*$/.test(node.text));
}

/** Concatenated Text leaves, comments excluded. */
export function textContent(node: Node | readonly Node[]): string {
    if (isNodeList(node)) return node.map(n => textContent(n)).join('');
    if (node.tag === 'Text') return node.text;
    return childLists(node).map(list => textContent(list)).join('');
}

function isNodeList(value: Node | readonly Node[]): value is readonly Node[] {
    return Array.isArray(value);
}
