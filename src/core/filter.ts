// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Filter Engine
// Pure pre-order rewriting with lookahead into later siblings
// ─────────────────────────────────────────────────────────────

import { childLists, mk, sameNodes, withChildLists, type Node } from './ast';

// ── Filter results ──────────────────────────────────────────

export type FilterResult =
    | { tag: 'Unchanged' }
    | { tag: 'Replace'; nodes: readonly Node[] }
    | { tag: 'Consume'; nodes: readonly Node[]; count: number };

export type FilterRule = (node: Node, rest: SiblingView) => FilterResult;

const UNCHANGED: FilterResult = { tag: 'Unchanged' };

export function unchanged(): FilterResult {
    return UNCHANGED;
}

/** Substitute the node. The replacement is not filtered again. */
export function replace(node: Node | readonly Node[]): FilterResult {
    return { tag: 'Replace', nodes: toList(node) };
}

export function remove(): FilterResult {
    return { tag: 'Replace', nodes: [] };
}

/** Substitute the node and the `count` siblings after it. */
export function consume(node: Node | readonly Node[], count: number): FilterResult {
    return { tag: 'Consume', nodes: toList(node), count };
}

function toList(node: Node | readonly Node[]): readonly Node[] {
    return isList(node) ? node : [node];
}

function isList(value: Node | readonly Node[]): value is readonly Node[] {
    return Array.isArray(value);
}

// ── Sibling lookahead ───────────────────────────────────────

/** Read-only window over the siblings not yet visited. */
export class SiblingView implements Iterable<Node> {
    constructor(private readonly nodes: readonly Node[], private readonly offset: number) {}

    get length(): number {
        return Math.max(0, this.nodes.length - this.offset);
    }

    at(index: number): Node | undefined {
        return index >= 0 && index < this.length ? this.nodes[this.offset + index] : undefined;
    }

    *[Symbol.iterator](): Iterator<Node> {
        for (let i = this.offset; i < this.nodes.length; i++) yield this.nodes[i];
    }
}

const NO_SIBLINGS = new SiblingView([], 0);

// ── Traversal ───────────────────────────────────────────────

export function filter(root: Node, rule: FilterRule): Node {
    const result = rule(root, NO_SIBLINGS);
    switch (result.tag) {
        case 'Unchanged':
            return filterChildren(root, rule);
        case 'Replace':
        case 'Consume':
            if (result.nodes.length === 1) return result.nodes[0];
            return root.tag === 'Document' ? mk.document(result.nodes) : mk.group(result.nodes);
    }
}

export function filterNodes(nodes: readonly Node[], rule: FilterRule): readonly Node[] {
    const out: Node[] = [];
    let changed = false;
    let i = 0;

    while (i < nodes.length) {
        const node = nodes[i];
        const result = rule(node, new SiblingView(nodes, i + 1));

        switch (result.tag) {
            case 'Unchanged': {
                const next = filterChildren(node, rule);
                if (next !== node) changed = true;
                out.push(next);
                i++;
                break;
            }
            case 'Replace':
                out.push(...result.nodes);
                changed = true;
                i++;
                break;
            case 'Consume': {
                const count = Number.isFinite(result.count) ? Math.floor(result.count) : 0;
                const skip = Math.max(0, Math.min(count, nodes.length - i - 1));
                out.push(...result.nodes);
                changed = true;
                i += 1 + skip;
                break;
            }
        }
    }

    return changed ? out : nodes;
}

function filterChildren(node: Node, rule: FilterRule): Node {
    const lists = childLists(node);
    if (lists.length === 0) return node;

    const filtered = lists.map(list => filterNodes(list, rule));
    if (filtered.every((list, i) => sameNodes(list, lists[i]))) return node;
    return withChildLists(node, filtered);
}
