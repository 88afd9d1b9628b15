// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Parameter Substitution
// ─────────────────────────────────────────────────────────────

import {
    childLists, cloneNode, cloneNodes, mk, withChildLists,
    type Node, type ParameterNode,
} from '../core/ast';
import { MacroError } from '../core/errors';

/**
 * Fresh copy of `template` with `#k` bound to `args[k - 1]`. Doubled hashes
 * halve, so `##1` in a body becomes `#1` of a definition made by the body.
 */
export function substitute(template: readonly Node[], args: readonly (readonly Node[])[], owner: string): Node[] {
    const out: Node[] = [];
    for (const node of template) {
        if (node.tag === 'Parameter') {
            out.push(...substituteParameter(node, args, owner));
            continue;
        }
        const lists = childLists(node);
        if (lists.length === 0) {
            out.push(cloneNode(node));
            continue;
        }
        out.push(withChildLists(node, lists.map(list => substitute(list, args, owner))));
    }
    return out;
}

function substituteParameter(param: ParameterNode, args: readonly (readonly Node[])[], owner: string): Node[] {
    if (param.hashes % 2 === 0) return [mk.parameter(param.index, param.hashes / 2)];

    const value = args[param.index - 1];
    if (value === undefined) {
        throw new MacroError('InvalidDefinition', `Illegal parameter number #${param.index} in ${owner}`, owner);
    }
    const escaped = (param.hashes - 1) / 2;
    return escaped > 0 ? [mk.text('#'.repeat(escaped)), ...cloneNodes(value)] : cloneNodes(value);
}
