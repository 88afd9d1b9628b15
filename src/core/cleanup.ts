// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Cleanup Filters
// ─────────────────────────────────────────────────────────────

import { mk, type Node } from './ast';
import { filter, remove, replace, unchanged, type FilterRule } from './filter';

const LETTER_NAME = /^[A-Za-z]+$/;

const separateCommand: FilterRule = (node, rest) => {
    if (node.tag !== 'Command' || node.starred || node.args.length > 0 || !LETTER_NAME.test(node.name)) {
        return unchanged();
    }
    const next = rest.at(0);
    if (next?.tag === 'Text' && /^[A-Za-z]/.test(next.text)) return replace([node, mk.text(' ')]);
    return unchanged();
};

/**
 * Put a space between `\name` and letters that follow it, so that `\alpha`
 * spliced before `x` does not re-tokenize as `\alphax`.
 */
export function fixWhitespace(root: Node): Node {
    return filter(root, separateCommand);
}

/** Drop comments, keeping `\foo%...` from running into the next line's letters. */
export function stripComments(root: Node): Node {
    return fixWhitespace(filter(root, node => (node.tag === 'Comment' ? remove() : unchanged())));
}
