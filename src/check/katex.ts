// ─────────────────────────────────────────────────────────────
// Unmacro  ·  KaTeX Math Check
// Reports math that a KaTeX renderer rejects
// ─────────────────────────────────────────────────────────────

import katex from 'katex';
import { childLists, type MathNode, type Node, type Span } from '../core/ast';
import { render, renderNodes } from '../core/render';

export interface MathDiagnostic {
    /** The whole math node as written, delimiters included. */
    source: string;
    /** What was handed to KaTeX. */
    tex: string;
    message: string;
    displayMode: boolean;
    span?: Span;
}

export interface CheckMathOptions {
    /** Passed to KaTeX as-is, e.g. `{ '\\R': '\\mathbb{R}' }`. */
    macros?: Record<string, string>;
}

export function checkMath(root: Node, options: CheckMathOptions = {}): MathDiagnostic[] {
    const diagnostics: MathDiagnostic[] = [];
    for (const math of outermostMath(root)) {
        const diagnostic = checkOne(math, options);
        if (diagnostic) diagnostics.push(diagnostic);
    }
    return diagnostics;
}

function checkOne(math: MathNode, options: CheckMathOptions): MathDiagnostic | null {
    const tex = renderNodes(math.body);
    const displayMode = math.kind === 'display';
    try {
        // KaTeX mutates the macros object it is given
        katex.renderToString(tex, { displayMode, throwOnError: true, macros: { ...options.macros } });
        return null;
    } catch (e) {
        if (!(e instanceof katex.ParseError)) throw e;
        return { source: render(math), tex, message: e.message, displayMode, span: math.span };
    }
}

function outermostMath(node: Node): MathNode[] {
    if (node.tag === 'Math') return [node];
    return childLists(node).flatMap(list => list.flatMap(outermostMath));
}
