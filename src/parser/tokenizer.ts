// ─────────────────────────────────────────────────────────────
// Unmacro  ·  LaTeX Tokenizer
// Flat, lossless scan: every input character lands in exactly
// one token, whitespace included
// ─────────────────────────────────────────────────────────────

import type { MathDelimiter } from '../core/ast';

// ── Token types ─────────────────────────────────────────────

export type TokenKind =
    | 'text' | 'whitespace' | 'command' | 'star'
    | 'lbrace' | 'rbrace' | 'lbracket' | 'rbracket'
    | 'comment' | 'mathOpen' | 'mathClose' | 'param';

interface TokenBase {
    start: number;
    end: number;
}

export type Token =
    | TokenBase & {
        kind: Exclude<TokenKind, 'mathOpen'>;
        /** Command name without the backslash, comment body, raw text otherwise. */
        value: string;
    }
    | TokenBase & { kind: 'mathOpen'; value: MathDelimiter };

export interface TokenizeOptions {
    /** Treat `%` inside math as a comment. Defaults to true. */
    mathComments?: boolean;
}

// ── Patterns ────────────────────────────────────────────────

const LETTERS = /[A-Za-z]+/y;
const WHITESPACE = /\s+/y;
const PARAMETER = /#+[1-9]/y;
const ESCAPED = new Set(['%', '{', '}', '$', '&', '#', '_']);

function matchAt(pattern: RegExp, text: string, pos: number): string | null {
    pattern.lastIndex = pos;
    const m = pattern.exec(text);
    return m ? m[0] : null;
}

// ── Tokenizer ───────────────────────────────────────────────

export function tokenize(input: string, options: TokenizeOptions = {}): Token[] {
    const mathComments = options.mathComments ?? true;
    const tokens: Token[] = [];

    // `[` counts as argument syntax only right after a command, a star,
    // or a closed argument
    let argPosition = false;
    // per open brace: did it open in argument position
    const braces: boolean[] = [];
    // brace depth at which each open argument bracket started
    const brackets: number[] = [];
    // open math, with the brace depth it opened at
    const math: { delimiter: MathDelimiter; depth: number }[] = [];

    const push = (kind: Exclude<TokenKind, 'mathOpen'>, start: number, end: number, value = input.slice(start, end)) => {
        const last = tokens[tokens.length - 1];
        if (kind === 'text' && last && last.kind === 'text' && last.end === start) {
            last.end = end;
            last.value += value;
            return;
        }
        tokens.push({ kind, value, start, end });
    };

    const commentsActive = () => mathComments || math.length === 0;

    let i = 0;
    while (i < input.length) {
        const ch = input[i];

        // Commands, escapes, and bracket-style math delimiters
        if (ch === '\\') {
            const next = input[i + 1];
            if (next === undefined) {
                push('text', i, i + 1);
                argPosition = false;
                i++;
                continue;
            }
            const name = matchAt(LETTERS, input, i + 1);
            if (name !== null) {
                push('command', i, i + 1 + name.length, name);
                i += 1 + name.length;
                argPosition = true;
                if (input[i] === '*') {
                    push('star', i, i + 1);
                    i++;
                }
                continue;
            }
            if (ESCAPED.has(next)) {
                push('text', i, i + 2);
                argPosition = false;
                i += 2;
                continue;
            }
            if (next === '(' || next === '[') {
                const delimiter = next === '(' ? '\\(' : '\\[';
                tokens.push({ kind: 'mathOpen', value: delimiter, start: i, end: i + 2 });
                math.push({ delimiter, depth: braces.length });
                argPosition = false;
                i += 2;
                continue;
            }
            if (next === ')' || next === ']') {
                const opener = next === ')' ? '\\(' : '\\[';
                if (math[math.length - 1]?.delimiter === opener) math.pop();
                push('mathClose', i, i + 2);
                argPosition = false;
                i += 2;
                continue;
            }
            // Single-character command like \\ or \,
            push('command', i, i + 2, next);
            i += 2;
            argPosition = true;
            if (input[i] === '*') {
                push('star', i, i + 1);
                i++;
            }
            continue;
        }

        if (ch === '%' && commentsActive()) {
            const end = scanComment(input, i);
            let bodyEnd = input.indexOf('\n', i);
            if (bodyEnd === -1) bodyEnd = input.length;
            if (bodyEnd > i + 1 && input[bodyEnd - 1] === '\r') bodyEnd--;
            push('comment', i, end, input.slice(i + 1, bodyEnd));
            argPosition = false;
            i = end;
            continue;
        }

        if (ch === '{') {
            push('lbrace', i, i + 1);
            braces.push(argPosition);
            argPosition = false;
            i++;
            continue;
        }

        if (ch === '}') {
            push('rbrace', i, i + 1);
            argPosition = braces.pop() ?? false;
            // math left open inside the group ends with it
            while (math.length > 0 && math[math.length - 1].depth > braces.length) math.pop();
            i++;
            continue;
        }

        if (ch === '[' && argPosition && findClosingBracket(input, i, commentsActive()) !== -1) {
            push('lbracket', i, i + 1);
            brackets.push(braces.length);
            argPosition = false;
            i++;
            continue;
        }

        if (ch === ']' && brackets.length > 0 && brackets[brackets.length - 1] === braces.length) {
            push('rbracket', i, i + 1);
            brackets.pop();
            argPosition = true;
            i++;
            continue;
        }

        if (ch === '$') {
            const top = math[math.length - 1];
            // a `$` inside a group within math opens nested math
            const closes = top !== undefined && top.depth === braces.length ? top.delimiter : undefined;
            const double = input[i + 1] === '$';
            argPosition = false;
            if (closes === '$') {
                math.pop();
                push('mathClose', i, i + 1);
                i++;
            } else if (double && closes === '$$') {
                math.pop();
                push('mathClose', i, i + 2);
                i += 2;
            } else if (double && top === undefined) {
                math.push({ delimiter: '$$', depth: braces.length });
                tokens.push({ kind: 'mathOpen', value: '$$', start: i, end: i + 2 });
                i += 2;
            } else {
                // inline math, possibly nested inside display math
                math.push({ delimiter: '$', depth: braces.length });
                tokens.push({ kind: 'mathOpen', value: '$', start: i, end: i + 1 });
                i++;
            }
            continue;
        }

        if (ch === '#') {
            const param = matchAt(PARAMETER, input, i);
            if (param !== null) {
                push('param', i, i + param.length);
                argPosition = false;
                i += param.length;
                continue;
            }
        }

        const space = matchAt(WHITESPACE, input, i);
        if (space !== null) {
            push('whitespace', i, i + space.length);
            i += space.length;
            continue;
        }

        push('text', i, i + 1);
        argPosition = false;
        i++;
    }

    return tokens;
}

// ── Helpers ─────────────────────────────────────────────────

/** End of a comment starting at `start`: past the line break and the next line's indentation. */
function scanComment(input: string, start: number): number {
    const newline = input.indexOf('\n', start);
    if (newline === -1) return input.length;
    let end = newline + 1;
    while (input[end] === ' ' || input[end] === '\t') end++;
    return end;
}

/**
 * Position of the `]` closing an optional argument opened at `open`, or -1
 * when the enclosing group ends first.
 */
function findClosingBracket(input: string, open: number, comments: boolean): number {
    let depth = 0;
    let j = open + 1;
    while (j < input.length) {
        const c = input[j];
        if (c === '\\') {
            j += 2;
            continue;
        }
        if (c === '%' && comments) {
            const newline = input.indexOf('\n', j);
            if (newline === -1) return -1;
            j = newline + 1;
            continue;
        }
        if (c === '{') depth++;
        else if (c === '}') {
            if (depth === 0) return -1;
            depth--;
        } else if (c === ']' && depth === 0) {
            return j;
        }
        j++;
    }
    return -1;
}
