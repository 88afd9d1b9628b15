// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Tree Builder
// Recursive descent from tokens to a lossless Document
// ─────────────────────────────────────────────────────────────

import {
    mk, MATH_CLOSERS, textContent,
    type Arg, type DocumentNode, type GroupNode, type MathDelimiter, type Node, type Span,
} from '../core/ast';
import { ParseError, type ParseErrorKind } from '../core/errors';
import { tokenize, type Token, type TokenizeOptions } from './tokenizer';

// ── Options ─────────────────────────────────────────────────

/**
 * Argument shapes, one letter per argument:
 *   o  optional `[...]`
 *   m  mandatory `{...}`
 *   n  command name, `{\name}` or a bare `\name`
 *   b  mandatory `{...}` holding a definition body, parsed leniently
 */
export type Signature = string;

export interface ParseOptions extends TokenizeOptions {
    signatures?: Readonly<Record<string, Signature>>;
    environments?: Readonly<Record<string, Signature>>;
    /**
     * Tolerate unmatched `\begin`/`\end` and math delimiters, turning them
     * into plain commands and text. Used for macro bodies.
     */
    lenient?: boolean;
}

export const DEFINITION_SIGNATURES: Readonly<Record<string, Signature>> = {
    newcommand: 'noob',
    renewcommand: 'noob',
    providecommand: 'noob',
    newenvironment: 'moobb',
    renewenvironment: 'moobb',
};

type Closer =
    | { kind: 'eof' }
    | { kind: 'brace' }
    | { kind: 'bracket' }
    | { kind: 'math'; delimiter: MathDelimiter }
    | { kind: 'env'; name: string };

// ── Entry points ────────────────────────────────────────────

export function parse(text: string, options: ParseOptions = {}): DocumentNode {
    return build(tokenize(text, options), text, options);
}

export function build(tokens: readonly Token[], source: string, options: ParseOptions = {}): DocumentNode {
    return new TreeBuilder(tokens, source, options).parseDocument();
}

// ── Builder ─────────────────────────────────────────────────

class TreeBuilder {
    private pos = 0;
    private lenientDepth = 0;
    private bareDepth = 0;
    // token positions of \begin and math openers already found unmatched
    private readonly unmatched = new Set<number>();
    private readonly signatures: Map<string, Signature>;
    private readonly environments: Map<string, Signature>;

    constructor(
        private readonly tokens: readonly Token[],
        private readonly source: string,
        private readonly options: ParseOptions,
    ) {
        this.signatures = new Map(Object.entries({ ...options.signatures, ...DEFINITION_SIGNATURES }));
        this.environments = new Map(Object.entries(options.environments ?? {}));
    }

    parseDocument(): DocumentNode {
        const children = this.parseSequence({ kind: 'eof' });
        return mk.document(children, this.span(0, this.source.length));
    }

    // ── Token access ────────────────────────────────────

    private peek(): Token | undefined {
        return this.tokens[this.pos];
    }

    private advance(): Token {
        const tok = this.tokens[this.pos];
        if (!tok) throw this.error('UnbalancedGroup', 'Unexpected end of input', this.source.length);
        this.pos++;
        return tok;
    }

    private lastEnd(): number {
        return this.pos > 0 ? this.tokens[this.pos - 1].end : 0;
    }

    private span(start: number, end: number): Span {
        return { source: this.source, start, end };
    }

    private error(kind: ParseErrorKind, message: string, position: number): ParseError {
        return new ParseError(kind, message, this.source, position);
    }

    private isLenient(): boolean {
        return this.options.lenient === true || this.lenientDepth > 0;
    }

    /** Consume whitespace tokens and return their text. */
    private readWhitespace(): string {
        let text = '';
        for (let tok = this.peek(); tok?.kind === 'whitespace'; tok = this.peek()) {
            text += tok.value;
            this.pos++;
        }
        return text;
    }

    // ── Sequences ───────────────────────────────────────

    private parseSequence(closer: Closer): Node[] {
        const nodes: Node[] = [];

        for (;;) {
            const tok = this.peek();
            if (!tok) {
                if (closer.kind === 'eof') return nodes;
                throw this.unclosed(closer, this.source.length);
            }

            switch (tok.kind) {
                case 'text':
                case 'whitespace':
                case 'star':
                case 'lbracket':
                    // a bracket reaching this point is not an argument
                    this.pos++;
                    nodes.push(mk.text(tok.value, this.span(tok.start, tok.end)));
                    break;

                case 'rbracket':
                    if (closer.kind === 'bracket') return nodes;
                    this.pos++;
                    nodes.push(mk.text(tok.value, this.span(tok.start, tok.end)));
                    break;

                case 'comment':
                    this.pos++;
                    nodes.push(mk.comment(
                        tok.value,
                        this.source.slice(tok.start + 1 + tok.value.length, tok.end),
                        this.span(tok.start, tok.end),
                    ));
                    break;

                case 'param':
                    this.pos++;
                    nodes.push(mk.parameter(
                        Number(tok.value[tok.value.length - 1]),
                        tok.value.length - 1,
                        this.span(tok.start, tok.end),
                    ));
                    break;

                case 'lbrace':
                    nodes.push(this.parseGroup());
                    break;

                case 'rbrace':
                    if (closer.kind === 'brace') return nodes;
                    throw this.unclosed(closer, tok.start, '}');

                case 'mathOpen':
                    nodes.push(this.parseMath());
                    break;

                case 'mathClose':
                    if (closer.kind === 'math' && MATH_CLOSERS[closer.delimiter] === tok.value) return nodes;
                    if (this.isLenient()) {
                        this.pos++;
                        nodes.push(mk.text(tok.value, this.span(tok.start, tok.end)));
                        break;
                    }
                    if (closer.kind === 'env') throw this.unclosed(closer, tok.start, tok.value);
                    throw this.error('UnbalancedGroup', `Unexpected math delimiter ${tok.value}`, tok.start);

                case 'command':
                    if (tok.value === 'begin') {
                        nodes.push(this.parseEnvironment());
                    } else if (tok.value === 'end') {
                        if (closer.kind === 'env') return nodes;
                        if (!this.isLenient()) {
                            throw this.error('EnvironmentNameMismatch', '\\end without matching \\begin', tok.start);
                        }
                        nodes.push(this.parseBareEnvironmentCommand());
                    } else {
                        nodes.push(this.parseCommand());
                    }
                    break;
            }
        }
    }

    private unclosed(closer: Closer, position: number, found = 'end of input'): ParseError {
        switch (closer.kind) {
            case 'env':
                return this.error('UnterminatedEnvironment', `\\begin{${closer.name}} is not closed before ${found}`, position);
            case 'math':
                return this.error('UnbalancedGroup', `Math opened with ${closer.delimiter} is not closed before ${found}`, position);
            case 'brace':
            case 'bracket':
                return this.error('UnbalancedGroup', `Group is not closed before ${found}`, position);
            case 'eof':
                return this.error('UnbalancedGroup', `Unexpected ${found}`, position);
        }
    }

    // ── Groups and math ─────────────────────────────────

    private parseGroup(): GroupNode {
        const open = this.advance();
        const children = this.parseSequence({ kind: 'brace' });
        this.advance();
        return mk.group(children, this.span(open.start, this.lastEnd()));
    }

    private parseMath(): Node {
        const mark = this.pos;
        const open = this.tokens[mark];
        if (open.kind !== 'mathOpen') throw this.error('UnbalancedGroup', 'Expected a math delimiter', open.start);
        const delimiter = open.value;

        if (!this.isLenient()) return this.parseMathBody(open.start, delimiter);
        if (!this.unmatched.has(mark)) {
            try {
                return this.parseMathBody(open.start, delimiter);
            } catch (e) {
                if (!(e instanceof ParseError)) throw e;
                this.unmatched.add(mark);
            }
        }
        // unbalanced inside a definition body: keep the delimiter as text
        this.pos = mark + 1;
        return mk.text(delimiter, this.span(open.start, open.end));
    }

    private parseMathBody(start: number, delimiter: MathDelimiter): Node {
        this.pos++;
        const body = this.parseSequence({ kind: 'math', delimiter });
        this.advance();
        return mk.math(delimiter, body, this.span(start, this.lastEnd()));
    }

    // ── Environments ────────────────────────────────────

    private parseEnvironment(): Node {
        const mark = this.pos;
        const begin = this.advance();
        const { name, leading, group } = this.readEnvironmentName();

        if (!this.isLenient()) return this.parseEnvironmentBody(begin.start, name);

        const afterName = this.pos;
        if (!this.unmatched.has(mark)) {
            try {
                return this.parseEnvironmentBody(begin.start, name);
            } catch (e) {
                if (!(e instanceof ParseError)) throw e;
                this.unmatched.add(mark);
            }
        }
        // unbalanced inside a definition body: keep \begin{name} as a command
        this.pos = afterName;
        return mk.command('begin', [mk.mandatory(group.children, leading)], false,
            this.span(begin.start, this.lastEnd()));
    }

    private parseEnvironmentBody(start: number, name: string): Node {
        const args = this.parseArguments(this.environments.get(name), `\\begin{${name}}`);
        const body = this.parseSequence({ kind: 'env', name });

        const end = this.advance();
        const closing = this.readEnvironmentName();
        if (closing.name !== name) {
            throw this.error('EnvironmentNameMismatch', `\\begin{${name}} ended by \\end{${closing.name}}`, end.start);
        }
        return mk.environment(name, body, args, this.span(start, this.lastEnd()));
    }

    private parseBareEnvironmentCommand(): Node {
        const end = this.advance();
        const { leading, group } = this.readEnvironmentName();
        return mk.command('end', [mk.mandatory(group.children, leading)], false, this.span(end.start, this.lastEnd()));
    }

    private readEnvironmentName(): { name: string; leading: string; group: GroupNode } {
        const mark = this.pos;
        const leading = this.readWhitespace();
        const tok = this.peek();
        if (tok?.kind !== 'lbrace') {
            this.pos = mark;
            throw this.error('MissingMandatoryArgument', 'Environment name expected', tok?.start ?? this.source.length);
        }
        const group = this.parseGroup();
        if (group.children.some(c => c.tag !== 'Text')) {
            throw this.error('MissingMandatoryArgument', 'Environment name must be plain text', tok.start);
        }
        return { name: textContent(group.children), leading, group };
    }

    // ── Commands ────────────────────────────────────────

    private parseCommand(): Node {
        const tok = this.advance();
        let starred = false;
        if (this.peek()?.kind === 'star') {
            this.pos++;
            starred = true;
        }
        const args = this.bareDepth > 0 ? [] : this.parseArguments(this.signatures.get(tok.value), `\\${tok.value}`);
        return mk.command(tok.value, args, starred, this.span(tok.start, this.lastEnd()));
    }

    /** Arguments per signature, or any run of optional arguments when none is registered. */
    private parseArguments(signature: Signature | undefined, owner: string): Arg[] {
        const args: Arg[] = [];
        if (signature === undefined) {
            for (let arg = this.tryOptional(); arg; arg = this.tryOptional()) args.push(arg);
            return args;
        }

        for (const slot of signature) {
            switch (slot) {
                case 'o': {
                    const arg = this.tryOptional();
                    if (arg) args.push(arg);
                    break;
                }
                case 'm': {
                    // inside definition bodies arguments may come from the call site
                    const arg = this.isLenient() ? this.tryGroup(false) : this.requireGroup(owner, false);
                    if (!arg) return args;
                    args.push(arg);
                    break;
                }
                case 'b':
                    args.push(this.requireGroup(owner, true));
                    break;
                case 'n':
                    args.push(this.requireName(owner));
                    break;
                default:
                    throw new Error(`Unknown signature letter '${slot}' for ${owner}`);
            }
        }
        return args;
    }

    private tryOptional(): Arg | null {
        const mark = this.pos;
        const leading = this.readWhitespace();
        if (this.peek()?.kind !== 'lbracket') {
            this.pos = mark;
            return null;
        }
        this.pos++;
        const children = this.parseSequence({ kind: 'bracket' });
        this.advance();
        return { kind: 'optional', leading, braced: true, children };
    }

    private tryGroup(lenient: boolean): Arg | null {
        const mark = this.pos;
        const leading = this.readWhitespace();
        if (this.peek()?.kind !== 'lbrace') {
            this.pos = mark;
            return null;
        }
        if (lenient) this.lenientDepth++;
        try {
            return { kind: 'mandatory', leading, braced: true, children: this.parseGroup().children };
        } finally {
            if (lenient) this.lenientDepth--;
        }
    }

    private requireGroup(owner: string, lenient: boolean): Arg {
        const arg = this.tryGroup(lenient);
        if (arg) return arg;
        throw this.error('MissingMandatoryArgument', `${owner} expects a {...} argument`,
            this.peek()?.start ?? this.source.length);
    }

    private requireName(owner: string): Arg {
        const mark = this.pos;
        const leading = this.readWhitespace();
        const tok = this.peek();

        if (tok?.kind === 'command') {
            this.pos++;
            const name = mk.command(tok.value, [], false, this.span(tok.start, tok.end));
            return { kind: 'mandatory', leading, braced: false, children: [name] };
        }
        if (tok?.kind === 'lbrace') {
            this.bareDepth++;
            try {
                return { kind: 'mandatory', leading, braced: true, children: this.parseGroup().children };
            } finally {
                this.bareDepth--;
            }
        }
        this.pos = mark;
        throw this.error('MissingMandatoryArgument', `${owner} expects a command name`, tok?.start ?? this.source.length);
    }
}
