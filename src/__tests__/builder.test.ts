// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Tree Builder Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { parse } from '../parser/builder';
import { ParseError } from '../core/errors';
import { childLists, textContent, withChildLists, type Node } from '../core/ast';
import { render } from '../core/render';

/** Same tree with every span dropped, so render has to rebuild the text. */
function stripSpans(node: Node): Node {
    return withChildLists(node, childLists(node).map(list => list.map(stripSpans)));
}

function parseError(source: string): ParseError {
    try {
        parse(source);
    } catch (e) {
        if (e instanceof ParseError) return e;
        throw e;
    }
    throw new Error(`parsed without error: ${source}`);
}

describe('parse', () => {
    describe('commands', () => {
        it('captures optional arguments and leaves groups as siblings', () => {
            const doc = parse('\\section*[short]{Title} text');
            expect(doc.children.map(n => n.tag)).toEqual(['Command', 'Group', 'Text', 'Text']);
            const cmd = doc.children[0];
            expect(cmd.tag === 'Command' && cmd.starred).toBe(true);
            if (cmd.tag === 'Command') {
                expect(cmd.name).toBe('section');
                expect(cmd.args).toHaveLength(1);
                expect(cmd.args[0].kind).toBe('optional');
                expect(textContent(cmd.args[0].children)).toBe('short');
            }
        });

        it('captures mandatory arguments from a registered signature', () => {
            const doc = parse('\\frac{a} {b}', { signatures: { frac: 'mm' } });
            expect(doc.children).toHaveLength(1);
            const cmd = doc.children[0];
            expect(cmd.tag).toBe('Command');
            if (cmd.tag === 'Command') {
                expect(cmd.args.map(a => a.kind)).toEqual(['mandatory', 'mandatory']);
                expect(cmd.args[1].leading).toBe(' ');
                expect(textContent(cmd.args[1].children)).toBe('b');
            }
        });

        it('reads definitions with their built-in signature', () => {
            const doc = parse('\\newcommand{\\foo}[1]{\\begin{x}#1}');
            const cmd = doc.children[0];
            expect(doc.children).toHaveLength(1);
            if (cmd.tag === 'Command') {
                expect(cmd.args.map(a => a.kind)).toEqual(['mandatory', 'optional', 'mandatory']);
                expect(cmd.args[2].children.map(n => n.tag)).toEqual(['Command', 'Parameter']);
            }
        });

        it('accepts a bare command name in a definition', () => {
            const doc = parse('\\newcommand\\foo{x}');
            const cmd = doc.children[0];
            if (cmd.tag === 'Command') {
                expect(cmd.args[0].braced).toBe(false);
                expect(cmd.args[0].children[0]).toMatchObject({ tag: 'Command', name: 'foo' });
            }
        });
    });

    describe('environments', () => {
        it('builds an environment with its arguments and body', () => {
            const doc = parse('\\begin{itemize}[x]\\item A\\end{itemize}');
            const env = doc.children[0];
            expect(env.tag).toBe('Environment');
            if (env.tag === 'Environment') {
                expect(env.name).toBe('itemize');
                expect(env.args.map(a => a.kind)).toEqual(['optional']);
                expect(env.body.map(n => n.tag)).toEqual(['Command', 'Text', 'Text']);
            }
        });

        it('keeps unbalanced \\begin and \\end in a definition body as commands', () => {
            const doc = parse('\\newenvironment{quote2}{\\begin{quote}}{\\end{quote}}');
            const cmd = doc.children[0];
            if (cmd.tag === 'Command') {
                expect(cmd.args[1].children[0]).toMatchObject({ tag: 'Command', name: 'begin' });
                expect(cmd.args[2].children[0]).toMatchObject({ tag: 'Command', name: 'end' });
            }
        });
    });

    describe('math', () => {
        it('nests math inside a group within math', () => {
            const doc = parse('$f(x) = 1 \\text{ if $x > 0$}$');
            expect(doc.children).toHaveLength(1);
            const math = doc.children[0];
            expect(math.tag).toBe('Math');
            if (math.tag !== 'Math') return;
            const group = math.body[math.body.length - 1];
            expect(group.tag).toBe('Group');
            if (group.tag === 'Group') expect(group.children[group.children.length - 1]).toMatchObject({ tag: 'Math', kind: 'inline' });
        });

        it('distinguishes the math kinds', () => {
            const doc = parse('$x$ \\[y\\] \\(z\\) $$w$$');
            const math = doc.children.filter(n => n.tag === 'Math');
            expect(math.map(n => n.tag === 'Math' ? [n.kind, n.delimiter] : [])).toEqual([
                ['inline', '$'], ['display', '\\['], ['explicit', '\\('], ['display', '$$'],
            ]);
        });
    });

    describe('definition bodies', () => {
        it('turns many unmatched \\begin into commands without re-parsing each', () => {
            const doc = parse('\\newcommand{\\x}{' + '\\begin{a}'.repeat(30) + '}');
            const cmd = doc.children[0];
            expect(cmd.tag).toBe('Command');
            if (cmd.tag === 'Command') {
                expect(cmd.args[1].children).toHaveLength(30);
                expect(cmd.args[1].children.every(n => n.tag === 'Command' && n.name === 'begin')).toBe(true);
            }
        }, 2000);

        it('keeps a lone $ as text and math after it intact', () => {
            const doc = parse('\\newcommand{\\mo}{$}\nLet $y$ be.');
            const cmd = doc.children[0];
            if (cmd.tag === 'Command') expect(cmd.args[1].children).toMatchObject([{ tag: 'Text', text: '$' }]);
            expect(doc.children.filter(n => n.tag === 'Math')).toHaveLength(1);
        });
    });

    describe('comments', () => {
        it('excludes comments from text content', () => {
            expect(textContent(parse('foo%comment\n  bar'))).toBe('foobar');
        });

        it('records the comment text and what it absorbed', () => {
            const doc = parse('a%note\n\tb');
            expect(doc.children[1]).toMatchObject({ tag: 'Comment', text: 'note', trailing: '\n\t' });
        });
    });

    describe('errors', () => {
        it('reports an unclosed group with its position', () => {
            const e = parseError('{a');
            expect(e.kind).toBe('UnbalancedGroup');
            expect(e.position).toBe(2);
            expect(e.message).toBe('Group is not closed before end of input (line 1, column 3)');
        });

        it('counts lines and columns', () => {
            const e = parseError('ab\ncd{');
            expect(e.line).toBe(2);
            expect(e.column).toBe(4);
        });

        it('reports a stray closing brace', () => {
            expect(parseError('a}').kind).toBe('UnbalancedGroup');
        });

        it('reports mismatched environment names', () => {
            expect(parseError('\\begin{a}x\\end{b}').kind).toBe('EnvironmentNameMismatch');
            expect(parseError('\\end{a}').kind).toBe('EnvironmentNameMismatch');
        });

        it('reports an environment that never ends', () => {
            expect(parseError('\\begin{a}x').kind).toBe('UnterminatedEnvironment');
        });

        it('reports a missing environment name', () => {
            expect(parseError('\\begin x').kind).toBe('MissingMandatoryArgument');
        });

        it('reports a missing registered argument', () => {
            expect(() => parse('\\frac{a}', { signatures: { frac: 'mm' } })).toThrow(ParseError);
        });

        it('reports unclosed math', () => {
            expect(parseError('$x').kind).toBe('UnbalancedGroup');
        });
    });

    describe('round trip', () => {
        const sources = [
            'Hello, \\textbf{world}!% note\n  next',
            '\\section*[s] {T}',
            '\\begin{itemize}[x]\n\\item $a_1$\n\\end{itemize}',
            '\\newcommand{\\f}[2][d]{#1 ##2}',
            '\\newcommand\\g{x}',
            '\\(a\\) \\[b\\] $$c$ d$ e$$',
            '100\\% of \\{x\\} costs \\$5 [really]',
            '$f(x) = 1 \\text{ if $x > 0$}$',
            '\\newcommand{\\mo}{$}\nLet $y$ be.',
        ];

        for (const source of sources) {
            it(`reproduces ${JSON.stringify(source)}`, () => {
                const doc = parse(source);
                expect(render(doc)).toBe(source);
                expect(render(stripSpans(doc))).toBe(source);
            });
        }
    });
});
