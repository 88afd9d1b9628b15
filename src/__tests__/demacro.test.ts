// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Demacro Engine Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { mk, type Node } from '../core/ast';
import { MacroError, type MacroErrorKind } from '../core/errors';
import type { Logger } from '../core/log';
import { render } from '../core/render';
import { Demacro, type DemacroOptions } from '../demacro/demacro';
import { macrosFromSpecs } from '../demacro/definitions';
import { parse } from '../parser/builder';

// ── Helpers ─────────────────────────────────────────────────

function engine(options: DemacroOptions = {}): Demacro {
    return new Demacro({ maxDepth: 64, maxExpansions: 10_000, logLevel: 'silent', ...options });
}

function expand(source: string, demacro = engine()): string {
    return render(demacro.demacro(parse(source)));
}

function failure(run: () => unknown): MacroErrorKind {
    try {
        run();
    } catch (e) {
        if (e instanceof MacroError) return e.kind;
        throw e;
    }
    throw new Error('expected a MacroError');
}

// ── Programmatic macros ─────────────────────────────────────

describe('addMacros', () => {
    it('expands a macro with an argument', () => {
        const d = engine();
        d.addMacros({ test: { body: 'testing #1', args: 1 } });
        expect(expand('\\test{X}', d)).toBe('testing X');
    });

    it('expands arguments the parser captured', () => {
        const d = engine();
        d.addMacros({ test: { body: 'testing #1', args: 1 } });
        expect(render(d.demacro(parse('\\test{X}', d.parseOptions())))).toBe('testing X');
    });

    it('skips comments and blank text before an argument', () => {
        const d = engine();
        d.addMacros({ test: { body: 'testing #1', args: 1 } });
        expect(expand('\\test%c\n{X}', d)).toBe('testing X');
        expect(expand('\\test {X}', d)).toBe('testing X');
    });

    it('calls function bodies with the bound arguments', () => {
        const d = engine();
        d.addMacros({
            twice: { body: (a: Node[]) => [...a, ...a] },
            R: { body: () => [mk.command('mathbb', [mk.mandatory([mk.text('R')])])] },
        });
        expect(expand('\\twice{ab}', d)).toBe('abab');
        expect(expand('$\\R$', d)).toBe('$\\mathbb{R}$');
    });

    it('uses the default for an omitted optional argument', () => {
        const d = engine();
        d.addMacros({ greet: { body: '#1, #2', args: 2, optionalDefault: 'Hello' } });
        expect(expand('\\greet{you}', d)).toBe('Hello, you');
        expect(expand('\\greet[Bye]{you}', d)).toBe('Bye, you');
    });

    it('re-emits captured arguments the macro does not take', () => {
        const d = engine();
        d.addMacros({ hi: { body: 'Hello' } });
        expect(expand('\\hi[x] there', d)).toBe('Hello[x] there');
        expect(expand('\\hi* there', d)).toBe('Hello* there');
    });

    it('rejects malformed mappings without registering any of them', () => {
        const d = engine();
        expect(failure(() => d.addMacros({ good: { body: 'g' }, 'bad name': { body: 'b' } }))).toBe('InvalidDefinition');
        expect(d.hasMacro('good')).toBe(false);
        expect(failure(() => d.addMacros({ x: { body: 'x', optionalDefault: 'd' } }))).toBe('InvalidDefinition');
    });

    it('validates mappings from untyped callers', () => {
        const untyped: unknown = JSON.parse('{"x": {"body": 42}}');
        expect(failure(() => macrosFromSpecs(untyped))).toBe('InvalidDefinition');
        expect(failure(() => macrosFromSpecs(['x']))).toBe('InvalidDefinition');
    });

    it('lists what is registered', () => {
        const d = engine();
        d.addMacros({ a: { body: 'x' }, b: { body: '#1', args: 1 } });
        d.addEnvironments({ box: { open: '(', close: ')', args: 2, optionalDefault: 'd' } });
        expect(d.macroNames()).toEqual(['a', 'b']);
        expect(d.environmentNames()).toEqual(['box']);
        expect(d.hasEnvironment('box')).toBe(true);
        expect(d.parseOptions()).toEqual({ signatures: { a: '', b: 'm' }, environments: { box: 'om' } });
    });
});

// ── Definitions in the document ─────────────────────────────

describe('document definitions', () => {
    it('binds an optional argument or its default', () => {
        const source = '\\newcommand{\\foo}[2][{bar}]{#1 = #2}\\foo{baz} \\foo[qux]{baz}';
        expect(expand(source)).toBe('bar = baz qux = baz');
    });

    it('turns doubled hashes into parameters of nested definitions', () => {
        const source = '\\newcommand{\\test}[1][test]{\\newcommand{\\newtest}[1]{#1 = ##1}}\\test[hello]\\newtest{world}';
        expect(expand(source)).toBe('hello = world');
    });

    it('expands an environment into its begin and end code', () => {
        const source = '\\newenvironment{quote2}{\\begin{quote}}{\\end{quote}}\\begin{quote2}Hi\\end{quote2}';
        expect(expand(source)).toBe('\\begin{quote}Hi\\end{quote}');
    });

    it('keeps an existing macro under \\providecommand', () => {
        expect(expand('\\newcommand{\\x}{one}\\providecommand{\\x}{two}\\x')).toBe('one');
        expect(expand('\\providecommand{\\y}{two}\\y')).toBe('two');
    });

    it('replaces a macro under \\renewcommand', () => {
        expect(expand('\\newcommand{\\x}{one}\\renewcommand{\\x}{two}\\x')).toBe('two');
    });

    it('warns when \\newcommand redefines a macro', () => {
        const warnings: string[] = [];
        const logger: Logger = { warn: m => warnings.push(m), debug: () => undefined };
        expect(expand('\\newcommand{\\x}{a}\\newcommand{\\x}{b}\\x', engine({ logger }))).toBe('b');
        expect(warnings).toEqual(['\\newcommand redefines \\x']);
    });

    it('applies definitions made inside a group to the rest of the document', () => {
        expect(expand('{\\newcommand{\\g}{G}}\\g')).toBe('{}G');
    });

    it('keeps definitions for later calls', () => {
        const d = engine();
        expect(expand('\\newcommand*{\\bar}{Bar}', d)).toBe('');
        expect(d.hasMacro('bar')).toBe(true);
        expect(expand('\\bar', d)).toBe('Bar');
    });

    it('rejects an argument count that is not a digit', () => {
        expect(failure(() => expand('\\newcommand{\\x}[a]{b}'))).toBe('InvalidDefinition');
    });
});

// ── Environments ────────────────────────────────────────────

describe('addEnvironments', () => {
    it('binds arguments from the start of the body', () => {
        const d = engine();
        d.addEnvironments({ box: { open: '[#1|', close: '|#1]', args: 1 } });
        expect(expand('\\begin{box}{A}text\\end{box}', d)).toBe('[A|text|A]');
        expect(render(d.demacro(parse('\\begin{box}{A}text\\end{box}', d.parseOptions())))).toBe('[A|text|A]');
    });

    it('expands \\begin and \\end produced by macros', () => {
        const d = engine();
        d.addEnvironments({ wrap: { open: '<', close: '>' } });
        d.addMacros({ start: { body: '\\begin{wrap}' }, stop: { body: '\\end{wrap}' } });
        expect(expand('\\start x\\stop', d)).toBe('< x>');
    });

    it('fails on a \\begin that is never ended', () => {
        const d = engine();
        d.addEnvironments({ wrap: { open: '<', close: '>' } });
        d.addMacros({ start: { body: '\\begin{wrap}' } });
        expect(failure(() => expand('\\start', d))).toBe('UnterminatedEnvironment');
    });
});

// ── Failures ────────────────────────────────────────────────

describe('demacro failures', () => {
    it('reports a missing argument', () => {
        const d = engine();
        d.addMacros({ test: { body: 'testing #1', args: 1 } });
        expect(failure(() => expand('\\test', d))).toBe('MissingArgument');
        expect(failure(() => expand('\\test x', d))).toBe('MissingArgument');
    });

    it('detects a macro that expands to itself', () => {
        const d = engine();
        d.addMacros({ loop: { body: '\\loop', args: 0 } });
        expect(failure(() => expand('\\loop', d))).toBe('ExpansionCycle');
    });

    it('stops recursion that keeps growing its arguments', () => {
        const d = engine({ maxDepth: 5 });
        d.addMacros({ grow: { body: '\\grow{#1x}', args: 1 } });
        expect(failure(() => expand('\\grow{a}', d))).toBe('DepthLimitExceeded');
    });

    it('stops after too many expansions', () => {
        const d = engine({ maxExpansions: 2 });
        d.addMacros({ a: { body: '\\b\\b' }, b: { body: 'x' } });
        expect(failure(() => expand('\\a', d))).toBe('ExpansionLimitExceeded');
    });

    it('rejects a placeholder beyond the bound arguments', () => {
        const d = engine();
        d.addMacros({ bad: { body: '#2', args: 1 } });
        expect(failure(() => expand('\\bad{a}', d))).toBe('InvalidDefinition');
    });

    it('leaves the tables untouched when a call fails', () => {
        const d = engine();
        d.addMacros({ test: { body: 'testing #1', args: 1 } });
        expect(failure(() => expand('\\newcommand{\\extra}{e}\\test', d))).toBe('MissingArgument');
        expect(d.hasMacro('extra')).toBe(false);
    });
});

// ── Output shape ────────────────────────────────────────────

describe('demacro output', () => {
    it('returns the input tree when nothing expands', () => {
        const doc = parse('plain \\emph{text} $x$');
        expect(engine().demacro(doc)).toBe(doc);
    });

    it('separates a spliced command from letters after it', () => {
        const source = '\\newcommand{\\glue}[2]{#1#2}\\glue{\\alpha}{x}';
        expect(expand(source)).toBe('\\alpha x');
        expect(expand(source, engine({ separateCommands: false }))).toBe('\\alphax');
    });

    it('places a fresh copy of an argument each time it is used', () => {
        const d = engine();
        d.addMacros({ two: { body: '#1#1', args: 1 } });
        const doc = parse('\\two{{a}}');
        const out = d.demacro(doc);
        expect(out.tag).toBe('Document');
        if (out.tag !== 'Document') return;
        expect(out.children.map(n => n.tag)).toEqual(['Group', 'Group']);
        expect(out.children[0]).not.toBe(out.children[1]);
        const arg = doc.children[1];
        if (arg.tag === 'Group') expect(out.children[0]).not.toBe(arg.children[0]);
    });

    it('copies what a function body returns', () => {
        const d = engine();
        d.addMacros({ dup: { body: (a: Node[]) => [...a, ...a] } });
        const out = d.demacro(parse('\\dup{{a}}'));
        expect(out.tag).toBe('Document');
        if (out.tag !== 'Document') return;
        expect(out.children).toHaveLength(2);
        expect(out.children[0]).not.toBe(out.children[1]);
        expect(render(out)).toBe('{a}{a}');
    });

    it('expands a single node root', () => {
        const d = engine();
        d.addMacros({ R: { body: '\\mathbb{R}' } });
        expect(render(d.demacro(mk.command('R')))).toBe('\\mathbb{R}');
    });
});
