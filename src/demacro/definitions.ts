// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Macro Definitions
// From \newcommand-style commands and from programmatic specs
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';
import { isBlank, textContent, type Node } from '../core/ast';
import { MacroError } from '../core/errors';
import { parse } from '../parser/builder';
import type { EnvironmentDefinition, MacroDefinition, MacroFunction } from './table';

// ── Defining commands ───────────────────────────────────────

export type DefiningCommand =
    | 'newcommand' | 'renewcommand' | 'providecommand'
    | 'newenvironment' | 'renewenvironment';

const DEFINING = new Set<string>(['newcommand', 'renewcommand', 'providecommand', 'newenvironment', 'renewenvironment']);

export function isDefiningCommand(name: string): name is DefiningCommand {
    return DEFINING.has(name);
}

export function definesEnvironment(command: DefiningCommand): boolean {
    return command === 'newenvironment' || command === 'renewenvironment';
}

// ── Pieces of a definition ──────────────────────────────────

/** `\name` out of the first argument of \newcommand. */
export function definedCommandName(nodes: readonly Node[], owner: string): string {
    const meaningful = nodes.filter(n => !isBlank(n));
    const only = meaningful[0];
    if (meaningful.length !== 1 || only.tag !== 'Command') {
        throw new MacroError('InvalidDefinition', `\\${owner} expects a single command name`);
    }
    return only.name;
}

export function definedEnvironmentName(nodes: readonly Node[], owner: string): string {
    const name = textContent(nodes).trim();
    if (name === '' || nodes.some(n => n.tag !== 'Text')) {
        throw new MacroError('InvalidDefinition', `\\${owner} expects a plain environment name`);
    }
    return name;
}

/** The `[n]` argument count; absent means zero. */
export function argumentCount(nodes: readonly Node[] | null, name: string): number {
    if (nodes === null) return 0;
    const text = textContent(nodes).trim();
    if (nodes.some(n => n.tag !== 'Text') || !/^\d$/.test(text)) {
        throw new MacroError('InvalidDefinition', `Argument count of ${name} must be a digit 0-9`, name);
    }
    return Number(text);
}

/** The `[default]` argument, unwrapped when it is a single brace group. */
export function defaultValue(nodes: readonly Node[] | null): readonly Node[] | undefined {
    if (nodes === null) return undefined;
    const meaningful = nodes.filter(n => n.tag !== 'Comment');
    const only = meaningful[0];
    if (meaningful.length === 1 && only.tag === 'Group') return only.children;
    return nodes;
}

function checkDefault(arity: number, optionalDefault: readonly Node[] | undefined, name: string): void {
    if (optionalDefault !== undefined && arity === 0) {
        throw new MacroError('InvalidDefinition', `${name} has a default value but takes no arguments`, name);
    }
}

export function macroDefinition(
    name: string,
    count: readonly Node[] | null,
    fallback: readonly Node[] | null,
    body: readonly Node[],
): MacroDefinition {
    const arity = argumentCount(count, `\\${name}`);
    const optionalDefault = defaultValue(fallback);
    checkDefault(arity, optionalDefault, `\\${name}`);
    return { name, arity, optionalDefault, body };
}

export function environmentDefinition(
    name: string,
    count: readonly Node[] | null,
    fallback: readonly Node[] | null,
    open: readonly Node[],
    close: readonly Node[],
): EnvironmentDefinition {
    const arity = argumentCount(count, name);
    const optionalDefault = defaultValue(fallback);
    checkDefault(arity, optionalDefault, name);
    return { name, arity, optionalDefault, open, close };
}

// ── Programmatic specs ──────────────────────────────────────

const MACRO_NAME = /^(?:[A-Za-z]+|[^A-Za-z])$/;

const MacroBodySchema = z.union([
    z.string(),
    z.custom<MacroFunction>(value => typeof value === 'function', { message: 'Expected a string or a function' }),
]);

const ArityShape = {
    args: z.number().int().min(0).max(9).optional(),
    optionalDefault: z.string().optional(),
};

export const MacroSpecSchema = z.object({ body: MacroBodySchema, ...ArityShape }).strict();
export const EnvironmentSpecSchema = z.object({ open: z.string(), close: z.string(), ...ArityShape }).strict();

export type MacroSpec = z.infer<typeof MacroSpecSchema>;
export type EnvironmentSpec = z.infer<typeof EnvironmentSpecSchema>;

const MacroMappingSchema = z.record(
    z.string().regex(MACRO_NAME, 'Macro names are letters or a single other character'),
    MacroSpecSchema,
);
const EnvironmentMappingSchema = z.record(z.string().min(1), EnvironmentSpecSchema);

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
    const result = schema.safeParse(input);
    if (result.success) return result.data;
    const detail = result.error.issues.map(i => `${i.path.join('.') || what}: ${i.message}`).join('; ');
    throw new MacroError('InvalidDefinition', `Invalid ${what}: ${detail}`);
}

/** Bodies given as text may open or close environments they do not balance. */
function parseBody(text: string): readonly Node[] {
    return parse(text, { lenient: true }).children;
}

export function macrosFromSpecs(input: unknown): MacroDefinition[] {
    const mapping = validate(MacroMappingSchema, input, 'macro mapping');
    return Object.entries(mapping).map(([name, spec]) => {
        const body = typeof spec.body === 'string' ? parseBody(spec.body) : spec.body;
        const arity = spec.args ?? (typeof spec.body === 'function' ? spec.body.length : 0);
        const optionalDefault = spec.optionalDefault === undefined
            ? undefined
            : defaultValue(parseBody(spec.optionalDefault));
        checkDefault(arity, optionalDefault, `\\${name}`);
        return { name, arity, optionalDefault, body };
    });
}

export function environmentsFromSpecs(input: unknown): EnvironmentDefinition[] {
    const mapping = validate(EnvironmentMappingSchema, input, 'environment mapping');
    return Object.entries(mapping).map(([name, spec]) => {
        const arity = spec.args ?? 0;
        const optionalDefault = spec.optionalDefault === undefined
            ? undefined
            : defaultValue(parseBody(spec.optionalDefault));
        checkDefault(arity, optionalDefault, name);
        return { name, arity, optionalDefault, open: parseBody(spec.open), close: parseBody(spec.close) };
    });
}
