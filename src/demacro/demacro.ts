// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Demacro Engine
// Owns the definition tables; each call expands one tree
// ─────────────────────────────────────────────────────────────

import { loadConfig, type LogLevel } from '../config';
import type { Node } from '../core/ast';
import { fixWhitespace } from '../core/cleanup';
import { createLogger, type Logger } from '../core/log';
import type { ParseOptions } from '../parser/builder';
import { environmentsFromSpecs, macrosFromSpecs, type EnvironmentSpec, type MacroSpec } from './definitions';
import { Expander } from './expander';
import { DefinitionTable } from './table';

export interface DemacroOptions {
    /** Nesting limit for expansions. */
    maxDepth?: number;
    /** Total expansions allowed per `demacro` call. */
    maxExpansions?: number;
    /** Insert a space between `\name` and letters that follow it. Defaults to true. */
    separateCommands?: boolean;
    logLevel?: LogLevel;
    logger?: Logger;
}

export class Demacro {
    private table = new DefinitionTable();
    private readonly maxDepth: number;
    private readonly maxExpansions: number;
    private readonly separateCommands: boolean;
    private readonly log: Logger;

    constructor(options: DemacroOptions = {}) {
        const needsConfig = options.maxDepth === undefined
            || options.maxExpansions === undefined
            || (options.logger === undefined && options.logLevel === undefined);
        const config = needsConfig ? loadConfig() : undefined;

        this.maxDepth = options.maxDepth ?? config?.maxDepth ?? 64;
        this.maxExpansions = options.maxExpansions ?? config?.maxExpansions ?? 100_000;
        this.separateCommands = options.separateCommands ?? true;
        this.log = options.logger ?? createLogger('Demacro', options.logLevel ?? config?.logLevel ?? 'warn');
    }

    // ── Registration ────────────────────────────────────

    /**
     * Register macros by name (without the backslash), e.g.
     * `{ R: { body: '\\mathbb{R}' }, abs: { body: '|#1|', args: 1 } }`.
     * Throws `MacroError` with kind `InvalidDefinition` and registers
     * nothing when any entry is malformed.
     */
    addMacros(mapping: Readonly<Record<string, MacroSpec>>): void {
        for (const def of macrosFromSpecs(mapping)) this.table.defineMacro(def);
    }

    addEnvironments(mapping: Readonly<Record<string, EnvironmentSpec>>): void {
        for (const def of environmentsFromSpecs(mapping)) this.table.defineEnvironment(def);
    }

    hasMacro(name: string): boolean {
        return this.table.macro(name) !== undefined;
    }

    hasEnvironment(name: string): boolean {
        return this.table.environment(name) !== undefined;
    }

    macroNames(): string[] {
        return this.table.macroNames();
    }

    environmentNames(): string[] {
        return this.table.environmentNames();
    }

    /** Options for `parse` so registered macros capture their arguments. */
    parseOptions(): Pick<ParseOptions, 'signatures' | 'environments'> {
        return this.table.signatures();
    }

    // ── Expansion ───────────────────────────────────────

    /**
     * Expand every registered macro and environment in `root`, registering
     * the definitions it contains along the way. On failure the tables are
     * left as they were before the call.
     */
    demacro(root: Node): Node {
        const table = this.table.clone();
        const expander = new Expander(table, { maxDepth: this.maxDepth, maxExpansions: this.maxExpansions }, this.log);

        const expanded = expander.expand(root);
        const result = this.separateCommands ? fixWhitespace(expanded) : expanded;

        this.table = table;
        return result;
    }
}
