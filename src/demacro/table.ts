// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Macro & Environment Definition Table
// ─────────────────────────────────────────────────────────────

import type { Node } from '../core/ast';
import type { Signature } from '../parser/builder';

// ── Definitions ─────────────────────────────────────────────

/** Programmatic macro body: receives bound arguments, returns the expansion. */
export type MacroFunction = (...args: Node[][]) => readonly Node[];

export interface MacroDefinition {
    readonly name: string;
    readonly arity: number;
    /** Set when the first argument is optional. */
    readonly optionalDefault?: readonly Node[];
    readonly body: readonly Node[] | MacroFunction;
}

export interface EnvironmentDefinition {
    readonly name: string;
    readonly arity: number;
    readonly optionalDefault?: readonly Node[];
    readonly open: readonly Node[];
    readonly close: readonly Node[];
}

/** A definition as stored, stamped with the registration it came from. */
export type Registered<T> = T & { readonly generation: number };

export function signatureOf(def: MacroDefinition | EnvironmentDefinition): Signature {
    if (def.arity === 0) return '';
    return def.optionalDefault !== undefined ? 'o' + 'm'.repeat(def.arity - 1) : 'm'.repeat(def.arity);
}

// ── Table ───────────────────────────────────────────────────

export class DefinitionTable {
    private readonly macros: Map<string, Registered<MacroDefinition>>;
    private readonly environments: Map<string, Registered<EnvironmentDefinition>>;
    private generation: number;

    constructor(from?: DefinitionTable) {
        this.macros = new Map(from?.macros);
        this.environments = new Map(from?.environments);
        this.generation = from?.generation ?? 0;
    }

    clone(): DefinitionTable {
        return new DefinitionTable(this);
    }

    macro(name: string): Registered<MacroDefinition> | undefined {
        return this.macros.get(name);
    }

    environment(name: string): Registered<EnvironmentDefinition> | undefined {
        return this.environments.get(name);
    }

    defineMacro(def: MacroDefinition): void {
        this.macros.set(def.name, { ...def, generation: ++this.generation });
    }

    defineEnvironment(def: EnvironmentDefinition): void {
        this.environments.set(def.name, { ...def, generation: ++this.generation });
    }

    macroNames(): string[] {
        return [...this.macros.keys()];
    }

    environmentNames(): string[] {
        return [...this.environments.keys()];
    }

    /** Builder signatures so a later parse captures macro arguments. */
    signatures(): { signatures: Record<string, Signature>; environments: Record<string, Signature> } {
        const signatures: Record<string, Signature> = {};
        const environments: Record<string, Signature> = {};
        for (const [name, def] of this.macros) signatures[name] = signatureOf(def);
        for (const [name, def] of this.environments) environments[name] = signatureOf(def);
        return { signatures, environments };
    }
}
