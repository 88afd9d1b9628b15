// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Macro & Environment Expander
// One pass per sibling list; expansion results go back to the
// front of the work queue so they are scanned again
// ─────────────────────────────────────────────────────────────

import {
    childLists, cloneNodes, isBlank, mk, sameNodes, textContent, withChildLists,
    type Arg, type CommandNode, type EnvironmentNode, type Node,
} from '../core/ast';
import { MacroError } from '../core/errors';
import type { Logger } from '../core/log';
import { renderNodes } from '../core/render';
import {
    definedCommandName, definedEnvironmentName, definesEnvironment, environmentDefinition,
    isDefiningCommand, macroDefinition, type DefiningCommand,
} from './definitions';
import { substitute } from './substitute';
import type {
    DefinitionTable, EnvironmentDefinition, MacroDefinition, Registered,
} from './table';

export interface ExpansionLimits {
    maxDepth: number;
    maxExpansions: number;
}

// ── Work queue ──────────────────────────────────────────────

/** The chain of expansions that produced a node, innermost first. */
interface Trail {
    readonly key: string;
    readonly depth: number;
    readonly parent: Trail | null;
}

type Entry =
    | { kind: 'node'; node: Node; trail: Trail | null }
    // an argument captured by a command that did not use it
    | { kind: 'arg'; arg: Arg; trail: Trail | null };

const nodeEntry = (node: Node, trail: Trail | null): Entry => ({ kind: 'node', node, trail });
const argEntry = (arg: Arg, trail: Trail | null): Entry => ({ kind: 'arg', arg, trail });

class WorkQueue {
    // next entry last
    private readonly stack: Entry[];

    constructor(entries: readonly Entry[]) {
        this.stack = [...entries].reverse();
    }

    next(): Entry | undefined {
        return this.stack.pop();
    }

    peek(offset = 0): Entry | undefined {
        return this.stack[this.stack.length - 1 - offset];
    }

    skip(count: number): void {
        this.stack.length = Math.max(0, this.stack.length - count);
    }

    pushFront(entries: readonly Entry[]): void {
        for (let i = entries.length - 1; i >= 0; i--) this.stack.push(entries[i]);
    }

    drain(): Entry[] {
        return this.stack.splice(0).reverse();
    }
}

// ── Argument binding ────────────────────────────────────────

/**
 * Reads invocation arguments: first the ones the parser attached to the
 * command, then the following siblings, past blank text and comments.
 */
class ArgReader {
    private index = 0;

    constructor(private readonly captured: readonly Arg[], private readonly queue: WorkQueue) {}

    optional(): readonly Node[] | null {
        if (this.index < this.captured.length) {
            const arg = this.captured[this.index];
            if (arg.kind !== 'optional') return null;
            this.index++;
            return arg.children;
        }
        const offset = this.blankRun();
        const entry = this.queue.peek(offset);
        if (entry?.kind === 'arg' && entry.arg.kind === 'optional') {
            this.queue.skip(offset + 1);
            return entry.arg.children;
        }
        return null;
    }

    mandatory(): readonly Node[] | null {
        if (this.index < this.captured.length) {
            const arg = this.captured[this.index];
            if (arg.kind !== 'mandatory') return null;
            this.index++;
            return arg.children;
        }
        const offset = this.blankRun();
        const entry = this.queue.peek(offset);
        if (entry?.kind === 'arg' && entry.arg.kind === 'mandatory') {
            this.queue.skip(offset + 1);
            return entry.arg.children;
        }
        if (entry?.kind === 'node' && entry.node.tag === 'Group') {
            this.queue.skip(offset + 1);
            return entry.node.children;
        }
        return null;
    }

    /** `{\name}` or a bare `\name`. */
    commandName(): readonly Node[] | null {
        const offset = this.index < this.captured.length ? 0 : this.blankRun();
        const entry = this.index < this.captured.length ? undefined : this.queue.peek(offset);
        if (entry?.kind === 'node' && entry.node.tag === 'Command') {
            this.queue.skip(offset + 1);
            return [entry.node];
        }
        return this.mandatory();
    }

    leftover(): Arg[] {
        return this.captured.slice(this.index);
    }

    private blankRun(): number {
        let offset = 0;
        for (let entry = this.queue.peek(0); entry?.kind === 'node' && isBlank(entry.node); entry = this.queue.peek(offset)) {
            offset++;
        }
        return offset;
    }
}

// ── Expander ────────────────────────────────────────────────

interface OpenEnvironment {
    name: string;
    args: readonly (readonly Node[])[];
}

export class Expander {
    private expansions = 0;

    constructor(
        private readonly table: DefinitionTable,
        private readonly limits: ExpansionLimits,
        private readonly log: Logger,
    ) {}

    expand(root: Node): Node {
        if (root.tag === 'Document' || root.tag === 'Group') return this.expandChildren(root, null);
        const out = this.expandNodes([root], null);
        return out.length === 1 ? out[0] : mk.document(out);
    }

    private expandChildren(node: Node, trail: Trail | null): Node {
        const lists = childLists(node);
        if (lists.length === 0) return node;
        const expanded = lists.map(list => this.expandNodes(list, trail));
        if (expanded.every((list, i) => sameNodes(list, lists[i]))) return node;
        return withChildLists(node, expanded);
    }

    private expandNodes(nodes: readonly Node[], trail: Trail | null): readonly Node[] {
        const queue = new WorkQueue(nodes.map(node => nodeEntry(node, trail)));
        const out: Node[] = [];
        const open: OpenEnvironment[] = [];

        for (let entry = queue.next(); entry; entry = queue.next()) {
            if (entry.kind === 'arg') {
                const at = entry.trail;
                queue.pushFront(argToNodes(entry.arg).map(node => nodeEntry(node, at)));
                continue;
            }

            const { node } = entry;
            if (node.tag === 'Command') {
                if (this.expandCommand(node, queue, entry.trail, open)) continue;
            } else if (node.tag === 'Environment') {
                const def = this.table.environment(node.name);
                if (def) {
                    this.expandEnvironment(node, def, queue, entry.trail);
                    continue;
                }
            }
            out.push(this.expandChildren(node, entry.trail));
        }

        const unclosed = open[open.length - 1];
        if (unclosed) {
            throw new MacroError('UnterminatedEnvironment', `\\begin{${unclosed.name}} is never ended`, unclosed.name);
        }

        const folded = foldEnvironments(out);
        return sameNodes(folded, nodes) ? nodes : folded;
    }

    /** True when the command was consumed by a definition or an expansion. */
    private expandCommand(node: CommandNode, queue: WorkQueue, trail: Trail | null, open: OpenEnvironment[]): boolean {
        if (isDefiningCommand(node.name)) {
            this.define(node, node.name, queue, trail);
            return true;
        }

        if (node.name === 'begin' || node.name === 'end') {
            const name = environmentMarker(node);
            const def = name === null ? undefined : this.table.environment(name);
            if (def) {
                if (node.name === 'begin') this.beginEnvironment(node, def, queue, trail, open);
                else this.endEnvironment(def, queue, trail, open);
                return true;
            }
        }

        const def = this.table.macro(node.name);
        if (!def) return false;
        this.expandMacro(node, def, queue, trail);
        return true;
    }

    // ── Definitions ─────────────────────────────────────

    private define(node: CommandNode, command: DefiningCommand, queue: WorkQueue, trail: Trail | null): void {
        const reader = new ArgReader(node.args, queue);

        if (definesEnvironment(command)) {
            const nameArg = reader.mandatory();
            if (nameArg === null) throw new MacroError('MissingArgument', `\\${command} expects an environment name`);
            const name = definedEnvironmentName(nameArg, command);
            const count = reader.optional();
            const fallback = reader.optional();
            const openBody = reader.mandatory();
            const closeBody = reader.mandatory();
            if (openBody === null || closeBody === null) {
                throw new MacroError('MissingArgument', `\\${command}{${name}} expects begin and end code`, name);
            }
            const exists = this.table.environment(name) !== undefined;
            if (command === 'newenvironment' && exists) this.log.warn(`\\newenvironment redefines {${name}}`);
            this.table.defineEnvironment(environmentDefinition(name, count, fallback, openBody, closeBody));
            this.log.debug(`defined environment {${name}}`);
        } else {
            const nameArg = reader.commandName();
            if (nameArg === null) throw new MacroError('MissingArgument', `\\${command} expects a command name`);
            const name = definedCommandName(nameArg, command);
            const count = reader.optional();
            const fallback = reader.optional();
            const body = reader.mandatory();
            if (body === null) throw new MacroError('MissingArgument', `\\${command}{\\${name}} expects a body`, name);

            const exists = this.table.macro(name) !== undefined;
            if (command === 'providecommand' && exists) {
                this.log.debug(`\\providecommand keeps existing \\${name}`);
            } else {
                if (command === 'newcommand' && exists) this.log.warn(`\\newcommand redefines \\${name}`);
                this.table.defineMacro(macroDefinition(name, count, fallback, body));
                this.log.debug(`defined \\${name}`);
            }
        }

        queue.pushFront(reader.leftover().map(arg => argEntry(arg, trail)));
    }

    // ── Expansion ───────────────────────────────────────

    private expandMacro(node: CommandNode, def: Registered<MacroDefinition>, queue: WorkQueue, trail: Trail | null): void {
        const owner = `\\${def.name}`;
        const reader = new ArgReader(node.args, queue);
        const args = this.bind(def, reader, owner);
        const inner = this.enter(trail, owner, def.generation, args);

        const body = typeof def.body === 'function'
            ? cloneNodes(def.body(...args.map(cloneNodes)))
            : substitute(def.body, args, owner);

        const entries = body.map(n => nodeEntry(n, inner));
        if (node.starred) entries.push(nodeEntry(mk.text('*'), trail));
        for (const arg of reader.leftover()) entries.push(argEntry(arg, trail));
        queue.pushFront(entries);
    }

    private expandEnvironment(
        node: EnvironmentNode,
        def: Registered<EnvironmentDefinition>,
        queue: WorkQueue,
        trail: Trail | null,
    ): void {
        const owner = `\\begin{${def.name}}`;
        // arguments not attached by the parser lead the body
        const body = new WorkQueue(node.body.map(n => nodeEntry(n, trail)));
        const reader = new ArgReader(node.args, body);
        const args = this.bind(def, reader, owner);
        const inner = this.enter(trail, owner, def.generation, args);

        queue.pushFront([
            ...substitute(def.open, args, owner).map(n => nodeEntry(n, inner)),
            ...reader.leftover().map(arg => argEntry(arg, trail)),
            ...body.drain(),
            ...substitute(def.close, args, owner).map(n => nodeEntry(n, inner)),
        ]);
    }

    private beginEnvironment(
        node: CommandNode,
        def: Registered<EnvironmentDefinition>,
        queue: WorkQueue,
        trail: Trail | null,
        open: OpenEnvironment[],
    ): void {
        const owner = `\\begin{${def.name}}`;
        const reader = new ArgReader(node.args.slice(1), queue);
        const args = this.bind(def, reader, owner);
        const inner = this.enter(trail, owner, def.generation, args);

        open.push({ name: def.name, args });
        queue.pushFront([
            ...substitute(def.open, args, owner).map(n => nodeEntry(n, inner)),
            ...reader.leftover().map(arg => argEntry(arg, trail)),
        ]);
    }

    private endEnvironment(
        def: Registered<EnvironmentDefinition>,
        queue: WorkQueue,
        trail: Trail | null,
        open: OpenEnvironment[],
    ): void {
        const owner = `\\end{${def.name}}`;
        const current = open.pop();
        if (current?.name !== def.name) {
            throw new MacroError('UnterminatedEnvironment', `${owner} without matching \\begin{${def.name}}`, def.name);
        }
        const inner = this.enter(trail, owner, def.generation, current.args);
        queue.pushFront(substitute(def.close, current.args, owner).map(n => nodeEntry(n, inner)));
    }

    private bind(def: MacroDefinition | EnvironmentDefinition, reader: ArgReader, owner: string): (readonly Node[])[] {
        const args: (readonly Node[])[] = [];
        let remaining = def.arity;

        if (def.optionalDefault !== undefined && remaining > 0) {
            args.push(reader.optional() ?? def.optionalDefault);
            remaining--;
        }
        for (; remaining > 0; remaining--) {
            const arg = reader.mandatory();
            if (arg === null) {
                throw new MacroError('MissingArgument', `${owner} expects ${def.arity} argument(s), found ${args.length}`, def.name);
            }
            args.push(arg);
        }
        return args;
    }

    /** Account for one expansion and return the trail its output carries. */
    private enter(trail: Trail | null, owner: string, generation: number, args: readonly (readonly Node[])[]): Trail {
        if (++this.expansions > this.limits.maxExpansions) {
            throw new MacroError('ExpansionLimitExceeded', `More than ${this.limits.maxExpansions} expansions`, owner);
        }

        const key = `${owner}@${generation}(${args.map(renderNodes).join('\u0000')})`;
        for (let t = trail; t; t = t.parent) {
            if (t.key === key) {
                throw new MacroError('ExpansionCycle', `${owner} expands to itself with the same arguments`, owner);
            }
        }

        const depth = (trail?.depth ?? 0) + 1;
        if (depth > this.limits.maxDepth) {
            throw new MacroError('DepthLimitExceeded', `Expansion of ${owner} nested deeper than ${this.limits.maxDepth}`, owner);
        }
        return { key, depth, parent: trail };
    }
}

// ── Helpers ─────────────────────────────────────────────────

/** Unused argument back as plain nodes, at the place it was written. */
function argToNodes(arg: Arg): Node[] {
    const nodes: Node[] = arg.leading ? [mk.text(arg.leading)] : [];
    if (!arg.braced) nodes.push(...arg.children);
    else if (arg.kind === 'optional') nodes.push(mk.text('['), ...arg.children, mk.text(']'));
    else nodes.push(mk.group(arg.children));
    return nodes;
}

/** Name of a command-form `\begin{x}` / `\end{x}`, or null. */
function environmentMarker(node: Node): string | null {
    if (node.tag !== 'Command' || (node.name !== 'begin' && node.name !== 'end')) return null;
    const first = node.args[0];
    if (!first || first.kind !== 'mandatory' || first.children.some(c => c.tag !== 'Text')) return null;
    return textContent(first.children);
}

/** Turn `\begin{x}` ... `\end{x}` command pairs at one level into Environment nodes. */
export function foldEnvironments(nodes: readonly Node[]): readonly Node[] {
    if (!nodes.some(n => n.tag === 'Command' && n.name === 'begin')) return nodes;

    const stack: { name: string; open: Node; outer: Node[] }[] = [];
    let items: Node[] = [];

    for (const node of nodes) {
        const name = environmentMarker(node);
        if (name !== null && node.tag === 'Command' && node.args.length === 1) {
            if (node.name === 'begin') {
                stack.push({ name, open: node, outer: items });
                items = [];
                continue;
            }
            const top = stack[stack.length - 1];
            if (top && top.name === name) {
                stack.pop();
                const env = mk.environment(name, items);
                items = top.outer;
                items.push(env);
                continue;
            }
        }
        items.push(node);
    }

    for (let top = stack.pop(); top; top = stack.pop()) {
        items = [...top.outer, top.open, ...items];
    }
    return items;
}
