// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Error Taxonomy
// ─────────────────────────────────────────────────────────────

export type ParseErrorKind =
    | 'UnbalancedGroup'
    | 'UnterminatedEnvironment'
    | 'EnvironmentNameMismatch'
    | 'MissingMandatoryArgument';

/** Structural malformation found while building the tree. */
export class ParseError extends Error {
    readonly kind: ParseErrorKind;
    /** Offset into the source text. */
    readonly position: number;
    /** 1-based. */
    readonly line: number;
    /** 1-based. */
    readonly column: number;

    constructor(kind: ParseErrorKind, message: string, source: string, position: number) {
        const { line, column } = locate(source, position);
        super(`${message} (line ${line}, column ${column})`);
        this.name = 'ParseError';
        this.kind = kind;
        this.position = position;
        this.line = line;
        this.column = column;
    }
}

export type MacroErrorKind =
    | 'MissingArgument'
    | 'UnterminatedEnvironment'
    | 'ExpansionCycle'
    | 'DepthLimitExceeded'
    | 'ExpansionLimitExceeded'
    | 'InvalidDefinition';

/** Failure of a single `demacro` call or macro registration. */
export class MacroError extends Error {
    readonly kind: MacroErrorKind;
    readonly macro?: string;

    constructor(kind: MacroErrorKind, message: string, macro?: string) {
        super(message);
        this.name = 'MacroError';
        this.kind = kind;
        this.macro = macro;
    }
}

export function locate(source: string, position: number): { line: number; column: number } {
    const before = source.slice(0, position);
    const line = before.split('\n').length;
    const column = position - before.lastIndexOf('\n');
    return { line, column };
}
