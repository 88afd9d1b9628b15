// ─────────────────────────────────────────────────────────────
// Unmacro  ·  Public API
// ─────────────────────────────────────────────────────────────

export { tokenize, type Token, type TokenKind, type TokenizeOptions } from './parser/tokenizer';
export { parse, build, DEFINITION_SIGNATURES, type ParseOptions, type Signature } from './parser/builder';
export {
    mk, textContent, optionalArgs, mandatoryArgs, cloneNode, cloneNodes,
    type Node, type TextNode, type CommentNode, type CommandNode, type GroupNode,
    type EnvironmentNode, type MathNode, type ParameterNode, type DocumentNode,
    type Arg, type Span, type MathKind, type MathDelimiter,
} from './core/ast';
export { render, renderNodes } from './core/render';
export {
    filter, filterNodes, unchanged, replace, remove, consume, SiblingView,
    type FilterResult, type FilterRule,
} from './core/filter';
export { fixWhitespace, stripComments } from './core/cleanup';
export { ParseError, MacroError, type ParseErrorKind, type MacroErrorKind } from './core/errors';
export { createLogger, type Logger } from './core/log';
export { loadConfig, type Config, type LogLevel } from './config';
export { Demacro, type DemacroOptions } from './demacro/demacro';
export type { MacroSpec, EnvironmentSpec } from './demacro/definitions';
export type { MacroFunction } from './demacro/table';
export { checkMath, type MathDiagnostic, type CheckMathOptions } from './check/katex';
