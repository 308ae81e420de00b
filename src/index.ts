export { assemble, assembleProgram, assembleSource, diagnosticFromError } from './assemble.js';
export type { AssembleFn, AssembleResult, AssemblerOptions, PipelineDeps } from './pipeline.js';
export type { Diagnostic, DiagnosticId, SourceLocation } from './diagnostics/types.js';
export {
  AssemblerError,
  DiagnosticIds,
  InternalError,
  formatDiagnostic,
} from './diagnostics/types.js';
export { defaultFormatWriters } from './formats/index.js';
export type { Artifact, EmittedByteMap, SymbolEntry } from './formats/types.js';
export { Lexer, type LexerOptions } from './frontend/lexer.js';
export { collectTokens, resolveTokens, type CollectedTokens } from './frontend/resolver.js';
export { Parser, parseTokens, type ParserOptions } from './frontend/parser.js';
export { fileSourceReader, memorySourceReader, type SourceReader } from './frontend/source.js';
export type { ResolvedToken, Token, TokenStream } from './frontend/token.js';
export { BinaryEmitter, type BinaryEmitterOptions, type Endianness } from './lowering/emitter.js';
export type { DirectiveRequest, EmitResult, Emitter, EncodingField } from './lowering/requests.js';
export { defaultInstructionTable, loadInstructionTable } from './mips/instructions.js';
export type { InstructionDescriptor, InstructionTable } from './mips/instructions.js';
export { instructionOverrides, type InstructionOverride } from './mips/overrides.js';
export type { InstructionParser, OperandBundle } from './mips/engine.js';
