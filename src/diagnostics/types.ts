/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * An assembler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `MIPS001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'MIPS000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'MIPS001',

  /**
   * Assembler defect: malformed static table, dispatcher bug or a token source that ran dry.
   *
   * Never reachable from well-formed input plus a correct table.
   */
  InternalError: 'MIPS002',

  /** `.inc` target could not be resolved on any search path. */
  IncludeNotFound: 'MIPS003',

  /** Malformed source text (bad number, unterminated string, stray character). */
  LexError: 'MIPS100',

  /** Undefined define or unresolvable relative label. */
  ResolveError: 'MIPS110',

  /** Generic syntax error (unexpected token, missing operand, trailing garbage). */
  ParseError: 'MIPS200',

  /** Unknown directive. */
  UnknownDirective: 'MIPS210',

  /** Recognized but unsupported feature (INCBIN, FLOAT, table entries without formats). */
  Unimplemented: 'MIPS220',

  /** Operand of the wrong class (register set, label where only numbers are allowed). */
  OperandError: 'MIPS300',

  /** Encoding error (value out of range, misaligned target, undefined/duplicate label). */
  EmitError: 'MIPS400',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Where a request or token came from.
 */
export interface SourceLocation {
  file: string;
  /** 1-based line number. */
  line: number;
}

/**
 * Fatal user-facing error, tied to the source position being processed when it was detected.
 */
export class AssemblerError extends Error {
  readonly file: string;
  readonly line: number;
  readonly id: DiagnosticId;
  readonly reason: string;

  constructor(where: SourceLocation, reason: string, id: DiagnosticId = DiagnosticIds.ParseError) {
    super(`${where.file}:${where.line}: Error: ${reason}`);
    this.name = 'AssemblerError';
    this.file = where.file;
    this.line = where.line;
    this.id = id;
    this.reason = reason;
  }

  toDiagnostic(): Diagnostic {
    return {
      id: this.id,
      severity: 'error',
      message: this.reason,
      file: this.file,
      line: this.line,
    };
  }
}

/**
 * Fatal defect in the assembler itself; carries no source position.
 */
export class InternalError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Internal Error: ${reason}`);
    this.name = 'InternalError';
    this.reason = reason;
  }

  toDiagnostic(file: string): Diagnostic {
    return { id: DiagnosticIds.InternalError, severity: 'error', message: this.reason, file };
  }
}

/**
 * Render a diagnostic the way the assembler reports it: `<file>:<line>: Error: <message>`.
 *
 * Internal errors are rendered as `Internal Error: <message>` with no position.
 */
export function formatDiagnostic(d: Diagnostic): string {
  if (d.id === DiagnosticIds.InternalError) return `Internal Error: ${d.message}`;
  const loc = d.line !== undefined ? `${d.file}:${d.line}` : d.file;
  const label = d.severity === 'error' ? 'Error' : d.severity === 'warning' ? 'Warning' : 'Info';
  return `${loc}: ${label}: ${d.message}`;
}
