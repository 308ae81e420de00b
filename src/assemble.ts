import { readFile } from 'node:fs/promises';

import type { Diagnostic } from './diagnostics/types.js';
import { AssemblerError, DiagnosticIds, InternalError } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { Lexer } from './frontend/lexer.js';
import { parseTokens } from './frontend/parser.js';
import { collectTokens, resolveTokens } from './frontend/resolver.js';
import { BinaryEmitter } from './lowering/emitter.js';
import type { EmitResult } from './lowering/requests.js';
import type { AssembleFn, AssembleResult, AssemblerOptions, PipelineDeps } from './pipeline.js';

function withDefaults(
  options: AssemblerOptions,
): Required<Pick<AssemblerOptions, 'emitBin' | 'emitHex' | 'emitListing'>> {
  const anyPrimaryEmitSpecified = [options.emitBin, options.emitHex].some((v) => v !== undefined);

  const emitBin = anyPrimaryEmitSpecified ? (options.emitBin ?? false) : true;
  const emitHex = anyPrimaryEmitSpecified ? (options.emitHex ?? false) : true;

  // Listing is a sidecar artifact: default to on unless explicitly suppressed.
  const emitListing = options.emitListing ?? true;

  return { emitBin, emitHex, emitListing };
}

/**
 * Turn anything thrown while assembling into a diagnostic.
 */
export function diagnosticFromError(err: unknown, entryFile: string): Diagnostic {
  if (err instanceof AssemblerError) return err.toDiagnostic();
  if (err instanceof InternalError) return err.toDiagnostic(entryFile);
  if (err instanceof Error && 'code' in err) {
    return {
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read source: ${err.message}`,
      file: entryFile,
    };
  }
  return {
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: err instanceof Error ? err.message : String(err),
    file: entryFile,
  };
}

/**
 * Lex, resolve, parse and emit one program held in memory.
 *
 * Throws `AssemblerError` / `InternalError` on the first failure.
 */
export function assembleProgram(
  text: string,
  entryFile: string,
  options: AssemblerOptions = {},
  deps: Pick<PipelineDeps, 'reader'> = {},
): EmitResult {
  const lexer = new Lexer(text, entryFile, {
    ...(options.includeDirs ? { includeDirs: options.includeDirs } : {}),
    ...(deps.reader ? { reader: deps.reader } : {}),
  });
  const tokens = resolveTokens(collectTokens(lexer));
  const emitter = new BinaryEmitter(options.endian ? { endian: options.endian } : {});
  return parseTokens(tokens, entryFile, emitter);
}

/**
 * Assemble source text and produce artifacts via `deps.formats`.
 */
export function assembleSource(
  text: string,
  entryFile: string,
  options: AssemblerOptions,
  deps: PipelineDeps,
): AssembleResult {
  const diagnostics: Diagnostic[] = [];
  let result: EmitResult;
  try {
    result = assembleProgram(text, entryFile, options, deps);
  } catch (err) {
    diagnostics.push(diagnosticFromError(err, entryFile));
    return { diagnostics, artifacts: [] };
  }

  const { map, symbols } = result;
  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];

  if (emit.emitBin) {
    artifacts.push(deps.formats.writeBin(map, symbols));
  }
  if (emit.emitHex) {
    artifacts.push(deps.formats.writeHex(map, symbols));
  }
  if (emit.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(map, symbols));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: entryFile,
      });
    }
  }

  return { diagnostics, artifacts };
}

/**
 * Assemble a program starting from an entry file on disk.
 *
 * Diagnostics name files the way they were given: the entry path as passed, included files by
 * their resolved path.
 */
export const assemble: AssembleFn = async (
  entryFile: string,
  options: AssemblerOptions,
  deps: PipelineDeps,
): Promise<AssembleResult> => {
  let text: string;
  try {
    text = deps.reader?.read(entryFile) ?? (await readFile(entryFile, 'utf8'));
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryFile,
        },
      ],
      artifacts: [],
    };
  }
  return assembleSource(text, entryFile, options, deps);
};
