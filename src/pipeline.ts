import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { SourceReader } from './frontend/source.js';
import type { Endianness } from './lowering/emitter.js';

/**
 * Options that influence assembly and which artifacts are produced.
 */
export interface AssemblerOptions {
  /**
   * Additional search directories for `.inc` targets.
   *
   * These directories are consulted after the directory of the including file.
   */
  includeDirs?: string[];
  /** Emit flat binary (`.bin`). */
  emitBin?: boolean;
  /** Emit Intel HEX (`.hex`). */
  emitHex?: boolean;
  /** Emit listing (`.lst`). */
  emitListing?: boolean;
  /** Byte order of emitted words (default `big`). */
  endian?: Endianness;
}

/**
 * Result of an assembly run: diagnostics plus any produced artifacts.
 *
 * Artifacts are empty whenever an error diagnostic is present.
 */
export interface AssembleResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the assembler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in-memory. `reader`
 * replaces disk access for included files.
 */
export interface PipelineDeps {
  formats: FormatWriters;
  reader?: SourceReader;
}

/**
 * Top-level assemble function signature used by the pipeline contract.
 */
export type AssembleFn = (
  entryFile: string,
  options: AssemblerOptions,
  deps: PipelineDeps,
) => Promise<AssembleResult>;
