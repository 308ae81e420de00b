import type { SourceLocation } from '../diagnostics/types.js';
import { AssemblerError, DiagnosticIds, InternalError } from '../diagnostics/types.js';
import type { EmitResult, Emitter } from '../lowering/requests.js';
import {
  encodableDescriptor,
  formatIn,
  formatOut,
  parseAddressForm,
  type InstructionParser,
  type OperandBundle,
} from '../mips/engine.js';
import { defaultInstructionTable, type InstructionTable } from '../mips/instructions.js';
import { instructionOverrides, type InstructionOverride } from '../mips/overrides.js';
import { TokenCursor } from './cursor.js';
import { interpretDirective } from './directives.js';
import type { InstructionToken, ResolvedToken } from './token.js';

export interface ParserOptions {
  instructions?: InstructionTable;
  overrides?: ReadonlyMap<string, InstructionOverride>;
}

/**
 * Top-level dispatch loop over a resolved token buffer.
 *
 * Drives the directive interpreter, label registration and instruction assembly, and calls
 * `emitter.dump()` once the top-level file ends. The first error stops the loop.
 */
export class Parser implements InstructionParser {
  readonly cursor: TokenCursor;
  readonly emitter: Emitter;
  readonly instructions: InstructionTable;
  private readonly overrides: ReadonlyMap<string, InstructionOverride>;
  private readonly mainFile: string;
  private current: SourceLocation;

  constructor(
    tokens: readonly ResolvedToken[],
    mainFile: string,
    emitter: Emitter,
    options: ParserOptions = {},
  ) {
    this.cursor = new TokenCursor(tokens);
    this.emitter = emitter;
    this.mainFile = mainFile;
    this.instructions = options.instructions ?? defaultInstructionTable;
    this.overrides = options.overrides ?? instructionOverrides;
    this.current = this.cursor.where;
  }

  get where(): SourceLocation {
    return this.current;
  }

  emit(mnemonic: string, args: OperandBundle): void {
    formatOut(this.emitter, this.current, encodableDescriptor(this.instructions, mnemonic), args);
  }

  parse(): EmitResult {
    const { cursor } = this;
    for (;;) {
      const t = cursor.token;
      switch (t.kind) {
        case 'EndOfFile':
          if (t.file === this.mainFile) return this.emitter.dump();
          cursor.advance();
          break;
        case 'EndOfLine':
          cursor.advance();
          break;
        case 'Define': {
          const value = cursor.advance();
          if (value.kind !== 'Number') throw new InternalError('define without a value');
          this.emitter.addConstant?.(t.value, value.value, t.file, t.line);
          cursor.advance();
          break;
        }
        case 'Directive':
          interpretDirective(cursor, this.emitter);
          break;
        case 'Label':
          this.emitter.addLabel(t.value, t.file, t.line);
          cursor.advance();
          break;
        case 'Instruction':
          this.instruction(t);
          break;
        default:
          cursor.error('unexpected token (unknown instruction?)');
      }
    }
  }

  private instruction(t: InstructionToken): void {
    this.current = { file: t.file, line: t.line };
    const descriptor = this.instructions.get(t.value);
    if (descriptor === undefined) throw new InternalError('undefined instruction');
    this.cursor.advance();

    const override = this.overrides.get(t.value);
    if (override) {
      override.parse(this, t.value);
    } else if (descriptor.kind === 'address') {
      parseAddressForm(this, descriptor);
    } else if (descriptor.kind === 'format') {
      formatOut(this.emitter, this.current, descriptor, formatIn(this.cursor, descriptor.input));
    } else {
      throw new AssemblerError(
        this.current,
        'unimplemented instruction',
        DiagnosticIds.Unimplemented,
      );
    }
    this.cursor.expectEOL();
  }
}

/**
 * Run the dispatch loop over `tokens` and return the emitter's output.
 */
export function parseTokens(
  tokens: readonly ResolvedToken[],
  mainFile: string,
  emitter: Emitter,
  options: ParserOptions = {},
): EmitResult {
  return new Parser(tokens, mainFile, emitter, options).parse();
}
