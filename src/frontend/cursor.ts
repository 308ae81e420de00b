import type { DiagnosticId, SourceLocation } from '../diagnostics/types.js';
import { AssemblerError, DiagnosticIds, InternalError } from '../diagnostics/types.js';
import type { LabelPolicy } from '../mips/instructions.js';
import { registerSets, type RegisterClass } from '../mips/registers.js';
import type { ConstantOperand } from '../lowering/requests.js';
import type { ResolvedToken } from './token.js';

/**
 * Cursor over the resolved token buffer.
 *
 * Operand readers check the current token, consume it on success and report a positioned
 * `AssemblerError` otherwise.
 */
export class TokenCursor {
  private readonly tokens: readonly ResolvedToken[];
  private index = 0;

  constructor(tokens: readonly ResolvedToken[]) {
    if (tokens.length === 0) throw new InternalError('missing token');
    this.tokens = tokens;
  }

  get token(): ResolvedToken {
    const t = this.tokens[this.index];
    if (!t) throw new InternalError('missing token');
    return t;
  }

  get where(): SourceLocation {
    const t = this.token;
    return { file: t.file, line: t.line };
  }

  error(message: string, id: DiagnosticId = DiagnosticIds.ParseError): never {
    throw new AssemblerError(this.where, message, id);
  }

  advance(): ResolvedToken {
    if (this.index + 1 >= this.tokens.length) throw new InternalError('missing token');
    this.index++;
    return this.token;
  }

  isEOL(): boolean {
    const kind = this.token.kind;
    return kind === 'EndOfLine' || kind === 'EndOfFile';
  }

  /** Consume an end of line. An end of file stays current for the dispatch loop. */
  expectEOL(): void {
    const kind = this.token.kind;
    if (kind === 'EndOfLine') {
      this.advance();
      return;
    }
    if (kind !== 'EndOfFile') this.error('expected end of line');
  }

  optionalComma(): boolean {
    if (this.token.kind !== 'Separator') return false;
    this.advance();
    return true;
  }

  number(): number {
    const t = this.token;
    if (t.kind !== 'Number') this.error('expected number');
    this.advance();
    return t.value;
  }

  string(): number[] {
    const t = this.token;
    if (t.kind !== 'String') this.error('expected string');
    this.advance();
    return t.value;
  }

  register(cls: RegisterClass = 'general'): string {
    const t = this.token;
    if (t.kind !== 'Register') this.error('expected register');
    if (!registerSets[cls].has(t.value)) {
      this.error('wrong type of register', DiagnosticIds.OperandError);
    }
    this.advance();
    return t.value;
  }

  deref(): string {
    const t = this.token;
    if (t.kind !== 'Deref') this.error('expected register to dereference');
    this.advance();
    return t.value;
  }

  /**
   * A number or a label reference. `relative` labels are branch targets.
   */
  constant(labels: LabelPolicy = 'allowed'): ConstantOperand {
    const t = this.token;
    if (t.kind === 'Number') {
      this.advance();
      return { kind: 'Number', value: t.value };
    }
    if (t.kind !== 'LabelRef') this.error('expected constant');
    if (labels === 'forbidden') {
      this.error('labels are not allowed here', DiagnosticIds.OperandError);
    }
    this.advance();
    return { kind: 'Label', name: t.value, relative: labels === 'relative' };
  }
}
