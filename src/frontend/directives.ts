import type { SourceLocation } from '../diagnostics/types.js';
import { AssemblerError, DiagnosticIds } from '../diagnostics/types.js';
import type { DirectiveRequest, Emitter } from '../lowering/requests.js';
import type { TokenCursor } from './cursor.js';

/**
 * Interpret the directive under the cursor and forward normalized requests to the emitter.
 *
 * On return the cursor is past the directive's line, except for `INC`, whose operand the lexer
 * already consumed.
 */
export function interpretDirective(cursor: TokenCursor, emitter: Emitter): void {
  const t = cursor.token;
  if (t.kind !== 'Directive') cursor.error('expected directive');
  const name = t.value;
  const where: SourceLocation = { file: t.file, line: t.line };
  const add = (request: DirectiveRequest): void =>
    emitter.addDirective(where.file, where.line, request);
  cursor.advance();

  switch (name) {
    case 'ORG':
      add({ name: 'ORG', address: cursor.number() });
      break;
    case 'ALIGN':
    case 'SKIP': {
      if (name === 'ALIGN' && cursor.isEOL()) {
        add({ name: 'ALIGN', size: 0 });
        break;
      }
      const size = cursor.number();
      if (cursor.isEOL()) {
        add({ name, size });
      } else {
        cursor.optionalComma();
        add({ name, size, fill: cursor.number() });
      }
      break;
    }
    case 'BYTE':
    case 'HALFWORD':
      add({ name, value: cursor.number() });
      while (!cursor.isEOL()) {
        cursor.optionalComma();
        add({ name, value: cursor.number() });
      }
      break;
    case 'WORD':
      add({ name, value: cursor.constant('allowed') });
      while (!cursor.isEOL()) {
        cursor.optionalComma();
        add({ name, value: cursor.constant('allowed') });
      }
      break;
    case 'INC':
      return;
    case 'ASCII':
    case 'ASCIIZ':
      for (const value of cursor.string()) add({ name: 'BYTE', value });
      if (name === 'ASCIIZ') add({ name: 'BYTE', value: 0 });
      break;
    case 'INCBIN':
    case 'FLOAT':
      throw new AssemblerError(where, 'unimplemented', DiagnosticIds.Unimplemented);
    default:
      throw new AssemblerError(where, 'unknown directive', DiagnosticIds.UnknownDirective);
  }
  cursor.expectEOL();
}
