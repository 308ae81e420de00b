/**
 * Token contracts shared by the lexer, the resolver and the parser.
 */
import type { SourceLocation } from '../diagnostics/types.js';

export type NumberToken = SourceLocation & { kind: 'Number'; value: number };
/** String literal; `value` holds one byte-sized character code per character. */
export type StringToken = SourceLocation & { kind: 'String'; value: number[] };
/** Register name, upper-cased. */
export type RegisterToken = SourceLocation & { kind: 'Register'; value: string };
/** `(reg)`: a general register used as a dereference base. */
export type DerefToken = SourceLocation & { kind: 'Deref'; value: string };
export type SeparatorToken = SourceLocation & { kind: 'Separator'; value: ',' };
export type EndOfLineToken = SourceLocation & { kind: 'EndOfLine' };
/** End of one source file; `file` names the file that ended. */
export type EndOfFileToken = SourceLocation & { kind: 'EndOfFile' };
/** `[name]:` definition; the next token must be the bound number. */
export type DefineToken = SourceLocation & { kind: 'Define'; value: string };
/** `@name` */
export type DefineRefToken = SourceLocation & { kind: 'DefineRef'; value: string };
/** Directive name, upper-cased and without the leading dot. */
export type DirectiveToken = SourceLocation & { kind: 'Directive'; value: string };
/** `name:` label definition. */
export type LabelToken = SourceLocation & { kind: 'Label'; value: string };
export type LabelRefToken = SourceLocation & { kind: 'LabelRef'; value: string };
/** `+:` or `-:` anchor definition. */
export type RelLabelToken = SourceLocation & { kind: 'RelLabel'; value: '+' | '-' };
/** Anchor reference; the magnitude counts anchors, the sign gives the direction. */
export type RelLabelRefToken = SourceLocation & { kind: 'RelLabelRef'; value: number };
/** Mnemonic, upper-cased. */
export type InstructionToken = SourceLocation & { kind: 'Instruction'; value: string };

export type Token =
  | NumberToken
  | StringToken
  | RegisterToken
  | DerefToken
  | SeparatorToken
  | EndOfLineToken
  | EndOfFileToken
  | DefineToken
  | DefineRefToken
  | DirectiveToken
  | LabelToken
  | LabelRefToken
  | RelLabelToken
  | RelLabelRefToken
  | InstructionToken;

export type TokenKind = Token['kind'];

/**
 * Tokens left after the resolver pass: define references become numbers and anchors become
 * ordinary labels.
 */
export type ResolvedToken = Exclude<Token, DefineRefToken | RelLabelToken | RelLabelRefToken>;

/**
 * Pull-based token producer. Returns `undefined` only when it has nothing left, which a
 * well-behaved source never does before the top-level end of file.
 */
export interface TokenStream {
  /** Path of the top-level source; its `EndOfFile` terminates collection. */
  readonly mainFile: string;
  next(): Token | undefined;
}

/**
 * A plain array-backed stream, handy for feeding pre-built tokens to the resolver.
 */
export function tokenStreamOf(mainFile: string, tokens: Token[]): TokenStream {
  let i = 0;
  return {
    mainFile,
    next: () => tokens[i++],
  };
}
