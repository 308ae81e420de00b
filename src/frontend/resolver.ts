/**
 * Token buffer and two-pass resolver.
 *
 * Pass 1 (`collectTokens`) drains a token stream into a buffer and records defines and anchor
 * positions. Pass 2 (`resolveTokens`) returns a new token array with define references replaced by
 * numbers and anchors turned into ordinary labels. Neither pass mutates a token record.
 */
import { AssemblerError, DiagnosticIds, InternalError } from '../diagnostics/types.js';
import type { ResolvedToken, Token, TokenStream } from './token.js';

export interface CollectedTokens {
  mainFile: string;
  tokens: Token[];
  defines: ReadonlyMap<string, number>;
  /** Positions of `+:` anchors, ascending. */
  forwardAnchors: readonly number[];
  /** Positions of `-:` anchors, newest (highest) first. */
  backwardAnchors: readonly number[];
}

function fail(t: Token, message: string): never {
  throw new AssemblerError({ file: t.file, line: t.line }, message, DiagnosticIds.ResolveError);
}

/**
 * Pass 1: pull tokens until the top-level file's `EndOfFile`.
 *
 * Included files' `EndOfFile` tokens are kept in the buffer; the dispatch loop skips them.
 */
export function collectTokens(stream: TokenStream): CollectedTokens {
  const tokens: Token[] = [];
  const defines = new Map<string, number>();
  const forwardAnchors: number[] = [];
  const backwardAnchors: number[] = [];

  const pull = (): Token => {
    const t = stream.next();
    if (!t) throw new InternalError('missing token');
    tokens.push(t);
    return t;
  };

  for (;;) {
    const t = pull();
    switch (t.kind) {
      case 'Define': {
        const value = pull();
        if (value.kind !== 'Number') fail(t, 'expected number for define');
        const prev = defines.get(t.value);
        if (prev !== undefined && prev !== value.value) {
          fail(t, `define "${t.value}" is already bound to ${prev}`);
        }
        defines.set(t.value, value.value);
        break;
      }
      case 'RelLabel':
        // forward list ascends, backward list descends; findAnchor scans both in stored order
        if (t.value === '+') {
          forwardAnchors.push(tokens.length - 1);
        } else {
          backwardAnchors.unshift(tokens.length - 1);
        }
        break;
      case 'EndOfFile':
        if (t.file === stream.mainFile) {
          return { mainFile: stream.mainFile, tokens, defines, forwardAnchors, backwardAnchors };
        }
        break;
      default:
        break;
    }
  }
}

/**
 * Position of the `|count|`-th anchor after (`count > 0`) or before (`count < 0`) `at`.
 */
export function findAnchor(
  collected: Pick<CollectedTokens, 'forwardAnchors' | 'backwardAnchors'>,
  at: number,
  count: number,
): number | undefined {
  let seen = 0;
  if (count > 0) {
    for (const pos of collected.forwardAnchors) {
      if (pos > at && ++seen === count) return pos;
    }
  } else if (count < 0) {
    for (const pos of collected.backwardAnchors) {
      if (pos < at && ++seen === -count) return pos;
    }
  }
  return undefined;
}

/** Synthetic label name of the anchor at buffer position `pos`; never a valid user label. */
export function anchorLabel(pos: number): string {
  return String(pos);
}

function resolveToken(t: Token, at: number, collected: CollectedTokens): ResolvedToken {
  switch (t.kind) {
    case 'DefineRef': {
      const value = collected.defines.get(t.value);
      if (value === undefined) fail(t, 'undefined define');
      return { file: t.file, line: t.line, kind: 'Number', value };
    }
    case 'RelLabel':
      return { file: t.file, line: t.line, kind: 'Label', value: anchorLabel(at) };
    case 'RelLabelRef': {
      const pos = findAnchor(collected, at, t.value);
      if (pos === undefined) fail(t, 'could not find appropriate relative label');
      return { file: t.file, line: t.line, kind: 'LabelRef', value: anchorLabel(pos) };
    }
    default:
      return t;
  }
}

/**
 * Pass 2: a new, fully resolved token array in buffer order.
 */
export function resolveTokens(collected: CollectedTokens): ResolvedToken[] {
  return collected.tokens.map((t, i) => resolveToken(t, i, collected));
}
