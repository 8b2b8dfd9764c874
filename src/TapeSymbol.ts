'use strict';

import * as _ from 'lodash';
import SymbolNotAccepted from './SymbolNotAccepted';

/**
 * The tape alphabet. `theta` terminates the input; `blank` is only ever
 * written by a transition, never read from the user.
 */
export enum TapeSymbol {
  zero = '0',
  one = '1',
  theta = 'theta',
  blank = 'blank',
}

export function symbolLabel (symbol: TapeSymbol): string {
  switch (symbol) {
    case TapeSymbol.zero: return '0';
    case TapeSymbol.one: return '1';
    case TapeSymbol.theta: return 'Θ';
    case TapeSymbol.blank: return '-';
  }
}

/**
 * Value left on the tape. The head moves left while writing, so the tape
 * reads as the writes in reverse.
 */
export function tapeValue (tapeWrites: readonly TapeSymbol[]): string {
  return _.reverse(tapeWrites.map(symbolLabel)).join('');
}

export type SymbolParseResult =
  | { ok: true, symbol: TapeSymbol }
  | { ok: false, error: SymbolNotAccepted };

/**
 * Map a typed character onto the alphabet.
 * `#` stands in for theta since it can't be typed on most keyboards.
 */
export function parseSymbol (ch: string): SymbolParseResult {
  switch (ch) {
    case '0': return { ok: true, symbol: TapeSymbol.zero };
    case '1': return { ok: true, symbol: TapeSymbol.one };
    case '#': return { ok: true, symbol: TapeSymbol.theta };
    default: return { ok: false, error: new SymbolNotAccepted(ch) };
  }
}
