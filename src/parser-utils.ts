import * as _ from 'lodash';

import type { RawTMTransition, RawTransitionRow, RawTransitionTable, TMTransition } from './TransitionSpec';

export type TransitionParser =
  (from: string, symbol: string, trans: RawTMTransition | null) => TMTransition;

/**
 * Flatten `{state: {symbol: cell}}` into transitions, in object key order:
 * integer-like keys (`'0'`, `'1'`) come first, ascending, then the rest as written.
 * A comma-separated symbol key declares the same cell for several symbols.
 */
export function parseTable (table: RawTransitionTable, parser: TransitionParser): TMTransition[] {
  return _.chain(table)
    .toPairs()
    .flatMap(([from, outTrans]) =>
      _.flatMap(cellsOf(outTrans), ([symbols, trans]) =>
        symbols.split(',').map((symbol) => parser(from, symbol, trans))
      )
    )
    .value();
}

function cellsOf (row: RawTransitionRow | null): [string, RawTMTransition | null][] {
  return row === null ? [] : _.toPairs(row);
}

/** First (state, symbol) pair given more than one cell, if any. */
export function repeatedCell (transitions: TMTransition[]): { from: string, read: string } | undefined {
  let seen = new Set<string>();
  let repeated = _.find(transitions, (trans) => {
    let key = trans.from + ' ' + trans.read;
    if (seen.has(key)) return true;
    seen.add(key);
    return false;
  });
  return repeated && { from: repeated.from, read: repeated.read };
}

/** Target states that have no row of their own. */
export function undeclaredTargets (transitions: TMTransition[], declared: string[]): string[] {
  return _.chain(transitions)
    .map((trans) => trans.to)
    .uniq()
    .reject((state) => _.includes(declared, state))
    .value();
}
