'use strict';

import * as _ from 'lodash';
import { State } from './State';
import { TapeSymbol } from './TapeSymbol';
import type { TMTransition } from './TransitionSpec';

export type TransitionLookup =
  | { kind: 'found', transition: TMTransition }
  | { kind: 'absent' };

/**
 * Deterministic transition function, keyed by (state, symbol).
 * Built once by the parser and never mutated afterwards.
 */
export default class TransitionTable {
  private readonly rows: ReadonlyMap<State, ReadonlyMap<TapeSymbol, TMTransition>>;

  constructor (transitions: TMTransition[], declaredStates: State[]) {
    let rows = new Map<State, Map<TapeSymbol, TMTransition>>();
    declaredStates.forEach((state) => rows.set(state, new Map()));
    transitions.forEach((trans) => {
      let row = rows.get(trans.from);
      if (row === undefined) {
        row = new Map();
        rows.set(trans.from, row);
      }
      row.set(trans.read, trans);
    });
    this.rows = rows;
  }

  /**
   * An absent entry means the machine halts; it is not an error.
   */
  public lookup (state: State, symbol: TapeSymbol): TransitionLookup {
    let transition = this.rows.get(state)?.get(symbol);
    return transition === undefined
      ? { kind: 'absent' }
      : { kind: 'found', transition };
  }

  public get states (): State[] {
    return Array.from(this.rows.keys());
  }

  /** Whether any transition leaves `state`. */
  public hasTransitionsFrom (state: State): boolean {
    let row = this.rows.get(state);
    return row !== undefined && row.size > 0;
  }

  /** All transitions, grouped by source state in the order the parser produced them. */
  public get entries (): TMTransition[] {
    return _.flatMap(Array.from(this.rows.values()), (row) => Array.from(row.values()));
  }

  /** Distinct symbols read anywhere in the table, first-seen order. */
  public get symbols (): TapeSymbol[] {
    return _.uniq(this.entries.map((trans) => trans.read));
  }
}
