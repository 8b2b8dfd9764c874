'use strict';

import type { MachineSpec } from './parser';
import type { Reporter } from './report/Reporter';
import { State } from './State';
import { StateAutomaton } from './StateAutomaton';
import { TapeSymbol, tapeValue } from './TapeSymbol';
import type TransitionTable from './TransitionTable';

export interface TMSnapshot {
  readonly states: readonly State[];
  readonly tapeWrites: readonly TapeSymbol[];
  readonly accepting: boolean;
}

export default class TM extends StateAutomaton<State, TapeSymbol> {
  private readonly transition: TransitionTable;
  private readonly acceptStates: ReadonlySet<State>;
  private readonly reporter: Reporter;
  private readonly visited: State[];
  private readonly writes: TapeSymbol[] = [];
  private finalized = false;

  /**
   * Construct a Turing machine.
   * @param spec      compiled machine definition
   * @param reporter  receives every reading, transition and the final summary
   */
  constructor (spec: MachineSpec, reporter: Reporter) {
    super();

    this.transition = spec.table;
    this.acceptStates = spec.acceptStates;
    this.reporter = reporter;
    this.visited = [spec.startState];
  }

  get states (): readonly State[] { return this.visited; }

  get tapeWrites (): readonly TapeSymbol[] { return this.writes; }

  get currentState (): State { return this.visited[this.visited.length - 1]; }

  get isAccepting (): boolean { return this.acceptStates.has(this.currentState); }

  get isHalted (): boolean { return !this.transition.hasTransitionsFrom(this.currentState); }

  toString (): string {
    return this.currentState + '\n' + tapeValue(this.writes);
  }

  public snapshot (): TMSnapshot {
    return Object.freeze({
      states: Object.freeze(this.visited.slice()),
      tapeWrites: Object.freeze(this.writes.slice()),
      accepting: this.isAccepting,
    });
  }

  public step (symbol: TapeSymbol): boolean {
    this.reporter.readingSymbol(symbol);

    let found = this.transition.lookup(this.currentState, symbol);
    if (found.kind === 'absent') { return false; }

    let instruct = found.transition;
    this.writes.push(instruct.write);
    this.visited.push(instruct.to);
    this.reporter.transition(instruct);

    return true;
  }

  /**
   * Report the outcome of the run. Only the first call has any effect.
   */
  public finalize (): void {
    if (this.finalized) { return; }
    this.finalized = true;
    this.reporter.summary(this.snapshot());
  }
}
