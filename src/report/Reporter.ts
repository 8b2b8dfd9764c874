import type { Writable } from 'stream';

import type SymbolNotAccepted from '../SymbolNotAccepted';
import type { State } from '../State';
import type { TapeSymbol } from '../TapeSymbol';
import type { TMSnapshot } from '../TM';
import type { TMTransition } from '../TransitionSpec';
import type TransitionTable from '../TransitionTable';
import {
  formatGrid,
  readingLine,
  statusLine,
  summaryLines,
  transitionLines,
  transitionMatrix,
} from './format';

/**
 * Sink for everything the machine and the driver have to say.
 * Implementations never touch the machine itself.
 */
export interface Reporter {
  transitionTable(table: TransitionTable): void;
  currentState(state: State): void;
  readingSymbol(symbol: TapeSymbol): void;
  transition(trans: TMTransition): void;
  rejected(error: SymbolNotAccepted): void;
  summary(run: TMSnapshot): void;
}

export class ConsoleReporter implements Reporter {
  private readonly console: Console;

  constructor (output: Writable) {
    this.console = new console.Console({ stdout: output, stderr: output });
  }

  private print (lines: string[]): void {
    lines.forEach((line) => this.console.log(line));
  }

  transitionTable (table: TransitionTable): void {
    this.print(['Transition table:'].concat(formatGrid(transitionMatrix(table))));
  }

  currentState (state: State): void {
    this.print([statusLine(state, false, false)]);
  }

  readingSymbol (symbol: TapeSymbol): void {
    this.print([readingLine(symbol)]);
  }

  transition (trans: TMTransition): void {
    this.print(transitionLines(trans));
  }

  rejected (error: SymbolNotAccepted): void {
    this.print([error.message]);
  }

  summary (run: TMSnapshot): void {
    this.print(summaryLines(run));
  }
}
