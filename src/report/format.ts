import * as _ from 'lodash';

import { State, stateLabel } from '../State';
import { symbolLabel, TapeSymbol, tapeValue } from '../TapeSymbol';
import type { TMSnapshot } from '../TM';
import { Direction, directionLabel, transitionTuple } from '../TransitionSpec';
import type { TMTransition } from '../TransitionSpec';
import type TransitionTable from '../TransitionTable';

const HORIZONTAL_BORDER_KNOT = '+';
const HORIZONTAL_BORDER_PATTERN = '-';
const VERTICAL_BORDER_PATTERN = '|';

// every state of the built-in machine reads exactly three symbols
const ENTRIES_PER_ROW = 3;

/**
 * Lay out the transition table as rows of cells: a header of the symbols
 * read, then one row per source state.
 */
export function transitionMatrix (table: TransitionTable): string[][] {
  let header = ['δ'].concat(table.symbols.map(symbolLabel));
  let rows = _.chunk(table.entries, ENTRIES_PER_ROW)
    .map((entries) =>
      [stateLabel(entries[0].from)].concat(entries.map(transitionTuple)));
  return [header].concat(rows);
}

/**
 * Render rows as a bordered grid with right-justified cells of equal width.
 */
export function formatGrid (rows: string[][]): string[] {
  if (_.isEmpty(rows)) return [];

  let numberOfColumns = _.max(rows.map((row) => row.length)) || 0;
  let width = _.max(_.flatten(rows).map((cell) => cell.length)) || 0;
  let border = HORIZONTAL_BORDER_KNOT
    + _.repeat(_.repeat(HORIZONTAL_BORDER_PATTERN, width) + HORIZONTAL_BORDER_KNOT, numberOfColumns);

  return [border].concat(_.flatMap(rows, (row) => [
    VERTICAL_BORDER_PATTERN + row.map((cell) => _.padStart(cell, width) + VERTICAL_BORDER_PATTERN).join(''),
    border,
  ]));
}

export function statusLine (state: State, final: boolean, accepting: boolean): string {
  let status = final ? 'Final' : 'Current';
  let result = final && accepting ? '(accepting)' : '';
  return `${status} TM state: ${stateLabel(state)} ${result}`;
}

export function readingLine (symbol: TapeSymbol): string {
  return `Reading symbol: ${symbolLabel(symbol)}`;
}

export function writtenLine (symbol: TapeSymbol): string {
  return `Value written on tape: ${symbolLabel(symbol)}`;
}

export function directionLine (direction: Direction): string {
  return `Head direction of movement: ${directionLabel(direction)}`;
}

export function transitionLines (trans: TMTransition): string[] {
  return [
    statusLine(trans.to, false, false),
    writtenLine(trans.write),
    directionLine(trans.move),
  ];
}

export function pathLine (states: readonly State[]): string {
  return `State change path: ${states.map(stateLabel).join('→')}`;
}

export function summaryLines (run: TMSnapshot): string[] {
  let lines = [
    pathLine(run.states),
    statusLine(run.states[run.states.length - 1], true, run.accepting),
  ];
  if (run.accepting)
    lines.push(`Final value: ${tapeValue(run.tapeWrites)}`);
  return lines;
}
