'use strict';

import * as yup from 'yup';
import * as _ from 'lodash';

import { parseTable, repeatedCell, undeclaredTargets } from './parser-utils';
import type { TransitionParser } from './parser-utils';
import { State } from './State';
import { Direction, StateSchema, TMTransitionSchema } from './TransitionSpec';
import type { RawTMTransition, RawTransitionTable } from './TransitionSpec';
import TransitionTable from './TransitionTable';

import TMSpecError from './TMSpecError';
export { TMSpecError };

/**
 * Machine definition as written in code, before validation.
 */
export interface RawMachineSpec {
  startState: string;
  acceptStates?: string[] | string | null;
  table: RawTransitionTable;
}

export interface MachineSpec {
  startState: State;
  acceptStates: ReadonlySet<State>;
  table: TransitionTable;
}

let MachineHeaderSchema = yup.object({
  startState: StateSchema,
  acceptStates: yup.array(StateSchema).defined(),
});

function toStringArray (val: string[] | string | null | undefined): string[] {
  if (_.isNil(val))
    return [];
  if (_.isString(val))
    return [val];
  else
    return val.map(String);
}

function wrapValidation<T> (reason: string, problemValue: unknown, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new TMSpecError(reason, { problemValue, validationErrors: e.errors });
    throw e;
  }
}

/**
 * Missing fields of a cell take their defaults: write what was read,
 * report no movement, stay in the same state.
 */
const TMTransitionParser: TransitionParser =
  function (from, symbol, trans) {
    let cell: RawTMTransition = trans || {};
    return wrapValidation('Illegal transition', { from, read: symbol, ...cell }, () =>
      TMTransitionSchema.validateSync({
        from: from,
        read: symbol,
        write: cell.write || symbol,
        move: cell.move || Direction.N,
        to: cell.state || from,
      }));
  };

function statesDeclared (states: State[], declared: State[], what: string): void {
  let missing = _.difference(states, declared);
  if (missing.length)
    throw new TMSpecError(`all ${what} must be declared`, { problemValue: missing });
}

/**
 * Validate a machine definition and compile its transition table.
 * @throws TMSpecError if anything in the definition is undeclared or unknown
 */
export function parseSpec (spec: RawMachineSpec): MachineSpec {
  let header = wrapValidation('Validation Error', _.pick(spec, ['startState', 'acceptStates']), () =>
    MachineHeaderSchema.validateSync({
      startState: spec.startState,
      acceptStates: toStringArray(spec.acceptStates),
    }));

  let declared = wrapValidation('Validation Error', _.keys(spec.table), () =>
    _.keys(spec.table).map((state) => StateSchema.validateSync(state)));

  let transitions = parseTable(spec.table, TMTransitionParser);

  let repeated = repeatedCell(transitions);
  if (repeated)
    throw new TMSpecError('Nondeterministic transition', { problemValue: repeated });

  let undeclared = undeclaredTargets(transitions, declared);
  if (undeclared.length)
    throw new TMSpecError('all states must be declared', { problemValue: undeclared });
  statesDeclared([header.startState], declared, 'start states');
  statesDeclared(header.acceptStates, declared, 'accept states');

  return {
    startState: header.startState,
    acceptStates: new Set(header.acceptStates),
    table: new TransitionTable(transitions, declared),
  };
}
