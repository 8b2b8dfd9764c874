import * as yup from 'yup';
import { State, stateLabel } from './State';
import { TapeSymbol, symbolLabel } from './TapeSymbol';

/**
 * Head movement reported by a transition. Nothing moves: the machine
 * only records what it writes.
 */
export enum Direction {
  L = 'L',
  R = 'R',
  N = 'N',
}

export function directionLabel (direction: Direction): string {
  return direction === Direction.N ? '-' : direction;
}

export let StateSchema = yup
  .mixed<State>()
  .oneOf(Object.values(State), 'unknown state: ${value}')
  .defined();

export let SymbolSchema = yup
  .mixed<TapeSymbol>()
  .oneOf(Object.values(TapeSymbol), 'unknown symbol: ${value}')
  .defined();

export let DirectionSchema = yup
  .mixed<Direction>()
  .oneOf(Object.values(Direction), 'illegal move: ${value}')
  .defined();

export let TMTransitionSchema = yup.object({
  from: StateSchema,
  read: SymbolSchema,
  write: SymbolSchema,
  move: DirectionSchema,
  to: StateSchema,
});

export type TMTransition = Readonly<yup.InferType<typeof TMTransitionSchema>>;

/**
 * Cell notation used by machine definitions; every field is optional.
 */
export interface RawTMTransition {
  write?: string | null;
  move?: string | null;
  state?: string | null;
}

export type RawTransitionRow = {[symbol: string]: RawTMTransition | null};

// a null row declares a state with no outgoing transitions
export type RawTransitionTable = {[state: string]: RawTransitionRow | null};

// "write, to, move" as shown in the transition grid
export function transitionTuple (trans: TMTransition): string {
  return [symbolLabel(trans.write), stateLabel(trans.to), directionLabel(trans.move)].join(', ');
}
