import { parseSpec } from './parser';
import type { MachineSpec, RawMachineSpec } from './parser';

/**
 * The one machine this program runs. Reads a binary digit followed by
 * theta; only a single digit is accepted, and the tape then reads 1
 * followed by that digit.
 */
export const definition: RawMachineSpec = {
  startState: 'q0',
  acceptStates: ['q2'],
  table: {
    q0: {
      '0': { write: '0', move: 'L', state: 'q1' },
      '1': { write: '1', move: 'L', state: 'q1' },
      theta: { write: 'blank', move: 'N', state: 'idle' },
    },
    q1: {
      '0': { write: 'blank', move: 'N', state: 'idle' },
      '1': { write: 'blank', move: 'N', state: 'idle' },
      theta: { write: '1', move: 'L', state: 'q2' },
    },
    q2: {
      '0,1,theta': { write: 'blank', move: 'N', state: 'idle' },
    },
    idle: null,
  },
};

export const machine: MachineSpec = parseSpec(definition);
