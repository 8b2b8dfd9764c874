export enum State {
  q0 = 'q0',
  q1 = 'q1',
  q2 = 'q2',
  // halt, no further movement
  idle = 'idle',
}

export function stateLabel (state: State): string {
  return state === State.idle ? '-' : state;
}
