export { run, parseLine, PROMPT } from './Driver';
export type { DriverOptions, LineParseResult } from './Driver';
export { machine, definition } from './machine';
export { parseSpec, TMSpecError } from './parser';
export type { MachineSpec, RawMachineSpec } from './parser';
export { ConsoleReporter } from './report/Reporter';
export type { Reporter } from './report/Reporter';
export { State } from './State';
export { default as SymbolNotAccepted } from './SymbolNotAccepted';
export { parseSymbol, symbolLabel, tapeValue, TapeSymbol } from './TapeSymbol';
export { default as TM } from './TM';
export type { TMSnapshot } from './TM';
export { Direction } from './TransitionSpec';
export type { TMTransition } from './TransitionSpec';
export { default as TransitionTable } from './TransitionTable';
