'use strict';

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import * as _ from 'lodash';

import { machine } from './machine';
import type { MachineSpec } from './parser';
import { ConsoleReporter } from './report/Reporter';
import type { Reporter } from './report/Reporter';
import type SymbolNotAccepted from './SymbolNotAccepted';
import { parseSymbol, TapeSymbol } from './TapeSymbol';
import TM from './TM';
import type { TMSnapshot } from './TM';

export const PROMPT = 'Type value terminated by # character (theta equivalent): ';

export interface DriverOptions {
  input?: Readable;
  output?: Writable;
  prompt?: string;
  spec?: MachineSpec;
  // defaults to a ConsoleReporter on `output`
  reporter?: Reporter;
}

export type LineParseResult =
  | { kind: 'empty' }
  | { kind: 'rejected', error: SymbolNotAccepted }
  | { kind: 'accepted', symbols: TapeSymbol[] };

function isWhitespace (ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Turn a typed line into symbols. Whitespace is ignored; the first
 * character outside the alphabet rejects the whole line.
 */
export function parseLine (line: string): LineParseResult {
  let chars = _.reject(Array.from(line), isWhitespace);
  if (_.isEmpty(chars)) return { kind: 'empty' };

  let symbols: TapeSymbol[] = [];
  for (let ch of chars) {
    let parsed = parseSymbol(ch);
    if (!parsed.ok) return { kind: 'rejected', error: parsed.error };
    symbols.push(parsed.symbol);
  }
  return { kind: 'accepted', symbols };
}

/**
 * Print the table, prompt until a line made only of accepted symbols
 * arrives, feed it to the machine and report the outcome.
 *
 * The final report is written even if reading fails (e.g. the input
 * ends first); the failure is rethrown afterwards.
 */
export async function run (options: DriverOptions = {}): Promise<TMSnapshot> {
  let output = options.output || process.stdout;
  let prompt = _.isNil(options.prompt) ? PROMPT : options.prompt;
  let spec = options.spec || machine;
  let reporter = options.reporter || new ConsoleReporter(output);

  reporter.transitionTable(spec.table);
  let tm = new TM(spec, reporter);
  reporter.currentState(tm.currentState);

  try {
    let rl = readline.createInterface({ input: options.input || process.stdin, terminal: false });
    try {
      let lines = rl[Symbol.asyncIterator]();
      for (;;) {
        output.write(prompt);
        let next = await lines.next();
        if (next.done) throw new Error('input closed before a value was accepted');

        let parsed = parseLine(next.value);
        if (parsed.kind === 'empty') continue;
        if (parsed.kind === 'rejected') {
          reporter.rejected(parsed.error);
          continue;
        }
        parsed.symbols.forEach((symbol) => tm.step(symbol));
        break;
      }
    } finally {
      rl.close();
    }
  } finally {
    tm.finalize();
  }

  return tm.snapshot();
}
