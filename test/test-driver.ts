import * as assert from 'assert';
import { Readable } from 'stream';

import { parseLine, PROMPT, run } from '../src/Driver';
import { State } from '../src/State';
import { TapeSymbol } from '../src/TapeSymbol';
import { Capture, RecordingReporter } from './helpers/capture';

const TABLE = [
  'Transition table:',
  '+--------+--------+--------+--------+',
  '|       δ|       0|       1|       Θ|',
  '+--------+--------+--------+--------+',
  '|      q0|0, q1, L|1, q1, L| -, -, -|',
  '+--------+--------+--------+--------+',
  '|      q1| -, -, -| -, -, -|1, q2, L|',
  '+--------+--------+--------+--------+',
  '|      q2| -, -, -| -, -, -| -, -, -|',
  '+--------+--------+--------+--------+',
  'Current TM state: q0 ',
];

function session (...lines: string[]) {
  let output = new Capture();
  let input = Readable.from(lines);
  return { output, done: run({ input, output }) };
}

describe('Driver', function() {
  describe('parseLine', function() {
    it('strips whitespace', function () {
      assert.deepStrictEqual(parseLine(' 0 1\t#\r'), {
        kind: 'accepted',
        symbols: [TapeSymbol.zero, TapeSymbol.one, TapeSymbol.theta],
      });
    });

    it('empty', function () {
      assert.deepStrictEqual(parseLine(''), { kind: 'empty' });
      assert.deepStrictEqual(parseLine(' \t '), { kind: 'empty' });
    });

    it('rejects on the first bad character', function () {
      let parsed = parseLine('0xy#');
      assert.strictEqual(parsed.kind, 'rejected');
      if (parsed.kind === 'rejected')
        assert.strictEqual(parsed.error.character, 'x');
    });
  });

  describe('run', function() {
    it('accepting input', async function () {
      let { output, done } = session('0#\n');
      let result = await done;

      assert.deepStrictEqual(result.states, [State.q0, State.q1, State.q2]);
      assert.deepStrictEqual(output.lines, TABLE.concat([
        PROMPT + 'Reading symbol: 0',
        'Current TM state: q1 ',
        'Value written on tape: 0',
        'Head direction of movement: L',
        'Reading symbol: Θ',
        'Current TM state: q2 ',
        'Value written on tape: 1',
        'Head direction of movement: L',
        'State change path: q0→q1→q2',
        'Final TM state: q2 (accepting)',
        'Final value: 10',
        '',
      ]));
    });

    it('halting input', async function () {
      let { output, done } = session('01#\n');
      let result = await done;

      assert.strictEqual(result.accepting, false);
      assert.deepStrictEqual(output.lines.slice(TABLE.length), [
        PROMPT + 'Reading symbol: 0',
        'Current TM state: q1 ',
        'Value written on tape: 0',
        'Head direction of movement: L',
        'Reading symbol: 1',
        'Current TM state: - ',
        'Value written on tape: -',
        'Head direction of movement: -',
        'Reading symbol: Θ',
        'State change path: q0→q1→-',
        'Final TM state: - ',
        '',
      ]);
    });

    it('rejected line is discarded whole', async function () {
      let { output, done } = session('0x#\n', '0#\n');
      let result = await done;

      assert.deepStrictEqual(result.tapeWrites, [TapeSymbol.zero, TapeSymbol.one]);
      assert.deepStrictEqual(output.lines.slice(TABLE.length, TABLE.length + 2), [
        PROMPT + "TM doesn't accept symbol: x",
        PROMPT + 'Reading symbol: 0',
      ]);
    });

    it('blank lines prompt again', async function () {
      let { output, done } = session('\n', '  \n', ' # \n');
      let result = await done;

      assert.deepStrictEqual(result.states, [State.q0, State.idle]);
      assert.strictEqual(output.lines[TABLE.length], PROMPT + PROMPT + PROMPT + 'Reading symbol: Θ');
    });

    it('only one line is consumed', async function () {
      let { done } = session('#\n', '0#\n');
      let result = await done;
      assert.deepStrictEqual(result.states, [State.q0, State.idle]);
    });

    it('last line without a newline', async function () {
      let { done } = session('1#');
      let result = await done;
      assert.deepStrictEqual(result.tapeWrites, [TapeSymbol.one, TapeSymbol.one]);
    });

    it('input ends before a value is accepted', async function () {
      let { output, done } = session('0x#\n');
      await assert.rejects(done, { message: 'input closed before a value was accepted' });
      assert.deepStrictEqual(output.lines.slice(TABLE.length), [
        PROMPT + "TM doesn't accept symbol: x",
        PROMPT + 'State change path: q0',
        'Final TM state: q0 ',
        '',
      ]);
    });

    it('custom reporter and prompt', async function () {
      let output = new Capture();
      let reporter = new RecordingReporter();
      await run({ input: Readable.from(['z\n', '0#\n']), output, reporter, prompt: '> ' });

      assert.strictEqual(output.text, '> > ');
      assert.strictEqual(reporter.tables, 1);
      assert.deepStrictEqual(reporter.states, [State.q0]);
      assert.deepStrictEqual(reporter.rejections.map((e) => e.character), ['z']);
      assert.strictEqual(reporter.summaries.length, 1);
    });
  });
});
