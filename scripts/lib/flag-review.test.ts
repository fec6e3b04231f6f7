import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable, Writable } from 'node:stream';
import test from 'node:test';
import { FLAG_PROMPT, formatRecordForReview, runFlagReview } from './flag-review';
import type { Logger } from './pipeline-driver';
import { loadQuestionFile } from './question-loader';
import { createLineReader } from './script-runner';
import type { GeneratedRecord, QueuedRecord } from './types';

const QUIET: Logger = { log: () => {}, warn: () => {}, error: () => {} };

function record(n: number): GeneratedRecord {
  return {
    question: `Question ${n}?`,
    options: { A: 'yes', B: 'no' },
    reasoning: `Because ${n}.`,
    correct_answer: 'A',
    category: 'population_genetics',
    subtopic: 'Hardy-Weinberg equilibrium',
  };
}

function queue(...positions: number[]): QueuedRecord[] {
  return positions.map(position => ({ position, record: record(position) }));
}

function scriptedAnswers(answers: Array<string | null>) {
  const prompts: string[] = [];
  return {
    prompts,
    ask: async (prompt: string) => {
      prompts.push(prompt);
      const answer = answers.shift();
      return answer === undefined ? null : answer;
    },
  };
}

test('f flags the current 1-based index, blank moves on', async () => {
  const records = queue(1, 2, 3);
  const answers = scriptedAnswers(['', ' F ', 'f']);
  const persisted: number[] = [];

  const summary = await runFlagReview(records, { ...answers, flag: index => persisted.push(index), logger: QUIET });

  assert.deepStrictEqual(summary, { shown: 3, flagged: [2, 3], quit: false });
  assert.deepStrictEqual(persisted, [2, 3]);
  assert.deepStrictEqual(answers.prompts, [FLAG_PROMPT, FLAG_PROMPT, FLAG_PROMPT]);
});

test('q stops the session early', async () => {
  const persisted: number[] = [];
  const summary = await runFlagReview(queue(1, 2, 3), {
    ...scriptedAnswers(['f', 'q']),
    flag: index => persisted.push(index),
    logger: QUIET,
  });
  assert.deepStrictEqual(summary, { shown: 2, flagged: [1], quit: true });
  assert.deepStrictEqual(persisted, [1]);
});

test('end of input stops like q', async () => {
  const summary = await runFlagReview(queue(1, 2), {
    ...scriptedAnswers([null]),
    flag: () => assert.fail('nothing should be flagged'),
    logger: QUIET,
  });
  assert.deepStrictEqual(summary, { shown: 1, flagged: [], quit: true });
});

test('flags use the line position in the file, not the place among valid records', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'genetics-flag-'));
  try {
    const path = join(dir, 'questions.jsonl');
    writeFileSync(path, `{"question": "broken"}\n${JSON.stringify(record(2))}\n`);
    const { queued } = loadQuestionFile(path, undefined, QUIET);
    const persisted: number[] = [];
    const shown: string[] = [];

    const summary = await runFlagReview(queued, {
      ...scriptedAnswers(['f']),
      flag: index => persisted.push(index),
      logger: { ...QUIET, log: (message: string) => shown.push(message) },
    });

    assert.deepStrictEqual(persisted, [2]);
    assert.deepStrictEqual(summary.flagged, [2]);
    assert.strictEqual(shown[0].split('\n')[2], 'QUESTION 2 of 2');
    assert.strictEqual(shown[1], '  -> Flagged question 2');
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test('records are shown with options, answer and reasoning', () => {
  const text = formatRecordForReview(record(7), 7, 12);
  const lines = text.split('\n');
  assert.strictEqual(lines[2], 'QUESTION 7 of 12');
  assert.strictEqual(lines[3], 'Category: population_genetics | Topic: Hardy-Weinberg equilibrium');
  assert.ok(text.includes('  A. yes\n  B. no'));
  assert.ok(text.includes('CORRECT ANSWER: A'));
  assert.ok(text.endsWith('REASONING:\nBecause 7.'));
});

test('line reader hands back piped lines then null', async () => {
  const written: string[] = [];
  const output = new Writable({
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });
  const reader = createLineReader(Readable.from(['f\n', '\nq\n']), output);

  assert.strictEqual(await reader.ask('> '), 'f');
  assert.strictEqual(await reader.ask('> '), '');
  assert.strictEqual(await reader.ask('> '), 'q');
  assert.strictEqual(await reader.ask('> '), null);
  reader.close();

  assert.deepStrictEqual(written, ['> ', '> ', '> ', '> ']);
});
