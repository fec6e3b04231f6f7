import assert from 'node:assert';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import { ConceptRegistry } from './concept-registry';
import { TimeoutFailure } from './errors';
import { JsonlWriter, type RecordSink } from './jsonl';
import type { ModelClient } from './model-client';
import { runPipeline, terminalState, type Logger } from './pipeline-driver';
import { createDefenseStage, createGenerationStage, createReviewStage, hasFailurePartition, truncate } from './pipeline-steps';
import { loadQuestionFile } from './question-loader';
import type { DefendedRecord, GeneratedRecord, QueuedRecord, ReviewedRecord } from './types';

const QUIET: Logger = { log: () => {}, warn: () => {}, error: () => {} };

const RECORD: GeneratedRecord = {
  question: 'Which mutation type changes a codon to a stop codon?',
  options: { A: 'Missense', B: 'Nonsense', C: 'Silent' },
  reasoning: 'A nonsense mutation introduces a premature stop codon.',
  correct_answer: 'B',
  category: 'mutations_and_variation',
  subtopic: 'Point mutations',
};

const QUEUED: QueuedRecord = { position: 4, record: RECORD };

function collect<T>(): RecordSink<T> & { records: T[] } {
  const records: T[] = [];
  return {
    records,
    write: record => {
      records.push(record);
    },
    get count() {
      return records.length;
    },
  };
}

function replying(text: string | Error): ModelClient {
  return {
    complete: async () => {
      if (text instanceof Error) throw text;
      return text;
    },
  };
}

async function review(reply: string | Error) {
  const passed = collect<ReviewedRecord>();
  const flagged = collect<ReviewedRecord>();
  const lines: string[] = [];
  const result = await runPipeline([QUEUED], createReviewStage('Review: {{question}}'), {
    client: replying(reply),
    model: 'anthropic/claude-opus-4',
    settings: { maxTokens: 500, temperature: 0.3, timeoutMs: 1000, delayMs: 0 },
    concepts: ConceptRegistry.empty(),
    sinks: { a: passed, b: flagged },
    logger: { ...QUIET, log: (message: string) => lines.push(message) },
  });
  return { result, passed, flagged, lines };
}

async function defend(reply: string | Error) {
  const defended = collect<DefendedRecord>();
  const cantDefend = collect<DefendedRecord>();
  const lines: string[] = [];
  await runPipeline([QUEUED], createDefenseStage('Defend: {{correct_answer}}'), {
    client: replying(reply),
    model: 'anthropic/claude-opus-4',
    settings: { maxTokens: 600, temperature: 0.3, timeoutMs: 1000, delayMs: 0 },
    concepts: ConceptRegistry.empty(),
    sinks: { a: defended, b: cantDefend },
    logger: { ...QUIET, log: (message: string) => lines.push(message) },
  });
  return { defended, cantDefend, lines };
}

test('truncate keeps short text and marks cut text', () => {
  assert.strictEqual(truncate('short', 10), 'short');
  assert.strictEqual(truncate('abcdefghijkl', 10), 'abcdefg...');
});

test('only v1 generation has no failure partition', () => {
  assert.strictEqual(hasFailurePartition('v1'), false);
  assert.strictEqual(hasFailurePartition('v3'), true);
  assert.strictEqual(hasFailurePartition('v4'), true);
  const failure = new TimeoutFailure(100);
  const item = { id: 'x-1-1', category: 'x', topic: 't' };
  assert.strictEqual(createGenerationStage('v1', '').onFailure(item, failure), undefined);
  assert.deepStrictEqual(createGenerationStage('v4', '').onFailure(item, failure), {
    id: 'x-1-1',
    category: 'x',
    subtopic: 't',
    failure: 'timeout',
    message: 'Request timed out after 100ms',
  });
});

test('review PASS keeps the record and attaches the verdict', async () => {
  const { passed, flagged, result } = await review('{"verdict": "PASS", "confidence": "high", "concerns": [], "notes": "Clean."}');
  assert.strictEqual(flagged.count, 0);
  assert.deepStrictEqual(passed.records[0], {
    ...RECORD,
    review: { verdict: 'PASS', confidence: 'high', concerns: [], notes: 'Clean.' },
  });
  assert.strictEqual(result.outcomes[0].id, 'question-4');
});

test('review FLAG goes to needs-review with its concerns', async () => {
  const { passed, flagged, lines } = await review(
    '```json\n{"verdict": "FLAG", "concerns": ["two defensible answers", "vague stem"], "notes": ""}\n```',
  );
  assert.strictEqual(passed.count, 0);
  assert.strictEqual(flagged.records[0].review.verdict, 'FLAG');
  assert.strictEqual(
    lines[0],
    '  ⚑ [1/1] Which mutation type changes a codon to a stop codon? - FLAG - two defensible answers, vague stem',
  );
});

test('a failed review is flagged for a human', async () => {
  const { flagged } = await review(new TimeoutFailure(1000));
  assert.deepStrictEqual(flagged.records[0].review, {
    verdict: 'FLAG',
    concerns: [],
    notes: 'Auto-review failed: Request timed out after 1000ms',
  });
});

test('defense that holds lands in defended', async () => {
  const { defended, lines } = await defend(
    '{"can_defend": true, "defense": "Only a nonsense mutation creates a stop codon.", "weak_points": ["C is weak", "A is weak", "unused"]}',
  );
  assert.strictEqual(defended.records[0].defense.can_defend, true);
  assert.strictEqual(lines[0].endsWith('DEFENDED (with notes: C is weak, A is weak)'), true);
});

test("defense that fails lands in can't defend", async () => {
  const { defended, cantDefend, lines } = await defend('{"can_defend": false, "defense": "Option A could also be argued."}');
  assert.strictEqual(defended.count, 0);
  assert.deepStrictEqual(cantDefend.records[0].defense, {
    can_defend: false,
    defense: 'Option A could also be argued.',
    weak_points: [],
  });
  assert.strictEqual(lines[0].endsWith("CAN'T DEFEND - Option A could also be argued."), true);
});

test("an unparseable defense counts as can't defend", async () => {
  const { cantDefend } = await defend('The answer is fine.');
  assert.strictEqual(cantDefend.records[0].defense.can_defend, false);
  assert.ok(cantDefend.records[0].defense.defense.startsWith('Auto-defense failed: JSON parse error:'));
});

test('a FLAG verdict with no needs-review sink is dropped, not kept', async () => {
  const passed = collect<ReviewedRecord>();
  const result = await runPipeline([QUEUED], createReviewStage('Review: {{question}}'), {
    client: replying('{"verdict": "FLAG", "concerns": ["vague stem"]}'),
    model: 'anthropic/claude-opus-4',
    settings: { maxTokens: 500, temperature: 0.3, timeoutMs: 1000, delayMs: 0 },
    concepts: ConceptRegistry.empty(),
    sinks: { a: passed },
    logger: QUIET,
  });
  assert.strictEqual(terminalState(result.outcomes[0]), 'DROPPED');
  assert.deepStrictEqual(result.attention, []);
  assert.strictEqual(passed.count, 0);
});

test('review then defense keeps both verdicts and every field of the input', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'genetics-stages-'));
  try {
    const input = join(dir, 'v3_genetics_qa.jsonl');
    const { category: _category, subtopic: _subtopic, ...bare } = RECORD;
    writeFileSync(input, JSON.stringify({ ...bare, source: 'hand-written' }) + '\n');
    const settings = { maxTokens: 500, temperature: 0.3, timeoutMs: 1000, delayMs: 0 };

    const passedPath = join(dir, 'v3_passed.jsonl');
    await runPipeline(loadQuestionFile(input, undefined, QUIET).queued, createReviewStage('Review: {{question}}'), {
      client: replying('{"verdict": "PASS", "confidence": "high", "concerns": [], "notes": "Clean."}'),
      model: 'anthropic/claude-opus-4',
      settings,
      concepts: ConceptRegistry.empty(),
      sinks: { a: new JsonlWriter<ReviewedRecord>(passedPath), b: collect<ReviewedRecord>() },
      logger: QUIET,
    });

    const defendedPath = join(dir, 'v3_defended.jsonl');
    await runPipeline(loadQuestionFile(passedPath, undefined, QUIET).queued, createDefenseStage('Defend: {{correct_answer}}'), {
      client: replying('{"can_defend": true, "defense": "Only B adds a stop codon.", "weak_points": []}'),
      model: 'anthropic/claude-opus-4',
      settings,
      concepts: ConceptRegistry.empty(),
      sinks: { a: new JsonlWriter<DefendedRecord>(defendedPath), b: collect<DefendedRecord>() },
      logger: QUIET,
    });

    assert.deepStrictEqual(JSON.parse(readFileSync(defendedPath, 'utf-8')), {
      ...bare,
      source: 'hand-written',
      review: { verdict: 'PASS', confidence: 'high', concerns: [], notes: 'Clean.' },
      defense: { can_defend: true, defense: 'Only B adds a stop codon.', weak_points: [] },
    });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
