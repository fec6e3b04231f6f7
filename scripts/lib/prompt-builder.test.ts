import assert from 'node:assert';
import test from 'node:test';
import { ConceptRegistry } from './concept-registry';
import {
  buildDefensePrompt,
  buildGenerationPrompt,
  buildReviewPrompt,
  formatOptions,
  loadPrompt,
  renderTemplate,
} from './prompt-builder';
import type { GeneratedRecord, WorkItem } from './types';

const TELOMERE_ITEM: WorkItem = {
  id: 'molecular_genetics-9-1',
  category: 'molecular_genetics',
  topic: 'Telomeres and telomerase',
};

const RECORD: GeneratedRecord = {
  question: 'Which enzyme adds repeats to chromosome ends?',
  options: { A: 'Primase', B: 'Telomerase', C: 'Ligase' },
  reasoning: 'Telomerase is a reverse transcriptase with an RNA template.',
  correct_answer: 'B',
  category: 'molecular_genetics',
  subtopic: 'Telomeres and telomerase',
};

test('generation prompt names the topic and an empty concept list', () => {
  const prompt = buildGenerationPrompt(loadPrompt('generate-v4'), TELOMERE_ITEM, ConceptRegistry.empty());
  assert.ok(prompt.includes('Generate a multiple-choice question about: Telomeres and telomerase'));
  assert.ok(prompt.includes('"topic": "molecular_genetics"'));
  assert.ok(prompt.includes('- None yet'));
  assert.ok(!prompt.includes('{{'));
});

test('generation prompt lists concepts already covered', () => {
  const concepts = ConceptRegistry.empty().with('leading vs lagging strand').with('shelterin capping');
  const prompt = buildGenerationPrompt(loadPrompt('generate-v3'), TELOMERE_ITEM, concepts);
  assert.ok(prompt.includes('- leading vs lagging strand\n- shelterin capping'));
  assert.ok(!prompt.includes('- None yet'));
});

test('v1 template renders without a concept list', () => {
  const prompt = buildGenerationPrompt(loadPrompt('generate-v1'), TELOMERE_ITEM, ConceptRegistry.empty());
  assert.ok(prompt.includes('"subtopic": "Telomeres and telomerase"'));
  assert.ok(!prompt.includes('{{'));
});

test('renderTemplate leaves unknown placeholders and literal braces alone', () => {
  assert.strictEqual(
    renderTemplate('{"a": 1} {{name}} {{other}}', { name: 'x' }),
    '{"a": 1} x {{other}}',
  );
});

test('formatOptions keeps emission order', () => {
  assert.strictEqual(formatOptions(RECORD.options), 'A. Primase\nB. Telomerase\nC. Ligase');
});

test('review prompt carries question, options, answer and reasoning', () => {
  const prompt = buildReviewPrompt(loadPrompt('review'), RECORD);
  assert.ok(prompt.includes(RECORD.question));
  assert.ok(prompt.includes('A. Primase\nB. Telomerase\nC. Ligase'));
  assert.ok(prompt.includes('STATED CORRECT ANSWER: B'));
  assert.ok(prompt.includes(RECORD.reasoning));
});

test('defense prompt states the answer to defend', () => {
  const prompt = buildDefensePrompt(loadPrompt('defend'), RECORD);
  assert.ok(prompt.includes('STATED CORRECT ANSWER: B'));
  assert.ok(prompt.includes('The stated answer (B) is DEFINITIVELY correct'));
  assert.ok(!prompt.includes(RECORD.reasoning));
});
