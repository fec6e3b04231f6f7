/**
 * Prompt rendering for the generation, review and defense stages.
 *
 * Templates live in scripts/prompts/*.md and use `{{name}}` placeholders, so
 * the literal JSON examples inside them need no escaping.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { ConceptRegistry } from './concept-registry';
import type { OptionMap, StoredRecord, WorkItem } from './types';

export type PromptName = 'generate-v1' | 'generate-v3' | 'generate-v4' | 'review' | 'defend';

const PROMPTS_DIR = resolve(__dirname, '../prompts');

export function loadPrompt(name: PromptName): string {
  return readFileSync(resolve(PROMPTS_DIR, `${name}.md`), 'utf-8');
}

/**
 * Substitute `{{key}}` placeholders. Placeholders without a value are left
 * in place.
 */
export function renderTemplate<K extends string>(template: string, values: Record<K, string>): string {
  const lookup: Record<string, string> = values;
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(lookup, key) ? lookup[key] : match,
  );
}

export function formatOptions(options: OptionMap): string {
  return Object.entries(options)
    .map(([letter, text]) => `${letter}. ${text}`)
    .join('\n');
}

export function buildGenerationPrompt(template: string, item: WorkItem, concepts: ConceptRegistry): string {
  return renderTemplate(template, {
    topic: item.topic,
    category: item.category,
    covered_concepts: concepts.render(),
  });
}

export function buildReviewPrompt(template: string, record: StoredRecord): string {
  return renderTemplate(template, {
    question: record.question,
    options: formatOptions(record.options),
    correct_answer: record.correct_answer,
    reasoning: record.reasoning,
  });
}

export function buildDefensePrompt(template: string, record: StoredRecord): string {
  return renderTemplate(template, {
    question: record.question,
    options: formatOptions(record.options),
    correct_answer: record.correct_answer,
  });
}
