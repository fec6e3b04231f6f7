/**
 * Turn MedMCQA-format rows (four options, zero-based `cop`) into chat
 * examples for the molecular genetics subset.
 */

import { z } from 'zod';
import type { ChatExample } from './types';

export const RELEVANT_TOPICS = [
  'Molecular Genetics',
  'Transcription',
  'Metabolism of nucleic acids',
  'Techniques in molecular biology',
];

export const medMcqaRowSchema = z.object({
  question: z.string(),
  opa: z.string(),
  opb: z.string(),
  opc: z.string(),
  opd: z.string(),
  cop: z.number().int().min(0).max(3),
  exp: z.string().nullable().optional(),
  subject_name: z.string(),
  topic_name: z.string().nullable().optional(),
});

export type MedMcqaRow = z.infer<typeof medMcqaRowSchema>;

const LETTERS = ['A', 'B', 'C', 'D'];

export function isRelevant(row: MedMcqaRow, topics: readonly string[] = RELEVANT_TOPICS): boolean {
  return row.subject_name === 'Biochemistry' && !!row.topic_name && topics.includes(row.topic_name);
}

export function toMedMcqaChat(row: MedMcqaRow): ChatExample {
  const texts = [row.opa, row.opb, row.opc, row.opd];
  const options = texts.map((text, i) => `${LETTERS[i]}. ${text}`).join('\n');
  const letter = LETTERS[row.cop];
  const answerText = texts[row.cop];
  const answer = `The answer is ${letter}. ${answerText}`;

  // Short or missing explanations are not worth keeping
  const explanation = row.exp && row.exp.length > 10 ? `${row.exp}\n\n` : '';

  return {
    messages: [
      { role: 'user', content: `${row.question}\n\n${options}` },
      { role: 'assistant', content: `${explanation}${answer}` },
    ],
  };
}

export function countByTopic(rows: readonly MedMcqaRow[], topics: readonly string[] = RELEVANT_TOPICS): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const topic of topics) {
    counts[topic] = rows.filter(row => row.topic_name === topic).length;
  }
  return counts;
}
