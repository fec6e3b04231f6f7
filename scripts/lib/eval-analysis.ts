/**
 * Helpers for inspecting lm-evaluation-harness sample logs
 * (one JSON object per evaluated question).
 */

import { z } from 'zod';

export const evalSampleSchema = z
  .object({
    doc: z
      .object({
        question: z.string().default(''),
        options: z.array(z.string()).default([]),
        answer: z.union([z.string(), z.number()]).optional(),
        src: z.string().optional(),
      })
      .passthrough(),
    exact_match: z.number(),
    filtered_resps: z.array(z.unknown()).default([]),
  })
  .passthrough();

export type EvalSample = z.infer<typeof evalSampleSchema>;

export interface EvalSplit {
  correct: EvalSample[];
  wrong: EvalSample[];
}

export function splitSamples(samples: readonly EvalSample[]): EvalSplit {
  const split: EvalSplit = { correct: [], wrong: [] };
  for (const sample of samples) {
    if (sample.exact_match === 1) {
      split.correct.push(sample);
    } else {
      split.wrong.push(sample);
    }
  }
  return split;
}

/** Count samples per `doc.src`, most frequent first. Ties keep first-seen order. */
export function countBySource(samples: readonly EvalSample[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    const src = sample.doc.src ?? 'unknown';
    counts.set(src, (counts.get(src) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function percent(part: number, total: number): string {
  return total === 0 ? '0.0' : ((100 * part) / total).toFixed(1);
}

function firstResponse(sample: EvalSample): string {
  const first = sample.filtered_resps[0];
  if (first === undefined) return 'N/A';
  return typeof first === 'string' ? first : JSON.stringify(first);
}

export function formatWrongSample(sample: EvalSample): string {
  return [
    `Q: ${sample.doc.question.substring(0, 200)}...`,
    `Options: ${JSON.stringify(sample.doc.options)}`,
    `Correct: ${sample.doc.answer ?? 'N/A'}, Model said: ${firstResponse(sample)}`,
  ].join('\n');
}
