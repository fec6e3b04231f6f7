/**
 * Convert accepted questions into chat examples for instruction tuning.
 */

import { formatOptions } from './prompt-builder';
import type { ChatExample, GeneratedRecord, PipelineVariant } from './types';

/**
 * v1/v3 ask the model to think step by step and close with `The answer is (X).`;
 * v4 mirrors the MMLU-Pro layout with a bare question and `The answer is X.`
 */
export function toChatExample(record: GeneratedRecord, variant: PipelineVariant): ChatExample {
  const options = formatOptions(record.options);

  const user = variant === 'v4'
    ? `${record.question}\n\n${options}`
    : `Answer the following genetics question. Think through it step by step before giving your final answer.\n\nQuestion: ${record.question}\n\nOptions:\n${options}`;

  const assistant = variant === 'v4'
    ? `${record.reasoning}\n\nThe answer is ${record.correct_answer}.`
    : `${record.reasoning}\n\nThe answer is (${record.correct_answer}).`;

  return {
    messages: [
      { role: 'user', content: user },
      { role: 'assistant', content: assistant },
    ],
    category: record.category || 'genetics',
    subtopic: record.subtopic,
  };
}
