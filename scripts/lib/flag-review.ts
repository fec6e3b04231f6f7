/**
 * Manual review loop: show each question, let a human flag the bad ones.
 * Questions are numbered by their position in the source file, so skipped
 * lines never shift the indexes written to the flag file.
 *
 * Input is read one line at a time:
 *   (blank)  next question
 *   f        append this question's position to the flag file
 *   q        stop
 * End of input stops the loop like `q`.
 */

import type { Logger } from './pipeline-driver';
import type { QueuedRecord, StoredRecord } from './types';

export const FLAG_PROMPT = '\n[Enter] next | [f] flag as bad | [q] quit: ';

export interface FlagReviewIO {
  /** Resolve with the entered line, or null at end of input. */
  ask(prompt: string): Promise<string | null>;
  /** Persist one flagged index. */
  flag(index: number): void;
  logger?: Logger;
}

export interface FlagReviewSummary {
  shown: number;
  flagged: number[];
  quit: boolean;
}

export function formatRecordForReview(record: StoredRecord, index: number, total: number): string {
  const rule = '='.repeat(60);
  const lines = [
    '',
    rule,
    `QUESTION ${index} of ${total}`,
    `Category: ${record.category || 'N/A'} | Topic: ${record.subtopic || record.topic || 'N/A'}`,
    rule,
    '',
    record.question,
    '',
    ...Object.entries(record.options).map(([letter, text]) => `  ${letter}. ${text}`),
    '',
    `CORRECT ANSWER: ${record.correct_answer}`,
    '',
    `REASONING:\n${record.reasoning}`,
  ];
  return lines.join('\n');
}

export async function runFlagReview(queued: readonly QueuedRecord[], io: FlagReviewIO): Promise<FlagReviewSummary> {
  const logger = io.logger ?? console;
  const summary: FlagReviewSummary = { shown: 0, flagged: [], quit: false };
  const total = queued.reduce((max, q) => Math.max(max, q.position), 0);

  for (const { position, record } of queued) {
    logger.log(formatRecordForReview(record, position, total));
    summary.shown++;

    const answer = await io.ask(FLAG_PROMPT);
    if (answer === null) {
      summary.quit = true;
      break;
    }

    const choice = answer.trim().toLowerCase();
    if (choice === 'q') {
      summary.quit = true;
      break;
    }
    if (choice === 'f') {
      io.flag(position);
      summary.flagged.push(position);
      logger.log(`  -> Flagged question ${position}`);
    }
  }

  return summary;
}
