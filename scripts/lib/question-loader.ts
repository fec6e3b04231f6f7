import { describeError } from './errors';
import { readJsonl } from './jsonl';
import type { Logger } from './pipeline-driver';
import { validateStoredRecord } from './record-validator';
import type { QueuedRecord } from './types';

export interface LoadedQuestions {
  queued: QueuedRecord[];
  skipped: number;
}

/**
 * Load a question file for review. Lines that are not JSON or fail the
 * stored-record contract are reported and skipped. A record's position is its
 * line number, so flag indexes point at the same line in the file.
 */
export function loadQuestionFile(
  filePath: string,
  expectedOptionCount?: number,
  logger: Logger = console,
): LoadedQuestions {
  const queued: QueuedRecord[] = [];
  let skipped = 0;

  const skip = (lineNumber: number, reason: string): void => {
    skipped++;
    logger.warn(`⚠️  Skipping line ${lineNumber}: ${reason}`);
  };

  for (const line of readJsonl(filePath, skip)) {
    try {
      queued.push({ position: line.lineNumber, record: validateStoredRecord(line.value, expectedOptionCount) });
    } catch (error) {
      skip(line.lineNumber, describeError(error));
    }
  }

  return { queued, skipped };
}
