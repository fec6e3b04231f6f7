/**
 * Stage definitions plugged into the pipeline driver.
 *
 * - generation: topic → question record (partition A) or failure line (B)
 * - review: question → PASS (A) or FLAG (B)
 * - defense: question → can defend (A) or can't defend (B)
 */

import type { PipelineError } from './errors';
import type { PipelineStage } from './pipeline-driver';
import { buildDefensePrompt, buildGenerationPrompt, buildReviewPrompt } from './prompt-builder';
import {
  QUESTION_CONTRACTS,
  validateDefenseVerdict,
  validateGeneratedQuestion,
  validateReviewVerdict,
} from './record-validator';
import type {
  DefendedRecord,
  FailedGeneration,
  GeneratedRecord,
  PipelineVariant,
  QueuedRecord,
  ReviewedRecord,
  WorkItem,
} from './types';

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max - 3)}...` : text;
}

// ─── Generation ──────────────────────────────────────────────────────────────

/**
 * v1 keeps no failure partition: failed items are dropped. v3/v4 write a
 * FailedGeneration line for each one.
 */
export function hasFailurePartition(variant: PipelineVariant): boolean {
  return variant !== 'v1';
}

export function createGenerationStage(
  variant: PipelineVariant,
  template: string,
): PipelineStage<WorkItem, GeneratedRecord, FailedGeneration> {
  const contract = QUESTION_CONTRACTS[variant];

  return {
    describe: item => `${item.category} / ${item.topic}`,
    identify: item => item.id,
    buildPrompt: (item, concepts) => buildGenerationPrompt(template, item, concepts),
    interpret(payload, item) {
      const record = validateGeneratedQuestion(payload, contract, item);
      const concept = record.core_concept ?? record.concept_tested;
      return {
        partition: 'A',
        record,
        summary: concept ? `${record.correct_answer} (${truncate(concept, 60)})` : record.correct_answer,
      };
    },
    onFailure(item, error) {
      if (!hasFailurePartition(variant)) return undefined;
      return {
        id: item.id,
        category: item.category,
        subtopic: item.topic,
        failure: error.kind,
        message: error.message,
      };
    },
    conceptOf: record => record.core_concept ?? record.concept_tested,
  };
}

// ─── Review ──────────────────────────────────────────────────────────────────

export function createReviewStage(template: string): PipelineStage<QueuedRecord, ReviewedRecord, ReviewedRecord> {
  return {
    describe: queued => truncate(queued.record.question, 60),
    identify: queued => `question-${queued.position}`,
    buildPrompt: queued => buildReviewPrompt(template, queued.record),
    interpret(payload, queued) {
      const review = validateReviewVerdict(payload);
      const reviewed: ReviewedRecord = { ...queued.record, review };
      if (review.verdict === 'PASS') {
        return { partition: 'A', record: reviewed, summary: 'PASS' };
      }
      const reason = review.concerns.length > 0 ? review.concerns.join(', ') : review.notes || 'unspecified concern';
      return { partition: 'B', record: reviewed, summary: `FLAG - ${reason}` };
    },
    onFailure: (queued, error: PipelineError) => ({
      ...queued.record,
      review: { verdict: 'FLAG', concerns: [], notes: `Auto-review failed: ${error.message}` },
    }),
  };
}

// ─── Defense ─────────────────────────────────────────────────────────────────

export function createDefenseStage(template: string): PipelineStage<QueuedRecord, DefendedRecord, DefendedRecord> {
  return {
    describe: queued => truncate(queued.record.question, 60),
    identify: queued => `question-${queued.position}`,
    buildPrompt: queued => buildDefensePrompt(template, queued.record),
    interpret(payload, queued) {
      const defense = validateDefenseVerdict(payload);
      const defended: DefendedRecord = { ...queued.record, defense };
      if (defense.can_defend) {
        const summary = defense.weak_points.length > 0
          ? `DEFENDED (with notes: ${defense.weak_points.slice(0, 2).join(', ')})`
          : 'DEFENDED';
        return { partition: 'A', record: defended, summary };
      }
      return {
        partition: 'B',
        record: defended,
        summary: `CAN'T DEFEND - ${truncate(defense.defense || 'unspecified', 80)}`,
      };
    },
    onFailure: (queued, error: PipelineError) => ({
      ...queued.record,
      defense: { can_defend: false, defense: `Auto-defense failed: ${error.message}`, weak_points: [] },
    }),
  };
}
