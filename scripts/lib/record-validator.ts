/**
 * Structural contracts for model output and stored records.
 *
 * Everything parsed from a model response or a JSONL line passes through one
 * of these before it is used; nothing untyped leaves this module. Validation
 * is purely structural and never judges whether an answer is right.
 */

import { z } from 'zod';
import { SchemaViolation } from './errors';
import type {
  Confidence,
  DefenseVerdict,
  GeneratedRecord,
  PipelineVariant,
  ReviewVerdict,
  StoredRecord,
  WorkItem,
} from './types';

export interface QuestionContract {
  variant: PipelineVariant;
  optionCount: number;
  /** Field the model writes its explanation into. */
  reasoningField: 'thinking' | 'reasoning';
  requireHighConfidence: boolean;
}

export const QUESTION_CONTRACTS: Record<PipelineVariant, QuestionContract> = {
  v1: { variant: 'v1', optionCount: 8, reasoningField: 'thinking', requireHighConfidence: false },
  v3: { variant: 'v3', optionCount: 10, reasoningField: 'reasoning', requireHighConfidence: true },
  v4: { variant: 'v4', optionCount: 10, reasoningField: 'reasoning', requireHighConfidence: true },
};

const optionsSchema = z.record(z.string(), z.string());

const questionFields = {
  question: z.string().min(1),
  options: optionsSchema,
  correct_answer: z.string().min(1),
  core_concept: z.string().optional(),
  concept_tested: z.string().optional(),
  topic: z.string().optional(),
};

const generatedSchemas = {
  thinking: z.object({ ...questionFields, thinking: z.string().min(1), confidence: z.string().optional() }),
  reasoning: z.object({ ...questionFields, reasoning: z.string().min(1), confidence: z.string().optional() }),
};

const gatedSchema = generatedSchemas.reasoning.extend({ confidence: z.string() });

// Unknown fields pass through so verdicts from earlier stages survive.
// Legacy 8-option files carry `thinking` instead of `reasoning`.
const storedRecordSchema = z
  .object({
    ...questionFields,
    reasoning: z.string().optional(),
    thinking: z.string().optional(),
    confidence: z.string().optional(),
    category: z.string().optional(),
    subtopic: z.string().optional(),
  })
  .passthrough();

const reviewVerdictSchema = z.object({
  verdict: z
    .string()
    .transform(v => v.trim().toUpperCase())
    .pipe(z.enum(['PASS', 'FLAG'])),
  confidence: z
    .string()
    .transform(v => v.trim().toLowerCase())
    .pipe(z.enum(['high', 'medium', 'low']))
    .optional(),
  concerns: z.array(z.string()).default([]),
  notes: z.string().default(''),
});

const defenseVerdictSchema = z.object({
  can_defend: z.boolean(),
  defense: z.string().default(''),
  weak_points: z.array(z.string()).default([]),
});

/** Turn the first zod issue into a named violation. */
function toViolation(error: z.ZodError): SchemaViolation {
  const issue = error.issues[0];
  const field = issue.path.join('.') || undefined;
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return new SchemaViolation('missing-field', `Missing field: ${field ?? '(root)'}`, field);
  }
  return new SchemaViolation('invalid-field', `Invalid field ${field ?? '(root)'}: ${issue.message}`, field);
}

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) throw toViolation(result.error);
  return result.data;
}

function checkOptions(options: Record<string, string>, correctAnswer: string, expectedCount?: number): void {
  const count = Object.keys(options).length;
  if (expectedCount !== undefined && count !== expectedCount) {
    throw new SchemaViolation('option-count', `Wrong number of options: ${count} (expected ${expectedCount})`, 'options');
  }
  if (count === 0) {
    throw new SchemaViolation('option-count', 'Record has no options', 'options');
  }
  if (!Object.prototype.hasOwnProperty.call(options, correctAnswer)) {
    throw new SchemaViolation(
      'answer-not-in-options',
      `Correct answer "${correctAnswer}" is not one of the options (${Object.keys(options).join(', ')})`,
      'correct_answer',
    );
  }
}

/**
 * Validate a freshly generated question against its variant contract.
 * The work item supplies `category` and `subtopic`.
 */
export function validateGeneratedQuestion(raw: unknown, contract: QuestionContract, item: WorkItem): GeneratedRecord {
  let base: z.output<typeof generatedSchemas.reasoning>;
  if (contract.reasoningField === 'thinking') {
    const { thinking, ...rest } = parseWith(generatedSchemas.thinking, raw);
    base = { ...rest, reasoning: thinking };
  } else {
    base = parseWith(contract.requireHighConfidence ? gatedSchema : generatedSchemas.reasoning, raw);
  }

  if (contract.requireHighConfidence && base.confidence?.trim().toLowerCase() !== 'high') {
    throw new SchemaViolation(
      'confidence-gate',
      `Skipping ${base.confidence ?? 'unrated'} confidence question`,
      'confidence',
    );
  }

  checkOptions(base.options, base.correct_answer, contract.optionCount);

  return { ...base, category: item.category, subtopic: item.topic };
}

/**
 * Validate a record read back from a JSONL file. Checks the option count only
 * when one is given, since files from different generator versions mix 8- and
 * 10-option records. `thinking` is renamed to `reasoning`; every other field is
 * kept as read.
 */
export function validateStoredRecord(raw: unknown, expectedOptionCount?: number): StoredRecord {
  const { thinking, ...record } = parseWith(storedRecordSchema, raw);
  const reasoning = record.reasoning ?? thinking;
  if (reasoning === undefined) {
    throw new SchemaViolation('missing-field', 'Missing field: reasoning', 'reasoning');
  }
  checkOptions(record.options, record.correct_answer, expectedOptionCount);
  return { ...record, reasoning };
}

export function validateReviewVerdict(raw: unknown): ReviewVerdict {
  const parsed = parseWith(reviewVerdictSchema, raw);
  const confidence: Confidence | undefined = parsed.confidence;
  return {
    verdict: parsed.verdict,
    ...(confidence ? { confidence } : {}),
    concerns: parsed.concerns,
    notes: parsed.notes,
  };
}

export function validateDefenseVerdict(raw: unknown): DefenseVerdict {
  return parseWith(defenseVerdictSchema, raw);
}
