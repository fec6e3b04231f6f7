/**
 * Shared types for the question generation, review and defense pipelines.
 */

export type PipelineVariant = 'v1' | 'v3' | 'v4';

export type Confidence = 'high' | 'medium' | 'low';

/** One generation request: a topic within a category. */
export interface WorkItem {
  id: string;
  category: string;
  topic: string;
}

/** Letter → option text, in the order the model emitted them. */
export type OptionMap = Record<string, string>;

export interface GeneratedRecord {
  question: string;
  options: OptionMap;
  reasoning: string;
  correct_answer: string;
  confidence?: string;
  core_concept?: string;
  concept_tested?: string;
  topic?: string;
  category: string;
  subtopic: string;
}

/**
 * A question read back from a JSONL file. Fields this pipeline does not know
 * about (including verdicts from earlier stages) are carried through as-is.
 */
export type StoredRecord = Omit<GeneratedRecord, 'category' | 'subtopic'> & {
  category?: string;
  subtopic?: string;
};

export interface ReviewVerdict {
  verdict: 'PASS' | 'FLAG';
  confidence?: Confidence;
  concerns: string[];
  notes: string;
}

export interface DefenseVerdict {
  can_defend: boolean;
  defense: string;
  weak_points: string[];
}

export type ReviewedRecord = StoredRecord & { review: ReviewVerdict };
export type DefendedRecord = StoredRecord & { defense: DefenseVerdict };

/** A stored question queued for review or defense. */
export interface QueuedRecord {
  position: number;
  record: StoredRecord;
}

export type FailureKind = 'transport' | 'timeout' | 'parse' | 'schema';

/** Audit line for a generation item that produced no record. */
export interface FailedGeneration {
  id: string;
  category: string;
  subtopic: string;
  failure: FailureKind;
  message: string;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatExample {
  messages: ChatMessage[];
  category?: string;
  subtopic?: string;
}
