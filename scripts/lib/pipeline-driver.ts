/**
 * Sequential pipeline driver.
 *
 * Each work item goes through
 *
 *   PENDING → REQUESTED → PARSED | TRANSPORT_FAILED → VALIDATED | REJECTED → PARTITION_A | PARTITION_B
 *
 * (a parse failure goes straight from REQUESTED to REJECTED). Any failure is
 * logged and routed to partition B, or DROPPED when the stage keeps no
 * failure partition. A partition-B decision with no B sink is DROPPED too.
 * Nothing raised while handling one item stops the run.
 */

import type { ConceptRegistry } from './concept-registry';
import type { RequestSettings } from './config';
import { PipelineError, TransportFailure, describeError } from './errors';
import type { RecordSink } from './jsonl';
import type { ModelClient } from './model-client';
import { sleep as defaultSleep } from './model-client';
import { parseModelJson } from './response-extractor';
import type { FailureKind } from './types';

export type ItemState =
  | 'PENDING'
  | 'REQUESTED'
  | 'PARSED'
  | 'TRANSPORT_FAILED'
  | 'VALIDATED'
  | 'REJECTED'
  | 'PARTITION_A'
  | 'PARTITION_B'
  | 'DROPPED';

export type StageDecision<A, B> =
  | { partition: 'A'; record: A; summary: string }
  | { partition: 'B'; record: B; summary: string };

export interface PipelineStage<TItem, A, B> {
  /** Short label for progress lines. */
  describe(item: TItem, index: number): string;
  identify(item: TItem, index: number): string;
  buildPrompt(item: TItem, concepts: ConceptRegistry): string;
  /** Validate the parsed payload and pick a partition. Throws SchemaViolation. */
  interpret(payload: unknown, item: TItem): StageDecision<A, B>;
  /** Partition-B record for a failed item; undefined drops it. */
  onFailure(item: TItem, error: PipelineError): B | undefined;
  /** Concept tag to register once a record lands in partition A. */
  conceptOf?(record: A): string | undefined;
}

export interface ItemOutcome {
  index: number;
  id: string;
  path: ItemState[];
  failure?: { kind: FailureKind; message: string };
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface DriverOptions<A, B> {
  client: ModelClient;
  model: string;
  settings: RequestSettings;
  concepts: ConceptRegistry;
  sinks: { a: RecordSink<A>; b?: RecordSink<B> };
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface PipelineRunResult<A, B> {
  accepted: A[];
  attention: B[];
  outcomes: ItemOutcome[];
  concepts: ConceptRegistry;
}

export function terminalState(outcome: ItemOutcome): ItemState {
  return outcome.path[outcome.path.length - 1];
}

export async function runPipeline<TItem, A, B>(
  items: readonly TItem[],
  stage: PipelineStage<TItem, A, B>,
  options: DriverOptions<A, B>,
): Promise<PipelineRunResult<A, B>> {
  const logger = options.logger ?? console;
  const wait = options.sleep ?? defaultSleep;
  const accepted: A[] = [];
  const attention: B[] = [];
  const outcomes: ItemOutcome[] = [];
  let concepts = options.concepts;

  for (let index = 0; index < items.length; index++) {
    const item = items[index];
    const outcome: ItemOutcome = { index, id: stage.identify(item, index), path: ['PENDING'] };
    const label = `[${index + 1}/${items.length}] ${stage.describe(item, index)}`;

    const fail = (error: PipelineError): void => {
      outcome.failure = { kind: error.kind, message: error.message };
      const record = stage.onFailure(item, error);
      if (record === undefined || !options.sinks.b) {
        outcome.path.push('DROPPED');
        logger.log(`  ✗ ${label} - ${error.kind}: ${error.message}`);
        return;
      }
      options.sinks.b.write(record);
      attention.push(record);
      outcome.path.push('PARTITION_B');
      logger.log(`  ⚠️  ${label} - ${error.kind}: ${error.message}`);
    };

    try {
      const prompt = stage.buildPrompt(item, concepts);
      outcome.path.push('REQUESTED');

      let text: string;
      try {
        text = await options.client.complete({
          prompt,
          model: options.model,
          maxTokens: options.settings.maxTokens,
          temperature: options.settings.temperature,
          timeoutMs: options.settings.timeoutMs,
        });
      } catch (error) {
        outcome.path.push('TRANSPORT_FAILED');
        throw error instanceof PipelineError
          ? error
          : new TransportFailure(`Request failed: ${describeError(error)}`);
      }

      let decision: StageDecision<A, B>;
      try {
        const payload = parseModelJson(text);
        outcome.path.push('PARSED');
        decision = stage.interpret(payload, item);
        outcome.path.push('VALIDATED');
      } catch (error) {
        outcome.path.push('REJECTED');
        throw error;
      }

      if (decision.partition === 'A') {
        options.sinks.a.write(decision.record);
        accepted.push(decision.record);
        outcome.path.push('PARTITION_A');
        const tag = stage.conceptOf?.(decision.record);
        if (tag) concepts = concepts.with(tag);
        logger.log(`  ✓ ${label} - ${decision.summary}`);
      } else if (options.sinks.b) {
        options.sinks.b.write(decision.record);
        attention.push(decision.record);
        outcome.path.push('PARTITION_B');
        logger.log(`  ⚑ ${label} - ${decision.summary}`);
      } else {
        outcome.path.push('DROPPED');
        logger.log(`  ✗ ${label} - ${decision.summary}`);
      }
    } catch (error) {
      if (!(error instanceof PipelineError)) {
        logger.error(`  ❌ ${label} - unexpected error: ${describeError(error)}`);
        throw error;
      }
      fail(error);
    }

    outcomes.push(outcome);

    if (options.settings.delayMs > 0 && outcome.path.includes('REQUESTED')) {
      await wait(options.settings.delayMs);
    }
  }

  return { accepted, attention, outcomes, concepts };
}
