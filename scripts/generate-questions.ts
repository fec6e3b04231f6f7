/**
 * Generate multiple-choice genetics questions for fine-tuning data.
 *
 * Run with: npx tsx scripts/generate-questions.ts [options]
 *
 * CLI Options:
 *   --variant <v1|v3|v4>    Generator version (default: v4)
 *   --per-topic <n>         Questions per topic (default: 1 for v1, 2 otherwise)
 *   --category <name>       Only this category (repeatable)
 *   --model <model-id>      Generation model (default: anthropic/claude-sonnet-4)
 *   --output-dir <dir>      Output directory (default: $GENETICS_DATA_DIR or ./genetics_training_data)
 *   --prefix <name>         Output file prefix (default: genetics for v1, <variant>_genetics otherwise)
 *   --max-retries <n>       Retries for timeouts, 429 and 5xx (default: $MODEL_MAX_RETRIES or 2)
 *   --delay <ms>            Pause after each request
 *
 * Variants:
 *   v1  4 categories x 10 topics, 8 options, no confidence gate, failed items dropped
 *   v3  reasoning-focused, 10 options, high-confidence only, concept de-duplication
 *   v4  MMLU-Pro style, 10 options, high-confidence only, concept de-duplication
 *
 * Output:
 *   <prefix>_qa.jsonl      accepted questions
 *   <prefix>_failed.jsonl  one line per item that produced no question (v3/v4)
 *   <prefix>_chat.jsonl    accepted questions in chat format
 *
 * Examples:
 *   npx tsx scripts/generate-questions.ts --variant v4 --per-topic 2
 *   npx tsx scripts/generate-questions.ts --variant v1 --category population_genetics
 *   npx tsx scripts/generate-questions.ts --model mistral-large-latest --prefix mistral_v4
 */

import { config } from 'dotenv';
// Load environment variables from .env.local BEFORE other imports
config({ path: '.env.local' });

import { toChatExample } from './lib/chat-format';
import { ConceptRegistry } from './lib/concept-registry';
import {
  DEFAULT_QUESTIONS_PER_TOPIC,
  MODELS,
  REQUEST_SETTINGS,
  type Stage,
  dataDir,
  readMaxRetries,
  readProviderEnv,
} from './lib/config';
import { JsonlWriter, partitionPath, writeJsonl } from './lib/jsonl';
import { createModelClient, providerFor, withRetry } from './lib/model-client';
import { runPipeline } from './lib/pipeline-driver';
import { createGenerationStage, hasFailurePartition } from './lib/pipeline-steps';
import { type PromptName, loadPrompt } from './lib/prompt-builder';
import { runMain } from './lib/script-runner';
import { buildWorklist, loadTopics } from './lib/topics';
import type { FailedGeneration, GeneratedRecord, PipelineVariant } from './lib/types';

const VARIANTS: PipelineVariant[] = ['v1', 'v3', 'v4'];

const GENERATION_STAGE: Record<PipelineVariant, Stage & PromptName> = {
  v1: 'generate-v1',
  v3: 'generate-v3',
  v4: 'generate-v4',
};

interface CLIOptions {
  variant: PipelineVariant;
  perTopic?: number;
  categories: string[];
  model: string;
  outputDir: string;
  prefix?: string;
  maxRetries: number;
  delayMs?: number;
}

function isVariant(value: string | undefined): value is PipelineVariant {
  return VARIANTS.some(v => v === value);
}

function parseNonNegative(flag: string, raw: string | undefined): number {
  const value = parseInt(raw ?? '', 10);
  if (isNaN(value) || value < 0) {
    console.error(`❌ ${flag} must be a non-negative integer`);
    process.exit(1);
  }
  return value;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const options: CLIOptions = {
    variant: 'v4',
    categories: [],
    model: MODELS.generation,
    outputDir: dataDir(),
    maxRetries: readMaxRetries(),
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--variant': {
        const value = args[++i];
        if (!isVariant(value)) {
          console.error(`❌ --variant must be one of: ${VARIANTS.join(', ')}`);
          process.exit(1);
        }
        options.variant = value;
        break;
      }
      case '--per-topic': {
        const count = parseNonNegative('--per-topic', args[++i]);
        if (count < 1) {
          console.error('❌ --per-topic must be a positive integer');
          process.exit(1);
        }
        options.perTopic = count;
        break;
      }
      case '--category':
        options.categories.push(args[++i]);
        break;
      case '--model':
        options.model = args[++i];
        break;
      case '--output-dir':
        options.outputDir = args[++i];
        break;
      case '--prefix':
        options.prefix = args[++i];
        break;
      case '--max-retries':
        options.maxRetries = parseNonNegative('--max-retries', args[++i]);
        break;
      case '--delay':
        options.delayMs = parseNonNegative('--delay', args[++i]);
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Genetics Question Generator

Usage: npx tsx scripts/generate-questions.ts [options]

Options:
  --variant <v1|v3|v4>    Generator version (default: v4)
  --per-topic <n>         Questions per topic (default: 1 for v1, 2 otherwise)
  --category <name>       Only this category (repeatable)
  --model <model-id>      Generation model (default: ${MODELS.generation})
  --output-dir <dir>      Output directory (default: ${dataDir()})
  --prefix <name>         Output file prefix
  --max-retries <n>       Retries for timeouts, 429 and 5xx
  --delay <ms>            Pause after each request
  --help, -h              Show this help message

Models starting with claude- go to Anthropic, mistral- to Mistral,
anything else to the OpenRouter chat completions endpoint.
  `);
}

function defaultPrefix(variant: PipelineVariant): string {
  return variant === 'v1' ? 'genetics' : `${variant}_genetics`;
}

async function main() {
  const options = parseArgs();
  const { variant } = options;
  const stageName = GENERATION_STAGE[variant];
  const settings = {
    ...REQUEST_SETTINGS[stageName],
    ...(options.delayMs !== undefined ? { delayMs: options.delayMs } : {}),
  };
  const perTopic = options.perTopic ?? DEFAULT_QUESTIONS_PER_TOPIC[variant];
  const prefix = options.prefix ?? defaultPrefix(variant);

  const table = loadTopics(variant);
  const worklist = buildWorklist(table, perTopic, options.categories);

  console.log(`Genetics Training Data Generator ${variant}`);
  console.log('='.repeat(50));
  console.log(`Model:            ${options.model} (${providerFor(options.model)})`);
  console.log(`Output directory: ${options.outputDir}`);
  for (const category of options.categories.length > 0 ? options.categories : Object.keys(table)) {
    console.log(`  ${category} (${table[category].length} topics)`);
  }
  console.log(`\nStarting generation (${perTopic} per topic = ${worklist.length} questions)...`);
  console.log('='.repeat(50));

  const client = withRetry(createModelClient(options.model, readProviderEnv()), {
    maxRetries: options.maxRetries,
    onRetry: (error, attempt, backoff) =>
      console.warn(`  ⚠️  ${error.kind}: ${error.message}. Retry ${attempt}/${options.maxRetries} in ${backoff / 1000}s...`),
  });

  const qaSink = new JsonlWriter<GeneratedRecord>(partitionPath(options.outputDir, prefix, 'qa'));
  const failedSink = hasFailurePartition(variant)
    ? new JsonlWriter<FailedGeneration>(partitionPath(options.outputDir, prefix, 'failed'))
    : undefined;

  const result = await runPipeline(worklist, createGenerationStage(variant, loadPrompt(stageName)), {
    client,
    model: options.model,
    settings,
    concepts: ConceptRegistry.empty(),
    sinks: { a: qaSink, b: failedSink },
  });

  const chatPath = partitionPath(options.outputDir, prefix, 'chat');
  writeJsonl(chatPath, result.accepted.map(record => toChatExample(record, variant)));

  const total = worklist.length;
  const generated = result.accepted.length;
  console.log(`\n${'='.repeat(50)}`);
  console.log('Generation complete!');
  console.log(`Total questions generated: ${generated}`);
  if (total > 0) {
    console.log(`Success rate: ${generated}/${total} (${Math.round((100 * generated) / total)}%)`);
  }
  console.log(`Saved ${generated} questions to ${qaSink.path}`);
  console.log(`Saved ${generated} chat examples to ${chatPath}`);
  if (failedSink) {
    console.log(`Recorded ${failedSink.count} failed items in ${failedSink.path}`);
  } else {
    console.log(`Dropped ${total - generated} failed items`);
  }
  console.log(`Concepts registered: ${result.concepts.size}`);
  console.log('='.repeat(50));

  const sample = result.accepted[0];
  if (sample) {
    console.log('\nSample question:');
    console.log(`Q: ${sample.question.substring(0, 200)}...`);
    console.log(`Concept: ${sample.core_concept ?? sample.concept_tested ?? 'N/A'}`);
    console.log(`Answer: ${sample.correct_answer}`);
    console.log(`Confidence: ${sample.confidence ?? 'N/A'}`);
  } else {
    console.log('\nNo questions were generated successfully.');
  }
}

runMain(main);
