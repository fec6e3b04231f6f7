/**
 * Auto-review generated questions with a reviewer model.
 *
 * The reviewer checks each question for multiple defensible answers,
 * accuracy, reasoning that does not support the answer, and ambiguity.
 *
 * Usage:
 *   npx tsx scripts/review-questions.ts
 *   npx tsx scripts/review-questions.ts --input genetics_training_data/v4_genetics_qa.jsonl --prefix v4
 *   npx tsx scripts/review-questions.ts --options 10 --model claude-opus-4-1-20250805
 *
 * Output:
 *   <prefix>_passed.jsonl        questions that passed review
 *   <prefix>_needs_review.jsonl  flagged questions and failed reviews, for a human
 */

import { config } from 'dotenv';
config({ path: '.env.local' });

import { existsSync } from 'fs';
import { join } from 'path';
import { ConceptRegistry } from './lib/concept-registry';
import { MODELS, REQUEST_SETTINGS, dataDir, readMaxRetries, readProviderEnv } from './lib/config';
import { JsonlWriter, partitionPath } from './lib/jsonl';
import { createModelClient, withRetry } from './lib/model-client';
import { runPipeline } from './lib/pipeline-driver';
import { createReviewStage } from './lib/pipeline-steps';
import { loadPrompt } from './lib/prompt-builder';
import { loadQuestionFile } from './lib/question-loader';
import { runMain } from './lib/script-runner';
import type { ReviewedRecord } from './lib/types';

interface CLIOptions {
  input: string;
  outputDir: string;
  prefix: string;
  model: string;
  optionCount?: number;
  maxRetries: number;
  delayMs?: number;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const options: CLIOptions = {
    input: join(dataDir(), 'v3_genetics_qa.jsonl'),
    outputDir: dataDir(),
    prefix: 'v3',
    model: MODELS.review,
    maxRetries: readMaxRetries(),
  };
  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--input': options.input = args[++i]; break;
      case '--output-dir': options.outputDir = args[++i]; break;
      case '--prefix': options.prefix = args[++i]; break;
      case '--model': options.model = args[++i]; break;
      case '--options': options.optionCount = parseInt(args[++i], 10); break;
      case '--max-retries': options.maxRetries = parseInt(args[++i], 10); break;
      case '--delay': options.delayMs = parseInt(args[++i], 10); break;
    }
  }
  if (options.optionCount !== undefined && ![8, 10].includes(options.optionCount)) {
    console.error('❌ --options must be 8 or 10');
    process.exit(1);
  }
  if (isNaN(options.maxRetries) || options.maxRetries < 0) {
    console.error('❌ --max-retries must be a non-negative integer');
    process.exit(1);
  }
  return options;
}

async function main() {
  const options = parseArgs();
  const settings = {
    ...REQUEST_SETTINGS.review,
    ...(options.delayMs !== undefined && !isNaN(options.delayMs) ? { delayMs: options.delayMs } : {}),
  };

  console.log('Question Auto-Review Script');
  console.log('='.repeat(50));
  console.log(`Reviewer model: ${options.model}`);
  console.log(`Input file: ${options.input}`);

  if (!existsSync(options.input)) {
    console.error(`❌ Input file ${options.input} not found`);
    process.exitCode = 1;
    return;
  }

  const { queued, skipped } = loadQuestionFile(options.input, options.optionCount);
  console.log(`Loaded ${queued.length} questions${skipped ? ` (${skipped} invalid lines skipped)` : ''}`);

  console.log('\n' + '='.repeat(50));
  console.log('Starting review...');
  console.log('='.repeat(50));

  const client = withRetry(createModelClient(options.model, readProviderEnv()), {
    maxRetries: options.maxRetries,
    onRetry: (error, attempt, backoff) =>
      console.warn(`  ⚠️  ${error.kind}: ${error.message}. Retry ${attempt}/${options.maxRetries} in ${backoff / 1000}s...`),
  });

  const passed = new JsonlWriter<ReviewedRecord>(partitionPath(options.outputDir, options.prefix, 'passed'));
  const needsReview = new JsonlWriter<ReviewedRecord>(partitionPath(options.outputDir, options.prefix, 'needs_review'));

  await runPipeline(queued, createReviewStage(loadPrompt('review')), {
    client,
    model: options.model,
    settings,
    concepts: ConceptRegistry.empty(),
    sinks: { a: passed, b: needsReview },
  });

  console.log('\n' + '='.repeat(50));
  console.log('Review complete!');
  console.log('='.repeat(50));
  console.log(`Passed: ${passed.count} questions → ${passed.path}`);
  console.log(`Needs review: ${needsReview.count} questions → ${needsReview.path}`);
  if (queued.length > 0) {
    console.log(`Pass rate: ${Math.round((100 * passed.count) / queued.length)}%`);
  }
}

runMain(main);
