/**
 * Defense-based review: instead of hunting for problems, ask the reviewer
 * model to DEFEND each question. Anything it cannot confidently defend goes
 * to a human.
 *
 * Usage:
 *   npx tsx scripts/defend-questions.ts
 *   npx tsx scripts/defend-questions.ts --input genetics_training_data/v4_genetics_qa.jsonl --prefix v4
 *
 * Output:
 *   <prefix>_defended.jsonl     questions the reviewer could defend
 *   <prefix>_cant_defend.jsonl  questions it could not, plus failed defenses
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
import { createDefenseStage } from './lib/pipeline-steps';
import { loadPrompt } from './lib/prompt-builder';
import { loadQuestionFile } from './lib/question-loader';
import { runMain } from './lib/script-runner';
import type { DefendedRecord } from './lib/types';

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
    ...REQUEST_SETTINGS.defend,
    ...(options.delayMs !== undefined && !isNaN(options.delayMs) ? { delayMs: options.delayMs } : {}),
  };

  console.log('Question Defense Review Script');
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
  console.log('Starting defense review...');
  console.log('='.repeat(50));

  const client = withRetry(createModelClient(options.model, readProviderEnv()), {
    maxRetries: options.maxRetries,
    onRetry: (error, attempt, backoff) =>
      console.warn(`  ⚠️  ${error.kind}: ${error.message}. Retry ${attempt}/${options.maxRetries} in ${backoff / 1000}s...`),
  });

  const defended = new JsonlWriter<DefendedRecord>(partitionPath(options.outputDir, options.prefix, 'defended'));
  const cantDefend = new JsonlWriter<DefendedRecord>(partitionPath(options.outputDir, options.prefix, 'cant_defend'));

  await runPipeline(queued, createDefenseStage(loadPrompt('defend')), {
    client,
    model: options.model,
    settings,
    concepts: ConceptRegistry.empty(),
    sinks: { a: defended, b: cantDefend },
  });

  console.log('\n' + '='.repeat(50));
  console.log('Defense review complete!');
  console.log('='.repeat(50));
  console.log(`Defended: ${defended.count} questions → ${defended.path}`);
  console.log(`Can't defend: ${cantDefend.count} questions → ${cantDefend.path}`);
  if (queued.length > 0) {
    console.log(`Defense rate: ${Math.round((100 * defended.count) / queued.length)}%`);
  }
}

runMain(main);
