/**
 * Walk through a question file in the terminal and flag bad questions.
 *
 * Flagged questions are appended to the flag file as 1-based line numbers of
 * the input file, one per line, so several sessions over the same file
 * accumulate.
 *
 * Usage:
 *   npx tsx scripts/flag-questions.ts
 *   npx tsx scripts/flag-questions.ts --input genetics_training_data/v4_genetics_qa.jsonl --flag-file flagged_v4.txt
 */

import { config } from 'dotenv';
config({ path: '.env.local' });

import { appendFileSync, existsSync } from 'fs';
import { join } from 'path';
import { dataDir } from './lib/config';
import { runFlagReview } from './lib/flag-review';
import { loadQuestionFile } from './lib/question-loader';
import { createLineReader, runMain } from './lib/script-runner';

interface CLIOptions {
  input: string;
  flagFile: string;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const options: CLIOptions = {
    input: join(dataDir(), 'v3_genetics_qa.jsonl'),
    flagFile: 'flagged_v3.txt',
  };
  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--input': options.input = args[++i]; break;
      case '--flag-file': options.flagFile = args[++i]; break;
    }
  }
  return options;
}

async function main() {
  const options = parseArgs();

  if (!existsSync(options.input)) {
    console.error(`❌ Input file ${options.input} not found`);
    process.exitCode = 1;
    return;
  }

  const { queued } = loadQuestionFile(options.input);
  const reader = createLineReader();

  try {
    const summary = await runFlagReview(queued, {
      ask: prompt => reader.ask(prompt),
      flag: index => appendFileSync(options.flagFile, `${index}\n`),
    });
    console.log(`\nReviewed ${summary.shown}/${queued.length} questions, flagged ${summary.flagged.length} → ${options.flagFile}`);
  } finally {
    reader.close();
  }
}

runMain(main);
