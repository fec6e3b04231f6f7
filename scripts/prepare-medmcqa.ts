/**
 * Prepare chat training data from a local MedMCQA-format JSONL file,
 * keeping Biochemistry questions in the molecular genetics topics.
 *
 * Usage:
 *   npx tsx scripts/prepare-medmcqa.ts --input data/medmcqa_train.jsonl
 *   npx tsx scripts/prepare-medmcqa.ts --input <file> --output genetics_training_data/medmcqa_molgen.jsonl
 */

import { config } from 'dotenv';
config({ path: '.env.local' });

import { existsSync } from 'fs';
import { join } from 'path';
import { dataDir } from './lib/config';
import { readJsonl, writeJsonl } from './lib/jsonl';
import { RELEVANT_TOPICS, countByTopic, isRelevant, medMcqaRowSchema, toMedMcqaChat, type MedMcqaRow } from './lib/medmcqa';
import { runMain } from './lib/script-runner';

interface CLIOptions {
  input?: string;
  output: string;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const options: CLIOptions = { output: join(dataDir(), 'medmcqa_molgen.jsonl') };
  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--input': options.input = args[++i]; break;
      case '--output': options.output = args[++i]; break;
    }
  }
  if (!options.input) {
    console.error('❌ --input <file> is required');
    process.exit(1);
  }
  return options;
}

async function main() {
  const options = parseArgs();
  const input = options.input ?? '';
  if (!existsSync(input)) {
    console.error(`❌ Input file ${input} not found`);
    process.exitCode = 1;
    return;
  }

  console.log(`Loading ${input}...`);
  const rows: MedMcqaRow[] = [];
  let invalid = 0;
  for (const line of readJsonl(input)) {
    const parsed = medMcqaRowSchema.safeParse(line.value);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      invalid++;
    }
  }
  if (invalid > 0) console.warn(`⚠️  Skipped ${invalid} rows that are not MedMCQA-shaped`);

  console.log('Filtering for molecular biology topics...');
  const filtered = rows.filter(row => isRelevant(row));
  console.log(`Found ${filtered.length} questions in relevant topics:`);
  for (const [topic, count] of Object.entries(countByTopic(filtered, RELEVANT_TOPICS))) {
    console.log(`  - ${topic}: ${count}`);
  }

  const formatted = filtered.map(toMedMcqaChat);
  writeJsonl(options.output, formatted);
  console.log(`\nSaved ${formatted.length} examples to ${options.output}`);

  if (formatted.length > 0) {
    console.log('\n' + '='.repeat(50));
    console.log('Sample formatted example:');
    console.log('='.repeat(50));
    console.log(JSON.stringify(formatted[0], null, 2));
  }
}

runMain(main);
