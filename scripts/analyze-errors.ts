/**
 * Summarize an lm-evaluation-harness samples file: accuracy, wrong answers
 * by source, and a few wrong answers to eyeball.
 *
 * Usage:
 *   npx tsx scripts/analyze-errors.ts --samples results/baseline/samples_mmlu_pro_biology.jsonl
 *   npx tsx scripts/analyze-errors.ts --samples <file> --show 10
 */

import { existsSync } from 'fs';
import { describeError } from './lib/errors';
import { countBySource, evalSampleSchema, formatWrongSample, percent, splitSamples, type EvalSample } from './lib/eval-analysis';
import { readJsonl } from './lib/jsonl';
import { runMain } from './lib/script-runner';

interface CLIOptions {
  samples?: string;
  show: number;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const options: CLIOptions = { show: 5 };
  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--samples': options.samples = args[++i]; break;
      case '--show': options.show = parseInt(args[++i], 10); break;
    }
  }
  if (!options.samples) {
    console.error('❌ --samples <file> is required');
    process.exit(1);
  }
  if (isNaN(options.show) || options.show < 0) {
    console.error('❌ --show must be a non-negative integer');
    process.exit(1);
  }
  return options;
}

async function main() {
  const options = parseArgs();
  const samplesPath = options.samples ?? '';
  if (!existsSync(samplesPath)) {
    console.error(`❌ Samples file ${samplesPath} not found`);
    process.exitCode = 1;
    return;
  }

  const samples: EvalSample[] = [];
  for (const line of readJsonl(samplesPath)) {
    const parsed = evalSampleSchema.safeParse(line.value);
    if (parsed.success) {
      samples.push(parsed.data);
    } else {
      console.warn(`⚠️  Skipping line ${line.lineNumber}: ${describeError(parsed.error)}`);
    }
  }

  const { correct, wrong } = splitSamples(samples);
  const total = correct.length + wrong.length;

  console.log(`Total questions: ${total}`);
  console.log(`Correct: ${correct.length} (${percent(correct.length, total)}%)`);
  console.log(`Wrong: ${wrong.length} (${percent(wrong.length, total)}%)`);

  console.log('\n--- Wrong answers by source ---');
  for (const [src, count] of countBySource(wrong)) {
    console.log(`  ${src}: ${count}`);
  }

  console.log('\n--- Sample wrong answers ---');
  for (const sample of wrong.slice(0, options.show)) {
    console.log(`\n${formatWrongSample(sample)}`);
  }
}

runMain(main);
