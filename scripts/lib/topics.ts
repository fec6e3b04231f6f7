/**
 * Topic tables and worklist expansion for the generators.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { PipelineVariant, WorkItem } from './types';

const topicTableSchema = z.record(z.string(), z.array(z.string().min(1)));
const topicFileSchema = z.object({
  v1: topicTableSchema,
  v3: topicTableSchema,
  v4: topicTableSchema,
});

/** Category → ordered topic list. */
export type TopicTable = z.infer<typeof topicTableSchema>;

const TOPICS_PATH = resolve(__dirname, '../data/topics.json');

export function loadTopics(variant: PipelineVariant, filePath: string = TOPICS_PATH): TopicTable {
  const parsed = topicFileSchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
  return parsed[variant];
}

/**
 * Expand a topic table into one work item per requested question, in table
 * order: every question for a topic before moving to the next topic.
 */
export function buildWorklist(
  table: TopicTable,
  questionsPerTopic: number,
  categories?: string[],
): WorkItem[] {
  const selected = categories && categories.length > 0 ? categories : Object.keys(table);
  const items: WorkItem[] = [];

  for (const category of selected) {
    const topics = table[category];
    if (!topics) {
      throw new Error(`Unknown category "${category}". Known: ${Object.keys(table).join(', ')}`);
    }
    topics.forEach((topic, topicIndex) => {
      for (let n = 1; n <= questionsPerTopic; n++) {
        items.push({ id: `${category}-${topicIndex + 1}-${n}`, category, topic });
      }
    });
  }

  return items;
}
