import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { getPackageRoot } from './utils.js';
import { ConfigError } from './errors.js';

export const TopicCatalogSchema = z.object({
  categories: z.record(z.string().min(1), z.array(z.string().min(1)).min(1)),
});

export type TopicCatalog = z.infer<typeof TopicCatalogSchema>;

export interface CatalogEntry {
  category: string;
  topic: string;
}

export function getDefaultCatalogPath(): string {
  return path.join(getPackageRoot(), 'topics', 'catalog.yaml');
}

export function parseTopicCatalog(yamlContent: string): TopicCatalog {
  const raw: unknown = yamlParse(yamlContent);
  const parsed = TopicCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid topic catalog', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export function loadTopicCatalog(filePath?: string): TopicCatalog {
  const catalogPath = filePath || getDefaultCatalogPath();
  if (!fs.existsSync(catalogPath)) {
    throw new ConfigError(`Topic catalog not found: ${catalogPath}`);
  }
  return parseTopicCatalog(fs.readFileSync(catalogPath, 'utf-8'));
}

export function listAllTopics(catalog: TopicCatalog): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  for (const [category, topics] of Object.entries(catalog.categories)) {
    for (const topic of topics) {
      entries.push({ category, topic });
    }
  }
  return entries;
}

/**
 * Unknown category names are ignored rather than rejected.
 */
export function topicsForCategories(catalog: TopicCatalog, categories: string[]): CatalogEntry[] {
  const entries: CatalogEntry[] = [];
  for (const category of categories) {
    const topics = catalog.categories[category];
    if (!topics) continue;
    for (const topic of topics) {
      entries.push({ category, topic });
    }
  }
  return entries;
}

/**
 * "ALL" selects everything; otherwise a comma list such as "study/academia, travel".
 * Names are upper-cased and "/" becomes "_".
 */
export function parseCategoryFilter(filter: string): string[] | 'ALL' {
  if (filter.trim().toUpperCase() === 'ALL') return 'ALL';
  return filter
    .split(',')
    .map((c) => c.trim().toUpperCase().replace(/\//g, '_'))
    .filter((c) => c.length > 0);
}

export function selectTopics(catalog: TopicCatalog, filter: string): CatalogEntry[] {
  const categories = parseCategoryFilter(filter);
  return categories === 'ALL' ? listAllTopics(catalog) : topicsForCategories(catalog, categories);
}
