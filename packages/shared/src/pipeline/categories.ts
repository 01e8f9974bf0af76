/**
 * Category Table
 *
 * Ordered keyword rules evaluated first-match-wins against the transaction
 * description, then an alias table applied to the model's own category.
 * The default table ships in data/category-rules.json; CATEGORY_RULES_PATH
 * points at a replacement file.
 */

import fs from 'fs';
import defaultRules from '../../data/category-rules.json';
import { config } from '../config';
import { logger } from '../logger';

export const FALLBACK_CATEGORY = 'other';

export interface CategoryRule {
  category: string;
  keywords: string[];
}

export interface CategoryTable {
  rules: CategoryRule[];
  aliases: Record<string, string>;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate a category table read from JSON
 */
export function parseCategoryTable(raw: unknown): CategoryTable {
  if (!isRecord(raw) || !Array.isArray(raw.rules) || !isRecord(raw.aliases)) {
    throw new Error('Category table must have "rules" and "aliases"');
  }

  const rules: CategoryRule[] = raw.rules.map((rule: unknown, i: number) => {
    if (!isRecord(rule) || typeof rule.category !== 'string' || !isStringArray(rule.keywords)) {
      throw new Error(`Category rule ${i} must have "category" and "keywords"`);
    }
    return {
      category: rule.category,
      keywords: rule.keywords.map(normalizeWords).filter((k) => k.length > 0),
    };
  });

  const aliases: Record<string, string> = {};
  for (const [alias, category] of Object.entries(raw.aliases)) {
    if (typeof category !== 'string') {
      throw new Error(`Category alias "${alias}" must map to a string`);
    }
    aliases[alias.toLowerCase().trim()] = category;
  }

  return { rules, aliases };
}

let cachedTable: CategoryTable | null = null;

/**
 * Load the category table (custom file when configured, else the bundled one)
 */
export function getCategoryTable(): CategoryTable {
  if (cachedTable) return cachedTable;

  if (config.categoryRulesPath) {
    const content = fs.readFileSync(config.categoryRulesPath, 'utf-8');
    cachedTable = parseCategoryTable(JSON.parse(content));
    logger.info('Loaded custom category table', {
      path: config.categoryRulesPath,
      rules: cachedTable.rules.length,
    });
  } else {
    cachedTable = parseCategoryTable(defaultRules);
  }
  return cachedTable;
}

/** Lowercase, collapse every non-alphanumeric run to one space */
function normalizeWords(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/**
 * Assign a category: first keyword rule matching the description on word
 * boundaries, else the model's category through the alias table, else "other".
 */
export function categorize(
  description: string,
  modelCategory: unknown,
  table: CategoryTable = getCategoryTable()
): string {
  const haystack = ` ${normalizeWords(description)} `;
  for (const rule of table.rules) {
    if (rule.keywords.some((keyword) => haystack.includes(` ${keyword} `))) {
      return rule.category;
    }
  }

  if (typeof modelCategory === 'string') {
    const key = modelCategory.toLowerCase().trim();
    if (Object.hasOwn(table.aliases, key)) return table.aliases[key];
  }

  return FALLBACK_CATEGORY;
}
