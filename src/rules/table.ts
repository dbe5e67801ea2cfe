/**
 * StrideGraph — Rule table loading.
 *
 * The table is data (data/stride-rules.json); the reasoner only looks rows
 * up by (componentType, role). Loading validates shape, unique ids,
 * template fields, and completeness: every component type needs at least
 * one Node row, otherwise the table is refused.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  COMPONENT_TYPES, RULE_ROLES, STRIDE_CATEGORIES,
  type ComponentType, type RuleEntry, type RuleRole, type RuleTable,
} from '../types/index.js';
import { ErrorCode, RuleTableError, StrideGraphError } from '../errors.js';
import { allowedFields, placeholders } from './template.js';

// ─── Schema ──────────────────────────────────────────────────────────

const ruleEntrySchema = z.object({
  id: z.string().min(1),
  componentType: z.enum(COMPONENT_TYPES),
  role: z.enum(RULE_ROLES),
  category: z.enum(STRIDE_CATEGORIES),
  descriptionTemplate: z.string().min(1),
  countermeasureTemplate: z.string().min(1),
});

export const ruleTableSchema = z.object({
  version: z.string().min(1),
  entries: z.array(ruleEntrySchema),
});

export type RuleTableData = z.infer<typeof ruleTableSchema>;

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../data/stride-rules.json', import.meta.url));

// ─── Construction ────────────────────────────────────────────────────

const NO_ROWS: readonly RuleEntry[] = Object.freeze([]);

export function indexKey(type: ComponentType, role: RuleRole): string {
  return `${type}::${role}`;
}

/**
 * Validate raw table data and build the frozen, indexed RuleTable.
 * Throws RuleTableError; there is no partial table.
 */
export function createRuleTable(data: unknown, origin = 'rule table'): RuleTable {
  const parsed = ruleTableSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RuleTableError(
      `${origin}: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ErrorCode.RULE_TABLE_INVALID,
      { origin },
    );
  }

  const seenIds = new Set<string>();
  for (const entry of parsed.data.entries) {
    if (seenIds.has(entry.id)) {
      throw new RuleTableError(`${origin}: duplicate rule id "${entry.id}"`, ErrorCode.RULE_TABLE_INVALID, { ruleId: entry.id });
    }
    seenIds.add(entry.id);

    const allowed = allowedFields(entry.role);
    for (const template of [entry.descriptionTemplate, entry.countermeasureTemplate]) {
      const unknown = placeholders(template).filter(name => !allowed.includes(name));
      if (unknown.length > 0) {
        throw new RuleTableError(
          `${origin}: rule "${entry.id}" (${entry.role}) uses unknown field(s) ${unknown.map(f => `{${f}}`).join(', ')}`,
          ErrorCode.RULE_TABLE_INVALID,
          { ruleId: entry.id },
        );
      }
    }
  }

  const missing = COMPONENT_TYPES.filter(
    type => !parsed.data.entries.some(e => e.componentType === type && e.role === 'Node'),
  );
  if (missing.length > 0) {
    throw new RuleTableError(
      `${origin}: no Node rules for component type(s) ${missing.join(', ')}`,
      ErrorCode.RULE_TABLE_INCOMPLETE,
      { missing: missing.join(',') },
    );
  }

  const entries: RuleEntry[] = parsed.data.entries.map(e => Object.freeze({ ...e }));
  const index = new Map<string, RuleEntry[]>();
  for (const entry of entries) {
    const key = indexKey(entry.componentType, entry.role);
    const rows = index.get(key);
    if (rows) rows.push(entry);
    else index.set(key, [entry]);
  }
  for (const rows of index.values()) Object.freeze(rows);

  return Object.freeze({
    version: parsed.data.version,
    entries: Object.freeze(entries),
    rows: (type: ComponentType, role: RuleRole): readonly RuleEntry[] => index.get(indexKey(type, role)) ?? NO_ROWS,
  });
}

export function loadRuleTable(path: string): RuleTable {
  if (!existsSync(path)) {
    throw new StrideGraphError(`Rule table not found: ${path}`, ErrorCode.IO_FILE_NOT_FOUND, undefined, { path });
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RuleTableError(`${path} is not valid JSON (${reason})`, ErrorCode.RULE_TABLE_INVALID, { path });
  }
  return createRuleTable(data, path);
}

let cachedDefault: RuleTable | null = null;

/** The bundled table, loaded on first use and shared for the process lifetime. */
export function defaultRuleTable(): RuleTable {
  if (!cachedDefault) cachedDefault = loadRuleTable(DEFAULT_RULES_PATH);
  return cachedDefault;
}

/** Rows for (type, role) in table order; empty when none. */
export function rulesFor(table: RuleTable, type: ComponentType, role: RuleRole): readonly RuleEntry[] {
  return table.rows(type, role);
}
