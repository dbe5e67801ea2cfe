/**
 * `{field}` placeholder rendering for rule templates.
 * A placeholder with no value is a bug in the rule table, never an input
 * problem, so it throws.
 */

import type { RuleRole } from '../types/index.js';
import { TemplateError } from '../errors.js';

const PLACEHOLDER = /\{([A-Za-z]+)\}/g;

export const NODE_FIELDS = ['id', 'type', 'label', 'confidence'] as const;
export const EDGE_FIELDS = [
  'sourceId', 'targetId', 'sourceType', 'targetType', 'sourceLabel', 'targetLabel', 'confidence',
] as const;

export type NodeField = typeof NODE_FIELDS[number];
export type EdgeField = typeof EDGE_FIELDS[number];

export function allowedFields(role: RuleRole): readonly string[] {
  return role === 'Node' ? NODE_FIELDS : EDGE_FIELDS;
}

/** Distinct placeholder names in order of first appearance. */
export function placeholders(template: string): string[] {
  const seen = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) seen.add(match[1]);
  return [...seen];
}

export function renderTemplate(
  template: string,
  fields: Readonly<Record<string, string>>,
  ruleId: string,
): string {
  return template.replace(PLACEHOLDER, (_match: string, name: string) => {
    const value = fields[name];
    if (value === undefined) throw new TemplateError(name, ruleId);
    return value;
  });
}
