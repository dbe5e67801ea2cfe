/**
 * StrideGraph Rules — Public API
 */

export {
  createRuleTable, loadRuleTable, defaultRuleTable, rulesFor, indexKey,
  ruleTableSchema, DEFAULT_RULES_PATH,
} from './table.js';
export type { RuleTableData } from './table.js';
export { renderTemplate, placeholders, allowedFields, NODE_FIELDS, EDGE_FIELDS } from './template.js';
export type { NodeField, EdgeField } from './template.js';
