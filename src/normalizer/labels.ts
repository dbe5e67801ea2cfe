/**
 * Label → component type mapping.
 *
 * The detector's label vocabulary is open; the component enum is closed.
 * Lookup goes through normalizeLabel() so "Load Balancer", "load-balancer"
 * and "LOAD_BALANCER" hit the same alias. Anything unmatched is Unknown.
 */

import type { ComponentType } from '../types/index.js';

/**
 * Label normalization:
 * 1. Apply Unicode NFKC normalization
 * 2. Convert to lowercase
 * 3. Replace whitespace → underscore
 * 4. Replace hyphens → underscore
 * 5. Collapse consecutive underscores
 * 6. Strip leading/trailing underscores
 */
export function normalizeLabel(label: string): string {
  return label
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\s\t\u00A0]+/g, '_')
    .replace(/-+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

const BUILTIN_ALIASES: [ComponentType, string[]][] = [
  ['Server', ['server', 'web_server', 'app_server', 'application_server', 'backend', 'compute', 'vm', 'instance', 'host']],
  ['Database', ['database', 'db', 'datastore', 'data_store', 'sql', 'rds', 'postgres', 'postgresql', 'mysql', 'mongodb']],
  ['User', ['user', 'users', 'client', 'actor', 'person', 'browser', 'end_user', 'customer']],
  ['LoadBalancer', ['loadbalancer', 'load_balancer', 'lb', 'elb', 'alb', 'nlb', 'reverse_proxy']],
  ['API', ['api', 'api_gateway', 'gateway', 'rest_api', 'endpoint']],
];

export type AliasTable = ReadonlyMap<string, ComponentType>;

/**
 * Build the lookup table: built-in aliases, then the configured extras
 * (which win on conflict). Keys are normalized.
 */
export function buildAliasTable(extra: Record<string, ComponentType> = {}): AliasTable {
  const table = new Map<string, ComponentType>();
  for (const [type, aliases] of BUILTIN_ALIASES) {
    for (const alias of aliases) table.set(alias, type);
  }
  for (const [alias, type] of Object.entries(extra)) {
    table.set(normalizeLabel(alias), type);
  }
  return table;
}

/** Total over every string: unmapped labels resolve to Unknown. */
export function resolveComponentType(label: string, aliases: AliasTable): ComponentType {
  return aliases.get(normalizeLabel(label)) ?? 'Unknown';
}
