import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { createRuleTable, defaultRuleTable, loadRuleTable, rulesFor, DEFAULT_RULES_PATH, type RuleTableData } from '../src/rules/table.js';
import { renderTemplate, placeholders } from '../src/rules/template.js';
import { COMPONENT_TYPES } from '../src/types/index.js';
import { ErrorCode, RuleTableError, StrideGraphError, TemplateError } from '../src/errors.js';

function bundledData(): RuleTableData {
  return JSON.parse(readFileSync(DEFAULT_RULES_PATH, 'utf-8'));
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

// ─── Templates ───────────────────────────────────────────────────────

describe('renderTemplate', () => {
  it('substitutes every placeholder', () => {
    expect(renderTemplate('{label} ({id}) and {id}', { id: 'C1', label: 'web' }, 'r1')).toBe('web (C1) and C1');
  });

  it('throws TemplateError for a field with no value', () => {
    const err = captureError(() => renderTemplate('Hello {nope}', { id: 'C1' }, 'r1'));
    expect(err).toBeInstanceOf(TemplateError);
    expect(err).toMatchObject({
      code: ErrorCode.TEMPLATE_FIELD_MISSING,
      message: 'Template of rule r1 references unknown field {nope}',
    });
  });

  it('lists distinct placeholders in order', () => {
    expect(placeholders('{sourceId} → {targetId}, again {sourceId}')).toEqual(['sourceId', 'targetId']);
  });
});

// ─── Table ───────────────────────────────────────────────────────────

describe('bundled rule table', () => {
  it('covers every component type with Node rules', () => {
    const table = defaultRuleTable();
    for (const type of COMPONENT_TYPES) {
      expect(rulesFor(table, type, 'Node').length).toBeGreaterThan(0);
    }
  });

  it('is shared across calls', () => {
    expect(defaultRuleTable()).toBe(defaultRuleTable());
  });

  it('returns rows in table order', () => {
    const rows = rulesFor(defaultRuleTable(), 'Server', 'Node');
    expect(rows.map(r => r.category)).toEqual(['Tampering', 'Denial of Service', 'Elevation of Privilege']);
  });

  it('returns no rows for an absent (type, role)', () => {
    expect(rulesFor(defaultRuleTable(), 'Database', 'EdgeSource')).toEqual([]);
  });

  it('exposes lookups without a mutable index', () => {
    const table = defaultRuleTable();
    expect(Object.keys(table)).toEqual(['version', 'entries', 'rows']);
    expect(Object.isFrozen(table.rows('Server', 'Node'))).toBe(true);
    expect(Object.isFrozen(table.rows('Database', 'EdgeSource'))).toBe(true);
  });
});

describe('createRuleTable', () => {
  it('refuses a table missing Node rules for a type', () => {
    const data = bundledData();
    data.entries = data.entries.filter(e => !(e.componentType === 'Unknown' && e.role === 'Node'));
    const err = captureError(() => createRuleTable(data, 'test table'));
    expect(err).toBeInstanceOf(RuleTableError);
    expect(err).toMatchObject({
      code: ErrorCode.RULE_TABLE_INCOMPLETE,
      message: 'test table: no Node rules for component type(s) Unknown',
    });
  });

  it('refuses duplicate rule ids', () => {
    const data = bundledData();
    data.entries.push({ ...data.entries[0] });
    expect(() => createRuleTable(data)).toThrow(`rule table: duplicate rule id "${data.entries[0].id}"`);
  });

  it('refuses Node templates that use edge fields', () => {
    const data = bundledData();
    data.entries[0] = { ...data.entries[0], descriptionTemplate: 'Talks to {targetId}' };
    const err = captureError(() => createRuleTable(data));
    expect(err).toMatchObject({ code: ErrorCode.RULE_TABLE_INVALID });
  });

  it('refuses rows with an unknown category', () => {
    const err = captureError(() => createRuleTable({
      version: '1',
      entries: [{ id: 'x', componentType: 'User', role: 'Node', category: 'Phishing', descriptionTemplate: 'a', countermeasureTemplate: 'b' }],
    }));
    expect(err).toBeInstanceOf(RuleTableError);
    expect(err).toMatchObject({ code: ErrorCode.RULE_TABLE_INVALID });
  });

  it('reports a missing file as not found', () => {
    const err = captureError(() => loadRuleTable('/nonexistent/rules.json'));
    expect(err).toBeInstanceOf(StrideGraphError);
    expect(err).toMatchObject({ code: ErrorCode.IO_FILE_NOT_FOUND });
  });
});
