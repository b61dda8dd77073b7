import { describe, it, expect, afterEach, vi } from 'vitest';
import type { ThresholdTable } from '@/types';
import { INJURY_THRESHOLD_DEFINITIONS } from '@/constants/injury-thresholds';
import { createEngineConfig, getEngineConfig, listInjuryTypes } from './config';
import { buildDefaultThresholdTables, buildThresholdTable } from './tables';
import { atLeast, atMost } from './criteria';
import { ConfigurationError } from './errors';

function aclTable(): ThresholdTable {
  return buildThresholdTable(INJURY_THRESHOLD_DEFINITIONS[0]);
}

function problemsOf(tables: ThresholdTable[]): string[] {
  try {
    createEngineConfig(tables);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.problems;
    throw error;
  }
  return [];
}

describe('getEngineConfig', () => {
  it('loads every built-in injury type in declared order', () => {
    const config = getEngineConfig();
    expect(config.injuryTypes).toHaveLength(9);
    expect(config.injuryTypes[0]).toBe('ACL');
    expect(config.injuryTypes[8]).toBe('Generic');
  });

  it('returns the same instance on every call', () => {
    expect(getEngineConfig()).toBe(getEngineConfig());
  });

  describe('first load', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('writes nothing to stdout', async () => {
      vi.resetModules();
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const fresh = await import('./config');

      expect(fresh.getEngineConfig().injuryTypes).toHaveLength(9);
      expect(log).not.toHaveBeenCalled();
    });
  });

  it('freezes tables', () => {
    const table = getEngineConfig().tables.get('ACL');
    expect(table).toBeDefined();
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table?.phases[0].criteria[0])).toBe(true);
  });
});

describe('listInjuryTypes', () => {
  it('pairs each type with its display name', () => {
    const options = listInjuryTypes();
    expect(options[0]).toEqual({ value: 'ACL', label: 'ACL - Anterior Cruciate Ligament' });
    expect(options.map(o => o.value)).toEqual(getEngineConfig().injuryTypes);
  });
});

describe('createEngineConfig', () => {
  it('accepts the built-in tables', () => {
    expect(() => createEngineConfig(buildDefaultThresholdTables())).not.toThrow();
  });

  it('builds independent instances', () => {
    const a = createEngineConfig([aclTable()]);
    const b = createEngineConfig([aclTable()]);
    expect(a).not.toBe(b);
    expect(a.injuryTypes).toEqual(['ACL']);
  });

  it('rejects an empty table list', () => {
    expect(problemsOf([])).toEqual(['at least one threshold table is required']);
  });

  it('rejects duplicate phase priorities', () => {
    const table = aclTable();
    const phases = table.phases.map(rule => rule.phase === 'Mid' ? { ...rule, priority: 3 } : rule);
    expect(problemsOf([{ ...table, phases }])).toEqual(['ACL: phase priority 3 is declared more than once']);
  });

  it('rejects duplicate injury types', () => {
    expect(problemsOf([aclTable(), aclTable()])).toEqual(['ACL: injury type is declared more than once']);
  });

  it('requires the core metrics', () => {
    const table = { ...aclTable(), requiredFields: [] };
    expect(problemsOf([table])).toEqual([
      'ACL: requiredFields must include limbSymmetryIndex',
      'ACL: requiredFields must include painScore',
    ]);
  });

  it('rejects criteria that can never be satisfied', () => {
    const table = aclTable();
    const alerts = [
      ...table.alerts,
      { id: 'impossible', severity: 'info' as const, message: 'never', criteria: [{ field: 'painScore' as const, min: atLeast(5), max: atMost(3) }] },
    ];
    expect(problemsOf([{ ...table, alerts }])).toEqual([
      'ACL: alert "impossible" criterion on Pain has an empty interval',
    ]);
  });

  it('reports schema problems with their path', () => {
    const table = { ...aclTable(), displayName: '' };
    const problems = problemsOf([table]);
    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^ACL: displayName: /);
  });

  it('throws a ConfigurationError listing every problem', () => {
    expect(() => createEngineConfig([])).toThrow(ConfigurationError);
    expect(() => createEngineConfig([])).toThrow(/at least one threshold table is required/);
  });
});
