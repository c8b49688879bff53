import { describe, it, expect } from 'vitest';
import { createExclusionPolicy, defaultExclusionPolicy, normalizeEntityName } from '@corroborate/core';

describe('normalizeEntityName', () => {
  it.each([
    ['Acme Energy LLC', 'acme energy'],
    ['  ACME   ENERGY  GROUP ', 'acme energy'],
    ['Gulf Trading Co. LLC', 'gulf trading'],
    ['Almarai Company PJSC', 'almarai'],
    ['Holding Ltd.', 'holding'],
    ['Group', 'group'],
    ['Northwind Holdings Limited', 'northwind'],
  ])('%s -> %s', (raw, expected) => {
    expect(normalizeEntityName(raw)).toBe(expected);
  });

  it('is idempotent', () => {
    const samples = [
      'Acme Energy LLC',
      'Gulf Trading Co. LLC',
      'Contoso Group Holdings Inc.',
      'Fabrikam   Corp',
      'stc (Saudi Telecom Company)',
      '',
      '   ',
    ];
    for (const raw of samples) {
      const once = normalizeEntityName(raw);
      expect(normalizeEntityName(once)).toBe(once);
    }
  });
});

describe('defaultExclusionPolicy', () => {
  const { isExcluded } = defaultExclusionPolicy;

  it('excludes platform vendors by exact match', () => {
    expect(isExcluded('SAP')).toBe(true);
    expect(isExcluded('  sap ')).toBe(true);
  });

  it('excludes names containing a disallowed entry', () => {
    expect(isExcluded('Accenture Middle East')).toBe(true);
  });

  it('excludes names contained in a disallowed entry', () => {
    expect(isExcluded('World')).toBe(true);
    expect(isExcluded('DP World')).toBe(false);
  });

  it('always excludes the empty name', () => {
    expect(isExcluded('')).toBe(true);
    expect(isExcluded('   ')).toBe(true);
  });

  it('keeps unrelated organizations', () => {
    expect(isExcluded('Almarai')).toBe(false);
  });
});

describe('createExclusionPolicy', () => {
  it('applies a custom list case-insensitively', () => {
    const policy = createExclusionPolicy(['Globex']);
    expect(policy.isExcluded('GLOBEX Corp')).toBe(true);
    expect(policy.isExcluded('Initech')).toBe(false);
  });
});
