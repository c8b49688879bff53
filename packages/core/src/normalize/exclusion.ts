import defaultExcludedNames from '../data/excluded-entities.json';
import { collapseName } from './entity-name';

export interface ExclusionPolicy {
  isExcluded(name: string): boolean;
}

/**
 * Disallowed-name policy. A name is excluded when it equals an entry or when either
 * string contains the other, so the empty name is always excluded and short entries
 * ("ey", "hp") reject every name that contains them.
 */
export function createExclusionPolicy(names: readonly string[] = defaultExcludedNames): ExclusionPolicy {
  const entries = [...new Set(names.map(collapseName).filter(Boolean))];
  const exact = new Set(entries);

  return {
    isExcluded(name: string): boolean {
      const candidate = collapseName(name);
      if (exact.has(candidate)) return true;
      return entries.some((entry) => entry.includes(candidate) || candidate.includes(entry));
    },
  };
}

export const defaultExclusionPolicy: ExclusionPolicy = createExclusionPolicy();
