/**
 * Canonical keys for organization names.
 */

export const LEGAL_SUFFIXES = [
  'llc',
  'ltd',
  'ltd.',
  'limited',
  'inc',
  'inc.',
  'corp',
  'corp.',
  'corporation',
  'group',
  'holding',
  'holdings',
  'plc',
  'fze',
  'wll',
  'pjsc',
  'psc',
  'bsc',
  'qsc',
  'co.',
  'company',
] as const;

// Longest first so "ltd." wins over "ltd".
const SUFFIXES_BY_LENGTH = [...LEGAL_SUFFIXES].sort((a, b) => b.length - a.length);

/** Lower-case, trim and collapse whitespace. */
export function collapseName(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, ' ');
}

function stripOneSuffix(name: string): string | null {
  for (const suffix of SUFFIXES_BY_LENGTH) {
    if (name.endsWith(` ${suffix}`)) {
      return name.slice(0, -(suffix.length + 1)).trimEnd();
    }
  }
  return null;
}

/**
 * Canonical key: collapsed name with trailing legal-form suffixes removed until none is left.
 * `normalizeEntityName(normalizeEntityName(x)) === normalizeEntityName(x)`.
 */
export function normalizeEntityName(raw: string): string {
  let name = collapseName(raw);
  for (let stripped = stripOneSuffix(name); stripped !== null; stripped = stripOneSuffix(name)) {
    name = stripped;
  }
  return name;
}
