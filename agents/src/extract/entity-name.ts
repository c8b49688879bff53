/**
 * Heuristics that guess the organization named in a headline or snippet.
 * Each returns a candidate name; when no pattern yields an acceptable name the
 * truncated text itself is returned and left to the exclusion policy downstream.
 */

export type NameFilter = (name: string) => boolean;

const MAX_NAME_LENGTH = 80;
const FALLBACK_LENGTH = 60;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const customerPatterns = (vendor: string): RegExp[] => [
  /^(.+?)\s+(?:selects|chooses|deploys|implements|goes live|adopts|migrates|transforms|runs|standardizes|accelerates)/i,
  new RegExp(`^(.+?)\\s+(?:and ${vendor}|with ${vendor}|partners with ${vendor})`, 'i'),
  new RegExp(
    `(?:how|why|when)\\s+(.+?)\\s+(?:chose|selected|deployed|implemented|uses|leverages|adopted)\\s+${vendor}`,
    'i',
  ),
];

const pressPatterns = (vendor: string): RegExp[] => [
  new RegExp(
    `(.+?)\\s+(?:implements|deploys|selects|goes live|adopts|chooses|migrates to|transforms with)\\s+${vendor}`,
    'i',
  ),
  new RegExp(`${vendor}\\s+(?:and|&)\\s+(.+?)\\s+(?:announce|partner|collaborate)`, 'i'),
];
const LEADING_FILLER = /^(?:how|why|when|as)\s+/i;

const HIRING_PATTERNS = [
  /(?:\bat|@)\s+(.+?)(?:\s*[-–|,]|\s*$)/i,
  /[-–|]\s*(.+?)(?:\s*[-–|,]|\s*$)/i,
  /^(.+?)\s+(?:is hiring|is looking|seeks|recruiting|careers)/i,
];

const PROCUREMENT_PATTERNS = [
  /^(.+?)\s+(?:tender|procurement|rfp|bid|contract)/i,
  /^(.+?)\s+(?:awards|issues|publishes)/i,
];

const SPEAKER_PATTERN = /(?:\bfrom|\bof|\bat)\s+(.+?)(?:\s*[-–|,.]|\s+(?:speaks|presents|discusses|shares))/i;

function firstAccepted(
  text: string,
  patterns: readonly RegExp[],
  minLength: number,
  isExcluded: NameFilter,
  clean: (name: string) => string = (name) => name,
): string | null {
  for (const pattern of patterns) {
    const captured = pattern.exec(text)?.[1];
    if (captured === undefined) continue;
    const name = clean(captured.trim());
    if (name.length >= minLength && !isExcluded(name)) return name.slice(0, MAX_NAME_LENGTH);
  }
  return null;
}

/** Vendor story and news headlines, e.g. "Almarai Selects SAP S/4HANA". */
export function extractCustomerName(title: string, vendor: string, isExcluded: NameFilter): string {
  const patterns = customerPatterns(escapeRegExp(vendor));
  return firstAccepted(title, patterns, 3, isExcluded) ?? title.slice(0, FALLBACK_LENGTH);
}

/** Press coverage: "<org> implements <vendor> …" or "<vendor> and <org> announce …". */
export function extractPressCustomer(text: string, vendor: string, isExcluded: NameFilter): string {
  const clean = (name: string) => name.replace(LEADING_FILLER, '').trim();
  const patterns = pressPatterns(escapeRegExp(vendor));
  return firstAccepted(text, patterns, 3, isExcluded, clean) ?? text.slice(0, FALLBACK_LENGTH);
}

/** Job result titles first, then the first two patterns against the snippet. */
export function extractHiringCompany(title: string, snippet: string, isExcluded: NameFilter): string {
  return (
    firstAccepted(title, HIRING_PATTERNS, 4, isExcluded) ??
    firstAccepted(snippet, HIRING_PATTERNS.slice(0, 2), 4, isExcluded) ??
    title.slice(0, FALLBACK_LENGTH)
  );
}

/** Tender notices, e.g. "Ministry of Finance tender for ERP upgrade". No exclusion check here. */
export function extractProcuringOrg(title: string): string {
  for (const pattern of PROCUREMENT_PATTERNS) {
    const captured = pattern.exec(title)?.[1];
    if (captured !== undefined) return captured.trim().slice(0, MAX_NAME_LENGTH);
  }
  return title.slice(0, 70);
}

export function extractSpeakerOrg(text: string, isExcluded: NameFilter): string {
  return firstAccepted(text, [SPEAKER_PATTERN], 4, isExcluded) ?? text.slice(0, FALLBACK_LENGTH);
}
