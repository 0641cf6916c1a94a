// Fiscal period references in statement text, table headers and questions
// Handles "FY2023", "FY23", "Q3 2022", "2022 Q3", "31 December 2023" and bare years

const MIN_YEAR = 1980;
const MAX_YEAR = 2099;

interface PeriodMatch {
  index: number;
  label: string;
}

function fullYear(raw: string): number {
  const n = Number(raw);
  return raw.length === 2 ? 2000 + n : n;
}

function inRange(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

const PATTERNS: Array<[RegExp, (m: RegExpExecArray) => string | null]> = [
  [/\bQ([1-4])\s*(?:FY\s?)?((?:19|20)\d{2})\b/gi, m => `${m[2]}-Q${m[1]}`],
  [/\b((?:19|20)\d{2})\s*Q([1-4])\b/gi, m => `${m[1]}-Q${m[2]}`],
  [/\bFY\s?'?(\d{4}|\d{2})\b/gi, m => {
    const year = fullYear(m[1]);
    return inRange(year) ? `FY${year}` : null;
  }],
  [/\b((?:19|20)\d{2})\b/g, m => {
    const year = Number(m[1]);
    return inRange(year) ? `FY${year}` : null;
  }],
];

/**
 * Extract normalized period labels in order of first appearance.
 * Quarter labels look like "2022-Q3"; annual labels like "FY2023".
 * A bare year that is part of a quarter label is not reported twice.
 */
export function extractFiscalPeriods(text: string): string[] {
  const matches: PeriodMatch[] = [];
  const claimed: Array<[number, number]> = [];

  for (const [re, toLabel] of PATTERNS) {
    re.lastIndex = 0;
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      const start = m.index;
      const end = start + m[0].length;
      if (claimed.some(([s, e]) => start < e && end > s)) continue;
      const label = toLabel(m);
      if (!label) continue;
      claimed.push([start, end]);
      matches.push({ index: start, label });
    }
  }

  matches.sort((a, b) => a.index - b.index);
  const seen = new Set<string>();
  const labels: string[] = [];
  for (const { label } of matches) {
    if (seen.has(label)) continue;
    seen.add(label);
    labels.push(label);
  }
  return labels;
}

export function periodYear(label: string): number | undefined {
  const m = /^(?:FY)?(\d{4})/.exec(label);
  return m ? Number(m[1]) : undefined;
}

/** Distinct years of the given period labels, ascending */
export function fiscalYearsOf(labels: readonly string[]): number[] {
  const years = new Set<number>();
  for (const label of labels) {
    const year = periodYear(label);
    if (year !== undefined) years.add(year);
  }
  return [...years].sort((a, b) => a - b);
}

/** Year named by a table header cell such as "2023", "FY2023" or "31 Dec 2023" */
export function yearFromHeader(cell: string): number | undefined {
  const labels = extractFiscalPeriods(cell);
  return labels.length > 0 ? periodYear(labels[0]) : undefined;
}
