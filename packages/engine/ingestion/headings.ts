// Heading rules shared by the unit stream, the boundary detector and the chunker
// A line is a heading only when it opens a paragraph and reads as a title

import type { StatementType } from '../types/document.js';
import { containsPhrase, LEXICON, type Lexicon } from '../config/lexicon.js';
import { normalizeLabel } from '../utils/text.js';

const AMOUNT_IN_TEXT = /\d{1,3}(?:,\d{3})+|\d+\.\d+/;
const NUMBERED_HEADING = /^(?:\d+(?:\.\d+)*\.?|[IVX]+\.|[A-Z]\.)\s+[A-Z]/;
const NOTE_HEADING = /^note\s+\d+/i;
export const TERMINAL_PUNCTUATION = /[.!?:]["')]?$/;

/** Words a wrapped line can end on; a title never does */
const CONNECTORS = new Set([
  'a', 'an', 'and', 'as', 'at', 'by', 'for', 'from', 'in', 'of', 'on', 'or', 'the', 'to', 'with',
]);

/** Words a statement title may open with */
const TITLE_PREFIX = new Set([
  'the', 'consolidated', 'group', 'company', 'parent', 'interim', 'condensed', 'unaudited', 'audited',
]);

/** Short, unpunctuated line with no amounts that does not stop on a connector */
export function isHeadingLike(line: string): boolean {
  const text = line.trim();
  if (!text || text.length > 100) return false;
  if (/[.;,]$/.test(text)) return false;
  const words = text.split(/\s+/);
  if (words.length > 12) return false;
  if (CONNECTORS.has(words[words.length - 1].toLowerCase())) return false;
  if (AMOUNT_IN_TEXT.test(text)) return false;
  return /^[A-Z0-9]/.test(text);
}

/** Numbered headings, "Note 12" headings and short upper-case lines */
export function isSectionHeading(line: string): boolean {
  const text = line.trim();
  if (NOTE_HEADING.test(text) || NUMBERED_HEADING.test(text)) return true;
  const letters = text.replace(/[^A-Za-z]/g, '');
  return letters.length >= 3 && text.length <= 60 && letters === letters.toUpperCase();
}

/** Every word of four letters or more is capitalized */
export function isTitleCase(line: string): boolean {
  return line
    .trim()
    .split(/\s+/)
    .filter(word => word.replace(/[^A-Za-z]/g, '').length >= 4)
    .every(word => /^["'(]?[A-Z]/.test(word));
}

/**
 * Statement type whose name opens the line, after nothing but title words such
 * as "Consolidated" or "Group". "Revenue as shown in the Balance Sheet" names
 * a statement without being its title.
 */
export function statementTitle(line: string, lexicon: Lexicon = LEXICON): StatementType | undefined {
  const normalized = normalizeLabel(line);
  for (const { phrase, statementType } of lexicon.statements) {
    if (!containsPhrase(normalized, phrase)) continue;
    const before = ` ${normalized} `.slice(0, ` ${normalized} `.indexOf(` ${phrase} `)).trim();
    const words = before ? before.split(' ') : [];
    if (words.every(w => TITLE_PREFIX.has(w))) return statementType;
  }
  return undefined;
}

/** Title test for a line that opens a paragraph */
export function isTitleLine(line: string, lexicon: Lexicon = LEXICON): boolean {
  if (!isHeadingLike(line)) return false;
  return statementTitle(line, lexicon) !== undefined || isSectionHeading(line) || isTitleCase(line);
}
