// Token estimation and sentence segmentation for narrative text

// ~4 characters per token, the estimate used across the ingestion path
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

const ABBREVIATIONS = new Set([
  'inc.', 'ltd.', 'co.', 'corp.', 'plc.', 'no.', 'vs.', 'e.g.', 'i.e.', 'u.s.', 'u.k.',
  'approx.', 'mr.', 'mrs.', 'ms.', 'dr.', 'st.', 'jan.', 'feb.', 'mar.', 'apr.', 'jun.',
  'jul.', 'aug.', 'sep.', 'sept.', 'oct.', 'nov.', 'dec.',
]);

const SENTENCE_BREAK = /(?<=[.!?])\s+(?=["'(\[]?[A-Z0-9])/;

/**
 * Split narrative text into sentences. Breaks after ., ! or ? followed by
 * whitespace and an upper-case letter or digit; common abbreviations do not
 * end a sentence.
 */
export function splitSentences(text: string): string[] {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (!normalized) return [];

  const pieces = normalized.split(SENTENCE_BREAK);
  const sentences: string[] = [];
  let pending = '';

  for (const piece of pieces) {
    pending = pending ? `${pending} ${piece}` : piece;
    const lastWord = pending.slice(pending.lastIndexOf(' ') + 1).toLowerCase();
    if (ABBREVIATIONS.has(lastWord)) continue;
    sentences.push(pending);
    pending = '';
  }
  if (pending) sentences.push(pending);

  return sentences;
}

export function normalizeLabel(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9%]+/g, ' ').trim();
}
