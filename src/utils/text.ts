const URL_RE = /(?:https?:\/\/|www\.)\S+/gi;
const EMAIL_RE = /\S+@\S+\.\S+/g;
const IN_WORD_APOSTROPHE_RE = /(\p{L})['’](\p{L})/gu;
const NON_WORD_RE = /[^\p{L}\p{N}_\s]+/gu;
const TOKEN_RE = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Lower-cases, drops URLs and e-mail addresses, folds contractions
 * ("don't" -> "dont") and collapses everything that is not a word character
 * into single spaces.
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return "";
  return text
    .toLowerCase()
    .replace(URL_RE, " ")
    .replace(EMAIL_RE, " ")
    .replace(IN_WORD_APOSTROPHE_RE, "$1$2")
    .replace(NON_WORD_RE, " ")
    .replace(/\s+/g, " ")
    .trim();
}

// Single-character tokens never count as terms.
export function tokenize(normalized: string): string[] {
  return normalized.match(TOKEN_RE) ?? [];
}

export function ngrams(tokens: string[], minN: number, maxN: number): string[] {
  const out: string[] = [];
  for (let n = minN; n <= maxN; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      out.push(tokens.slice(i, i + n).join(" "));
    }
  }
  return out;
}

// companies -> company, boxes -> box, friends -> friend
export function singularize(word: string): string {
  const w = word.toLowerCase().trim();
  if (w.endsWith("ies")) return w.slice(0, -3) + "y";
  if (w.endsWith("es") && w.length > 3) return w.slice(0, -2);
  if (w.endsWith("s") && !w.endsWith("ss") && w.length > 2) return w.slice(0, -1);
  return w;
}

export function isDuplicateTerm(term: string, kept: string[]): boolean {
  const norm = singularize(term);
  return kept.some((k) => {
    const other = singularize(k);
    return norm === other || norm.includes(other) || other.includes(norm);
  });
}
