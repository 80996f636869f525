/**
 * Figure citation extraction.
 *
 * Finds tokens such as "Figure 3", "Fig. 2A–C" or "Figs. 4-5" in free text.
 * Only non-supplementary references are ever required to survive
 * summarization verbatim; "Fig. S1" and "Supplementary Figure 2" are excluded.
 *
 * @module summarizer/figure-references
 */

// A panel range ("2A–C") needs a panel letter before the dash; a numeric range ("4-5") needs a digit after it.
const FIGURE_REF_PATTERN =
  /\b(?:Supplementary\s+)?Fig(?:ure)?s?\.?\s*(?:S\s*)?\d+(?:[A-Za-z](?:\s*[–—-]\s*[A-Za-z](?![A-Za-z]))?)?(?:\s*[–—-]\s*\d+[A-Za-z]?)?\b/gi;

const SUPPLEMENTARY_FIG_PATTERN = /\bfig(?:ure)?s?\b\.?\s*s\s*\d/i;

/**
 * Comparison key for a reference: lowercased, whitespace collapsed,
 * en/em dashes folded to "-".
 */
export function normalizeFigureRef(ref: string): string {
  return ref.trim().replace(/\s+/g, " ").replace(/[–—]/g, "-").toLowerCase();
}

export function isSupplementaryRef(ref: string): boolean {
  const lower = ref.toLowerCase();
  if (lower.includes("supplementary")) return true;
  return SUPPLEMENTARY_FIG_PATTERN.test(lower);
}

/**
 * All distinct figure references in first-seen order, supplementary included.
 */
export function extractFigureRefs(text: string): string[] {
  if (!text) return [];
  const found: string[] = [];
  const seen = new Set<string>();
  for (const match of text.matchAll(FIGURE_REF_PATTERN)) {
    const ref = match[0].trim();
    const key = normalizeFigureRef(ref);
    if (seen.has(key)) continue;
    seen.add(key);
    found.push(ref);
  }
  return found;
}

/**
 * Distinct non-supplementary references in first-seen order, in the exact
 * textual form of their first occurrence.
 */
export function extractRequiredFigureRefs(text: string): string[] {
  return extractFigureRefs(text).filter((ref) => !isSupplementaryRef(ref));
}

/** Normalized keys of the non-supplementary references in `text`. */
export function requiredRefKeys(text: string): Set<string> {
  return new Set(extractRequiredFigureRefs(text).map(normalizeFigureRef));
}

/**
 * Required references that do not occur in `text` (compared on normalized form).
 */
export function findMissingRefs(text: string, requiredRefs: string[]): string[] {
  if (requiredRefs.length === 0) return [];
  const haystack = normalizeFigureRef(text ?? "");
  return requiredRefs.filter((ref) => !containsRef(haystack, normalizeFigureRef(ref)));
}

// "figure 1" must not be satisfied by "figure 10" or "figure 1b".
function containsRef(haystack: string, key: string): boolean {
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(key, from);
    if (idx < 0) return false;
    const next = haystack.charAt(idx + key.length);
    if (!/[0-9a-z]/.test(next)) return true;
    from = idx + 1;
  }
}
