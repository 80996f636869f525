/**
 * Language code handling for prompts and the summary header.
 *
 * @module summarizer/language
 */

const LANGUAGE_ALIASES: Record<string, { code: string; label: string }> = {
  EN: { code: "EN", label: "English" },
  ENG: { code: "EN", label: "English" },
  ENGLISH: { code: "EN", label: "English" },
  RU: { code: "RU", label: "Russian" },
  RUS: { code: "RU", label: "Russian" },
  RUSSIAN: { code: "RU", label: "Russian" },
};

/** "eng" → "EN", "Russian" → "RU"; unknown languages pass through trimmed. */
export function normalizeLanguageCode(language: string): string {
  const trimmed = (language ?? "").trim();
  return LANGUAGE_ALIASES[trimmed.toUpperCase()]?.code ?? trimmed;
}

/** Human-readable language name used inside prompts. */
export function languageLabel(language: string): string {
  const trimmed = (language ?? "").trim();
  return LANGUAGE_ALIASES[trimmed.toUpperCase()]?.label ?? trimmed;
}
