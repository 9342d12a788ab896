const COMBINING_MARKS = /\p{M}/gu;

export function foldAccents(value: string): string {
  if (!value) return "";
  return value.normalize("NFKD").replace(COMBINING_MARKS, "");
}

/**
 * Lowercase ASCII form of a display name. With `strict` (the default) anything
 * outside `[a-z0-9]` and whitespace is dropped.
 */
export function normalizeText(value: string, { strict = true }: { strict?: boolean } = {}): string {
  const folded = foldAccents(value).toLowerCase();
  return strict ? folded.replace(/[^a-z0-9\s]/g, "") : folded;
}
