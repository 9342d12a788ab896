export const MAX_NAME_LENGTH = 60;

/**
 * Best-effort person name from a search result title, e.g.
 * "Jane Doe - Marketing Manager - LinkedIn" -> "Jane Doe".
 */
export function cleanName(title: string): string {
  const cleaned = title.replace(/\s?[|-]\s?LinkedIn.*$/i, "");
  const [first = ""] = cleaned.split(/\s[–-]\s/);
  return first.trim();
}

// Directory and listing pages ("10+ profiles named ...") rather than one person.
export function isNoiseName(name: string): boolean {
  return [...name].length > MAX_NAME_LENGTH || name.toLowerCase().includes("profiles");
}
