import { uniq } from "lodash";
import { normalizeText } from "./normalize";
import { EmailPolicy } from "./types";

const PLACEHOLDERS = ["{first}", "{last}", "{f}", "{l}"] as const;

export function isTemplate(template: string): boolean {
  return PLACEHOLDERS.some((p) => template.includes(p));
}

export function renderTemplate(template: string, first: string, last: string): string {
  return template
    .replaceAll("{first}", first)
    .replaceAll("{last}", last)
    .replaceAll("{f}", first.charAt(0))
    .replaceAll("{l}", last.charAt(0));
}

function surnameCandidates(tokens: string[], policy: EmailPolicy): string[] {
  if (policy === "single") return [tokens[tokens.length - 1]];
  // Compound surnames (Garcia Lopez): try both the paternal and maternal one.
  return tokens.length === 2 ? [tokens[1]] : [tokens[1], tokens[2]];
}

/**
 * Candidate addresses for `fullName` under `template`.
 *
 * - `single`: first token + last token, at most one address.
 * - `multi`: first token + second token, and + third token when there is one.
 *
 * Returns an empty list without a template or with fewer than two name tokens.
 */
export function inferEmails(
  fullName: string,
  template: string | undefined,
  policy: EmailPolicy = "multi"
): string[] {
  if (!template) return [];

  const tokens = normalizeText(fullName, { strict: true }).split(/\s+/).filter(Boolean);
  if (tokens.length < 2) return [];

  const first = tokens[0];
  const emails = surnameCandidates(tokens, policy)
    .filter((last) => last.length > 0)
    .map((last) => renderTemplate(template, first, last));

  return uniq(emails);
}
