import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { uniq } from "lodash";
import { z } from "zod";

export const ROLES_FILE = join(__dirname, "..", "data", "roles.json");

const RoleListSchema = z.array(z.string());
const PresetsSchema = z.record(RoleListSchema);

export async function loadPresets(file = ROLES_FILE): Promise<Record<string, string[]>> {
  const raw = await readFile(file, "utf-8");
  return PresetsSchema.parse(JSON.parse(raw));
}

/**
 * Ordered, de-duplicated role terms. The empty term (organization name alone)
 * always comes first.
 */
export function normalizeRoleTerms(terms: string[]): string[] {
  return uniq(["", ...terms.map((t) => t.trim())]);
}

/**
 * Role terms from a preset name in data/roles.json, a JSON array file, or a
 * plain text file with one term per line.
 */
export async function loadRoleTerms(source: string, presetsFile = ROLES_FILE): Promise<string[]> {
  const presets = await loadPresets(presetsFile);
  if (Object.hasOwn(presets, source)) return normalizeRoleTerms(presets[source]);

  const raw = await readFile(source, "utf-8");
  if (source.toLowerCase().endsWith(".json")) {
    return normalizeRoleTerms(RoleListSchema.parse(JSON.parse(raw)));
  }
  return normalizeRoleTerms(raw.split(/\r?\n/).filter((l) => l.trim() && !l.trim().startsWith("#")));
}
