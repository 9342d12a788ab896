import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadPresets, loadRoleTerms, normalizeRoleTerms } from "./roles";

describe("roles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "roles-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("puts the empty term first and drops duplicates", () => {
    expect(normalizeRoleTerms(["CTO", " Sales ", "", "CTO"])).toEqual(["", "CTO", "Sales"]);
  });

  it("ships en and es presets starting with the bare organization", async () => {
    const presets = await loadPresets();
    expect(Object.keys(presets).sort()).toEqual(["en", "es"]);

    const en = await loadRoleTerms("en");
    expect(en.slice(0, 4)).toEqual(["", "IT", "Human Resources", "Recruiter"]);
    expect(en).toHaveLength(23);

    const es = await loadRoleTerms("es");
    expect(es[0]).toBe("");
    expect(es).toContain("Atención al Cliente");
  });

  it("reads a JSON array file", async () => {
    const file = join(dir, "roles.json");
    await writeFile(file, JSON.stringify(["Engineer", "Recruiter"]));
    expect(await loadRoleTerms(file)).toEqual(["", "Engineer", "Recruiter"]);
  });

  it("reads a text file, one term per line", async () => {
    const file = join(dir, "roles.txt");
    await writeFile(file, "# roles\nEngineer\r\n\nData Scientist\n");
    expect(await loadRoleTerms(file)).toEqual(["", "Engineer", "Data Scientist"]);
  });

  it("fails on a missing file", async () => {
    await expect(loadRoleTerms(join(dir, "missing.txt"))).rejects.toThrow(/ENOENT/);
  });
});
