import { describe, expect, it } from "vitest";
import { ConfigError, USAGE, parseCli, readFlags } from "./config";

const required = ["--api-key", "test-key", "--cse-id", "test-cx", "--org", "Acme Corp"];

function options(argv: string[], env: NodeJS.ProcessEnv = {}) {
  const command = parseCli(argv, env);
  if (command.kind !== "run") throw new Error("expected a run command");
  return command.options;
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("readFlags", () => {
  it("accepts both --flag value and --flag=value", () => {
    expect(readFlags(["--org", "Acme", "--output=out/e.json"]).values).toEqual({
      org: "Acme",
      output: "out/e.json",
    });
  });

  it("rejects unknown flags and missing values", () => {
    expect(issuesOf(() => readFlags(["--nope", "x", "--org"]))).toEqual([
      "unknown option --nope",
      'unexpected argument "x"',
      "--org needs a value",
    ]);
  });
});

describe("parseCli", () => {
  it("fills in defaults", () => {
    expect(options(required)).toEqual({
      apiKey: "test-key",
      cseId: "test-cx",
      org: "Acme Corp",
      emailPolicy: "multi",
      output: "employees.json",
      metrics: "metrics.json",
      roles: "en",
      maxPages: 10,
      flushEvery: 25,
      delayMs: 1000,
    });
  });

  it("reads every option", () => {
    const parsed = options([
      ...required,
      "--email-format",
      "{f}{last}@acme.test",
      "--email-policy=single",
      "--output",
      "out/employees.json",
      "--metrics",
      "out/metrics.json",
      "--csv",
      "out/employees.csv",
      "--roles",
      "es",
      "--max-pages",
      "3",
      "--flush-every",
      "1",
      "--delay-ms",
      "0",
    ]);

    expect(parsed).toMatchObject({
      emailFormat: "{f}{last}@acme.test",
      emailPolicy: "single",
      output: "out/employees.json",
      metrics: "out/metrics.json",
      csv: "out/employees.csv",
      roles: "es",
      maxPages: 3,
      flushEvery: 1,
      delayMs: 0,
    });
  });

  it("falls back to the environment for credentials and delay", () => {
    const parsed = options(["--org", "Acme"], {
      GOOGLE_API_KEY: "env-key",
      Google_CX: "env-cx",
      SEARCH_PAGE_DELAY_MS: "250",
    });

    expect(parsed.apiKey).toBe("env-key");
    expect(parsed.cseId).toBe("env-cx");
    expect(parsed.delayMs).toBe(250);
  });

  it("prefers flags over the environment", () => {
    expect(options(required, { GOOGLE_API_KEY: "env-key" }).apiKey).toBe("test-key");
  });

  it("reports missing required options by flag name", () => {
    expect(issuesOf(() => parseCli([], {}))).toEqual([
      "--api-key is required (or set GOOGLE_API_KEY)",
      "--cse-id is required (or set GOOGLE_CX)",
      "--org is required",
    ]);
  });

  it("rejects templates without placeholders and bad numbers", () => {
    const issues = issuesOf(() =>
      parseCli([...required, "--email-format", "info@acme.test", "--max-pages", "11", "--email-policy", "all"], {})
    );

    expect(issues).toHaveLength(3);
    expect(issues[0]).toBe("--email-format needs at least one of {first} {last} {f} {l}");
    expect(issues[1]).toMatch(/^--email-policy /);
    expect(issues[2]).toMatch(/^--max-pages /);
  });

  it("rejects empty numeric values instead of reading them as 0", () => {
    expect(issuesOf(() => parseCli([...required, "--flush-every=", "--delay-ms="], {}))).toEqual([
      "--flush-every needs a number",
      "--delay-ms needs a number",
    ]);
    expect(issuesOf(() => parseCli([...required, "--max-pages", "ten"], {}))[0]).toMatch(/^--max-pages /);
  });

  it("documents the role presets and the default", () => {
    expect(USAGE).toContain("--roles <preset|file>   Role terms appended to the organization (default: en)");
    expect(USAGE).toContain("es      Spanish banking roles");
  });

  it("returns help", () => {
    expect(parseCli(["--help"], {})).toEqual({ kind: "help" });
    expect(parseCli(["-h", "--bogus"], {})).toEqual({ kind: "help" });
  });
});
