import { z } from "zod";
import { isTemplate } from "./emails";
import { MAX_PAGES } from "./harvest";

export const USAGE = `Usage: profile-harvester --org <name> [options]

Options:
  --api-key <key>         Google API key (env GOOGLE_API_KEY)
  --cse-id <id>           Custom Search Engine id (env GOOGLE_CX)
  --org <name>            Target organization (required)
  --email-format <tpl>    Email template, e.g. "{first}.{last}@example.com"
                          placeholders: {first} {last} {f} {l}
  --email-policy <p>      single | multi (default: multi)
                            single  first token + last token, one address
                            multi   second and third token as surnames
  --output <file>         Profiles JSON (default: employees.json)
  --metrics <file>        Metrics JSON (default: metrics.json)
  --csv <file>            Also write profiles as CSV
  --roles <preset|file>   Role terms appended to the organization (default: en)
                            en      English job titles and departments
                            es      Spanish banking roles (branch, risk, compliance...)
                            <file>  a JSON array or a text file, one term per line
  --max-pages <n>         Pages per query, 1-${MAX_PAGES} (default: ${MAX_PAGES})
  --flush-every <n>       Rewrite the output every n new profiles, 0 = end only (default: 25)
  --delay-ms <ms>         Delay before each request (env SEARCH_PAGE_DELAY_MS, default: 1000)
  -h, --help              Show this help
`;

const FLAGS = {
  "api-key": "apiKey",
  "cse-id": "cseId",
  org: "org",
  "email-format": "emailFormat",
  "email-policy": "emailPolicy",
  output: "output",
  metrics: "metrics",
  csv: "csv",
  roles: "roles",
  "max-pages": "maxPages",
  "flush-every": "flushEvery",
  "delay-ms": "delayMs",
} as const;

type Flag = keyof typeof FLAGS;
type OptionKey = (typeof FLAGS)[Flag];

// Flag values arrive as strings; an empty one ("--delay-ms=") is an error, not 0.
const numeric = (schema: z.ZodNumber) => z.string().trim().min(1, "needs a number").pipe(schema);

const OptionsSchema = z.object({
  apiKey: z.string({ required_error: "is required (or set GOOGLE_API_KEY)" }).min(1),
  cseId: z.string({ required_error: "is required (or set GOOGLE_CX)" }).min(1),
  org: z.string({ required_error: "is required" }).trim().min(1, "must not be empty"),
  emailFormat: z
    .string()
    .refine(isTemplate, "needs at least one of {first} {last} {f} {l}")
    .optional(),
  emailPolicy: z.enum(["single", "multi"]).default("multi"),
  output: z.string().min(1).default("employees.json"),
  metrics: z.string().min(1).default("metrics.json"),
  csv: z.string().min(1).optional(),
  roles: z.string().min(1).default("en"),
  maxPages: numeric(z.coerce.number().int().min(1).max(MAX_PAGES)).default(String(MAX_PAGES)),
  flushEvery: numeric(z.coerce.number().int().min(0)).default("25"),
  delayMs: numeric(z.coerce.number().int().min(0)).default("1000"),
});

export type HarvestOptions = z.infer<typeof OptionsSchema>;

export type CliCommand = { kind: "help" } | { kind: "run"; options: HarvestOptions };

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid arguments:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

function isFlag(name: string): name is Flag {
  return Object.hasOwn(FLAGS, name);
}

function flagFor(key: PropertyKey | undefined): string {
  const entry = Object.entries(FLAGS).find(([, k]) => k === key);
  return entry ? `--${entry[0]}` : String(key ?? "arguments");
}

/** `--flag value` and `--flag=value` pairs; anything else is an error. */
export function readFlags(argv: string[]): { help: boolean; values: Partial<Record<OptionKey, string>> } {
  const values: Partial<Record<OptionKey, string>> = {};
  const issues: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      issues.push(`unexpected argument "${arg}"`);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    if (!isFlag(name)) {
      issues.push(`unknown option --${name}`);
      continue;
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
      value = argv[++i];
    }
    if (value === undefined) {
      issues.push(`--${name} needs a value`);
      continue;
    }
    values[FLAGS[name]] = value;
  }

  if (issues.length && !help) throw new ConfigError(issues);
  return { help, values };
}

function fromEnv(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
  for (const n of names) {
    const v = env[n]?.trim();
    if (v) return v;
  }
  return undefined;
}

export function parseCli(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const { help, values } = readFlags(argv);
  if (help) return { kind: "help" };

  const parsed = OptionsSchema.safeParse({
    ...values,
    apiKey: values.apiKey ?? fromEnv(env, "GOOGLE_API_KEY"),
    cseId: values.cseId ?? fromEnv(env, "GOOGLE_CX", "Google_CX"), // tolerate both
    delayMs: values.delayMs ?? fromEnv(env, "SEARCH_PAGE_DELAY_MS"),
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${flagFor(i.path[0])} ${i.message}`));
  }
  return { kind: "run", options: parsed.data };
}
