import { inferEmails } from "./emails";
import { PAGE_SIZE } from "./googleSearch";
import { Logger, consoleLogger, errorMessage } from "./logger";
import { cleanName, isNoiseName } from "./names";
import { saveCsv, saveJson } from "./save";
import {
  EmailPolicy,
  Employee,
  HarvestState,
  HarvestSummary,
  Metrics,
  SearchItem,
  SearchProvider,
} from "./types";
import { roundTo, singleLine } from "./utils";

export const MAX_PAGES = 10;

export type HarvesterConfig = {
  organization: string;
  /** Ordered; "" queries the organization name alone. */
  roleTerms: string[];
  emailFormat?: string;
  emailPolicy?: EmailPolicy;
  outputFile: string;
  metricsFile: string;
  csvFile?: string;
  maxPages?: number;
  /** Rewrite the output file every N new profiles; 0 only writes at start and end. */
  flushEvery?: number;
};

export type HarvesterDeps = {
  logger?: Logger;
  clock?: () => number;
};

export function buildQuery(organization: string, role: string): string {
  return `"${organization}" ${role}`.trim();
}

export class Harvester {
  private readonly found = new Map<string, Employee>();
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly maxPages: number;
  private readonly flushEvery: number;
  private status: HarvestState = "idle";
  private startedAt = 0;
  private queries = 0;
  private unsaved = 0;
  private final?: Metrics;

  constructor(
    private readonly config: HarvesterConfig,
    private readonly provider: SearchProvider,
    deps: HarvesterDeps = {}
  ) {
    this.logger = deps.logger ?? consoleLogger;
    this.clock = deps.clock ?? Date.now;
    this.maxPages = Math.min(Math.max(config.maxPages ?? MAX_PAGES, 1), MAX_PAGES);
    this.flushEvery = Math.max(config.flushEvery ?? 25, 0);
  }

  get state(): HarvestState {
    return this.status;
  }

  get employees(): Employee[] {
    return [...this.found.values()];
  }

  get size(): number {
    return this.found.size;
  }

  /**
   * Turns one search result into an employee keyed by its link. Returns null
   * for a link already seen, an empty link, or a noisy title.
   */
  add(item: SearchItem): Employee | null {
    const link = item.link;
    if (!link || this.found.has(link)) return null;

    const name = cleanName(item.title);
    if (isNoiseName(name)) return null;

    const employee: Employee = {
      name,
      profile_url: link,
      snippet: singleLine(item.snippet),
      inferred_emails: inferEmails(name, this.config.emailFormat, this.config.emailPolicy),
    };
    this.found.set(link, employee);
    return employee;
  }

  metrics(): Metrics {
    if (this.final) return this.final;
    return {
      organization: this.config.organization,
      timestamp: new Date(this.startedAt).toISOString(),
      api_requests: this.provider.requests,
      profiles_found: this.found.size,
      execution_time_seconds: roundTo((this.clock() - this.startedAt) / 1000, 2),
      queries: this.queries,
      state: this.status,
    };
  }

  /**
   * Walks every role term, up to `maxPages` pages each. Results and metrics
   * are written when the run ends, however it ends; an error that stopped the
   * run is rethrown after that.
   */
  async run(signal?: AbortSignal): Promise<HarvestSummary> {
    if (this.status !== "idle") throw new Error(`Harvester already ${this.status}`);

    this.status = "running";
    this.startedAt = this.clock();

    const { organization, emailFormat, emailPolicy = "multi" } = this.config;
    this.logger.info(`[*] Target organization: ${organization}`);
    this.logger.info(
      `[*] Email inference enabled: ${emailFormat ? `Yes (${emailFormat}, ${emailPolicy})` : "No"}`
    );

    let failed = false;
    let failure: unknown;
    try {
      await this.saveResults();
      await this.harvest(signal);
    } catch (err) {
      failed = true;
      failure = err;
      this.logger.error(`[!] Harvest stopped: ${errorMessage(err)}`);
    }

    this.status = failed ? "failed" : signal?.aborted ? "interrupted" : "completed";
    const writeErrors = await this.finalize();
    if (failed) throw failure;
    if (writeErrors.length) throw writeErrors[0];

    return { state: this.status, employees: this.employees, metrics: this.metrics() };
  }

  private async harvest(signal?: AbortSignal) {
    for (const role of this.config.roleTerms) {
      if (signal?.aborted) return;

      const query = buildQuery(this.config.organization, role);
      this.queries++;
      this.logger.info(`\n[>] Query: ${query}`);

      for (let page = 0; page < this.maxPages; page++) {
        if (signal?.aborted) return;

        const outcome = await this.provider.search(query, page * PAGE_SIZE + 1, signal);
        if (outcome.kind === "rate-limited") {
          this.logger.warn(`    rate limited on page ${page + 1}, moving on`);
          break;
        }
        if (outcome.kind === "failed" || outcome.items.length === 0) break;

        for (const item of outcome.items) {
          const employee = this.add(item);
          if (!employee) continue;

          const emails = employee.inferred_emails.length ? employee.inferred_emails.join(", ") : "N/A";
          this.logger.success(`    + ${employee.name} -> [${emails}]`);
          await this.noteInsert();
        }
      }
    }
  }

  private async noteInsert() {
    this.unsaved++;
    if (this.flushEvery > 0 && this.unsaved >= this.flushEvery) {
      await this.saveResults();
    }
  }

  private async saveResults() {
    await saveJson(this.employees, this.config.outputFile);
    this.unsaved = 0;
  }

  /** Writes every output it can; a failed write does not skip the others. */
  private async finalize(): Promise<unknown[]> {
    const errors: unknown[] = [];
    const attempt = async (file: string, write: () => Promise<unknown>) => {
      try {
        await write();
      } catch (err) {
        errors.push(err);
        this.logger.error(`[!] Could not write ${file}: ${errorMessage(err)}`);
      }
    };

    const { outputFile, csvFile, metricsFile } = this.config;
    await attempt(outputFile, () => this.saveResults());
    if (csvFile) await attempt(csvFile, () => saveCsv(this.employees, csvFile));

    const metrics = this.metrics();
    this.final = metrics;
    await attempt(metricsFile, () => saveJson(metrics, metricsFile));
    return errors;
  }
}
