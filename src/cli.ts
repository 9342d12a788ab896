import { CliCommand, ConfigError, HarvestOptions, USAGE, parseCli } from "./config";
import { CseClient } from "./googleSearch";
import { Harvester } from "./harvest";
import { Logger, consoleLogger } from "./logger";
import { loadRoleTerms } from "./roles";
import { SearchProvider } from "./types";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  signal?: AbortSignal;
  print?: (text: string) => void;
  createProvider?: (options: HarvestOptions, logger: Logger) => SearchProvider;
};

function defaultProvider(options: HarvestOptions, logger: Logger): SearchProvider {
  return new CseClient({
    apiKey: options.apiKey,
    cx: options.cseId,
    requestDelayMs: options.delayMs,
    logger,
  });
}

/** Runs one harvest from command-line arguments and resolves to an exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? consoleLogger;
  const print = deps.print ?? ((text: string) => console.log(text));

  let command: CliCommand;
  try {
    command = parseCli(argv, deps.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error(err.message);
    print(USAGE);
    return EXIT_USAGE;
  }

  if (command.kind === "help") {
    print(USAGE);
    return EXIT_OK;
  }

  const { options } = command;
  const roleTerms = await loadRoleTerms(options.roles);
  const provider = (deps.createProvider ?? defaultProvider)(options, logger);

  const harvester = new Harvester(
    {
      organization: options.org,
      roleTerms,
      emailFormat: options.emailFormat,
      emailPolicy: options.emailPolicy,
      outputFile: options.output,
      metricsFile: options.metrics,
      csvFile: options.csv,
      maxPages: options.maxPages,
      flushEvery: options.flushEvery,
    },
    provider,
    { logger }
  );

  const { state, metrics } = await harvester.run(deps.signal);

  if (state === "interrupted") logger.warn("\n[!] Interrupted by user");
  logger.success(
    `\n[✓] ${metrics.profiles_found} profiles, ${metrics.api_requests} API requests, ${metrics.execution_time_seconds}s`
  );
  logger.info(`Profiles: ${options.output}\nMetrics : ${options.metrics}`);

  return state === "interrupted" ? EXIT_INTERRUPTED : EXIT_OK;
}
