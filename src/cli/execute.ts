import { RetentionAggregator, type RollupCycleReport } from "../aggregator";
import { loadSettings } from "../config/loader";
import { DEFAULT_SETTINGS, redactSettings, type MonitorSettings } from "../config/settings";
import { SitePulseError } from "../errors";
import {
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_OK,
  EXIT_CODE_RUNTIME_FAILURE,
  exitCodeFromRollupStatus,
  type ExitCode,
} from "../exit-codes";
import { createLogger, type Logger } from "../logging";
import { MonitorService, runUntilSignal, waitForShutdownSignal, type SignalSource } from "../monitor";
import { Prober } from "../probe";
import { openStore } from "../storage";
import type { MonitorStore } from "../storage/types";
import { startWorkerServer } from "../worker/server";
import { parseCliCommand, type CliCommand } from "./commands";
import { parseCliFlags, type CliParameters } from "./flags";
import {
  generateBashCompletionScript,
  generatePwshCompletionScript,
  generateZshCompletionScript,
  renderCliHelp,
} from "./help";

const COMPLETION_FLAG_PATTERN = /^--completion=(bash|zsh|pwsh)$/;
const VERSION_FLAGS = new Set(["--version", "-v"]);
const HELP_FLAGS = new Set(["--help", "-h"]);

export interface CliIo {
  version: string;
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  signals: SignalSource;
  clock?: () => Date;
}

interface CommandContext {
  parameters: CliParameters;
  settings: MonitorSettings;
  logger: Logger;
  io: CliIo;
}

type CommandHandler = (context: CommandContext) => Promise<ExitCode>;

function printJson(io: CliIo, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

async function withStore<T>(
  context: CommandContext,
  fn: (store: MonitorStore) => Promise<T>,
): Promise<T> {
  const { settings, logger } = context;
  const store = await openStore(settings.storage, logger.child({ component: "storage" }));

  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

const runMonitor: CommandHandler = async ({ parameters, settings, logger, io }) => {
  const service = new MonitorService({
    settings,
    reloadSettings: () => loadSettings(parameters.configPath, { env: io.env }),
    clock: io.clock,
    logger,
  });

  const report = await runUntilSignal(service, io.signals);
  logger.info("shutdown complete", { ...report });
  return EXIT_CODE_OK;
};

const runRollup: CommandHandler = async (context) => {
  const { settings, logger, io } = context;
  let report: RollupCycleReport | null;

  try {
    report = await withStore(context, (store) =>
      new RetentionAggregator({
        store,
        ...settings.retention,
        clock: io.clock,
        logger: logger.child({ component: "aggregator" }),
      }).runCycle(),
    );
  } catch (error) {
    logger.error("rollup failed", { error });
    return exitCodeFromRollupStatus("failed");
  }

  if (report === null) {
    printJson(io, { status: "locked" });
    return exitCodeFromRollupStatus("locked");
  }

  printJson(io, { status: "completed", ...report });
  return exitCodeFromRollupStatus("completed");
};

const runSummary: CommandHandler = async (context) => {
  const { logger, io } = context;
  const now = io.clock?.() ?? new Date();

  try {
    printJson(io, await withStore(context, (store) => store.recentSummary(now)));
  } catch (error) {
    logger.error("summary failed", { error });
    return EXIT_CODE_RUNTIME_FAILURE;
  }

  return EXIT_CODE_OK;
};

const runWorker: CommandHandler = async ({ parameters, settings, logger, io }) => {
  const listen = parameters.listen ?? settings.worker.listen;
  const concurrency =
    settings.backend.kind === "distributed"
      ? settings.backend.workerConcurrency
      : DEFAULT_SETTINGS.workerConcurrency;

  const server = await startWorkerServer({
    host: listen.host,
    port: listen.port,
    concurrency,
    prober: new Prober({
      ...settings.probe,
      clock: io.clock,
      logger: logger.child({ component: "probe" }),
    }),
    logger: logger.child({ component: "worker" }),
  });

  const signal = await waitForShutdownSignal(io.signals);
  logger.info("worker stopping", { signal, ...server.stats() });
  await server.close();
  return EXIT_CODE_OK;
};

const runValidate: CommandHandler = async ({ settings, io }) => {
  printJson(io, redactSettings(settings));
  return EXIT_CODE_OK;
};

const HANDLERS: Record<Exclude<CliCommand, "help">, CommandHandler> = {
  run: runMonitor,
  rollup: runRollup,
  worker: runWorker,
  summary: runSummary,
  validate: runValidate,
};

function completionScript(shell: string): string {
  switch (shell) {
    case "zsh":
      return generateZshCompletionScript();
    case "pwsh":
      return generatePwshCompletionScript();
    default:
      return generateBashCompletionScript();
  }
}

async function dispatch(args: readonly string[], io: CliIo): Promise<ExitCode> {
  const completion = args.map((token) => COMPLETION_FLAG_PATTERN.exec(token)).find((match) => match);

  if (completion) {
    io.stdout(completionScript(completion[1]));
    return EXIT_CODE_OK;
  }

  if (args.some((token) => VERSION_FLAGS.has(token))) {
    io.stdout(`sitepulse ${io.version}\n`);
    return EXIT_CODE_OK;
  }

  if (args.length === 0 || args.some((token) => HELP_FLAGS.has(token))) {
    io.stdout(renderCliHelp());
    return EXIT_CODE_OK;
  }

  const { command, argv } = parseCliCommand(args);

  if (command === "help") {
    io.stdout(renderCliHelp());
    return EXIT_CODE_OK;
  }

  const parameters = parseCliFlags(argv, { env: io.env });
  const settings = await loadSettings(parameters.configPath, { env: io.env });
  const logger = createLogger({
    level: parameters.logLevel ?? settings.logLevel,
    write: (entry) => {
      io.stderr(`${JSON.stringify(entry)}\n`);
    },
  }).child({ command });

  return HANDLERS[command]({ parameters, settings, logger, io });
}

/**
 * Runs one CLI invocation and resolves with its exit code. Usage and configuration problems are
 * printed to stderr and never thrown.
 */
export async function runCli(args: readonly string[], io: CliIo): Promise<ExitCode> {
  try {
    return await dispatch(args, io);
  } catch (error) {
    if (error instanceof SitePulseError) {
      io.stderr(`${error.message}\n`);
      return error.exitCode;
    }

    io.stderr(`${error instanceof Error ? error.message : `Unexpected error: ${String(error)}`}\n`);
    return EXIT_CODE_INTERNAL_ERROR;
  }
}
