import type { Writable } from "node:stream";
import { loadConfig } from "../config";
import { createApp, type AppOverrides } from "../core/app";
import {
  runCancel,
  runDeleteModel,
  runExport,
  runExtractQueue,
  runFetch,
  runIngest,
  runModels,
  runRetry,
  runShow,
  runStatus,
  runTasks,
  runUpdate,
  runVerifyStore,
  runWork,
  type CommandContext,
} from "../core/commands";
import {
  InvalidTransitionError,
  NotFoundError,
  StoreCorruptionError,
  UsageError,
  errorMessage,
} from "../errors";
import type { ExportFormat } from "../export";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import type { ExtractionMode, TaskKind, VerifyStatus } from "../types";

export type CommandName =
  | "ingest"
  | "fetch"
  | "extract"
  | "work"
  | "tasks"
  | "retry"
  | "cancel"
  | "models"
  | "show"
  | "update"
  | "delete-model"
  | "export"
  | "verify-store"
  | "status";

const COMMANDS: readonly CommandName[] = [
  "ingest",
  "fetch",
  "extract",
  "work",
  "tasks",
  "retry",
  "cancel",
  "models",
  "show",
  "update",
  "delete-model",
  "export",
  "verify-store",
  "status",
];

export interface ParsedCliArgs {
  command: CommandName;
  positionals: string[];
  configPath?: string;
  site?: string;
  force: boolean;
  mode?: ExtractionMode;
  kind?: TaskKind;
  status?: string;
  q?: string;
  page?: number;
  sets: string[];
  apps?: string;
  verify?: boolean;
  reviewer?: string;
  notes?: string;
  format: ExportFormat;
  listPath?: string;
  preserveOrder: boolean;
  outPath?: string;
}

export interface CliIo {
  env?: NodeJS.ProcessEnv;
  out?: Writable;
  overrides?: AppOverrides;
}

export const EXIT_NOT_FOUND = 2;
export const EXIT_INVALID_TRANSITION = 3;

const HELP_TEXT = `
Usage:
  datasheet-review <command> [options]

Commands:
  ingest <files...>                  Store local PDF files
  fetch <urls...> [--site <name>]    Queue downloads (processed by "work")
  extract <hashes...> [--force] [--mode sync|batch|background]
  work                               Recover, run both queues until idle, stop
  tasks [--kind download|extraction] [--status <s>]
  retry <download|extraction> <id>
  cancel <download|extraction> <id>
  models [--status unverified|verified] [--q <text>] [--page <n>]
  show <model>
  update <model> [--set key=value]... [--apps a,b] [--verify|--unverify]
                 [--reviewer <name>] [--notes <text>]
  delete-model <model>
  export [--status <s>] [--format csv|json] [--list <file>] [--preserve-order] [--out <file>]
  verify-store                       Report committed files whose bytes are missing
  status

Options:
  --config <path>  Optional path to JSON config file
  -h, --help       Show this help
`;

const VALUE_OPTIONS = new Set([
  "--config",
  "--site",
  "--mode",
  "--kind",
  "--status",
  "--q",
  "--page",
  "--set",
  "--apps",
  "--reviewer",
  "--notes",
  "--format",
  "--list",
  "--out",
]);

const FLAG_OPTIONS = new Set(["--force", "--verify", "--unverify", "--preserve-order"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function parseChoice<T extends string>(option: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new UsageError(`${option} must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

function parsePositiveInt(label: string, raw: string | undefined): number {
  const parsed = raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new UsageError(`${label} must be a positive integer, got "${raw ?? ""}"`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const flags = new Set<string>();
  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index];
    if (VALUE_OPTIONS.has(token)) {
      const value = argv[index + 1];
      if (value === undefined) {
        throw new UsageError(`${token} expects a value`);
      }
      values.set(token, [...(values.get(token) ?? []), value]);
      index += 1;
    } else if (FLAG_OPTIONS.has(token)) {
      flags.add(token);
    } else if (token.startsWith("--")) {
      throw new UsageError(`unknown option ${token}`);
    } else {
      positionals.push(token);
    }
  }

  const last = (option: string): string | undefined => values.get(option)?.at(-1);

  if (flags.has("--verify") && flags.has("--unverify")) {
    throw new UsageError("--verify and --unverify cannot be combined");
  }
  let verify: boolean | undefined;
  if (flags.has("--verify")) {
    verify = true;
  } else if (flags.has("--unverify")) {
    verify = false;
  }

  const pageRaw = last("--page");
  return {
    command,
    positionals,
    configPath: last("--config"),
    site: last("--site"),
    force: flags.has("--force"),
    mode: parseChoice("--mode", last("--mode"), ["sync", "batch", "background"]),
    kind: parseChoice("--kind", last("--kind"), ["download", "extraction"]),
    status: last("--status"),
    q: last("--q"),
    page: pageRaw === undefined ? undefined : parsePositiveInt("--page", pageRaw),
    sets: values.get("--set") ?? [],
    apps: last("--apps"),
    verify,
    reviewer: last("--reviewer"),
    notes: last("--notes"),
    format: parseChoice("--format", last("--format"), ["csv", "json"]) ?? "csv",
    listPath: last("--list"),
    preserveOrder: flags.has("--preserve-order"),
    outPath: last("--out"),
  };
}

function requirePositionals(parsed: ParsedCliArgs, count: number, usage: string): string[] {
  if (parsed.positionals.length < count) {
    throw new UsageError(`usage: datasheet-review ${usage}`);
  }
  return parsed.positionals;
}

function parseTaskTarget(parsed: ParsedCliArgs): { kind: TaskKind; taskId: number } {
  const [kindRaw, idRaw] = requirePositionals(parsed, 2, `${parsed.command} <download|extraction> <id>`);
  const kind = parseChoice<TaskKind>("task kind", kindRaw, ["download", "extraction"]);
  if (!kind) {
    throw new UsageError("task kind is required");
  }
  return { kind, taskId: parsePositiveInt("task id", idRaw) };
}

function parseVerifyStatus(raw: string | undefined): VerifyStatus | undefined {
  return parseChoice<VerifyStatus>("--status", raw, ["unverified", "verified"]);
}

async function dispatch(ctx: CommandContext, parsed: ParsedCliArgs): Promise<number> {
  switch (parsed.command) {
    case "ingest":
      await runIngest(ctx, requirePositionals(parsed, 1, "ingest <files...>"));
      return 0;
    case "fetch":
      await runFetch(ctx, requirePositionals(parsed, 1, "fetch <urls...>"), parsed.site);
      return 0;
    case "extract":
      await runExtractQueue(ctx, requirePositionals(parsed, 1, "extract <hashes...>"), parsed.force, parsed.mode);
      return 0;
    case "work":
      await runWork(ctx);
      return 0;
    case "tasks":
      await runTasks(ctx, { kind: parsed.kind, status: parsed.status });
      return 0;
    case "retry": {
      const { kind, taskId } = parseTaskTarget(parsed);
      await runRetry(ctx, kind, taskId);
      return 0;
    }
    case "cancel": {
      const { kind, taskId } = parseTaskTarget(parsed);
      await runCancel(ctx, kind, taskId);
      return 0;
    }
    case "models":
      await runModels(ctx, { status: parseVerifyStatus(parsed.status), q: parsed.q, page: parsed.page });
      return 0;
    case "show": {
      const [modelNumber] = requirePositionals(parsed, 1, "show <model>");
      await runShow(ctx, modelNumber);
      return 0;
    }
    case "update": {
      const [modelNumber] = requirePositionals(parsed, 1, "update <model> [options]");
      await runUpdate(ctx, modelNumber, {
        sets: parsed.sets,
        apps: parsed.apps,
        verify: parsed.verify,
        reviewer: parsed.reviewer,
        notes: parsed.notes,
      });
      return 0;
    }
    case "delete-model": {
      const [modelNumber] = requirePositionals(parsed, 1, "delete-model <model>");
      await runDeleteModel(ctx, modelNumber);
      return 0;
    }
    case "export":
      await runExport(ctx, {
        status: parseVerifyStatus(parsed.status),
        format: parsed.format,
        listPath: parsed.listPath,
        preserveOrder: parsed.preserveOrder,
        outPath: parsed.outPath,
      });
      return 0;
    case "verify-store":
      return (await runVerifyStore(ctx)) > 0 ? 1 : 0;
    case "status":
      await runStatus(ctx);
      return 0;
  }
}

/** Maps a command failure to its exit code and prints the one-line reason. */
export function exitCodeFor(error: unknown, logger: Logger): number {
  if (error instanceof NotFoundError) {
    console.error(error.message);
    return EXIT_NOT_FOUND;
  }
  if (error instanceof InvalidTransitionError) {
    console.error(`invalid transition: ${error.message}`);
    return EXIT_INVALID_TRANSITION;
  }
  if (error instanceof UsageError) {
    console.error(`${error.message}\n\n${HELP_TEXT.trim()}`);
    return 1;
  }
  if (error instanceof StoreCorruptionError) {
    logger.error("data_integrity_alarm", { fileHash: error.fileHash, localPath: error.localPath });
  }
  console.error(`fatal: ${errorMessage(error)}`);
  return 1;
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${HELP_TEXT.trim()}`);
      return 1;
    }
    throw error;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const env = io.env ?? process.env;
  const config = loadConfig(parsed.configPath, env);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(env.LOG_LEVEL) });
  const app = createApp(config, runId, logger, metrics, io.overrides);
  const context: CommandContext = {
    runId,
    config,
    app,
    logger: logger.child(parsed.command),
    metrics,
    out: io.out ?? process.stdout,
  };

  logger.info("command_start", { command: parsed.command, args: parsed.positionals.length });

  try {
    const exitCode = await dispatch(context, parsed);
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } catch (error) {
    return exitCodeFor(error, logger);
  } finally {
    await app.close();
    metrics.printSummary();
  }
}
