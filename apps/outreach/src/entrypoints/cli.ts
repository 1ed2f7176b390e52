#!/usr/bin/env tsx
/**
 * Command-line entrypoint.
 *
 *   outreach (--csv <path> | --pdf <path>) [--env-file <path>] [--dry-run] [--verify]
 *
 * Exit codes: 0 when the batch ran to completion (individual recipients may
 * still have failed), 1 on a startup error, 2 on a usage error, 130 when the
 * run was interrupted.
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { loadConfig, loadEnvFile } from "@outreach/config";
import { toOutreachSettings } from "../config.js";
import { OutreachError, ConfigurationError, UsageError } from "../errors.js";
import { log, logFailure, setLogLevel } from "../logger.js";
import { runOutreach } from "../outreach.js";
import type { RecipientSource } from "../recipients/types.js";

export const EXIT_OK = 0;
export const EXIT_STARTUP_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;
export const EXIT_INTERRUPTED = 130;

export const USAGE = `Usage: outreach (--csv <path> | --pdf <path>) [options]

Send a personalized message, with the configured attachment, to every
recipient in a CSV file or a PDF table.

Recipient source (exactly one):
  --csv <path>        CSV with name, company and email columns
  --pdf <path>        PDF containing a recipient table

Options:
  --env-file <path>   Environment file to load (default: .env)
  --dry-run           Use the mock transport; nothing is sent
  --verify            Check the SMTP connection and credentials before sending
  -h, --help          Show this help`;

export interface CliOptions {
  source: RecipientSource;
  envFile: string;
  dryRun: boolean;
  verify: boolean;
}

export type CliCommand = { help: true } | ({ help: false } & CliOptions);

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      csv: { type: "string" },
      pdf: { type: "string" },
      "env-file": { type: "string", default: ".env" },
      "dry-run": { type: "boolean", default: false },
      verify: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
    strict: true,
  });
}

/**
 * Parse command-line arguments (without the node and script paths).
 *
 * @throws UsageError on unknown options, missing values, or when the number
 * of recipient sources given is not exactly one
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  const { values } = parsed;
  if (values.help) {
    return { help: true };
  }

  const { csv, pdf } = values;
  if (csv !== undefined && pdf !== undefined) {
    throw new UsageError("Options --csv and --pdf are mutually exclusive");
  }

  let source: RecipientSource;
  if (csv !== undefined) {
    source = { kind: "csv", path: csv };
  } else if (pdf !== undefined) {
    source = { kind: "pdf", path: pdf };
  } else {
    throw new UsageError("One of --csv or --pdf is required");
  }

  if (!source.path.trim()) {
    throw new UsageError(`--${source.kind} needs a file path`);
  }

  return {
    help: false,
    source,
    envFile: values["env-file"],
    dryRun: values["dry-run"],
    verify: values.verify,
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`error: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE_ERROR;
    }
    throw error;
  }

  if (command.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    log.cli.warn({}, "interrupt received, finishing in-flight sends (press Ctrl+C again to abort)");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    loadEnvFile(command.envFile);
    const config = loadConfig();
    if (config.LOG_LEVEL) {
      setLogLevel(config.LOG_LEVEL);
    }

    const report = await runOutreach(toOutreachSettings(config), {
      source: command.source,
      dryRun: command.dryRun,
      verify: command.verify,
      signal: controller.signal,
    });

    console.log(report.text);
    return controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_OK;
  } catch (error) {
    if (error instanceof OutreachError || error instanceof ConfigurationError) {
      log.cli.error({ error: error.message, errorName: error.name }, "startup failed");
      console.error(`error: ${error.message}`);
      return EXIT_STARTUP_ERROR;
    }

    logFailure("cli", "run crashed", error, { source: command.source.path });
    return EXIT_STARTUP_ERROR;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logFailure("cli", "crashed", error, {});
      process.exitCode = EXIT_STARTUP_ERROR;
    }
  );
}
