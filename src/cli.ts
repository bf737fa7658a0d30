// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Exit codes and flag combinations can be checked without spawning a process.

import { Command, Option } from "commander";
import { assertBatchJob, parseIdentifierSource, runBatch } from "./batch.js";
import { InputError } from "./errors.js";
import { error as logError, info, setLogLevel, warn } from "./logger.js";
import { ArchiveSink } from "./output.js";
import { listFirefoxVersions } from "./resolver.js";
import { PLATFORMS, type BatchReport, type Platform } from "./types.js";
import { describeIdFormat, validateExtensionId } from "./validator.js";

export const CLI_VERSION = "1.0.0";

/**
 * Parsed command-line flags as commander hands them to the action.
 */
export interface CliOptions {
  readonly output?: string;
  readonly version?: string;
  readonly platform: Platform;
  readonly verbose?: boolean;
  readonly force?: boolean;
  readonly batch?: string;
  readonly continueOnError?: boolean;
  readonly listVersions?: boolean;
}

/**
 * Identifiers from --batch, or the single positional argument.
 *
 * @throws InputError when neither is given or the batch file is missing.
 */
export async function collectIdentifiers(extensionId: string | undefined, options: CliOptions): Promise<string[]> {
  if (options.batch) {
    return parseIdentifierSource(options.batch);
  }
  const trimmed = extensionId?.trim();
  if (trimmed) {
    return [trimmed];
  }
  throw new InputError("Must provide extension_id, --batch, or --list-versions.");
}

/**
 * List-versions mode: print the version list of one Firefox addon, download nothing.
 */
export async function listVersionsAction(identifiers: readonly string[], platform: Platform): Promise<void> {
  if (identifiers.length !== 1) {
    throw new InputError("--list-versions requires exactly one ID.");
  }
  const [addonId] = identifiers;
  if (platform !== "firefox") {
    console.log("Listing versions is not supported for Chrome; specify version manually.");
    return;
  }
  if (!validateExtensionId(addonId, "firefox")) {
    throw new InputError(`Invalid firefox extension ID format for ${addonId}. ${describeIdFormat("firefox")}`);
  }
  const versions = await listFirefoxVersions(addonId);
  console.log(`Available versions for ${addonId}: ${versions.map(entry => entry.version).join(", ")}`);
}

function summarise(report: BatchReport): void {
  const summary = `Done: ${report.saved.length} saved, ${report.skipped.length} skipped, ${report.failed.length} failed.`;
  if (report.skipped.length > 0 || report.failed.length > 0) {
    warn(summary);
  } else {
    info(summary);
  }
}

/**
 * Download mode entry point (also dispatches list-versions).
 *
 * @param extensionId - Positional identifier, if any.
 * @param options - Parsed flags.
 * @param sink - Archive destination.
 */
export async function downloadAction(
  extensionId: string | undefined,
  options: CliOptions,
  sink: Pick<ArchiveSink, "exists" | "write"> = new ArchiveSink()
): Promise<BatchReport | undefined> {
  if (options.verbose) {
    setLogLevel("debug");
  }
  const identifiers = await collectIdentifiers(extensionId, options);
  if (options.listVersions) {
    await listVersionsAction(identifiers, options.platform);
    return undefined;
  }
  const job = {
    identifiers,
    platform: options.platform,
    version: options.version,
    output: options.output,
    policy: {
      force: options.force ?? false,
      continueOnError: options.continueOnError ?? false
    }
  };
  assertBatchJob(job);
  const report = await runBatch(job, sink);
  summarise(report);
  return report;
}

/**
 * Construct commander program with configured arguments and options.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("extension-fetcher")
    .description("Download Chrome or Firefox extensions by ID and save them as plain ZIP archives")
    .version(CLI_VERSION, "-V, --cli-version", "output the tool version")
    .argument("[extension_id]", "Chrome: 32 lowercase alphanumerics; Firefox: GUID or slug (optional with --batch)")
    .option("-o, --output <path>", "output ZIP file path (default: {extension_id}.zip)")
    .option("-v, --version <version>", "Chrome client version, or Firefox addon version to fetch (default: latest)")
    .addOption(new Option("--platform <platform>", "platform to download from").choices(PLATFORMS).default("chrome"))
    .option("--verbose", "enable verbose logging")
    .option("-f, --force", "overwrite output file if it exists")
    .option("--batch <source>", "comma-separated IDs, or a file with one ID per line")
    .option("--continue-on-error", "skip identifiers that fail instead of aborting")
    .option("--list-versions", "list available versions of a Firefox addon and exit")
    .action(async (extensionId: string | undefined, options: CliOptions) => {
      await downloadAction(extensionId, options);
    });
  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trimEnd())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
