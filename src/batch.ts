// CHANGE: Expand batch input and run the per-identifier pipeline in order.
// WHY: Each identifier completes (saved, skipped or aborting) before the next one starts.

import fs from "fs-extra";
import { downloadExtension } from "./download.js";
import { BatchAbortedError, InputError, OutputExistsError, describeError } from "./errors.js";
import { debug, error as logError, info, warn } from "./logger.js";
import { type ArchiveSink, resolveOutputPath } from "./output.js";
import type { BatchIssue, BatchJob, BatchReport, SavedArchive } from "./types.js";
import { createProgressLogger } from "./utils/progress.js";
import { describeIdFormat, toExtensionIdentifier } from "./validator.js";

/**
 * Expand `--batch` input into identifiers.
 *
 * A value containing a comma is a literal list; anything else is a file with one
 * identifier per line. Blank lines and lines starting with `#` are ignored.
 *
 * @param source - Comma list or file path.
 * @throws InputError when the file does not exist.
 */
export async function parseIdentifierSource(source: string): Promise<string[]> {
  if (source.includes(",")) {
    return source
      .split(",")
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);
  }
  if (!(await fs.pathExists(source))) {
    throw new InputError(`Batch file ${source} not found.`);
  }
  const content = await fs.readFile(source, "utf8");
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith("#"));
}

/**
 * Reject an explicit output path shared by several identifiers. An empty job is valid and runs nothing.
 */
export function assertBatchJob(job: BatchJob): void {
  if (job.output && job.identifiers.length > 1) {
    throw new InputError("--output can only be used with a single extension identifier.");
  }
}

/**
 * Run validate → output check → download → write for each identifier.
 *
 * @param job - Identifiers in processing order plus policy flags.
 * @param sink - Destination for archives.
 * @param directory - Directory for derived output names.
 * @returns Saved, skipped and failed identifiers.
 * @throws BatchAbortedError on the first problem when continue-on-error is off.
 */
export async function runBatch(
  job: BatchJob,
  sink: Pick<ArchiveSink, "exists" | "write">,
  directory = process.cwd()
): Promise<BatchReport> {
  const saved: SavedArchive[] = [];
  const skipped: BatchIssue[] = [];
  const failed: BatchIssue[] = [];
  const total = job.identifiers.length;

  const skipOrAbort = (identifier: string, cause: Error): void => {
    if (!job.policy.continueOnError) {
      throw new BatchAbortedError(identifier, cause);
    }
    warn(`${cause.message} Skipping.`);
    skipped.push({ identifier, reason: cause.message });
  };

  for (const [index, identifier] of job.identifiers.entries()) {
    info(`Processing ${index + 1}/${total}: ${identifier}`);

    const tagged = toExtensionIdentifier(identifier, job.platform);
    if (!tagged) {
      skipOrAbort(
        identifier,
        new InputError(`Invalid ${job.platform} extension ID format for ${identifier}. ${describeIdFormat(job.platform)}`)
      );
      continue;
    }

    const target = resolveOutputPath(tagged.value, job.output, directory);
    if (!job.policy.force && (await sink.exists(target))) {
      skipOrAbort(identifier, new OutputExistsError(target));
      continue;
    }

    try {
      const archive = await downloadExtension(
        { identifier: tagged.value, platform: tagged.platform, version: job.version },
        createProgressLogger(`Downloading ${identifier}`)
      );
      const digest = await sink.write(target, archive.bytes);
      saved.push({ identifier, path: target, size: archive.bytes.byteLength, sha256: digest });
      info(`Saved → ${target} (${archive.bytes.byteLength} bytes, sha256 ${digest})`);
    } catch (cause) {
      if (!job.policy.continueOnError) {
        throw new BatchAbortedError(identifier, cause);
      }
      logError(`Failed for ${identifier}: ${describeError(cause)}. Continuing.`);
      failed.push({ identifier, reason: describeError(cause) });
    }
  }

  debug(`Batch finished: saved=${saved.length} skipped=${skipped.length} failed=${failed.length}`);
  return { saved, skipped, failed };
}
