// CHANGE: Resolve output paths and write archives to disk.
// WHY: The target path only ever holds a complete archive; partial writes land in a .part file.

import path from "path";
import fs from "fs-extra";
import sanitize from "sanitize-filename";
import { OUTPUT } from "./config.js";
import { debug } from "./logger.js";
import { sha256 } from "./utils/hashing.js";

/**
 * Output path for one identifier.
 *
 * @param identifier - Validated extension id.
 * @param explicit - Path given with --output.
 * @param directory - Base directory for derived names.
 * @returns `explicit` as given, otherwise `{identifier}.zip` under `directory`.
 */
export function resolveOutputPath(identifier: string, explicit?: string, directory = process.cwd()): string {
  if (explicit) {
    return explicit;
  }
  const safe = sanitize(identifier, { replacement: "_" });
  return path.join(directory, `${safe}${OUTPUT.EXTENSION}`);
}

/**
 * Archive destination backed by the local file system.
 */
export class ArchiveSink {
  /**
   * @param target - Output path.
   * @returns Whether something already occupies it.
   */
  async exists(target: string): Promise<boolean> {
    return fs.pathExists(target);
  }

  /**
   * Write the archive beside the target as `.part`, then move it into place.
   * Parent directories are created as needed.
   *
   * @returns SHA-256 digest of the written bytes.
   */
  async write(target: string, bytes: Buffer): Promise<string> {
    const partial = `${target}${OUTPUT.PARTIAL_SUFFIX}`;
    try {
      await fs.outputFile(partial, bytes);
      await fs.move(partial, target, { overwrite: true });
    } catch (cause) {
      if (await fs.pathExists(partial)) {
        await fs.remove(partial);
      }
      throw cause;
    }
    const digest = sha256(bytes);
    debug(`Wrote ${bytes.byteLength} bytes to ${target} (sha256 ${digest})`);
    return digest;
  }
}
