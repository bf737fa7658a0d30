// CHANGE: Report download progress in coarse steps at debug level.
// WHY: Per-chunk callbacks would flood verbose output.

import { debug } from "../logger.js";
import type { ProgressListener } from "../types.js";

/**
 * Progress listener that logs at DEBUG each time another `stepPercent` of the body arrives.
 *
 * Without a known total it logs nothing; the fetcher's own debug line reports the final size.
 *
 * @param label - Prefix naming the download.
 * @param stepPercent - Reporting granularity.
 */
export function createProgressLogger(label: string, stepPercent = 25): ProgressListener {
  let nextMark = stepPercent;
  return (received, total) => {
    if (!total || total <= 0) {
      return;
    }
    const percent = Math.floor((received / total) * 100);
    if (percent < nextMark) {
      return;
    }
    debug(`${label}: ${Math.min(percent, 100)}% (${received}/${total} bytes)`);
    while (nextMark <= percent) {
      nextMark += stepPercent;
    }
  };
}
