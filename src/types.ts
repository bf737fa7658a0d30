// CHANGE: Define typed values flowing through the download pipeline.
// WHY: Every value is request-scoped; nothing here outlives one invocation.

/**
 * JSON-like value type used for upstream API payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRecord = { readonly [key: string]: JsonValue };

export const PLATFORMS = ["chrome", "firefox"] as const;

export type Platform = (typeof PLATFORMS)[number];

/**
 * Identifier string tagged with the platform whose syntax it was checked against.
 */
export interface ExtensionIdentifier {
  readonly value: string;
  readonly platform: Platform;
}

/**
 * One download to perform.
 *
 * @property version - Chrome: spoofed client version; Firefox: addon version to fetch.
 */
export interface DownloadRequest {
  readonly identifier: string;
  readonly platform: Platform;
  readonly version?: string;
}

/**
 * Bytes exactly as served by the vendor endpoint.
 *
 * Invariant: for `chrome` the payload starts with the `Cr24` magic when valid.
 */
export interface RawPackage {
  readonly platform: Platform;
  readonly bytes: Buffer;
}

/**
 * Plain ZIP archive with no vendor header, ready to be written.
 */
export interface NormalizedArchive {
  readonly platform: Platform;
  readonly bytes: Buffer;
  readonly sourceUrl: string;
}

/**
 * Listener for byte-level download progress. `total` is absent without content-length.
 */
export type ProgressListener = (received: number, total?: number) => void;

/**
 * Entry of the AMO versions listing.
 */
export interface FirefoxVersion {
  readonly version: string;
  readonly url?: string;
}

export interface BatchPolicy {
  readonly force: boolean;
  readonly continueOnError: boolean;
}

/**
 * Ordered identifiers plus the policy applied to each of them.
 *
 * @property output - Explicit output path; only valid with a single identifier.
 */
export interface BatchJob {
  readonly identifiers: readonly string[];
  readonly platform: Platform;
  readonly version?: string;
  readonly output?: string;
  readonly policy: BatchPolicy;
}

export interface SavedArchive {
  readonly identifier: string;
  readonly path: string;
  readonly size: number;
  readonly sha256: string;
}

export interface BatchIssue {
  readonly identifier: string;
  readonly reason: string;
}

export interface BatchReport {
  readonly saved: readonly SavedArchive[];
  readonly skipped: readonly BatchIssue[];
  readonly failed: readonly BatchIssue[];
}
