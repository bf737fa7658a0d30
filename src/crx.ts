// CHANGE: Strip the CRX3 header so Chrome packages become plain ZIP archives.
// WHY: Header lengths pointing past the payload are rejected instead of sliced.

/**
 * CRX3 layout:
 *
 * | offset | size | field                          |
 * | ------ | ---- | ------------------------------ |
 * | 0      | 4    | magic `Cr24`                   |
 * | 4      | 4    | format version (LE)            |
 * | 8      | 4    | header length N (LE)           |
 * | 12     | N    | signed header (protobuf)       |
 * | 12 + N | ...  | ZIP archive                    |
 */

import { PackageFormatError } from "./errors.js";
import { debug } from "./logger.js";

export const CRX_MAGIC = "Cr24";
export const CRX_PREAMBLE_LENGTH = 12;

/**
 * Strip the CRX header and return the embedded archive.
 *
 * The result is a view over the input and is not checked to be a valid ZIP.
 *
 * @param raw - Bytes as served by the update endpoint.
 * @throws PackageFormatError on bad magic, truncated input or a header length past the end.
 */
export function crxToZip(raw: Uint8Array): Buffer {
  const data = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength);
  if (data.subarray(0, CRX_MAGIC.length).toString("latin1") !== CRX_MAGIC) {
    throw new PackageFormatError("invalid package: bad magic");
  }
  if (data.byteLength < CRX_PREAMBLE_LENGTH) {
    throw new PackageFormatError("invalid package: truncated");
  }
  const headerLength = data.readUInt32LE(8);
  const offset = CRX_PREAMBLE_LENGTH + headerLength;
  if (offset > data.byteLength) {
    throw new PackageFormatError("invalid package: corrupt header length");
  }
  debug(`CRX version ${data.readUInt32LE(4)}, header ${headerLength} bytes, archive ${data.byteLength - offset} bytes`);
  return data.subarray(offset);
}
