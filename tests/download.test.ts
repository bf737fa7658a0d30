// CHANGE: Exercise the per-platform download pipeline with mocked HTTP.
// WHY: Chrome and Firefox differ in URL resolution, timeouts and normalization.

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const fetchBytesMock = vi.hoisted(() => vi.fn());
const resolveChromeVersionMock = vi.hoisted(() => vi.fn());
const resolveFirefoxDownloadUrlMock = vi.hoisted(() => vi.fn());

vi.mock("../src/utils/http.js", () => ({
  fetchBytes: fetchBytesMock
}));

vi.mock("../src/resolver.js", () => ({
  resolveChromeVersion: resolveChromeVersionMock,
  resolveFirefoxDownloadUrl: resolveFirefoxDownloadUrlMock
}));

import { downloadExtension } from "../src/download.js";
import { HttpStatusError, NotFoundError, PackageFormatError } from "../src/errors.js";

const CHROME_ID = "aapbdbdomjkkjkaonfhkkikfgjllcleb";
const archive = Buffer.from("PK\u0003\u0004archive", "latin1");

function crxOf(payload: Buffer): Buffer {
  const preamble = Buffer.alloc(12);
  preamble.write("Cr24", 0, "latin1");
  preamble.writeUInt32LE(3, 4);
  preamble.writeUInt32LE(2, 8);
  return Buffer.concat([preamble, Buffer.from([0xaa, 0xbb]), payload]);
}

describe("downloadExtension", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fetchBytesMock.mockReset();
    resolveChromeVersionMock.mockReset();
    resolveFirefoxDownloadUrlMock.mockReset();
    vi.restoreAllMocks();
  });

  it("fetches a CRX and strips its header", async () => {
    resolveChromeVersionMock.mockResolvedValueOnce("120.0.6099.71");
    fetchBytesMock.mockResolvedValueOnce({ data: crxOf(archive), headers: {}, status: 200 });

    const result = await downloadExtension({ identifier: CHROME_ID, platform: "chrome" });

    expect(result.platform).toBe("chrome");
    expect(result.bytes).toEqual(archive);
    expect(result.sourceUrl).toBe(
      "https://clients2.google.com/service/update2/crx?response=redirect&prodversion=120.0.6099.71" +
        `&acceptformat=crx2,crx3&x=id%3D${CHROME_ID}%26installsource%3Dondemand%26uc`
    );
    expect(resolveChromeVersionMock).toHaveBeenCalledWith(undefined);
    expect(fetchBytesMock).toHaveBeenCalledWith(
      result.sourceUrl,
      expect.objectContaining({
        timeout: 30000,
        retry: expect.objectContaining({ attempts: 3, baseDelayMs: 1000 })
      })
    );
  });

  it("passes an explicit version to the resolver", async () => {
    resolveChromeVersionMock.mockResolvedValueOnce("118.0.0.0");
    fetchBytesMock.mockResolvedValueOnce({ data: crxOf(archive), headers: {}, status: 200 });

    await downloadExtension({ identifier: CHROME_ID, platform: "chrome", version: "118.0.0.0" });

    expect(resolveChromeVersionMock).toHaveBeenCalledWith("118.0.0.0");
  });

  it.each([404, 204])("reports HTTP %i from the update service as not found", async status => {
    resolveChromeVersionMock.mockResolvedValueOnce("120.0.6099.71");
    fetchBytesMock.mockRejectedValueOnce(new HttpStatusError(status, "https://clients2.google.com/service/update2/crx"));

    const outcome = downloadExtension({ identifier: CHROME_ID, platform: "chrome" });
    await expect(outcome).rejects.toBeInstanceOf(NotFoundError);
    await expect(outcome).rejects.toThrow(`Extension not found or invalid ID: ${CHROME_ID}`);
  });

  it("keeps other statuses as they are", async () => {
    resolveChromeVersionMock.mockResolvedValueOnce("120.0.6099.71");
    const serverError = new HttpStatusError(503, "https://clients2.google.com/service/update2/crx");
    fetchBytesMock.mockRejectedValueOnce(serverError);

    await expect(downloadExtension({ identifier: CHROME_ID, platform: "chrome" })).rejects.toBe(serverError);
  });

  it("rejects a payload that is not a CRX", async () => {
    resolveChromeVersionMock.mockResolvedValueOnce("120.0.6099.71");
    fetchBytesMock.mockResolvedValueOnce({ data: Buffer.from("<html>not a package</html>"), headers: {}, status: 200 });

    await expect(downloadExtension({ identifier: CHROME_ID, platform: "chrome" })).rejects.toBeInstanceOf(
      PackageFormatError
    );
  });

  it("saves Firefox packages verbatim", async () => {
    const xpi = Buffer.from("PK\u0003\u0004xpi-body", "latin1");
    resolveFirefoxDownloadUrlMock.mockResolvedValueOnce("https://example.com/ublock.xpi");
    fetchBytesMock.mockResolvedValueOnce({ data: xpi, headers: {}, status: 200 });

    const result = await downloadExtension({ identifier: "ublock-origin", platform: "firefox", version: "1.2.0" });

    expect(result).toEqual({ platform: "firefox", bytes: xpi, sourceUrl: "https://example.com/ublock.xpi" });
    expect(resolveFirefoxDownloadUrlMock).toHaveBeenCalledWith("ublock-origin", "1.2.0");
    expect(fetchBytesMock).toHaveBeenCalledWith(
      "https://example.com/ublock.xpi",
      expect.objectContaining({
        timeout: 60000,
        retry: expect.objectContaining({ attempts: 3, baseDelayMs: 1000, label: "XPI download" })
      })
    );
    expect(resolveChromeVersionMock).not.toHaveBeenCalled();
  });
});
