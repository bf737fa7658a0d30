// CHANGE: Build CRX update and AMO API URLs.
// WHY: Identifiers are path-encoded so GUID braces survive the request.

import { ENDPOINTS } from "../config.js";

/**
 * Replace `{name}` placeholders; values are inserted verbatim.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}

/**
 * CRX update-service URL for one extension.
 *
 * @param extensionId - Validated 32-character Chrome id.
 * @param chromeVersion - Client version the request claims to come from.
 */
export function buildCrxUrl(extensionId: string, chromeVersion: string): string {
  return fillTemplate(ENDPOINTS.CRX, {
    version: encodeURIComponent(chromeVersion),
    id: extensionId
  });
}

export function amoAddonUrl(addonId: string): string {
  return `${ENDPOINTS.AMO_API}/addon/${encodeURIComponent(addonId)}/`;
}

export function amoVersionsUrl(addonId: string): string {
  return `${ENDPOINTS.AMO_API}/addon/${encodeURIComponent(addonId)}/versions/`;
}
