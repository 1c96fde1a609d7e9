import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { createLogger } from "../logger.js";
import { isRecord, readTrimmedString } from "../utils/json.js";
import type { ProviderPreference, SupportedProvider } from "./types.js";

const log = createLogger("ProviderCatalog");

const CATALOG_FILE_PATH = fileURLToPath(new URL("../../data/supported-providers.json", import.meta.url));

let cachedCatalog: SupportedProvider[] | null = null;

export function getSupportedProviderCatalog(): SupportedProvider[] {
  if (!cachedCatalog) {
    cachedCatalog = readCatalog(CATALOG_FILE_PATH);
  }
  return cachedCatalog.map((entry) => ({ ...entry }));
}

/** Fresh preference records for every supported provider, in catalog order. */
export function getSupportedProviders(): ProviderPreference[] {
  return getSupportedProviderCatalog().map((entry) => ({
    id: entry.id,
    name: entry.name,
    url: entry.url,
    enabled: true,
    models: [],
    wasCustomlyAdded: false,
  }));
}

export function getProviderDisplayName(providerId: string): string {
  const entry = getSupportedProviderCatalog().find((item) => item.id === providerId);
  if (!entry) {
    return "Unknown";
  }
  return entry.displayName ?? entry.name;
}

export function readCatalog(filePath: string): SupportedProvider[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    log.error(`failed to read provider catalog ${filePath}:`, error);
    return [];
  }
  if (!Array.isArray(parsed)) {
    log.error(`provider catalog ${filePath} is not an array`);
    return [];
  }

  const entries: SupportedProvider[] = [];
  for (const item of parsed) {
    if (!isRecord(item)) {
      continue;
    }
    const id = readTrimmedString(item.id);
    const name = readTrimmedString(item.name);
    const url = readTrimmedString(item.url);
    const displayName = readTrimmedString(item.displayName);
    if (!id || !name || !url || entries.some((entry) => entry.id === id)) {
      continue;
    }
    entries.push({
      id,
      name,
      displayName: displayName || undefined,
      url,
    });
  }
  return entries;
}
