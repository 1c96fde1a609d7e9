import fs from "node:fs";
import path from "node:path";
import { createLogger, maskSecret } from "./logger.js";
import { getSupportedProviders } from "./providers/catalog.js";
import { hasApiKey, type ProviderPreference } from "./providers/types.js";
import { isRecord, readBoolean, readOptionalString, readTrimmedString } from "./utils/json.js";

const log = createLogger("Preferences");

export const PREFERENCES_FILE_NAME = "preferences.json";
const DEFAULT_VIEW = "Chat";

export type PreferencesData = {
  darkMode: boolean;
  sidebarExpanded: boolean;
  currentView: string;
  providers: ProviderPreference[];
  currentChatModel: string | null;
};

export type NewProviderInput = {
  name: string;
  url: string;
  apiKey?: string;
};

export type AddProviderResult =
  | { ok: true; provider: ProviderPreference }
  | { ok: false; reason: "name_required" | "url_required" | "duplicate_id"; message: string };

export function defaultPreferences(): PreferencesData {
  return {
    darkMode: false,
    sidebarExpanded: true,
    currentView: DEFAULT_VIEW,
    providers: getSupportedProviders(),
    currentChatModel: null,
  };
}

/**
 * Durable user preferences. Every mutating call writes the whole file back
 * synchronously.
 */
export class PreferencesStore {
  readonly filePath: string;
  private data: PreferencesData;

  private constructor(filePath: string, data: PreferencesData) {
    this.filePath = filePath;
    this.data = data;
  }

  static load(filePath: string): PreferencesStore {
    log.debug(`loading preferences from ${filePath}`);
    const loaded = readPreferencesFromPath(filePath);
    const data = loaded ?? defaultPreferences();
    mergeWithSupportedProviders(data.providers);
    return new PreferencesStore(filePath, data);
  }

  static forDataDir(dataDir: string): PreferencesStore {
    return PreferencesStore.load(path.join(dataDir, PREFERENCES_FILE_NAME));
  }

  snapshot(): PreferencesData {
    return structuredClone(this.data);
  }

  get darkMode(): boolean {
    return this.data.darkMode;
  }

  get sidebarExpanded(): boolean {
    return this.data.sidebarExpanded;
  }

  get currentView(): string {
    return this.data.currentView;
  }

  get providers(): readonly ProviderPreference[] {
    return this.data.providers;
  }

  save(): void {
    const json = JSON.stringify(this.data, null, 2);
    const tmpPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, `${json}\n`, "utf8");
      fs.renameSync(tmpPath, this.filePath);
      log.info(`saved preferences to ${this.filePath} (${json.length} bytes)`);
    } catch (error) {
      log.error(`failed to write preferences to ${this.filePath}:`, error);
      try {
        if (fs.existsSync(tmpPath)) {
          fs.unlinkSync(tmpPath);
        }
      } catch (cleanupError) {
        log.warn(`failed to remove ${tmpPath}:`, cleanupError);
      }
    }
  }

  setDarkMode(darkMode: boolean): void {
    log.info(`setDarkMode: ${darkMode}`);
    this.data.darkMode = darkMode;
    this.save();
  }

  setSidebarExpanded(expanded: boolean): void {
    log.info(`setSidebarExpanded: ${expanded}`);
    this.data.sidebarExpanded = expanded;
    this.save();
  }

  setCurrentView(view: string): void {
    log.info(`setCurrentView: ${view}`);
    this.data.currentView = view;
    this.save();
  }

  getProvider(id: string): ProviderPreference | undefined {
    return this.data.providers.find((provider) => provider.id === id);
  }

  setProviderApiKey(id: string, apiKey: string | undefined): boolean {
    log.info(`setProviderApiKey: provider=${id}, key=${apiKey ? maskSecret(apiKey) : "none"}`);
    return this.updateProvider(id, (provider) => {
      provider.apiKey = apiKey;
    });
  }

  setProviderUrl(id: string, url: string): boolean {
    log.info(`setProviderUrl: provider=${id}, url=${url}`);
    return this.updateProvider(id, (provider) => {
      provider.url = url;
    });
  }

  setProviderEnabled(id: string, enabled: boolean): boolean {
    return this.updateProvider(id, (provider) => {
      provider.enabled = enabled;
    });
  }

  setModelEnabled(providerId: string, modelName: string, enabled: boolean): boolean {
    return this.updateProvider(providerId, (provider) => {
      const entry = provider.models.find(([name]) => name === modelName);
      if (entry) {
        entry[1] = enabled;
      } else {
        provider.models.push([modelName, enabled]);
      }
    });
  }

  /** Replaces the model list, keeping stored flags. New models start enabled. */
  mergeProviderModels(providerId: string, modelNames: readonly string[]): boolean {
    return this.updateProvider(providerId, (provider) => {
      const flags = new Map(provider.models);
      provider.models = modelNames.map((name): [string, boolean] => [name, flags.get(name) ?? true]);
    });
  }

  addCustomProvider(input: NewProviderInput): AddProviderResult {
    const name = input.name.trim();
    const url = input.url.trim();
    if (!name) {
      log.warn("addCustomProvider: provider name is required");
      return { ok: false, reason: "name_required", message: "Provider name is required" };
    }
    if (!url) {
      log.warn("addCustomProvider: provider URL is required");
      return { ok: false, reason: "url_required", message: "Provider URL is required" };
    }

    const id = name.toLowerCase().replace(/ /g, "_");
    if (this.getProvider(id)) {
      log.warn(`addCustomProvider: provider with id '${id}' already exists`);
      return { ok: false, reason: "duplicate_id", message: `Provider with id '${id}' already exists` };
    }

    const provider: ProviderPreference = {
      id,
      name,
      url,
      apiKey: input.apiKey ? input.apiKey : undefined,
      enabled: true,
      models: [],
      wasCustomlyAdded: true,
    };
    this.data.providers.push(provider);
    this.save();
    log.info(`added custom provider ${id} (${url})`);
    return { ok: true, provider: structuredClone(provider) };
  }

  /** Built-in providers cannot be deleted. */
  deleteProvider(id: string): boolean {
    const provider = this.getProvider(id);
    if (!provider) {
      log.warn(`deleteProvider: provider not found: ${id}`);
      return false;
    }
    if (!provider.wasCustomlyAdded) {
      log.warn(`deleteProvider: cannot delete built-in provider: ${id}`);
      return false;
    }
    this.data.providers = this.data.providers.filter((item) => item.id !== id);
    this.save();
    log.info(`deleted provider ${id}`);
    return true;
  }

  setCurrentChatModel(model: string | null): void {
    log.info(`setCurrentChatModel: ${model ?? "none"}`);
    this.data.currentChatModel = model;
    this.save();
  }

  getCurrentChatModel(): string | null {
    return this.data.currentChatModel;
  }

  /** Enabled providers with an API key, in list order. */
  getEnabledProviders(): ProviderPreference[] {
    return this.data.providers.filter((provider) => provider.enabled && hasApiKey(provider));
  }

  getActiveProvider(): ProviderPreference | undefined {
    return this.getEnabledProviders()[0];
  }

  private updateProvider(id: string, mutate: (provider: ProviderPreference) => void): boolean {
    const provider = this.getProvider(id);
    if (!provider) {
      log.warn(`provider ${id} not found`);
      return false;
    }
    mutate(provider);
    this.save();
    return true;
  }
}

export function mergeWithSupportedProviders(providers: ProviderPreference[]): void {
  for (const supported of getSupportedProviders()) {
    if (!providers.some((provider) => provider.id === supported.id)) {
      providers.push(supported);
    }
  }
}

function readPreferencesFromPath(filePath: string): PreferencesData | null {
  let raw: string;
  try {
    if (!fs.existsSync(filePath)) {
      log.debug("no preferences file found, using defaults");
      return null;
    }
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    log.error(`failed to read preferences ${filePath}:`, error);
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.error("failed to parse preferences:", error);
    return null;
  }
  if (!isRecord(parsed)) {
    log.error("failed to parse preferences: not an object");
    return null;
  }

  const providers: ProviderPreference[] = [];
  const rawProviders = Array.isArray(parsed.providers) ? parsed.providers : [];
  for (const item of rawProviders) {
    const provider = parseProviderPreference(item);
    if (provider && !providers.some((existing) => existing.id === provider.id)) {
      providers.push(provider);
    }
  }

  const currentView = readTrimmedString(parsed.currentView);
  const currentChatModel = readTrimmedString(parsed.currentChatModel);

  return {
    darkMode: readBoolean(parsed.darkMode, false),
    sidebarExpanded: readBoolean(parsed.sidebarExpanded, true),
    currentView: currentView || DEFAULT_VIEW,
    providers,
    currentChatModel: currentChatModel || null,
  };
}

export function parseProviderPreference(value: unknown): ProviderPreference | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readTrimmedString(value.id);
  const name = readOptionalString(value.name);
  const url = readOptionalString(value.url);
  if (!id || name === undefined || url === undefined) {
    return null;
  }

  const models: Array<[string, boolean]> = [];
  if (Array.isArray(value.models)) {
    for (const entry of value.models) {
      if (Array.isArray(entry) && typeof entry[0] === "string" && typeof entry[1] === "boolean") {
        models.push([entry[0], entry[1]]);
      }
    }
  }

  return {
    id,
    name,
    url,
    apiKey: readOptionalString(value.apiKey),
    enabled: readBoolean(value.enabled, true),
    models,
    wasCustomlyAdded: readBoolean(value.wasCustomlyAdded, false),
  };
}
