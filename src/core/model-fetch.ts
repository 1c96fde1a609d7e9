import { createAbortError, describeError, isAbortError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { Bot, ProviderPreference } from "../providers/types.js";
import type { ChatController, ControllerEvent } from "./chat-controller.js";
import type { SavedModelRestorer } from "./model-restore.js";

const log = createLogger("ModelFetch");

export type FetchPhase =
  | { kind: "idle" }
  | { kind: "configuring" }
  | { kind: "fetching"; index: number; providerId: string };

export type FetchFailure = {
  providerId: string;
  error: string;
};

export type FetchCycleResult = {
  fetched: string[];
  failed: FetchFailure[];
  skipped: string[];
  bots: Bot[];
  superseded: boolean;
};

export type SyncOptions = {
  /** Runs a cycle even when the provider id set is unchanged. */
  force?: boolean;
};

type RunningCycle = {
  abortController: AbortController;
  done: Promise<FetchCycleResult>;
};

export type ModelFetchDeps = {
  controller: ChatController;
  registry: ProviderRegistry;
  restorer: SavedModelRestorer;
};

/**
 * Walks the enabled providers one at a time, loading each provider's bots
 * from its own client, then hands the merged list to the controller
 * and restores the saved model. A new provider set supersedes the running
 * cycle, and the old cycle is fully unwound before the next one starts.
 */
export class ModelFetchOrchestrator {
  private readonly controller: ChatController;
  private readonly registry: ProviderRegistry;
  private readonly restorer: SavedModelRestorer;
  private phase: FetchPhase = { kind: "idle" };
  private targetIds: string[] | null = null;
  private configured = false;
  private generation = 0;
  private running: RunningCycle | null = null;
  private listeners = new Set<(event: ControllerEvent) => void>();

  constructor(deps: ModelFetchDeps) {
    this.controller = deps.controller;
    this.registry = deps.registry;
    this.restorer = deps.restorer;
  }

  onEvent(listener: (event: ControllerEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    const event: ControllerEvent = {
      type,
      payload,
    };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  getPhase(): FetchPhase {
    return { ...this.phase };
  }

  get isConfigured(): boolean {
    return this.configured;
  }

  /**
   * Brings the fetched bots in line with `enabledProviders`. Resolves with the
   * cycle result, or null when nothing was fetched (unchanged set, empty set,
   * or superseded before it started).
   */
  async sync(enabledProviders: readonly ProviderPreference[], options: SyncOptions = {}): Promise<FetchCycleResult | null> {
    const ids = enabledProviders.map((provider) => provider.id);
    if (!options.force && this.configured && this.targetIds !== null && sameIdSet(ids, this.targetIds)) {
      return null;
    }

    const generation = ++this.generation;
    this.targetIds = ids;
    this.running?.abortController.abort();

    if (ids.length === 0) {
      if (this.configured) {
        this.clearAll();
      }
      return null;
    }

    const previous = this.running;
    if (previous) {
      await previous.done;
    }
    if (generation !== this.generation) {
      return null;
    }

    const abortController = new AbortController();
    const done = this.runCycle([...enabledProviders], abortController.signal);
    const cycle: RunningCycle = { abortController, done };
    this.running = cycle;
    try {
      return await done;
    } finally {
      if (this.running === cycle) {
        this.running = null;
      }
    }
  }

  /** Aborts the running cycle, if any, and waits for it to unwind. */
  async cancel(): Promise<void> {
    const running = this.running;
    if (!running) {
      return;
    }
    this.generation += 1;
    this.targetIds = null;
    running.abortController.abort();
    await running.done;
  }

  private clearAll(): void {
    log.info("no enabled providers, clearing bots");
    this.registry.configureProviders([]);
    this.controller.setClient(null);
    this.controller.setBots([]);
    this.controller.setBotId(null);
    this.restorer.reset();
    this.configured = false;
    this.phase = { kind: "idle" };
  }

  private async runCycle(providers: ProviderPreference[], signal: AbortSignal): Promise<FetchCycleResult> {
    const result: FetchCycleResult = {
      fetched: [],
      failed: [],
      skipped: [],
      bots: [],
      superseded: false,
    };

    this.phase = { kind: "configuring" };
    this.restorer.reset();
    this.registry.configureProviders(providers);
    this.controller.setBots([]);
    this.configured = true;

    const queue = providers.filter((provider) => (provider.apiKey?.trim() ?? "") !== "").map((provider) => provider.id);
    log.info(`fetch cycle started for ${queue.join(", ") || "no providers"}`);

    for (const [index, providerId] of queue.entries()) {
      if (signal.aborted) {
        break;
      }
      const client = this.registry.cloneClient(providerId);
      if (!client) {
        log.warn(`no client configured for ${providerId}, skipping`);
        result.skipped.push(providerId);
        this.emit("fetch.skipped", { provider_id: providerId, index });
        continue;
      }

      this.phase = { kind: "fetching", index, providerId };
      this.emit("fetch.started", { provider_id: providerId, index });
      try {
        // The controller's client stays on the selected bot's provider.
        const bots = await this.controller.loadBots(signal, client);
        if (signal.aborted) {
          throw createAbortError();
        }
        this.registry.setProviderBots(providerId, bots);
        result.fetched.push(providerId);
        this.emit("fetch.completed", { provider_id: providerId, index, count: bots.length });
      } catch (error) {
        if (signal.aborted || isAbortError(error)) {
          this.emit("fetch.failed", { provider_id: providerId, index, error: "aborted", aborted: true });
          break;
        }
        const message = describeError(error);
        log.warn(`failed to fetch models from ${providerId}: ${message}`);
        result.failed.push({ providerId, error: message });
        this.emit("fetch.failed", { provider_id: providerId, index, error: message, aborted: false });
      }
    }

    if (signal.aborted) {
      log.info("fetch cycle superseded");
      result.superseded = true;
      this.phase = { kind: "idle" };
      return result;
    }

    result.bots = this.registry.getAllBots();
    this.controller.setBots(result.bots);
    this.phase = { kind: "idle" };
    this.emit("fetch.cycle_completed", {
      fetched: result.fetched,
      failed: result.failed.map((failure) => failure.providerId),
      skipped: result.skipped,
      bot_count: result.bots.length,
    });

    if (!this.restorer.restore()) {
      this.controller.setClient(this.registry.getActiveClient() ?? null);
    }
    return result;
  }
}

function sameIdSet(left: readonly string[], right: readonly string[]): boolean {
  const leftSet = new Set(left);
  const rightSet = new Set(right);
  return leftSet.size === rightSet.size && [...leftSet].every((id) => rightSet.has(id));
}
