import { createLogger } from "../logger.js";
import { modelNamesMatch, parseBotId } from "../providers/bot-id.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { Bot } from "../providers/types.js";
import type { PreferencesStore } from "../preferences.js";
import type { ChatController } from "./chat-controller.js";

const log = createLogger("ModelRestore");

export type SavedModelMatch = "exact" | "fuzzy" | "fallback";

export type SavedModelResolution = {
  bot: Bot;
  match: SavedModelMatch;
};

export type SavedModelStore = Pick<PreferencesStore, "getCurrentChatModel" | "setCurrentChatModel">;

/**
 * Picks the bot a saved model id refers to: the same id, then the same
 * provider token with a name equal up to a `models/` prefix, then the first
 * bot. Returns null only when there are no bots.
 */
export function resolveSavedModel(saved: string | null, bots: readonly Bot[]): SavedModelResolution | null {
  const first = bots[0];
  if (!first) {
    return null;
  }
  if (!saved) {
    return { bot: first, match: "fallback" };
  }

  const exact = bots.find((bot) => bot.id === saved);
  if (exact) {
    return { bot: exact, match: "exact" };
  }

  const wanted = parseBotId(saved);
  if (wanted.name && wanted.provider) {
    const fuzzy = bots.find((bot) => {
      const candidate = parseBotId(bot.id);
      return candidate.provider === wanted.provider && modelNamesMatch(candidate.name, wanted.name);
    });
    if (fuzzy) {
      return { bot: fuzzy, match: "fuzzy" };
    }
  }

  return { bot: first, match: "fallback" };
}

/**
 * Reconciles the saved model with the bots of a finished fetch cycle, once per
 * cycle. Later selections are persisted through `trackSelection`.
 */
export class SavedModelRestorer {
  private readonly controller: ChatController;
  private readonly registry: ProviderRegistry;
  private readonly store: SavedModelStore;
  private restored = false;
  private lastSavedId: string | null = null;

  constructor(controller: ChatController, registry: ProviderRegistry, store: SavedModelStore) {
    this.controller = controller;
    this.registry = registry;
    this.store = store;
  }

  get isRestored(): boolean {
    return this.restored;
  }

  /** Arms the restorer for a new fetch cycle. */
  reset(): void {
    this.restored = false;
  }

  restore(): SavedModelResolution | null {
    if (this.restored) {
      return null;
    }

    const saved = this.store.getCurrentChatModel();
    this.lastSavedId = saved;
    const resolution = resolveSavedModel(saved, this.registry.getAllBots());
    this.restored = true;
    if (!resolution) {
      log.info("no bots available, nothing to restore");
      return null;
    }

    const { bot, match } = resolution;
    log.info(`restored model ${bot.id} (${match})`);
    this.activateBot(bot.id, bot.providerId, true);
    if (saved !== bot.id) {
      this.store.setCurrentChatModel(bot.id);
      this.lastSavedId = bot.id;
    }
    return resolution;
  }

  /** Persists a selection made after restoration. Returns true when it was saved. */
  trackSelection(botId: string | null): boolean {
    if (!this.restored || !botId || botId === this.lastSavedId) {
      return false;
    }
    this.activateBot(botId, this.registry.getProviderForBot(botId), false);
    this.store.setCurrentChatModel(botId);
    this.lastSavedId = botId;
    return true;
  }

  /**
   * Points the registry and the controller at the provider serving `botId`.
   * After a fetch cycle the registry holds new clients, so `refreshClient`
   * replaces the controller's client even when the provider is unchanged.
   */
  private activateBot(botId: string, providerId: string | undefined, refreshClient: boolean): void {
    const owner = providerId || this.registry.getProviderForBot(botId);
    if (!owner) {
      log.warn(`no configured provider serves ${botId}`);
    } else if (
      this.registry.setActiveProvider(owner) &&
      (refreshClient || owner !== this.controller.activeClient?.providerId)
    ) {
      this.controller.setClient(this.registry.getActiveClient() ?? null);
    }
    this.controller.setBotId(botId);
  }
}
