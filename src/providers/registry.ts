import { createLogger } from "../logger.js";
import { parseBotId } from "./bot-id.js";
import { createOpenAiProviderClient, type ProviderClient, type ProviderClientFactory } from "./client.js";
import type { Bot, ProviderPreference } from "./types.js";

const log = createLogger("ProviderRegistry");

type ConfiguredProvider = {
  id: string;
  baseUrl: string;
  client: ProviderClient;
};

/**
 * One client per configured provider plus the bots each provider reported.
 * Bots are tagged with their provider on insert so lookups never have to
 * guess from the bot id.
 */
export class ProviderRegistry {
  private readonly createClient: ProviderClientFactory;
  private configured: ConfiguredProvider[] = [];
  private botsByProvider = new Map<string, Bot[]>();
  private providerByBotId = new Map<string, string>();
  private allBots: Bot[] = [];
  private activeProviderId: string | null = null;

  constructor(createClient: ProviderClientFactory = createOpenAiProviderClient) {
    this.createClient = createClient;
  }

  /** Replaces every client and forgets all bots. Providers without a key are skipped. */
  configureProviders(providers: readonly ProviderPreference[]): void {
    this.configured = [];
    this.clearAllBots();

    for (const provider of providers) {
      const apiKey = provider.apiKey?.trim() ?? "";
      if (!apiKey) {
        log.warn(`skipping provider ${provider.id}: empty API key`);
        continue;
      }
      try {
        this.configured.push({
          id: provider.id,
          baseUrl: provider.url.trim().replace(/\/+$/, ""),
          client: this.createClient(provider, apiKey),
        });
      } catch (error) {
        log.error(`failed to create client for ${provider.id}:`, error);
      }
    }

    if (this.activeProviderId === null || !this.findProvider(this.activeProviderId)) {
      this.activeProviderId = this.configured[0]?.id ?? null;
    }
    log.info(`configured ${this.configured.length} providers`);
  }

  getClient(providerId: string): ProviderClient | undefined {
    return this.findProvider(providerId)?.client;
  }

  cloneClient(providerId: string): ProviderClient | undefined {
    return this.findProvider(providerId)?.client.clone();
  }

  getActiveClient(): ProviderClient | undefined {
    return this.activeProviderId === null ? undefined : this.cloneClient(this.activeProviderId);
  }

  get activeProvider(): string | null {
    return this.activeProviderId;
  }

  setActiveProvider(providerId: string): boolean {
    if (!this.findProvider(providerId)) {
      return false;
    }
    this.activeProviderId = providerId;
    return true;
  }

  setProviderBots(providerId: string, bots: readonly Bot[]): void {
    this.botsByProvider.set(
      providerId,
      bots.map((bot) => ({ ...bot, providerId })),
    );
    this.rebuildBots();
  }

  getAllBots(): Bot[] {
    return this.allBots.map((bot) => ({ ...bot }));
  }

  clearAllBots(): void {
    this.botsByProvider.clear();
    this.providerByBotId.clear();
    this.allBots = [];
  }

  /**
   * Resolves the provider that serves a bot. Bots seen through
   * `setProviderBots` come from the index; anything else must name a
   * configured provider's id or base URL after its `@`.
   */
  getProviderForBot(botId: string): string | undefined {
    const indexed = this.providerByBotId.get(botId);
    if (indexed !== undefined) {
      return indexed;
    }
    const token = parseBotId(botId).provider.replace(/\/+$/, "");
    if (!token) {
      return undefined;
    }
    return this.configured.find((provider) => provider.id === token || provider.baseUrl === token)?.id;
  }

  hasProviders(): boolean {
    return this.configured.length > 0;
  }

  configuredProviderIds(): string[] {
    return this.configured.map((provider) => provider.id);
  }

  private findProvider(providerId: string): ConfiguredProvider | undefined {
    return this.configured.find((provider) => provider.id === providerId);
  }

  private rebuildBots(): void {
    this.allBots = [];
    this.providerByBotId.clear();
    for (const provider of this.configured) {
      for (const bot of this.botsByProvider.get(provider.id) ?? []) {
        this.allBots.push(bot);
        if (!this.providerByBotId.has(bot.id)) {
          this.providerByBotId.set(bot.id, provider.id);
        }
      }
    }
  }
}
