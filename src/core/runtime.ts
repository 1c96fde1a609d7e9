import { appConfig } from "../config.js";
import { ChatStore } from "../chat-history.js";
import type { ChatData, ChatId, ChatMessage } from "../chat-types.js";
import { describeError } from "../errors.js";
import { createLogger } from "../logger.js";
import { McpServersStore, type McpConfigUpdateResult } from "../mcp-servers.js";
import { ModelServerClient, type ServerConnectionStatus } from "../model-server.js";
import { PreferencesStore, type AddProviderResult, type NewProviderInput } from "../preferences.js";
import { getProviderDisplayName } from "../providers/catalog.js";
import { createOpenAiProviderClient, type ProviderClientFactory } from "../providers/client.js";
import { testProviderConnection, type FetchLike } from "../providers/connection.js";
import { ProviderRegistry } from "../providers/registry.js";
import { hasApiKey, type Bot, type ConnectionStatus, type ProviderPreference } from "../providers/types.js";
import { ChatController, type ControllerEvent, type SendResult } from "./chat-controller.js";
import { ModelFetchOrchestrator, type FetchCycleResult, type FetchPhase, type SyncOptions } from "./model-fetch.js";
import { SavedModelRestorer } from "./model-restore.js";

const log = createLogger("Runtime");

export type RuntimeEvent = ControllerEvent;

export type StoreAction =
  | { type: "toggle_dark_mode" }
  | { type: "set_dark_mode"; value: boolean }
  | { type: "toggle_sidebar" }
  | { type: "set_sidebar_expanded"; value: boolean }
  | { type: "navigate"; view: string };

export type UiPreferences = {
  darkMode: boolean;
  sidebarExpanded: boolean;
  currentView: string;
};

export type ProviderView = {
  id: string;
  name: string;
  displayName: string;
  url: string;
  enabled: boolean;
  hasApiKey: boolean;
  models: Array<[string, boolean]>;
  wasCustomlyAdded: boolean;
  connection: ConnectionStatus;
};

export type BotGroup = {
  providerId: string;
  displayName: string;
  bots: Bot[];
};

export type ChatSummary = {
  id: ChatId;
  title: string;
  botId: string | null;
  messageCount: number;
  createdAt: string;
  accessedAt: string;
  current: boolean;
};

export type RuntimeSnapshot = {
  preferences: UiPreferences & { currentChatModel: string | null };
  providers: {
    enabled: string[];
    configured: string[];
    active: string | null;
  };
  fetch: FetchPhase;
  chat: {
    currentChatId: ChatId | null;
    botId: string | null;
    botCount: number;
    messageCount: number;
    isStreaming: boolean;
  };
  chats: {
    count: number;
  };
  mcp: {
    enabled: boolean;
    dangerousModeEnabled: boolean;
    serverCount: number;
  };
  modelServer: ServerConnectionStatus;
};

export type RuntimeInitOptions = {
  dataDir?: string;
  clientFactory?: ProviderClientFactory;
  fetchImpl?: FetchLike;
  modelServerPort?: number;
  /** Run the first provider fetch cycle during `create`. Defaults to true. */
  syncOnStart?: boolean;
};

/**
 * Application state, built once at startup and handed to whoever needs it.
 * All mutations go through here so the stores, the provider registry and the
 * live chat stay consistent.
 */
export class AppRuntime {
  readonly dataDir: string;
  readonly preferences: PreferencesStore;
  readonly chats: ChatStore;
  readonly mcpServers: McpServersStore;
  readonly modelServer: ModelServerClient;
  private readonly registry: ProviderRegistry;
  private readonly controller: ChatController;
  private readonly restorer: SavedModelRestorer;
  private readonly orchestrator: ModelFetchOrchestrator;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly connectionStatuses = new Map<string, ConnectionStatus>();
  private listeners = new Set<(event: RuntimeEvent) => void>();
  private shuttingDown = false;

  private constructor(options: RuntimeInitOptions) {
    this.dataDir = options.dataDir ?? appConfig.dataDir;
    this.fetchImpl = options.fetchImpl;
    this.preferences = PreferencesStore.forDataDir(this.dataDir);
    this.chats = ChatStore.forDataDir(this.dataDir);
    this.mcpServers = McpServersStore.forDataDir(this.dataDir);
    this.modelServer = new ModelServerClient({ port: options.modelServerPort, fetchImpl: options.fetchImpl });
    this.registry = new ProviderRegistry(options.clientFactory ?? createOpenAiProviderClient);
    this.controller = new ChatController();
    this.restorer = new SavedModelRestorer(this.controller, this.registry, this.preferences);
    this.orchestrator = new ModelFetchOrchestrator({
      controller: this.controller,
      registry: this.registry,
      restorer: this.restorer,
    });
  }

  static async create(options: RuntimeInitOptions = {}): Promise<AppRuntime> {
    const runtime = new AppRuntime(options);
    await runtime.initialize(options.syncOnStart ?? true);
    return runtime;
  }

  private async initialize(syncOnStart: boolean): Promise<void> {
    log.info(`starting with data dir ${this.dataDir}`);
    this.controller.onEvent((event) => this.emit(event.type, event.payload));
    this.orchestrator.onEvent((event) => this.emit(event.type, event.payload));

    this.chats.loadFromDisk();
    const current = this.chats.getCurrentChat();
    if (current) {
      this.controller.setMessages(current.messages);
    }

    if (syncOnStart) {
      await this.syncProviders();
    }
  }

  onEvent(listener: (event: RuntimeEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(type: string, payload: Record<string, unknown>): void {
    const event: RuntimeEvent = {
      type,
      payload,
    };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error(`event listener failed for ${type}:`, error);
      }
    }
  }

  getState(): RuntimeSnapshot {
    const controller = this.controller.getState();
    const mcp = this.mcpServers.snapshot();
    return {
      preferences: {
        ...this.getUiPreferences(),
        currentChatModel: this.preferences.getCurrentChatModel(),
      },
      providers: {
        enabled: this.preferences.getEnabledProviders().map((provider) => provider.id),
        configured: this.registry.configuredProviderIds(),
        active: controller.providerId,
      },
      fetch: this.orchestrator.getPhase(),
      chat: {
        currentChatId: this.chats.currentId,
        botId: controller.botId,
        botCount: controller.bots.length,
        messageCount: controller.messages.length,
        isStreaming: controller.isStreaming,
      },
      chats: {
        count: this.chats.size,
      },
      mcp: {
        enabled: mcp.enabled,
        dangerousModeEnabled: mcp.dangerousModeEnabled,
        serverCount: Object.keys(mcp.servers).length,
      },
      modelServer: this.modelServer.connectionStatus,
    };
  }

  dispatch(action: StoreAction): UiPreferences {
    switch (action.type) {
      case "toggle_dark_mode":
        this.preferences.setDarkMode(!this.preferences.darkMode);
        break;
      case "set_dark_mode":
        this.preferences.setDarkMode(action.value);
        break;
      case "toggle_sidebar":
        this.preferences.setSidebarExpanded(!this.preferences.sidebarExpanded);
        break;
      case "set_sidebar_expanded":
        this.preferences.setSidebarExpanded(action.value);
        break;
      case "navigate":
        this.preferences.setCurrentView(action.view);
        break;
    }
    const preferences = this.getUiPreferences();
    this.emit("preferences.changed", { ...preferences });
    return preferences;
  }

  private getUiPreferences(): UiPreferences {
    return {
      darkMode: this.preferences.darkMode,
      sidebarExpanded: this.preferences.sidebarExpanded,
      currentView: this.preferences.currentView,
    };
  }

  listProviders(): ProviderView[] {
    return this.preferences.providers.map((provider) => this.toProviderView(provider));
  }

  async setProviderApiKey(providerId: string, apiKey: string | undefined): Promise<boolean> {
    const trimmed = apiKey?.trim();
    if (!this.preferences.setProviderApiKey(providerId, trimmed ? trimmed : undefined)) {
      return false;
    }
    this.connectionStatuses.delete(providerId);
    await this.afterProviderChange(providerId);
    return true;
  }

  async setProviderUrl(providerId: string, url: string): Promise<boolean> {
    if (!this.preferences.setProviderUrl(providerId, url.trim())) {
      return false;
    }
    this.connectionStatuses.delete(providerId);
    await this.afterProviderChange(providerId);
    return true;
  }

  async setProviderEnabled(providerId: string, enabled: boolean): Promise<boolean> {
    if (!this.preferences.setProviderEnabled(providerId, enabled)) {
      return false;
    }
    this.emit("providers.changed", { provider_id: providerId, enabled });
    await this.syncProviders();
    return true;
  }

  setModelEnabled(providerId: string, modelName: string, enabled: boolean): boolean {
    const updated = this.preferences.setModelEnabled(providerId, modelName, enabled);
    if (updated) {
      this.emit("providers.changed", { provider_id: providerId, model: modelName, enabled });
    }
    return updated;
  }

  async addCustomProvider(input: NewProviderInput): Promise<AddProviderResult> {
    const result = this.preferences.addCustomProvider(input);
    if (result.ok) {
      this.emit("providers.changed", { provider_id: result.provider.id, added: true });
      await this.syncProviders();
    }
    return result;
  }

  async deleteProvider(providerId: string): Promise<boolean> {
    if (!this.preferences.deleteProvider(providerId)) {
      return false;
    }
    this.connectionStatuses.delete(providerId);
    this.emit("providers.changed", { provider_id: providerId, deleted: true });
    await this.syncProviders();
    return true;
  }

  /** Probes the provider's models endpoint and stores the models it reports. */
  async testProviderConnection(providerId: string): Promise<ConnectionStatus> {
    const provider = this.preferences.getProvider(providerId);
    if (!provider) {
      return this.setConnectionStatus(providerId, { state: "error", message: `Unknown provider: ${providerId}` });
    }
    const apiKey = provider.apiKey?.trim() ?? "";
    if (!apiKey) {
      return this.setConnectionStatus(providerId, { state: "error", message: "API key is required" });
    }

    this.setConnectionStatus(providerId, { state: "connecting" });
    try {
      const result = await testProviderConnection(provider.url, apiKey, { fetchImpl: this.fetchImpl });
      if (result.models.length > 0) {
        this.preferences.mergeProviderModels(providerId, result.models);
      }
      return this.setConnectionStatus(providerId, { state: "connected", modelCount: result.modelCount });
    } catch (error) {
      return this.setConnectionStatus(providerId, { state: "error", message: describeError(error) });
    }
  }

  /** Runs a fetch cycle when the enabled provider set changed, or always with `force`. */
  syncProviders(options: SyncOptions = {}): Promise<FetchCycleResult | null> {
    return this.orchestrator.sync(this.preferences.getEnabledProviders(), options);
  }

  listBots(): Bot[] {
    return this.controller.getState().bots;
  }

  listBotGroups(): BotGroup[] {
    const groups: BotGroup[] = [];
    for (const bot of this.controller.getState().bots) {
      const providerId = bot.providerId || this.registry.getProviderForBot(bot.id) || "";
      let group = groups.find((item) => item.providerId === providerId);
      if (!group) {
        group = { providerId, displayName: this.providerDisplayName(providerId), bots: [] };
        groups.push(group);
      }
      group.bots.push(bot);
    }
    return groups;
  }

  /** Makes `botId` the chat model, switching provider client when needed. */
  selectBot(botId: string): boolean {
    if (!this.controller.getState().bots.some((bot) => bot.id === botId)) {
      log.warn(`selectBot: unknown bot ${botId}`);
      return false;
    }
    if (!this.restorer.trackSelection(botId)) {
      const providerId = this.registry.getProviderForBot(botId);
      if (
        providerId &&
        this.registry.setActiveProvider(providerId) &&
        providerId !== this.controller.activeClient?.providerId
      ) {
        this.controller.setClient(this.registry.getActiveClient() ?? null);
      }
      this.controller.setBotId(botId);
    }
    const chatId = this.chats.currentId;
    if (chatId !== null) {
      this.chats.updateChatBot(chatId, botId);
    }
    return true;
  }

  listChats(): ChatSummary[] {
    const currentId = this.chats.currentId;
    return this.chats.getSortedChats().map((chat) => toChatSummary(chat, currentId));
  }

  createChat(): ChatSummary {
    const chat = this.chats.createChat(this.controller.getState().botId);
    this.controller.setMessages([]);
    this.emit("chats.changed", { chat_id: chat.id, created: true });
    return toChatSummary(chat, chat.id);
  }

  selectChat(chatId: ChatId): ChatData | undefined {
    if (!this.chats.getChat(chatId)) {
      return undefined;
    }
    this.chats.setCurrentChat(chatId);
    const chat = this.chats.getChat(chatId);
    if (!chat) {
      return undefined;
    }
    this.controller.setMessages(chat.messages.map((message) => ({ ...message, isWriting: false })));
    if (chat.botId && chat.botId !== this.controller.getState().botId) {
      if (this.controller.getState().bots.some((bot) => bot.id === chat.botId)) {
        this.selectBot(chat.botId);
      } else {
        log.info(`chat ${chatId} uses ${chat.botId}, which is not currently available`);
      }
    }
    this.emit("chats.changed", { chat_id: chatId, selected: true });
    return chat;
  }

  deleteChat(chatId: ChatId): boolean {
    const wasCurrent = this.chats.currentId === chatId;
    const removed = this.chats.deleteChat(chatId);
    if (removed && wasCurrent) {
      this.controller.setMessages(this.chats.getCurrentChat()?.messages ?? []);
    }
    if (removed) {
      this.emit("chats.changed", { chat_id: chatId, deleted: true });
    }
    return removed;
  }

  /**
   * Sends `text` in the current chat, creating one if needed. The chat file
   * is rewritten whenever the message count or the streamed text changes.
   */
  async sendMessage(text: string): Promise<SendResult & { chatId: ChatId }> {
    const chatId = this.chats.currentId ?? this.createChat().id;
    let persistedCount = -1;
    let persistedText = "";
    const persist = (messages: ChatMessage[]): void => {
      const lastText = messages.at(-1)?.content.text ?? "";
      if (messages.length === persistedCount && lastText === persistedText) {
        return;
      }
      persistedCount = messages.length;
      persistedText = lastText;
      this.chats.updateChatMessages(chatId, messages);
    };

    const result = await this.controller.send(text, persist);
    this.chats.updateChatMessages(chatId, result.messages);
    this.emit("chat.message_sent", {
      chat_id: chatId,
      outcome: result.outcome,
      error: result.error ?? null,
    });
    return { ...result, chatId };
  }

  abortMessage(): boolean {
    return this.controller.abort();
  }

  getMcpServersJson(): string {
    return this.mcpServers.toJson();
  }

  updateMcpServersFromJson(json: string): McpConfigUpdateResult {
    const result = this.mcpServers.updateFromJson(json);
    if (result.ok) {
      this.emit("mcp.changed", { enabled: this.mcpServers.enabled });
    }
    return result;
  }

  setMcpServersEnabled(enabled: boolean): void {
    this.mcpServers.setEnabled(enabled);
    this.emit("mcp.changed", { enabled });
  }

  setMcpDangerousModeEnabled(enabled: boolean): void {
    this.mcpServers.setDangerousModeEnabled(enabled);
    this.emit("mcp.changed", { dangerous_mode_enabled: enabled });
  }

  async testModelServer(): Promise<ServerConnectionStatus> {
    const status = await this.modelServer.testConnection();
    this.emit("model_server.status", { ...status });
    return status;
  }

  async shutdown(reason?: string): Promise<{ accepted: true; reason?: string }> {
    if (!this.shuttingDown) {
      this.shuttingDown = true;
      this.controller.abort();
      await this.orchestrator.cancel();
      this.chats.saveCurrentChat();
      log.info(`shutdown${reason ? `: ${reason}` : ""}`);
      this.emit("state.changed", {
        reason: reason ?? "shutdown",
        snapshot: this.getState(),
      });
    }
    return {
      accepted: true,
      reason,
    };
  }

  private async afterProviderChange(providerId: string): Promise<void> {
    this.emit("providers.changed", { provider_id: providerId });
    const affectsCycle = this.preferences.getEnabledProviders().some((provider) => provider.id === providerId);
    await this.syncProviders({ force: affectsCycle && this.orchestrator.isConfigured });
  }

  private setConnectionStatus(providerId: string, status: ConnectionStatus): ConnectionStatus {
    this.connectionStatuses.set(providerId, status);
    this.emit("providers.connection", { provider_id: providerId, ...status });
    return { ...status };
  }

  private connectionStatusOf(providerId: string): ConnectionStatus {
    const status = this.connectionStatuses.get(providerId);
    return status ? { ...status } : { state: "not_connected" };
  }

  private providerDisplayName(providerId: string): string {
    const known = getProviderDisplayName(providerId);
    if (known !== "Unknown") {
      return known;
    }
    return this.preferences.getProvider(providerId)?.name ?? known;
  }

  private toProviderView(provider: ProviderPreference): ProviderView {
    return {
      id: provider.id,
      name: provider.name,
      displayName: this.providerDisplayName(provider.id),
      url: provider.url,
      enabled: provider.enabled,
      hasApiKey: hasApiKey(provider),
      models: provider.models.map(([name, enabled]): [string, boolean] => [name, enabled]),
      wasCustomlyAdded: provider.wasCustomlyAdded,
      connection: this.connectionStatusOf(provider.id),
    };
  }
}

function toChatSummary(chat: ChatData, currentId: ChatId | null): ChatSummary {
  return {
    id: chat.id,
    title: chat.title,
    botId: chat.botId,
    messageCount: chat.messages.length,
    createdAt: chat.createdAt,
    accessedAt: chat.accessedAt,
    current: chat.id === currentId,
  };
}
