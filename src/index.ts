export { appConfig, type AppConfig, type LogLevel } from "./config.js";
export { createLogger, maskSecret, type Logger } from "./logger.js";
export { ProviderRequestError, describeError, isAbortError, type ProviderErrorKind } from "./errors.js";

export * from "./chat-types.js";
export { ChatStore, DEFAULT_CHAT_TITLE, deriveChatTitle } from "./chat-history.js";
export { PreferencesStore, defaultPreferences, type PreferencesData, type AddProviderResult } from "./preferences.js";
export {
  McpServersStore,
  createSampleConfig,
  httpServer,
  sseServer,
  stdioServer,
  transportOf,
  type McpServer,
  type McpServersConfig,
  type McpTransport,
} from "./mcp-servers.js";
export {
  ModelServerClient,
  type DownloadedFile,
  type ModelFile,
  type PendingDownload,
  type ServerConnectionStatus,
  type ServerModel,
} from "./model-server.js";

export type { Bot, ConnectionStatus, ProviderPreference, SupportedProvider } from "./providers/types.js";
export { formatBotId, modelNamesMatch, parseBotId, type ParsedBotId } from "./providers/bot-id.js";
export { getProviderDisplayName, getSupportedProviders } from "./providers/catalog.js";
export {
  OpenAiProviderClient,
  createOpenAiProviderClient,
  type ChatRequest,
  type ProviderClient,
  type ProviderClientFactory,
} from "./providers/client.js";
export { testProviderConnection, type ConnectionTestResult, type FetchLike } from "./providers/connection.js";
export { ProviderRegistry } from "./providers/registry.js";

export { ChatController, type ControllerState, type SendResult } from "./core/chat-controller.js";
export { ModelFetchOrchestrator, type FetchCycleResult, type FetchPhase } from "./core/model-fetch.js";
export { SavedModelRestorer, resolveSavedModel, type SavedModelResolution } from "./core/model-restore.js";
export {
  AppRuntime,
  type RuntimeEvent,
  type RuntimeInitOptions,
  type RuntimeSnapshot,
  type StoreAction,
} from "./core/runtime.js";

export { RpcRouter, createRpcRouter } from "./rpc/router.js";
export { JSON_RPC_ERROR, RpcMethodError, type JsonRpcRequest } from "./rpc/protocol.js";
