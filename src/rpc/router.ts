import { AppRuntime, type RuntimeEvent, type RuntimeInitOptions, type StoreAction } from "../core/runtime.js";
import { describeError } from "../errors.js";
import {
  JSON_RPC_ERROR,
  assertBoolean,
  assertNumber,
  assertObjectParams,
  assertOptionalBoolean,
  assertOptionalString,
  assertString,
  buildRpcMethodError,
  isRpcMethodError,
  type JsonRpcRequest,
} from "./protocol.js";

type RpcMethodHandler = (params: unknown) => Promise<unknown>;

const PROTOCOL_VERSION = "1.0.0";

export class RpcRouter {
  private readonly runtime: AppRuntime;
  private readonly handlers = new Map<string, RpcMethodHandler>();
  private nextRequestId = 1;

  constructor(runtime: AppRuntime) {
    this.runtime = runtime;
    this.registerHandlers();
  }

  listMethods(): string[] {
    return [...this.handlers.keys()].sort((a, b) => a.localeCompare(b));
  }

  onEvent(listener: (event: RuntimeEvent) => void): () => void {
    return this.runtime.onEvent(listener);
  }

  /**
   * Runs `method` in process. Anything thrown that is not an RpcMethodError
   * comes back as INTERNAL_ERROR carrying the failure's message.
   */
  async call(method: string, params?: unknown): Promise<unknown> {
    const request: JsonRpcRequest = {
      jsonrpc: "2.0",
      id: this.nextRequestId++,
      method,
      params,
    };

    try {
      return await this.dispatch(request);
    } catch (error) {
      if (isRpcMethodError(error)) {
        throw error;
      }
      throw buildRpcMethodError(JSON_RPC_ERROR.INTERNAL_ERROR, describeError(error), {
        reason: "internal_error",
        method,
      });
    }
  }

  async dispatch(request: JsonRpcRequest): Promise<unknown> {
    const handler = this.handlers.get(request.method);
    if (!handler) {
      throw buildRpcMethodError(
        JSON_RPC_ERROR.METHOD_NOT_FOUND,
        `method not found: ${request.method}`,
        {
          reason: "method_not_found",
          method: request.method,
        },
      );
    }

    return handler(request.params);
  }

  private registerHandlers(): void {
    this.handlers.set("rpc.handshake", async (params) => {
      const body = assertObjectParams(params ?? {}, "rpc.handshake");
      const protocolVersion = assertOptionalString(body.protocol_version, "protocol_version", "rpc.handshake");
      const strict = assertOptionalBoolean(body.strict, "strict", "rpc.handshake") ?? false;

      if (strict && protocolVersion && protocolVersion !== PROTOCOL_VERSION) {
        throw buildRpcMethodError(
          JSON_RPC_ERROR.INVALID_PARAMS,
          `unsupported protocol_version: ${protocolVersion}`,
          {
            reason: "unsupported_protocol_version",
            supported: PROTOCOL_VERSION,
          },
        );
      }

      return {
        protocol_version: PROTOCOL_VERSION,
        server_name: "polychat",
        capabilities: {
          events: true,
          streaming: true,
          model_server: true,
        },
        methods: this.listMethods(),
      };
    });

    this.handlers.set("system.ping", async () => ({
      ok: true,
      time: new Date().toISOString(),
    }));

    this.handlers.set("system.shutdown", async (params) => {
      const body = assertObjectParams(params ?? {}, "system.shutdown");
      const reason = assertOptionalString(body.reason, "reason", "system.shutdown");
      return this.runtime.shutdown(reason);
    });

    this.handlers.set("state.get", async () => this.runtime.getState());

    this.handlers.set("preferences.dispatch", async (params) => {
      const body = assertObjectParams(params, "preferences.dispatch");
      return this.runtime.dispatch(parseStoreAction(body.action));
    });

    this.registerProviderHandlers();
    this.registerModelHandlers();
    this.registerChatHandlers();
    this.registerMcpHandlers();
    this.registerModelServerHandlers();
  }

  private registerProviderHandlers(): void {
    this.handlers.set("providers.list", async () => this.runtime.listProviders());

    this.handlers.set("providers.set_api_key", async (params) => {
      const body = assertObjectParams(params, "providers.set_api_key");
      const providerId = assertString(body.provider_id, "provider_id", "providers.set_api_key");
      const apiKey = assertOptionalString(body.api_key, "api_key", "providers.set_api_key");
      return { updated: await this.runtime.setProviderApiKey(providerId, apiKey) };
    });

    this.handlers.set("providers.set_url", async (params) => {
      const body = assertObjectParams(params, "providers.set_url");
      const providerId = assertString(body.provider_id, "provider_id", "providers.set_url");
      const url = assertString(body.url, "url", "providers.set_url");
      return { updated: await this.runtime.setProviderUrl(providerId, url) };
    });

    this.handlers.set("providers.set_enabled", async (params) => {
      const body = assertObjectParams(params, "providers.set_enabled");
      const providerId = assertString(body.provider_id, "provider_id", "providers.set_enabled");
      const enabled = assertBoolean(body.enabled, "enabled", "providers.set_enabled");
      return { updated: await this.runtime.setProviderEnabled(providerId, enabled) };
    });

    this.handlers.set("providers.set_model_enabled", async (params) => {
      const body = assertObjectParams(params, "providers.set_model_enabled");
      const providerId = assertString(body.provider_id, "provider_id", "providers.set_model_enabled");
      const model = assertString(body.model, "model", "providers.set_model_enabled");
      const enabled = assertBoolean(body.enabled, "enabled", "providers.set_model_enabled");
      return { updated: this.runtime.setModelEnabled(providerId, model, enabled) };
    });

    this.handlers.set("providers.add", async (params) => {
      const body = assertObjectParams(params, "providers.add");
      const name = assertOptionalString(body.name, "name", "providers.add") ?? "";
      const url = assertOptionalString(body.url, "url", "providers.add") ?? "";
      const apiKey = assertOptionalString(body.api_key, "api_key", "providers.add");
      return this.runtime.addCustomProvider({ name, url, apiKey });
    });

    this.handlers.set("providers.delete", async (params) => {
      const body = assertObjectParams(params, "providers.delete");
      const providerId = assertString(body.provider_id, "provider_id", "providers.delete");
      return { deleted: await this.runtime.deleteProvider(providerId) };
    });

    this.handlers.set("providers.test_connection", async (params) => {
      const body = assertObjectParams(params, "providers.test_connection");
      const providerId = assertString(body.provider_id, "provider_id", "providers.test_connection");
      return this.runtime.testProviderConnection(providerId);
    });

    this.handlers.set("providers.sync", async (params) => {
      const body = assertObjectParams(params ?? {}, "providers.sync");
      const force = assertOptionalBoolean(body.force, "force", "providers.sync") ?? false;
      const result = await this.runtime.syncProviders({ force });
      return { ran: result !== null, result };
    });
  }

  private registerModelHandlers(): void {
    this.handlers.set("models.list", async () => this.runtime.listBots());
    this.handlers.set("models.groups", async () => this.runtime.listBotGroups());

    this.handlers.set("models.select", async (params) => {
      const body = assertObjectParams(params, "models.select");
      const botId = assertString(body.bot_id, "bot_id", "models.select");
      if (!this.runtime.selectBot(botId)) {
        throw buildRpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, `unknown bot: ${botId}`, {
          reason: "unknown_bot",
          field: "bot_id",
        });
      }
      return { bot_id: botId };
    });
  }

  private registerChatHandlers(): void {
    this.handlers.set("chats.list", async () => this.runtime.listChats());
    this.handlers.set("chats.create", async () => this.runtime.createChat());

    this.handlers.set("chats.select", async (params) => {
      const body = assertObjectParams(params, "chats.select");
      const chatId = assertNumber(body.chat_id, "chat_id", "chats.select");
      const chat = this.runtime.selectChat(chatId);
      if (!chat) {
        throw buildRpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, `chat not found: ${chatId}`, {
          reason: "chat_not_found",
          field: "chat_id",
        });
      }
      return chat;
    });

    this.handlers.set("chats.delete", async (params) => {
      const body = assertObjectParams(params, "chats.delete");
      const chatId = assertNumber(body.chat_id, "chat_id", "chats.delete");
      return { deleted: this.runtime.deleteChat(chatId) };
    });

    this.handlers.set("chats.send", async (params) => {
      const body = assertObjectParams(params, "chats.send");
      const text = assertString(body.text, "text", "chats.send");
      return this.runtime.sendMessage(text);
    });

    this.handlers.set("chats.abort", async () => ({ aborted: this.runtime.abortMessage() }));
  }

  private registerMcpHandlers(): void {
    this.handlers.set("mcp.get", async () => ({ json: this.runtime.getMcpServersJson() }));

    this.handlers.set("mcp.update", async (params) => {
      const body = assertObjectParams(params, "mcp.update");
      const json = assertString(body.json, "json", "mcp.update");
      return this.runtime.updateMcpServersFromJson(json);
    });

    this.handlers.set("mcp.set_enabled", async (params) => {
      const body = assertObjectParams(params, "mcp.set_enabled");
      const enabled = assertBoolean(body.enabled, "enabled", "mcp.set_enabled");
      this.runtime.setMcpServersEnabled(enabled);
      return { enabled };
    });

    this.handlers.set("mcp.set_dangerous_mode", async (params) => {
      const body = assertObjectParams(params, "mcp.set_dangerous_mode");
      const enabled = assertBoolean(body.enabled, "enabled", "mcp.set_dangerous_mode");
      this.runtime.setMcpDangerousModeEnabled(enabled);
      return { enabled };
    });
  }

  private registerModelServerHandlers(): void {
    const server = this.runtime.modelServer;

    this.handlers.set("model_server.test", async () => this.runtime.testModelServer());
    this.handlers.set("model_server.featured", async () => server.getFeaturedModels());

    this.handlers.set("model_server.search", async (params) => {
      const body = assertObjectParams(params, "model_server.search");
      const query = assertString(body.query, "query", "model_server.search");
      return server.searchModels(query);
    });

    this.handlers.set("model_server.files", async () => server.getDownloadedFiles());
    this.handlers.set("model_server.downloads", async () => server.getPendingDownloads());

    const fileActions: Array<[string, (fileId: string) => Promise<void>]> = [
      ["model_server.download", (fileId) => server.downloadFile(fileId)],
      ["model_server.pause", (fileId) => server.pauseDownload(fileId)],
      ["model_server.cancel", (fileId) => server.cancelDownload(fileId)],
      ["model_server.delete_file", (fileId) => server.deleteFile(fileId)],
    ];
    for (const [method, action] of fileActions) {
      this.handlers.set(method, async (params) => {
        const body = assertObjectParams(params, method);
        const fileId = assertString(body.file_id, "file_id", method);
        await action(fileId);
        return { ok: true, file_id: fileId };
      });
    }
  }
}

export async function createRpcRouter(options: RuntimeInitOptions = {}): Promise<RpcRouter> {
  return new RpcRouter(await AppRuntime.create(options));
}

function parseStoreAction(value: unknown): StoreAction {
  const method = "preferences.dispatch";
  const action = assertObjectParams(value, method);
  const type = assertString(action.type, "action.type", method);
  switch (type) {
    case "toggle_dark_mode":
    case "toggle_sidebar":
      return { type };
    case "set_dark_mode":
      return { type, value: assertBoolean(action.value, "action.value", method) };
    case "set_sidebar_expanded":
      return { type, value: assertBoolean(action.value, "action.value", method) };
    case "navigate":
      return { type, view: assertString(action.view, "action.view", method) };
    default:
      throw buildRpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, `${method}: unknown action type: ${type}`, {
        reason: "invalid_params",
        field: "action.type",
      });
  }
}
