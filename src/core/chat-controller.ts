import { appConfig } from "../config.js";
import { createMessage, type ChatMessage } from "../chat-types.js";
import { createAbortError, describeError, isAbortError } from "../errors.js";
import { createLogger } from "../logger.js";
import { parseBotId } from "../providers/bot-id.js";
import type { ProviderClient } from "../providers/client.js";
import type { Bot } from "../providers/types.js";

const log = createLogger("ChatController");

export type ControllerEvent = {
  type: string;
  payload: Record<string, unknown>;
};

export type ControllerState = {
  bots: Bot[];
  botId: string | null;
  messages: ChatMessage[];
  isStreaming: boolean;
  providerId: string | null;
};

export type SendOutcome = "completed" | "aborted" | "failed";

export type SendResult = {
  outcome: SendOutcome;
  messages: ChatMessage[];
  error?: string;
};

/**
 * Owns the live conversation: the bot list, the selected bot, the message
 * list and the one client replies are streamed through. Everything else reads
 * it through `getState()` and change events.
 */
export class ChatController {
  private bots: Bot[] = [];
  private botId: string | null = null;
  private messages: ChatMessage[] = [];
  private client: ProviderClient | null = null;
  private streamAbortController: AbortController | null = null;
  private listeners = new Set<(event: ControllerEvent) => void>();

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

  getState(): ControllerState {
    return {
      bots: this.bots.map((bot) => ({ ...bot })),
      botId: this.botId,
      messages: cloneMessages(this.messages),
      isStreaming: this.isStreaming,
      providerId: this.client?.providerId ?? null,
    };
  }

  get isStreaming(): boolean {
    return this.streamAbortController !== null;
  }

  get activeClient(): ProviderClient | null {
    return this.client;
  }

  setClient(client: ProviderClient | null): void {
    this.client = client;
    this.emit("controller.changed", { field: "client", provider_id: client?.providerId ?? null });
  }

  /**
   * Resolves with the bots of `client`, the active client by default, without
   * making it active. Rejects when there is no client.
   */
  async loadBots(signal?: AbortSignal, client: ProviderClient | null = this.client): Promise<Bot[]> {
    if (!client) {
      throw new Error("No provider client is active.");
    }
    return client.listBots(signal);
  }

  setBots(bots: readonly Bot[]): void {
    this.bots = bots.map((bot) => ({ ...bot }));
    this.emit("controller.changed", { field: "bots", count: this.bots.length });
  }

  setBotId(botId: string | null): void {
    if (this.botId === botId) {
      return;
    }
    this.botId = botId;
    this.emit("controller.changed", { field: "bot_id", bot_id: botId });
  }

  setMessages(messages: readonly ChatMessage[]): void {
    this.messages = cloneMessages(messages);
    this.emit("controller.changed", { field: "messages", count: this.messages.length });
  }

  /**
   * Appends the user's text and streams the reply into a writing assistant
   * message. `onUpdate` sees the message list after every change.
   */
  async send(text: string, onUpdate?: (messages: ChatMessage[]) => void): Promise<SendResult> {
    const prompt = text.trim();
    if (!prompt) {
      return { outcome: "failed", messages: cloneMessages(this.messages), error: "Message is empty." };
    }
    if (this.streamAbortController) {
      return { outcome: "failed", messages: cloneMessages(this.messages), error: "A reply is already streaming." };
    }
    const client = this.client;
    if (!client) {
      return { outcome: "failed", messages: cloneMessages(this.messages), error: "No provider client is active." };
    }
    const model = this.resolveModelName();
    if (!model) {
      return { outcome: "failed", messages: cloneMessages(this.messages), error: "No model is selected." };
    }

    const history = cloneMessages(this.messages);
    const reply = createMessage("assistant", "", true);
    this.messages = [...history, createMessage("user", prompt), reply];
    const abortController = new AbortController();
    this.streamAbortController = abortController;
    this.notifyMessages(onUpdate);

    let outcome: SendOutcome = "completed";
    let errorMessage: string | undefined;
    try {
      const result = await client.streamChat(
        {
          model,
          messages: this.messages.slice(0, -1),
          systemInstruction: appConfig.systemInstruction,
          signal: abortController.signal,
        },
        (chunk) => {
          if (abortController.signal.aborted) {
            return;
          }
          reply.content.text += chunk.answerText;
          this.notifyMessages(onUpdate);
        },
      );
      if (abortController.signal.aborted) {
        throw createAbortError();
      }
      reply.content.text = result.answer || reply.content.text;
    } catch (error) {
      if (isAbortError(error) || abortController.signal.aborted) {
        outcome = "aborted";
      } else {
        outcome = "failed";
        errorMessage = describeError(error);
        log.error(`reply from ${client.providerId} failed:`, error);
        if (!reply.content.text) {
          reply.content.text = `Error: ${errorMessage}`;
        }
      }
    } finally {
      reply.isWriting = false;
      if (this.streamAbortController === abortController) {
        this.streamAbortController = null;
      }
    }

    this.notifyMessages(onUpdate);
    return { outcome, messages: cloneMessages(this.messages), error: errorMessage };
  }

  abort(): boolean {
    const controller = this.streamAbortController;
    if (!controller || controller.signal.aborted) {
      return false;
    }
    controller.abort();
    return true;
  }

  private resolveModelName(): string {
    if (!this.botId) {
      return "";
    }
    const parsed = parseBotId(this.botId).name;
    if (parsed) {
      return parsed;
    }
    return this.bots.find((bot) => bot.id === this.botId)?.name ?? "";
  }

  private notifyMessages(onUpdate?: (messages: ChatMessage[]) => void): void {
    this.emit("controller.changed", { field: "messages", count: this.messages.length });
    onUpdate?.(cloneMessages(this.messages));
  }
}

function cloneMessages(messages: readonly ChatMessage[]): ChatMessage[] {
  return messages.map((message) => ({
    from: message.from,
    content: { text: message.content.text },
    isWriting: message.isWriting,
  }));
}
