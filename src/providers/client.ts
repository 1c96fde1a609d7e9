import OpenAI from "openai";
import { appConfig } from "../config.js";
import type { ChatMessage, ModelResult, StreamChunk } from "../chat-types.js";
import { ProviderRequestError, createAbortError, describeError, httpStatusError } from "../errors.js";
import { formatBotId } from "./bot-id.js";
import type { Bot, ProviderPreference } from "./types.js";

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  systemInstruction?: string;
  signal?: AbortSignal;
};

/**
 * A configured connection to one provider. Only one client is active in the
 * chat controller at a time; the registry hands out clones.
 */
export type ProviderClient = {
  readonly providerId: string;
  readonly baseUrl: string;
  listBots(signal?: AbortSignal): Promise<Bot[]>;
  streamChat(request: ChatRequest, onChunk?: (chunk: StreamChunk) => void): Promise<ModelResult>;
  clone(): ProviderClient;
};

export type ProviderClientFactory = (provider: ProviderPreference, apiKey: string) => ProviderClient;

export type OpenAiProviderClientOptions = {
  providerId: string;
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
};

export class OpenAiProviderClient implements ProviderClient {
  readonly providerId: string;
  readonly baseUrl: string;
  private readonly options: OpenAiProviderClientOptions;
  private readonly client: OpenAI;

  constructor(options: OpenAiProviderClientOptions) {
    const apiKey = options.apiKey.trim();
    if (!apiKey) {
      throw new Error(`Missing API key for provider ${options.providerId}.`);
    }
    this.options = { ...options, apiKey };
    this.providerId = options.providerId;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.client = new OpenAI({
      apiKey,
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? appConfig.requestTimeoutMs,
      maxRetries: 0,
    });
  }

  async listBots(signal?: AbortSignal): Promise<Bot[]> {
    const bots: Bot[] = [];
    try {
      for await (const model of this.client.models.list({ signal })) {
        const name = model.id.trim();
        if (!name || bots.some((bot) => bot.name === name)) {
          continue;
        }
        bots.push({
          id: formatBotId(name, this.baseUrl),
          name,
          providerId: this.providerId,
        });
      }
    } catch (error) {
      throw toProviderError(error, this.providerId);
    }
    return bots;
  }

  async streamChat(request: ChatRequest, onChunk?: (chunk: StreamChunk) => void): Promise<ModelResult> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    const systemInstruction = request.systemInstruction?.trim();
    if (systemInstruction) {
      messages.push({ role: "system", content: systemInstruction });
    }
    for (const message of request.messages) {
      messages.push(toCompletionMessage(message));
    }

    let answer = "";
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model,
          messages,
          stream: true,
        },
        { signal: request.signal },
      );
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content ?? "";
        if (!delta) {
          continue;
        }
        answer += delta;
        onChunk?.({ answerText: delta });
      }
    } catch (error) {
      throw toProviderError(error, this.providerId);
    }
    return { answer };
  }

  clone(): OpenAiProviderClient {
    return new OpenAiProviderClient(this.options);
  }
}

export const createOpenAiProviderClient: ProviderClientFactory = (provider, apiKey) =>
  new OpenAiProviderClient({
    providerId: provider.id,
    baseUrl: provider.url,
    apiKey,
  });

function toCompletionMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.from) {
    case "system":
      return { role: "system", content: message.content.text };
    case "assistant":
      return { role: "assistant", content: message.content.text };
    case "user":
      return { role: "user", content: message.content.text };
  }
}

function toProviderError(error: unknown, providerId: string): Error {
  if (error instanceof OpenAI.APIUserAbortError) {
    return createAbortError();
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderRequestError("timeout", "Connection timed out", { providerId, cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderRequestError("network", "Failed to connect to server", { providerId, cause: error });
  }
  if (error instanceof OpenAI.APIError && typeof error.status === "number") {
    return httpStatusError(error.status, describeError(error), providerId);
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(describeError(error));
}
