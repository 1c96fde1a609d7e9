import { describe, expect, it } from "vitest";
import type { ChatRequest, ProviderClient, ProviderClientFactory } from "./client.js";
import { ProviderRegistry } from "./registry.js";
import type { Bot, ProviderPreference } from "./types.js";

class StubClient implements ProviderClient {
  readonly providerId: string;
  readonly baseUrl: string;
  readonly generation: number;

  constructor(providerId: string, baseUrl: string, generation = 0) {
    this.providerId = providerId;
    this.baseUrl = baseUrl;
    this.generation = generation;
  }

  async listBots(): Promise<Bot[]> {
    return [];
  }

  async streamChat(_request: ChatRequest) {
    return { answer: "" };
  }

  clone(): StubClient {
    return new StubClient(this.providerId, this.baseUrl, this.generation + 1);
  }
}

const stubFactory: ProviderClientFactory = (provider) => new StubClient(provider.id, provider.url);

function provider(id: string, url: string, apiKey = "test-key"): ProviderPreference {
  return {
    id,
    name: id,
    url,
    apiKey,
    enabled: true,
    models: [],
    wasCustomlyAdded: false,
  };
}

function bot(name: string, providerToken: string): Bot {
  return { id: `${name.length};${name}@${providerToken}`, name, providerId: "" };
}

describe("ProviderRegistry.configureProviders", () => {
  it("skips blank keys and activates the first configured provider", () => {
    const registry = new ProviderRegistry(stubFactory);
    registry.configureProviders([
      provider("blank", "http://blank", "   "),
      provider("openai", "https://api.openai.com/v1"),
      provider("groq", "https://api.groq.com/openai/v1"),
    ]);

    expect(registry.configuredProviderIds()).toEqual(["openai", "groq"]);
    expect(registry.activeProvider).toBe("openai");
    expect(registry.getClient("blank")).toBeUndefined();
    expect(registry.hasProviders()).toBe(true);
  });

  it("forgets bots from the previous configuration", () => {
    const registry = new ProviderRegistry(stubFactory);
    registry.configureProviders([provider("openai", "https://api.openai.com/v1")]);
    registry.setProviderBots("openai", [bot("gpt-4o", "https://api.openai.com/v1")]);

    registry.configureProviders([provider("openai", "https://api.openai.com/v1")]);

    expect(registry.getAllBots()).toEqual([]);
  });

  it("hands out clones of the active client", () => {
    const registry = new ProviderRegistry(stubFactory);
    registry.configureProviders([provider("openai", "https://api.openai.com/v1"), provider("groq", "https://g")]);

    expect(registry.setActiveProvider("groq")).toBe(true);
    expect(registry.setActiveProvider("missing")).toBe(false);
    const active = registry.getActiveClient();
    expect(active?.providerId).toBe("groq");
    expect(active).not.toBe(registry.getClient("groq"));
  });
});

describe("ProviderRegistry bots", () => {
  it("orders bots by provider configuration order and tags them", () => {
    const registry = new ProviderRegistry(stubFactory);
    registry.configureProviders([provider("openai", "https://a"), provider("groq", "https://g")]);

    registry.setProviderBots("groq", [bot("llama3", "https://g")]);
    registry.setProviderBots("openai", [bot("gpt-4o", "https://a")]);

    expect(registry.getAllBots()).toEqual([
      { id: "6;gpt-4o@https://a", name: "gpt-4o", providerId: "openai" },
      { id: "6;llama3@https://g", name: "llama3", providerId: "groq" },
    ]);
  });

  it("resolves bots from the index before the provider token", () => {
    const registry = new ProviderRegistry(stubFactory);
    registry.configureProviders([provider("openai", "https://a"), provider("mirror", "https://m")]);
    registry.setProviderBots("mirror", [bot("gpt-4o", "https://a")]);

    expect(registry.getProviderForBot("6;gpt-4o@https://a")).toBe("mirror");
    expect(registry.getProviderForBot("4;o1-x@https://a/")).toBe("openai");
    expect(registry.getProviderForBot("4;o1-x@mirror")).toBe("mirror");
  });

  it("does not match provider tokens by substring", () => {
    const registry = new ProviderRegistry(stubFactory);
    registry.configureProviders([provider("openai", "https://api.openai.com/v1")]);

    expect(registry.getProviderForBot("5;model@ai")).toBeUndefined();
    expect(registry.getProviderForBot("not-a-bot-id")).toBeUndefined();
  });
});
