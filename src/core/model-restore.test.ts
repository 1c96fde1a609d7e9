import { describe, expect, it } from "vitest";
import { ProviderRegistry } from "../providers/registry.js";
import { FakeProviderBackend, botFor, memoryModelStore, providerPreference } from "../testing/fakes.js";
import { ChatController } from "./chat-controller.js";
import { SavedModelRestorer, resolveSavedModel } from "./model-restore.js";

describe("resolveSavedModel", () => {
  const gpt = { id: "5;gpt-4o@openai", name: "gpt-4o", providerId: "openai" };
  const prefixed = { id: "13;models/gpt-4o@openai", name: "models/gpt-4o", providerId: "openai" };
  const claude = botFor("claude-3", "anthropic", "anthropic");

  it("selects the bot with the same id", () => {
    expect(resolveSavedModel("5;gpt-4o@openai", [claude, gpt])).toEqual({ bot: gpt, match: "exact" });
  });

  it("tolerates a models/ prefix on the live bot", () => {
    expect(resolveSavedModel("5;gpt-4o@openai", [claude, prefixed])).toEqual({ bot: prefixed, match: "fuzzy" });
  });

  it("tolerates a models/ prefix on the saved id", () => {
    const gemini = botFor("gemini-pro", "gemini", "gemini");
    expect(resolveSavedModel("17;models/gemini-pro@gemini", [claude, gemini])).toEqual({
      bot: gemini,
      match: "fuzzy",
    });
  });

  it("requires the same provider for a fuzzy match", () => {
    expect(resolveSavedModel("5;gpt-4o@azure", [claude, prefixed])).toEqual({ bot: claude, match: "fallback" });
  });

  it("falls back to the first bot", () => {
    expect(resolveSavedModel(null, [claude, gpt])).toEqual({ bot: claude, match: "fallback" });
    expect(resolveSavedModel("garbage", [claude, gpt])).toEqual({ bot: claude, match: "fallback" });
    expect(resolveSavedModel("5;gpt-4o@openai", [])).toBeNull();
  });
});

function setup(saved: string | null) {
  const backend = new FakeProviderBackend();
  const registry = new ProviderRegistry(backend.factory);
  registry.configureProviders([
    providerPreference("anthropic", "https://anthropic.test/v1"),
    providerPreference("openai", "https://openai.test/v1"),
  ]);
  registry.setProviderBots("anthropic", [botFor("claude-3", "https://anthropic.test/v1")]);
  registry.setProviderBots("openai", [{ id: "13;models/gpt-4o@openai", name: "models/gpt-4o", providerId: "" }]);
  const controller = new ChatController();
  const store = memoryModelStore(saved);
  const restorer = new SavedModelRestorer(controller, registry, store);
  return { registry, controller, store, restorer };
}

describe("SavedModelRestorer", () => {
  it("resolves once per cycle", () => {
    const { store, restorer } = setup("5;gpt-4o@openai");

    expect(restorer.restore()?.match).toBe("fuzzy");
    expect(restorer.restore()).toBeNull();
    expect(store.writes).toEqual(["13;models/gpt-4o@openai"]);

    restorer.reset();
    expect(restorer.restore()?.match).toBe("exact");
    expect(store.writes).toEqual(["13;models/gpt-4o@openai"]);
  });

  it("switches the controller to the owning provider", () => {
    const { controller, restorer } = setup("5;gpt-4o@openai");

    restorer.restore();

    expect(controller.getState().botId).toBe("13;models/gpt-4o@openai");
    expect(controller.activeClient?.providerId).toBe("openai");
  });

  it("activates the restored provider even when the controller already uses it", () => {
    const { registry, controller, restorer } = setup("13;models/gpt-4o@openai");
    const previous = registry.cloneClient("openai") ?? null;
    controller.setClient(previous);
    expect(registry.activeProvider).toBe("anthropic");

    restorer.restore();

    expect(registry.activeProvider).toBe("openai");
    expect(controller.activeClient?.providerId).toBe("openai");
    expect(controller.activeClient).not.toBe(previous);
  });

  it("persists the first bot when nothing was saved", () => {
    const { controller, store, restorer } = setup(null);

    expect(restorer.restore()?.bot.id).toBe("8;claude-3@https://anthropic.test/v1");
    expect(store.writes).toEqual(["8;claude-3@https://anthropic.test/v1"]);
    expect(controller.activeClient?.providerId).toBe("anthropic");
  });

  it("only marks itself restored when there are no bots", () => {
    const controller = new ChatController();
    const store = memoryModelStore("5;gpt-4o@openai");
    const restorer = new SavedModelRestorer(controller, new ProviderRegistry(new FakeProviderBackend().factory), store);

    expect(restorer.restore()).toBeNull();
    expect(restorer.isRestored).toBe(true);
    expect(store.writes).toEqual([]);
    expect(controller.getState().botId).toBeNull();
  });

  it("tracks selections made after restoration", () => {
    const { controller, store, restorer } = setup("13;models/gpt-4o@openai");

    expect(restorer.trackSelection("8;claude-3@https://anthropic.test/v1")).toBe(false);
    restorer.restore();
    expect(restorer.trackSelection("13;models/gpt-4o@openai")).toBe(false);
    expect(restorer.trackSelection("8;claude-3@https://anthropic.test/v1")).toBe(true);

    expect(store.writes).toEqual(["8;claude-3@https://anthropic.test/v1"]);
    expect(controller.activeClient?.providerId).toBe("anthropic");
  });
});
