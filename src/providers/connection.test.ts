import { describe, expect, it, vi } from "vitest";
import { ProviderRequestError } from "../errors.js";
import { extractModelNames, testProviderConnection, type FetchLike } from "./connection.js";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("testProviderConnection", () => {
  it("reads models from the first endpoint that answers", async () => {
    const fetchImpl = vi.fn<FetchLike>(async (input: string) => {
      if (input === "http://localhost:1234/models") {
        return new Response("missing", { status: 404 });
      }
      return jsonResponse(200, { data: [{ id: "llama3" }, { id: "qwen2" }] });
    });

    const result = await testProviderConnection("http://localhost:1234/", "test-key", { fetchImpl });

    expect(result).toEqual({ modelCount: 2, models: ["llama3", "qwen2"] });
    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([
      "http://localhost:1234/models",
      "http://localhost:1234/v1/models",
    ]);
    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({
      Authorization: "Bearer test-key",
      "Content-Type": "application/json",
    });
  });

  it("maps auth failures without trying other endpoints", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("nope", { status: 401 }));

    await expect(testProviderConnection("http://localhost:1234", "test-key", { fetchImpl })).rejects.toThrow(
      "Invalid API key",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("reports other statuses with the body", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("boom", { status: 500 }));

    await expect(testProviderConnection("http://localhost:1234", "test-key", { fetchImpl })).rejects.toThrow(
      "HTTP 500: boom",
    );
  });

  it("treats a body that is not json as connected with no models", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("<html></html>", { status: 200 }));

    await expect(testProviderConnection("http://localhost:1234", "test-key", { fetchImpl })).resolves.toEqual({
      modelCount: 0,
      models: [],
    });
  });

  it("gives up after every endpoint returns 404", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("", { status: 404 }));

    await expect(testProviderConnection("http://localhost:1234", "test-key", { fetchImpl })).rejects.toThrow(
      "Could not find models endpoint",
    );
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(fetchImpl.mock.calls.at(-1)?.[0]).toBe("http://localhost:1234");
  });

  it("classifies transport failures", async () => {
    const refused = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed");
    });
    const timedOut = vi.fn<FetchLike>(async () => {
      const error = new Error("The operation was aborted due to timeout");
      error.name = "TimeoutError";
      throw error;
    });

    const network = await testProviderConnection("http://localhost:1234", "test-key", { fetchImpl: refused }).catch(
      (error: unknown) => error,
    );
    expect(network).toBeInstanceOf(ProviderRequestError);
    expect(network).toMatchObject({ kind: "network", message: "Failed to connect to server" });

    await expect(
      testProviderConnection("http://localhost:1234", "test-key", { fetchImpl: timedOut }),
    ).rejects.toThrow("Connection timed out");
  });
});

describe("extractModelNames", () => {
  it("accepts ollama style payloads and drops duplicates", () => {
    expect(extractModelNames({ models: [{ name: "mistral" }, { name: "mistral" }, { size: 3 }] })).toEqual([
      "mistral",
    ]);
    expect(extractModelNames([])).toEqual([]);
  });
});
