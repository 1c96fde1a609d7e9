import { describe, expect, it, vi } from "vitest";
import { ModelServerClient } from "./model-server.js";
import type { FetchLike } from "./providers/connection.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("ModelServerClient.testConnection", () => {
  it("pings the configured port", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("pong"));
    const client = new ModelServerClient({ port: 9999, fetchImpl });

    expect(client.connectionStatus).toEqual({ state: "disconnected" });
    await expect(client.testConnection()).resolves.toEqual({ state: "connected" });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://localhost:9999/ping");
  });

  it("reports refused connections and bad statuses", async () => {
    const refused = new ModelServerClient({
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });
    await expect(refused.testConnection()).resolves.toEqual({
      state: "error",
      message: "Failed to connect to model server. Is it running?",
    });

    const broken = new ModelServerClient({ fetchImpl: async () => new Response("", { status: 503 }) });
    await expect(broken.testConnection()).resolves.toEqual({ state: "error", message: "Server returned status: 503" });
  });
});

describe("ModelServerClient lists", () => {
  it("parses featured models", async () => {
    const client = new ModelServerClient({
      fetchImpl: async () =>
        jsonResponse([
          {
            id: "tinyllama",
            name: "TinyLlama",
            summary: "Small chat model",
            author: { name: "Example Lab" },
            files: [{ id: "tinyllama-q4", name: "tinyllama.Q4.gguf", size: "600MB", quantization: "Q4_K_M" }],
          },
        ]),
    });

    await expect(client.getFeaturedModels()).resolves.toEqual([
      {
        id: "tinyllama",
        name: "TinyLlama",
        summary: "Small chat model",
        author: "Example Lab",
        files: [
          { id: "tinyllama-q4", name: "tinyllama.Q4.gguf", size: "600MB", quantization: "Q4_K_M", downloaded: false },
        ],
      },
    ]);
  });

  it("encodes search queries", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse([]));
    const client = new ModelServerClient({ port: 8765, fetchImpl });

    await client.searchModels("llama 3/instruct");

    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://localhost:8765/models/search?q=llama%203%2Finstruct");
  });

  it("surfaces status and parse failures", async () => {
    const missing = new ModelServerClient({ fetchImpl: async () => new Response("", { status: 500 }) });
    await expect(missing.getDownloadedFiles()).rejects.toThrow("Server returned status: 500");

    const garbled = new ModelServerClient({ fetchImpl: async () => new Response("{oops") });
    await expect(garbled.getPendingDownloads()).rejects.toThrow(/^Failed to parse response: /);

    const wrongShape = new ModelServerClient({ fetchImpl: async () => jsonResponse({ files: [] }) });
    await expect(wrongShape.getDownloadedFiles()).rejects.toThrow("Failed to parse response: expected an array");

    const offline = new ModelServerClient({
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });
    await expect(offline.getFeaturedModels()).rejects.toThrow("Request failed: fetch failed");
  });
});

describe("ModelServerClient downloads", () => {
  it("posts the file id to start a download", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(null, { status: 202 }));
    const client = new ModelServerClient({ port: 8765, fetchImpl });

    await client.downloadFile("tinyllama-q4");

    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://localhost:8765/downloads");
    expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe("POST");
    expect(fetchImpl.mock.calls[0]?.[1]?.body).toBe('{"file_id":"tinyllama-q4"}');
  });

  it("reports failed download actions", async () => {
    const client = new ModelServerClient({ fetchImpl: async () => new Response("disk full", { status: 507 }) });

    await expect(client.downloadFile("a")).rejects.toThrow("Failed to start download: disk full");
    await expect(client.pauseDownload("a")).rejects.toThrow("Failed to pause download: 507");
    await expect(client.cancelDownload("a")).rejects.toThrow("Failed to cancel download: 507");
    await expect(client.deleteFile("a")).rejects.toThrow("Failed to delete file: 507");
  });
});
