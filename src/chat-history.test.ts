import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ChatStore, DEFAULT_CHAT_TITLE, deriveChatTitle, parseChatData } from "./chat-history.js";
import { createMessage } from "./chat-types.js";

const tempDirs: string[] = [];

function makeChatsDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "polychat-chats-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("ChatStore.createChat", () => {
  it("writes the chat immediately and makes it current", () => {
    const dir = makeChatsDir();
    const store = ChatStore.load(dir);

    const chat = store.createChat("6;gpt-4o@openai");

    expect(chat.title).toBe(DEFAULT_CHAT_TITLE);
    expect(store.currentId).toBe(chat.id);
    expect(fs.existsSync(path.join(dir, `${chat.id}.chat.json`))).toBe(true);
  });

  it("inherits the bot of the most recent chat and issues distinct ids", () => {
    const store = ChatStore.load(makeChatsDir());
    const first = store.createChat("6;gpt-4o@openai");
    const second = store.createChat();
    const third = store.createChat(null);

    expect(second.botId).toBe("6;gpt-4o@openai");
    expect(third.botId).toBe("6;gpt-4o@openai");
    expect(new Set([first.id, second.id, third.id]).size).toBe(3);
    expect(store.list().map((chat) => chat.id)).toEqual([third.id, second.id, first.id]);
  });
});

describe("ChatStore.updateChatMessages", () => {
  it("round-trips messages with writing flags cleared", () => {
    const dir = makeChatsDir();
    const store = ChatStore.load(dir);
    const chat = store.createChat("6;gpt-4o@openai");
    const messages = [
      createMessage("user", "What is a monad?"),
      createMessage("assistant", "A monoid in the category", true),
    ];

    store.updateChatMessages(chat.id, messages);

    const reloaded = ChatStore.load(dir).getChat(chat.id);
    expect(reloaded?.messages).toEqual([
      { from: "user", content: { text: "What is a monad?" }, isWriting: false },
      { from: "assistant", content: { text: "A monoid in the category" }, isWriting: false },
    ]);
    expect(store.getChat(chat.id)?.messages[1]?.isWriting).toBe(false);

    const onDisk = JSON.parse(fs.readFileSync(path.join(dir, `${chat.id}.chat.json`), "utf8")) as {
      messages: Array<Record<string, unknown>>;
    };
    expect(onDisk.messages[1]).toEqual({ from: "assistant", content: { text: "A monoid in the category" } });
  });

  it("derives the title from the first user message only once", () => {
    const store = ChatStore.load(makeChatsDir());
    const chat = store.createChat();

    store.updateChatMessages(chat.id, [createMessage("user", "  Plan a trip to Lisbon  ")]);
    expect(store.getChat(chat.id)?.title).toBe("Plan a trip to Lisbon");

    store.updateChatMessages(chat.id, [createMessage("user", "Something else entirely")]);
    expect(store.getChat(chat.id)?.title).toBe("Plan a trip to Lisbon");
  });
});

describe("ChatStore.deleteChat", () => {
  it("removes the file and moves current to the first remaining chat", () => {
    const dir = makeChatsDir();
    const store = ChatStore.load(dir);
    const older = store.createChat();
    const newer = store.createChat();

    expect(store.deleteChat(newer.id)).toBe(true);
    expect(fs.existsSync(path.join(dir, `${newer.id}.chat.json`))).toBe(false);
    expect(store.currentId).toBe(older.id);

    expect(store.deleteChat(older.id)).toBe(true);
    expect(store.currentId).toBeNull();
    expect(store.size).toBe(0);
  });

  it("keeps current when another chat is deleted", () => {
    const store = ChatStore.load(makeChatsDir());
    const older = store.createChat();
    const newer = store.createChat();

    store.deleteChat(older.id);
    expect(store.currentId).toBe(newer.id);
  });
});

describe("ChatStore.load", () => {
  it("skips corrupt files and sorts by access time", () => {
    const dir = makeChatsDir();
    const base = {
      title: "t",
      botId: null,
      messages: [],
      createdAt: "2024-01-01T00:00:00.000Z",
    };
    fs.writeFileSync(path.join(dir, "1.chat.json"), JSON.stringify({ ...base, id: 1, accessedAt: "2024-01-02T00:00:00.000Z" }));
    fs.writeFileSync(path.join(dir, "2.chat.json"), JSON.stringify({ ...base, id: 2, accessedAt: "2024-01-03T00:00:00.000Z" }));
    fs.writeFileSync(path.join(dir, "3.chat.json"), "{ broken");
    fs.writeFileSync(path.join(dir, "notes.txt"), "ignored");

    const store = ChatStore.load(dir);
    expect(store.list().map((chat) => chat.id)).toEqual([2, 1]);
    expect(store.currentId).toBe(2);
  });

  it("refreshes accessedAt when a chat is selected", () => {
    const dir = makeChatsDir();
    fs.writeFileSync(
      path.join(dir, "5.chat.json"),
      JSON.stringify({
        id: 5,
        title: "old",
        botId: "6;gpt-4o@openai",
        messages: [],
        createdAt: "2024-01-01T00:00:00.000Z",
        accessedAt: "2024-01-01T00:00:00.000Z",
      }),
    );
    const store = ChatStore.load(dir);

    store.setCurrentChat(5);

    const accessedAt = store.getChat(5)?.accessedAt ?? "";
    expect(Date.parse(accessedAt)).toBeGreaterThan(Date.parse("2024-01-01T00:00:00.000Z"));
    expect(ChatStore.load(dir).getChat(5)?.accessedAt).toBe(accessedAt);
  });
});

describe("parseChatData", () => {
  it("clamps accessedAt to createdAt", () => {
    const chat = parseChatData({
      id: 9,
      title: "x",
      botId: null,
      messages: [],
      createdAt: "2024-02-01T00:00:00.000Z",
      accessedAt: "2024-01-01T00:00:00.000Z",
    });
    expect(chat?.accessedAt).toBe("2024-02-01T00:00:00.000Z");
  });

  it("rejects unknown message authors", () => {
    expect(
      parseChatData({
        id: 9,
        messages: [{ from: "robot", content: { text: "hi" } }],
        createdAt: "2024-02-01T00:00:00.000Z",
        accessedAt: "2024-02-01T00:00:00.000Z",
      }),
    ).toBeNull();
  });
});

describe("deriveChatTitle", () => {
  it("truncates long first messages to fifty characters", () => {
    const text = "a".repeat(60);
    expect(deriveChatTitle(DEFAULT_CHAT_TITLE, [createMessage("user", text)])).toBe(`${"a".repeat(50)}...`);
  });

  it("ignores assistant-only histories", () => {
    expect(deriveChatTitle(DEFAULT_CHAT_TITLE, [createMessage("assistant", "hello")])).toBe(DEFAULT_CHAT_TITLE);
  });
});
