import fs from "node:fs";
import path from "node:path";
import type { ChatData, ChatId, ChatMessage, MessageAuthor } from "./chat-types.js";
import { createLogger } from "./logger.js";
import { isRecord, parseIsoDate, readTrimmedString } from "./utils/json.js";

const log = createLogger("ChatHistory");

export const CHATS_DIR_NAME = "chats";
export const DEFAULT_CHAT_TITLE = "New Chat";
const CHAT_FILE_SUFFIX = ".chat.json";
const MAX_TITLE_LENGTH = 50;

type PersistedMessage = {
  from: MessageAuthor;
  content: {
    text: string;
  };
};

type PersistedChat = Omit<ChatData, "messages"> & {
  messages: PersistedMessage[];
};

/**
 * Chat sessions, one JSON file per session. The in-memory list is kept most
 * recent first.
 */
export class ChatStore {
  readonly chatsDir: string;
  private chats: ChatData[] = [];
  private currentChatId: ChatId | null = null;
  private lastIssuedId = 0;

  constructor(chatsDir: string) {
    this.chatsDir = chatsDir;
  }

  static forDataDir(dataDir: string): ChatStore {
    return new ChatStore(path.join(dataDir, CHATS_DIR_NAME));
  }

  static load(chatsDir: string): ChatStore {
    const store = new ChatStore(chatsDir);
    store.loadFromDisk();
    return store;
  }

  get currentId(): ChatId | null {
    return this.currentChatId;
  }

  get size(): number {
    return this.chats.length;
  }

  /** Replaces the in-memory list with every readable chat file in the directory. */
  loadFromDisk(): void {
    log.info(`loading chats from ${this.chatsDir}`);
    this.chats = [];
    this.currentChatId = null;

    try {
      fs.mkdirSync(this.chatsDir, { recursive: true });
    } catch (error) {
      log.error(`failed to create chats directory ${this.chatsDir}:`, error);
      return;
    }

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.chatsDir, { withFileTypes: true });
    } catch (error) {
      log.warn(`could not read chats directory ${this.chatsDir}:`, error);
      return;
    }

    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(".json")) {
        continue;
      }
      const chat = readChatFile(path.join(this.chatsDir, entry.name));
      if (chat && !this.chats.some((existing) => existing.id === chat.id)) {
        this.chats.push(chat);
        this.lastIssuedId = Math.max(this.lastIssuedId, chat.id);
      }
    }

    sortByAccessedAtDesc(this.chats);
    this.currentChatId = this.chats[0]?.id ?? null;
    log.info(`loaded ${this.chats.length} chats from disk`);
  }

  list(): ChatData[] {
    return this.chats.map(cloneChat);
  }

  getSortedChats(): ChatData[] {
    return sortByAccessedAtDesc(this.list());
  }

  getChat(chatId: ChatId): ChatData | undefined {
    const chat = this.findChat(chatId);
    return chat ? cloneChat(chat) : undefined;
  }

  getCurrentChat(): ChatData | undefined {
    return this.currentChatId === null ? undefined : this.getChat(this.currentChatId);
  }

  /** Without an explicit bot the new chat inherits the latest chat's bot. */
  createChat(botId?: string | null): ChatData {
    const now = new Date();
    const id = this.nextChatId(now.getTime());
    const createdAt = now.toISOString();
    const chat: ChatData = {
      id,
      title: DEFAULT_CHAT_TITLE,
      botId: botId ?? this.chats[0]?.botId ?? null,
      messages: [],
      createdAt,
      accessedAt: createdAt,
    };

    this.writeChat(chat);
    this.chats.unshift(chat);
    this.currentChatId = id;
    log.info(`created chat ${id}`);
    return cloneChat(chat);
  }

  setCurrentChat(chatId: ChatId | null): void {
    this.currentChatId = chatId;
    if (chatId === null) {
      return;
    }
    const chat = this.findChat(chatId);
    if (!chat) {
      log.warn(`setCurrentChat: chat ${chatId} not found`);
      return;
    }
    chat.accessedAt = laterOf(new Date().toISOString(), chat.createdAt);
    this.writeChat(chat);
  }

  updateChatMessages(chatId: ChatId, messages: ChatMessage[]): ChatData | undefined {
    const chat = this.findChat(chatId);
    if (!chat) {
      log.warn(`updateChatMessages: chat ${chatId} not found`);
      return undefined;
    }
    chat.messages = messages.map((message) => ({
      from: message.from,
      content: { text: message.content.text },
      isWriting: false,
    }));
    chat.title = deriveChatTitle(chat.title, chat.messages);
    this.writeChat(chat);
    return cloneChat(chat);
  }

  updateChatBot(chatId: ChatId, botId: string | null): void {
    const chat = this.findChat(chatId);
    if (!chat) {
      log.warn(`updateChatBot: chat ${chatId} not found`);
      return;
    }
    chat.botId = botId;
    this.writeChat(chat);
  }

  deleteChat(chatId: ChatId): boolean {
    const index = this.chats.findIndex((chat) => chat.id === chatId);
    let removed = false;
    if (index >= 0) {
      this.chats.splice(index, 1);
      this.deleteChatFile(chatId);
      log.info(`deleted chat ${chatId}`);
      removed = true;
    }
    if (this.currentChatId === chatId) {
      this.currentChatId = this.chats[0]?.id ?? null;
    }
    return removed;
  }

  saveChat(chatId: ChatId): void {
    const chat = this.findChat(chatId);
    if (chat) {
      this.writeChat(chat);
    }
  }

  saveCurrentChat(): void {
    if (this.currentChatId !== null) {
      this.saveChat(this.currentChatId);
    }
  }

  chatFilePath(chatId: ChatId): string {
    return path.join(this.chatsDir, `${chatId}${CHAT_FILE_SUFFIX}`);
  }

  private findChat(chatId: ChatId): ChatData | undefined {
    return this.chats.find((chat) => chat.id === chatId);
  }

  // Millisecond ids collide when two chats are created in the same tick.
  private nextChatId(nowMs: number): ChatId {
    const id = Math.max(nowMs, this.lastIssuedId + 1);
    this.lastIssuedId = id;
    return id;
  }

  private writeChat(chat: ChatData): void {
    const filePath = this.chatFilePath(chat.id);
    const payload: PersistedChat = {
      id: chat.id,
      title: chat.title,
      botId: chat.botId,
      messages: chat.messages.map((message) => ({
        from: message.from,
        content: { text: message.content.text },
      })),
      createdAt: chat.createdAt,
      accessedAt: chat.accessedAt,
    };
    try {
      fs.mkdirSync(this.chatsDir, { recursive: true });
      fs.writeFileSync(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
      log.debug(`saved chat ${chat.id} to ${filePath}`);
    } catch (error) {
      log.error(`failed to save chat ${chat.id}:`, error);
    }
  }

  private deleteChatFile(chatId: ChatId): void {
    const filePath = this.chatFilePath(chatId);
    try {
      fs.unlinkSync(filePath);
      log.debug(`deleted chat file ${filePath}`);
    } catch (error) {
      log.warn(`failed to delete chat file ${filePath}:`, error);
    }
  }
}

/** Title comes from the first non-blank user message, once. */
export function deriveChatTitle(currentTitle: string, messages: ChatMessage[]): string {
  if (currentTitle !== DEFAULT_CHAT_TITLE) {
    return currentTitle;
  }
  const firstUserMessage = messages.find((message) => message.from === "user");
  const text = firstUserMessage?.content.text.trim() ?? "";
  if (!text) {
    return currentTitle;
  }
  return text.length > MAX_TITLE_LENGTH ? `${text.slice(0, MAX_TITLE_LENGTH)}...` : text;
}

export function readChatFile(filePath: string): ChatData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    log.error(`failed to read chat from ${filePath}:`, error);
    return null;
  }

  const chat = parseChatData(parsed);
  if (!chat) {
    log.error(`failed to parse chat from ${filePath}`);
    return null;
  }
  log.debug(`loaded chat ${chat.id} from ${filePath}`);
  return chat;
}

export function parseChatData(value: unknown): ChatData | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = value.id;
  if (typeof id !== "number" || !Number.isSafeInteger(id) || id < 0) {
    return null;
  }
  if (!Array.isArray(value.messages)) {
    return null;
  }

  const messages: ChatMessage[] = [];
  for (const item of value.messages) {
    const message = parseMessage(item);
    if (!message) {
      return null;
    }
    messages.push(message);
  }

  const createdAt = parseIsoDate(value.createdAt);
  const accessedAt = parseIsoDate(value.accessedAt);
  if (!createdAt || !accessedAt) {
    return null;
  }

  const title = typeof value.title === "string" ? value.title : DEFAULT_CHAT_TITLE;
  const botId = readTrimmedString(value.botId);
  return {
    id,
    title,
    botId: botId || null,
    messages,
    createdAt,
    accessedAt: laterOf(accessedAt, createdAt),
  };
}

function parseMessage(value: unknown): ChatMessage | null {
  if (!isRecord(value)) {
    return null;
  }
  const from = value.from;
  if (from !== "user" && from !== "assistant" && from !== "system") {
    return null;
  }
  const content = value.content;
  if (!isRecord(content) || typeof content.text !== "string") {
    return null;
  }
  return {
    from,
    content: { text: content.text },
    isWriting: false,
  };
}

function laterOf(left: string, right: string): string {
  return Date.parse(left) >= Date.parse(right) ? left : right;
}

function sortByAccessedAtDesc(chats: ChatData[]): ChatData[] {
  return chats.sort((left, right) => {
    const byAccess = Date.parse(right.accessedAt) - Date.parse(left.accessedAt);
    return byAccess !== 0 ? byAccess : right.id - left.id;
  });
}

function cloneChat(chat: ChatData): ChatData {
  return {
    ...chat,
    messages: chat.messages.map((message) => ({
      from: message.from,
      content: { text: message.content.text },
      isWriting: message.isWriting,
    })),
  };
}
