export type MessageAuthor = "user" | "assistant" | "system";

export type ChatMessage = {
  from: MessageAuthor;
  content: {
    text: string;
  };
  /** Set while a reply is streaming. Never persisted. */
  isWriting: boolean;
};

export type ChatId = number;

export type ChatData = {
  id: ChatId;
  title: string;
  botId: string | null;
  messages: ChatMessage[];
  createdAt: string;
  accessedAt: string;
};

export type StreamChunk = {
  answerText: string;
};

export type ModelResult = {
  answer: string;
};

export function createMessage(from: MessageAuthor, text: string, isWriting = false): ChatMessage {
  return {
    from,
    content: { text },
    isWriting,
  };
}
