// server/src/infra/group-chat.ts
import { randomUUID } from "crypto";
import type { Logger } from "pino";
import type { Server } from "socket.io";
import { z } from "zod";
import type { ChatMessageEvent, ChatTransport, SendOptions, SentMessage, Timestamp } from "../types";

export const GROUP_ROOM = "group";
export const BOT_SENDER_ID = "bot";

export type ChatLine = {
  id: string;
  senderId: string;
  senderName: string;
  body: string;
  timestamp: Timestamp;
  quoteId: string | null;
  fromBot: boolean;
};

type Listener = (event: ChatMessageEvent) => void;

export type GroupChatOptions = {
  botName: string;
  broadcast: (line: ChatLine) => void;
  logger: Logger;
  clock?: () => Timestamp;
  newId?: () => string;
};

/**
 * A single chat group. Every line gets a server id and a server timestamp (epoch seconds);
 * member lines go to the listeners, the bot's own lines are only broadcast.
 */
export class GroupChat implements ChatTransport {
  private readonly members = new Map<string, string>();
  private readonly listeners = new Set<Listener>();
  private readonly clock: () => Timestamp;
  private readonly newId: () => string;

  constructor(private readonly opts: GroupChatOptions) {
    this.clock = opts.clock ?? (() => Date.now() / 1000);
    this.newId = opts.newId ?? randomUUID;
  }

  get memberCount(): number {
    return this.members.size;
  }

  join(memberId: string, name: string): string {
    const displayName = name.replace(/\s+/g, " ").trim() || "Someone";
    this.members.set(memberId, displayName);
    return displayName;
  }

  leave(memberId: string) {
    this.members.delete(memberId);
  }

  onMessage(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* ---------------------------------------------------------------------------------------- */
  receive(memberId: string, body: string): ChatLine | null {
    const senderName = this.members.get(memberId);
    if (senderName === undefined) return null;

    const line: ChatLine = {
      id: this.newId(),
      senderId: memberId,
      senderName,
      body,
      timestamp: this.clock(),
      quoteId: null,
      fromBot: false,
    };
    this.opts.broadcast(line);

    const event: ChatMessageEvent = {
      senderId: line.senderId,
      senderName: line.senderName,
      body: line.body,
      timestamp: line.timestamp,
      messageId: line.id,
    };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.opts.logger.error({ err, messageId: line.id }, "chat listener failed");
      }
    }
    return line;
  }
  /* ---------------------------------------------------------------------------------------- */

  async send(text: string, sendOpts?: SendOptions): Promise<SentMessage> {
    const line: ChatLine = {
      id: this.newId(),
      senderId: BOT_SENDER_ID,
      senderName: this.opts.botName,
      body: text,
      timestamp: this.clock(),
      quoteId: sendOpts?.quoteId ?? null,
      fromBot: true,
    };
    this.opts.broadcast(line);
    return { id: line.id, timestamp: line.timestamp };
  }
}

/* ---------------------------------------------------------------------------------------- */
const JoinPayload = z.object({ name: z.string().max(64) });
const MessagePayload = z.object({ body: z.string().max(2000) });

type Ack = (res: { ok: boolean; reason?: string }) => void;

export function registerGroupChatHandlers(io: Server, chat: GroupChat, logger: Logger) {
  io.on("connection", (socket) => {
    socket.on("join_group", (p: unknown, ack?: Ack) => {
      const parsed = JoinPayload.safeParse(p);
      if (!parsed.success) return ack?.({ ok: false, reason: "invalid-name" });

      const name = chat.join(socket.id, parsed.data.name);
      socket.join(GROUP_ROOM);
      logger.debug({ socketId: socket.id, name }, "member_joined");
      ack?.({ ok: true });
    });

    socket.on("chat_message", (p: unknown, ack?: Ack) => {
      const parsed = MessagePayload.safeParse(p);
      if (!parsed.success) return ack?.({ ok: false, reason: "invalid-message" });

      const line = chat.receive(socket.id, parsed.data.body);
      ack?.(line ? { ok: true } : { ok: false, reason: "not-in-group" });
    });

    socket.on("disconnect", () => {
      chat.leave(socket.id);
    });
  });
}
/* ---------------------------------------------------------------------------------------- */
