// In-memory conversation history, expired by last-append time
import { logger } from '../utils/logger.js';
import type { ConversationTurn } from '../agent/types.js';

interface Conversation {
  turns: ConversationTurn[];
  lastAppend: number;
}

export interface ConversationStoreOptions {
  ttlMs: number;
  sweepMs?: number;
  now?: () => number;
}

export class ConversationStore {
  private conversations = new Map<string, Conversation>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(opts: ConversationStoreOptions) {
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
    if (opts.sweepMs && opts.sweepMs > 0) {
      this.timer = setInterval(() => this.sweep(), opts.sweepMs);
      this.timer.unref();
    }
  }

  append(conversationId: string, ...turns: ConversationTurn[]): void {
    const existing = this.live(conversationId);
    const conversation = existing ?? { turns: [], lastAppend: 0 };
    conversation.turns.push(...turns);
    conversation.lastAppend = this.now();
    if (!existing) this.conversations.set(conversationId, conversation);
  }

  /** Copy of the turns in insertion order; empty when unknown or expired. */
  get(conversationId: string): ConversationTurn[] {
    return [...(this.live(conversationId)?.turns ?? [])];
  }

  clear(conversationId: string): boolean {
    return this.conversations.delete(conversationId);
  }

  size(): number {
    return this.conversations.size;
  }

  sweep(): number {
    let removed = 0;
    for (const [id, conversation] of this.conversations) {
      if (this.isExpired(conversation)) {
        this.conversations.delete(id);
        removed++;
      }
    }
    if (removed) logger.info({ removed, remaining: this.conversations.size }, 'conversation_sweep');
    return removed;
  }

  dispose(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.conversations.clear();
  }

  private live(conversationId: string): Conversation | undefined {
    const conversation = this.conversations.get(conversationId);
    if (conversation && this.isExpired(conversation)) {
      this.conversations.delete(conversationId);
      return undefined;
    }
    return conversation;
  }

  private isExpired(conversation: Conversation): boolean {
    return this.now() - conversation.lastAppend > this.ttlMs;
  }
}
