/**
 * In-memory state store for development and testing
 * Data is lost when the process ends
 */

import { StateStore } from './state-store';
import type {
  ChatId,
  Context,
  Conversation,
  StateId,
} from '../types/step.types';

/**
 * Map-based state store
 * Conversations are cloned on the way in and out, so callers never share them
 */
export class MemoryStateStore extends StateStore {
  private storage: Map<ChatId, Conversation> = new Map();

  async get(chatId: ChatId): Promise<Conversation | null> {
    const conversation = this.storage.get(chatId);
    return conversation ? structuredClone(conversation) : null;
  }

  async set(chatId: ChatId, stateId: StateId, context: Context): Promise<void> {
    this.storage.set(chatId, structuredClone({ stateId, context }));
  }

  async delete(chatId: ChatId): Promise<void> {
    this.storage.delete(chatId);
  }

  /**
   * Clear all data from memory (useful for testing)
   */
  clearAll(): void {
    this.storage.clear();
  }

  /**
   * Get all chat IDs in storage (useful for debugging)
   */
  getAllChatIds(): ChatId[] {
    return Array.from(this.storage.keys());
  }
}
