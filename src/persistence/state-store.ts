/**
 * State store interface for conversation persistence
 * One current (stateId, context) pair per chat id
 */

import type {
  ChatId,
  Context,
  Conversation,
  StateId,
} from '../types/step.types';

/**
 * Abstract state store
 * Implement this class to create custom storage backends
 */
export abstract class StateStore {
  /**
   * Load the conversation for a chat
   * @param chatId The chat identifier
   * @returns The conversation or null if the chat has never been stored
   */
  abstract get(chatId: ChatId): Promise<Conversation | null>;

  /**
   * Replace the conversation for a chat
   * @param chatId The chat identifier
   * @param stateId State the conversation is now in
   * @param context Context replacing the stored one
   */
  abstract set(chatId: ChatId, stateId: StateId, context: Context): Promise<void>;

  /**
   * Forget a chat; a later message starts it from the initial state
   * @param chatId The chat identifier
   */
  abstract delete(chatId: ChatId): Promise<void>;
}
