/**
 * Message sink interface
 * Handlers deliver replies through the sink they are invoked with
 */

import type { ChatId } from '../types/step.types';

/**
 * Sink-specific delivery options (buttons, media, reply context, ...)
 */
export type SendOptions = Record<string, unknown>;

/**
 * Abstract message sink
 * Extend this class to deliver messages over a concrete channel
 */
export abstract class MessageSink {
  /**
   * Deliver one message to a conversation
   * @param chatId The conversation to deliver to
   * @param text Message body
   * @param options Sink-specific options
   */
  abstract send(
    chatId: ChatId,
    text: string,
    options?: SendOptions
  ): void | Promise<void>;
}
