/**
 * Console message sink for development and demos
 */

import { MessageSink, SendOptions } from './message-sink';
import type { ChatId } from '../types/step.types';

export interface ConsoleSinkOptions {
  /** Line writer (defaults to console.log) */
  write?: (line: string) => void;
}

/**
 * Prints every message, and its options when present, one line each
 */
export class ConsoleMessageSink extends MessageSink {
  private readonly write: (line: string) => void;

  constructor(options: ConsoleSinkOptions = {}) {
    super();
    this.write = options.write ?? ((line) => console.log(line));
  }

  send(chatId: ChatId, text: string, options?: SendOptions): void {
    this.write(`[To ${chatId}] ${text}`);
    if (options && Object.keys(options).length > 0) {
      this.write(`  Options: ${JSON.stringify(options)}`);
    }
  }
}
