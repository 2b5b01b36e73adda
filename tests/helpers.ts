/**
 * Shared test doubles
 */

import pino from 'pino';
import { MessageSink, SendOptions } from '../src';

export const silentLogger = pino({ level: 'silent' });

export type SentMessage = {
  chatId: string;
  text: string;
  options?: SendOptions;
};

/**
 * Sink that records every message instead of delivering it
 */
export class RecordingSink extends MessageSink {
  readonly sent: SentMessage[] = [];

  send(chatId: string, text: string, options?: SendOptions): void {
    this.sent.push(options ? { chatId, text, options } : { chatId, text });
  }
}
