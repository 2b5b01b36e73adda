/**
 * File-based state store
 * One JSON file per chat: { "stateId": ..., "context": {...} }
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { StateStore } from './state-store';
import { StateStoreError } from '../errors';
import { ConversationSchema, describeIssues } from '../schema/step-schema';
import type {
  ChatId,
  Context,
  Conversation,
  StateId,
} from '../types/step.types';

export interface FileStoreOptions {
  /** Directory holding the chat files (defaults to 'chat_states') */
  directory?: string;
}

export class FileStateStore extends StateStore {
  readonly directory: string;

  constructor(options: FileStoreOptions = {}) {
    super();
    this.directory = path.resolve(options.directory ?? 'chat_states');
  }

  async get(chatId: ChatId): Promise<Conversation | null> {
    const filePath = this.filePath(chatId);

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new StateStoreError(`Cannot read state file "${filePath}"`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new StateStoreError(`State file "${filePath}" is not valid JSON`, {
        cause: error,
      });
    }

    const parsed = ConversationSchema.safeParse(data);
    if (!parsed.success) {
      throw new StateStoreError(
        `State file "${filePath}" is malformed: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }

  async set(chatId: ChatId, stateId: StateId, context: Context): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(
      this.filePath(chatId),
      JSON.stringify({ stateId, context }),
      'utf8'
    );
  }

  async delete(chatId: ChatId): Promise<void> {
    await rm(this.filePath(chatId), { force: true });
  }

  /**
   * Chat ids are encoded so any id maps to one file inside the directory
   */
  private filePath(chatId: ChatId): string {
    return path.join(this.directory, `${encodeURIComponent(chatId)}.json`);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
