/**
 * MongoDB state store for persistent conversations
 * One document per chat, keyed by chat id
 */

import type { Collection, MongoClient } from 'mongodb';

import { StateStore } from './state-store';
import { StateStoreError, errorMessage } from '../errors';
import { ConversationSchema, describeIssues } from '../schema/step-schema';
import type {
  ChatId,
  Context,
  Conversation,
  StateId,
} from '../types/step.types';

/**
 * MongoDB configuration options
 */
export interface MongoStoreOptions {
  /** MongoDB connection URI */
  uri: string;
  /** Database name */
  database: string;
  /** Collection name for conversations (defaults to 'conversations') */
  collection?: string;
}

/**
 * Stored shape of one conversation
 */
export interface ConversationDocument {
  _id: ChatId;
  stateId: StateId;
  context: Context;
  updatedAt: Date;
}

export class MongoStateStore extends StateStore {
  private client: MongoClient | null = null;
  private collection: Collection<ConversationDocument> | null = null;
  private readonly options: Required<MongoStoreOptions>;

  constructor(options: MongoStoreOptions) {
    super();
    this.options = {
      ...options,
      collection: options.collection ?? 'conversations',
    };
  }

  /**
   * Connect to MongoDB
   * Must be called before using the store
   */
  async connect(): Promise<void> {
    if (this.collection) {
      return;
    }

    let client: MongoClient | undefined;
    try {
      // Loaded on first connect so the driver is only required when used
      const mongodb = await import('mongodb');
      client = new mongodb.MongoClient(this.options.uri);
      await client.connect();
      this.collection = client
        .db(this.options.database)
        .collection<ConversationDocument>(this.options.collection);
      this.client = client;
    } catch (error) {
      await client?.close();
      throw new StateStoreError(
        `Failed to connect to MongoDB: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Disconnect from MongoDB
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.collection = null;
    }
  }

  async get(chatId: ChatId): Promise<Conversation | null> {
    const doc = await this.connected().findOne({ _id: chatId });
    if (!doc) {
      return null;
    }

    const parsed = ConversationSchema.safeParse(doc);
    if (!parsed.success) {
      throw new StateStoreError(
        `Conversation "${chatId}" is malformed: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  }

  async set(chatId: ChatId, stateId: StateId, context: Context): Promise<void> {
    await this.connected().replaceOne(
      { _id: chatId },
      { stateId, context, updatedAt: new Date() },
      { upsert: true }
    );
  }

  async delete(chatId: ChatId): Promise<void> {
    await this.connected().deleteOne({ _id: chatId });
  }

  private connected(): Collection<ConversationDocument> {
    if (!this.collection) {
      throw new StateStoreError(
        'MongoStateStore is not connected. Call connect() first.'
      );
    }
    return this.collection;
  }
}
