import type { MessageSink } from '../senders/message-sink';

/** Identifier of one node in a conversation's state machine */
export type StateId = string;

/** Key of one conversation */
export type ChatId = string;

/** Incoming message payload, passed to the handler as received */
export type UserInput = unknown;

/**
 * Per-conversation data carried between steps
 * Replaced wholesale by each handler result, never merged
 */
export type Context = Record<string, unknown>;

/**
 * A conversation as held by a state store
 */
export type Conversation = {
  stateId: StateId;
  context: Context;
};

/**
 * What a step handler returns: the state to move to and the new context
 */
export type StepResult = readonly [nextStateId: StateId, context: Context];

/**
 * A step function, invoked for the conversation's current state
 */
export type StepHandler<Sink extends MessageSink = MessageSink> = (
  chatId: ChatId,
  userInput: UserInput,
  context: Context,
  sender: Sink
) => StepResult | Promise<StepResult>;

/**
 * One value of a step document, classified by shape
 */
export type StepSource =
  | {
      kind: 'reference';
      /** The dotted reference as written */
      reference: string;
      /** Path segments of the module under the modules root */
      modulePath: readonly string[];
      exportName: string;
    }
  | {
      kind: 'inline';
      source: string;
    };
