import { CONTEXT_PREVIEW_LENGTH, DEFAULT_INITIAL_STATE_ID } from './constants';
import {
  HandlerExecutionError,
  UnknownStateError,
  errorMessage,
} from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import type { StateStore } from './persistence/state-store';
import { StateIdSchema, StepResultSchema, describeIssues } from './schema/step-schema';
import type { MessageSink } from './senders/message-sink';
import { StepRegistry } from './step-registry';
import type {
  ChatId,
  Context,
  Conversation,
  StateId,
  StepHandler,
  UserInput,
} from './types/step.types';

export interface DispatcherOptions<Sink extends MessageSink = MessageSink> {
  /** Where conversations are read from and written to */
  store: StateStore;
  /** Passed to every handler for delivering replies */
  sender: Sink;
  /** Registry owned by this dispatcher (a fresh one when omitted) */
  registry?: StepRegistry;
  /** State for chats the store has never seen (defaults to "start") */
  initialStateId?: StateId;
  logger?: Logger;
}

/**
 * Advances one conversation by one message
 *
 * Calls for the same chat id must not overlap: reading the conversation and
 * writing its next state are two separate store operations. Serialise them
 * per chat before calling `handleMessage`.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({
 *   store: new MemoryStateStore(),
 *   sender: new ConsoleMessageSink(),
 * });
 *
 * dispatcher.registerStep('start', (chatId, input, context, sender) => {
 *   sender.send(chatId, "Hi! What's your name?");
 *   return ['ask_name', {}];
 * });
 *
 * await dispatcher.handleMessage('chat-1', 'hello');
 * ```
 */
export class Dispatcher<Sink extends MessageSink = MessageSink> {
  readonly registry: StepRegistry;
  readonly initialStateId: StateId;
  private readonly store: StateStore;
  private readonly sender: Sink;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions<Sink>) {
    this.store = options.store;
    this.sender = options.sender;
    this.logger = (options.logger ?? defaultLogger).child({
      component: 'dispatcher',
    });
    this.registry =
      options.registry ?? new StepRegistry({ logger: options.logger });
    this.initialStateId = StateIdSchema.parse(
      options.initialStateId ?? DEFAULT_INITIAL_STATE_ID
    );
  }

  /**
   * Register a handler for a state on this dispatcher's registry
   */
  registerStep(stateId: StateId, handler: StepHandler<Sink>): this {
    // Handlers only ever receive this dispatcher's sink
    this.registry.register(stateId, (chatId, userInput, context) =>
      handler(chatId, userInput, context, this.sender)
    );
    return this;
  }

  /**
   * Bulk register a step document on this dispatcher's registry
   */
  async loadSteps(document: unknown): Promise<StateId[]> {
    return this.registry.bulkRegister(document);
  }

  /**
   * Run the handler for the chat's current state and persist its transition.
   * Nothing is written when the state is unknown or the handler fails.
   *
   * @returns The conversation as persisted after the step
   */
  async handleMessage(
    chatId: ChatId,
    userInput: UserInput
  ): Promise<Conversation> {
    const stored = await this.store.get(chatId);
    const stateId = stored ? stored.stateId : this.initialStateId;
    const context: Context = stored ? stored.context : {};

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        { chatId, stateId, context: preview(context) },
        stored ? 'Dispatching message' : 'Dispatching first message of chat'
      );
    }

    let handler: StepHandler;
    try {
      handler = this.registry.resolve(stateId);
    } catch (error) {
      if (error instanceof UnknownStateError) {
        this.logger.warn({ chatId, stateId }, 'No step for current state');
      }
      throw error;
    }

    let result: unknown;
    try {
      result = await handler(
        chatId,
        userInput,
        structuredClone(context),
        this.sender
      );
    } catch (error) {
      this.logger.error({ chatId, stateId, err: error }, 'Step handler failed');
      throw new HandlerExecutionError(
        stateId,
        chatId,
        errorMessage(error),
        { cause: error }
      );
    }

    const transition = StepResultSchema.safeParse(result);
    if (!transition.success) {
      this.logger.error(
        { chatId, stateId },
        'Step handler returned a malformed transition'
      );
      throw new HandlerExecutionError(
        stateId,
        chatId,
        `expected [nextStateId, context], ${describeIssues(transition.error)}`
      );
    }

    const [nextStateId, nextContext] = transition.data;
    await this.store.set(chatId, nextStateId, nextContext);

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(
        { chatId, stateId, nextStateId, context: preview(nextContext) },
        'Step completed'
      );
    }
    return { stateId: nextStateId, context: nextContext };
  }
}

/**
 * Log-only rendering of a context; never throws
 */
function preview(context: Context): string {
  let text: string;
  try {
    text = JSON.stringify(context);
  } catch (error) {
    return `[unserializable: ${errorMessage(error)}]`;
  }
  return text.length > CONTEXT_PREVIEW_LENGTH
    ? `${text.slice(0, CONTEXT_PREVIEW_LENGTH)}...`
    : text;
}
