/**
 * Chat Step Dispatcher
 *
 * A conversational state-machine dispatcher: each message runs the step
 * registered for the conversation's current state and persists the transition
 * it returns. Steps are registered directly or loaded from JSON documents as
 * module references or statically vetted inline source.
 *
 * @packageDocumentation
 */

export * from './dispatcher';
export * from './step-registry';
export * from './step-compiler';
export * from './errors';
export * from './constants';
export * from './logger';
export type * from './types/step.types';

// Static vetting of inline handler source
export * from './validation/source-validator';
export * from './validation/violations';

// Zod schemas for documents and results
export * from './schema/step-schema';

// State stores and message sinks
export * from './persistence/state-store';
export * from './persistence/memory-store';
export * from './persistence/file-store';
export * from './persistence/mongo-store';
export * from './senders/message-sink';
export * from './senders/console-sink';
