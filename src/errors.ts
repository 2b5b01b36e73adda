/**
 * Error taxonomy
 * Every failure aborts its unit (a bulk load or one message) and reaches the caller
 */

import type { ChatId, StateId } from './types/step.types';
import { formatViolation, type Violation } from './validation/violations';

/**
 * Base class for every error raised by the dispatcher and its collaborators
 */
export class DispatcherError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Inline handler source broke one or more validator rules
 */
export class StepValidationError extends DispatcherError {
  readonly stateId: StateId;
  readonly violations: readonly Violation[];

  constructor(stateId: StateId, violations: readonly Violation[]) {
    super(
      `Inline handler for state "${stateId}" was rejected:\n` +
        violations.map((v) => `  ${formatViolation(v)}`).join('\n')
    );
    this.stateId = stateId;
    this.violations = violations;
  }
}

/**
 * Dotted reference could not be imported, or does not name a function
 */
export class StepResolutionError extends DispatcherError {
  readonly stateId: StateId;
  readonly reference: string;

  constructor(
    stateId: StateId,
    reference: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(
      `Cannot resolve handler "${reference}" for state "${stateId}": ${reason}`,
      options
    );
    this.stateId = stateId;
    this.reference = reference;
  }
}

/**
 * Step document is unreadable or has the wrong shape
 */
export class StepConfigError extends DispatcherError {}

/**
 * No handler is registered for a state id
 */
export class UnknownStateError extends DispatcherError {
  readonly stateId: StateId;

  constructor(stateId: StateId) {
    super(`No step registered for state "${stateId}"`);
    this.stateId = stateId;
  }
}

/**
 * A handler threw, rejected, or returned something other than a transition
 */
export class HandlerExecutionError extends DispatcherError {
  readonly stateId: StateId;
  readonly chatId: ChatId;

  constructor(
    stateId: StateId,
    chatId: ChatId,
    reason: string,
    options?: ErrorOptions
  ) {
    super(
      `Handler for state "${stateId}" failed on chat "${chatId}": ${reason}`,
      options
    );
    this.stateId = stateId;
    this.chatId = chatId;
  }
}

/**
 * A state store could not read back its own data
 */
export class StateStoreError extends DispatcherError {}

/**
 * Message of a thrown value, whatever realm or type it comes from
 */
export function errorMessage(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}
