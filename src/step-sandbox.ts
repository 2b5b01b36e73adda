/**
 * Realm boundary for inline step handlers
 *
 * Each inline handler gets its own vm context with code generation from
 * strings disabled and its intrinsics frozen. No host object ever crosses
 * into that context: the input and context are rebuilt there from JSON, the
 * sink is a frozen facade created there, and the result comes back as JSON.
 * The host functions the facade and the runner call into only ever receive
 * and return primitives.
 */

import * as vm from 'node:vm';

import { errorMessage } from './errors';
import type { Logger } from './logger';
import { StepResultSchema, describeIssues } from './schema/step-schema';
import type { SendOptions } from './senders/message-sink';
import type { StateId, StepHandler, StepResult } from './types/step.types';

/**
 * Evaluated inside the context. The handler source is appended as the single
 * argument of the outer function, which returns the per-message runner.
 */
const RUNNER_PRELUDE = `'use strict';
(function (handler) {
  var freeze = Object.freeze;
  var ownKeys = Reflect.ownKeys;
  var ownNames = Object.getOwnPropertyNames;
  var describeKey = Object.getOwnPropertyDescriptor;
  var protoOf = Object.getPrototypeOf;
  var parse = JSON.parse;
  var stringify = JSON.stringify;
  var toText = String;
  var SandboxError = Error;
  var SandboxPromise = Promise;
  var hardened = new Set();

  function harden(value) {
    if (value === null || value === undefined || value === globalThis) return;
    if (typeof value !== 'object' && typeof value !== 'function') return;
    if (hardened.has(value)) return;
    hardened.add(value);
    freeze(value);
    var keys = ownKeys(value);
    for (var i = 0; i < keys.length; i++) {
      var property = describeKey(value, keys[i]);
      if (property) {
        harden(property.value);
        harden(property.get);
        harden(property.set);
      }
    }
    harden(protoOf(value));
  }

  var names = ownNames(globalThis);
  for (var n = 0; n < names.length; n++) {
    var global = describeKey(globalThis, names[n]);
    if (global) harden(global.value);
  }
  harden(handler);

  function copy(json) {
    return json === undefined ? undefined : parse(json);
  }

  function describe(error) {
    try {
      if (error !== null && typeof error === 'object' && typeof error.message === 'string') {
        return error.message;
      }
      return toText(error);
    } catch (failure) {
      return 'handler threw a value that cannot be described';
    }
  }

  function loggedByHost() {
    return undefined;
  }

  return function run(chatId, input, context, deliver, settle) {
    var sender = {
      send: function send(to, text, options) {
        var finish;
        var delivered = new SandboxPromise(function (resolve, reject) {
          finish = function (failure) {
            if (failure === undefined) resolve();
            else reject(new SandboxError(failure));
          };
        });
        var outcome = deliver(
          toText(to),
          toText(text),
          options === undefined ? undefined : stringify(options),
          finish
        );
        if (typeof outcome === 'string') throw new SandboxError(outcome);
        if (outcome !== true) return undefined;
        // Delivery failures are logged by the host; awaiting still rejects
        delivered.then(undefined, loggedByHost);
        return delivered;
      }
    };
    harden(sender);

    SandboxPromise.resolve()
      .then(function () {
        return handler(chatId, copy(input), copy(context), sender);
      })
      .then(
        function (result) {
          var json;
          try {
            json = stringify(result);
          } catch (error) {
            settle(describe(error));
            return;
          }
          settle(undefined, json);
        },
        function (error) {
          settle(describe(error));
        }
      );
  };
})(`;

const PRELUDE_LINES = RUNNER_PRELUDE.split('\n').length;

/**
 * Evaluate validated handler source in a fresh context and return a host-side
 * handler that runs it. The source must already have passed the validator.
 */
export function createSandboxedHandler(
  stateId: StateId,
  source: string,
  logger: Logger
): StepHandler {
  const context = vm.createContext({}, {
    name: `step:${stateId}`,
    codeGeneration: { strings: false, wasm: false },
  });
  // The trailing newline keeps a closing line comment from eating the paren
  const run: unknown = vm.runInContext(
    `${RUNNER_PRELUDE}\n${source}\n)`,
    context,
    { filename: `step:${stateId}`, lineOffset: -PRELUDE_LINES }
  );
  if (typeof run !== 'function') {
    throw new TypeError(`Inline step "${stateId}" did not evaluate to a function`);
  }

  return (chatId, userInput, conversationContext, sender) =>
    new Promise<StepResult>((resolve, reject) => {
      const deliver = (
        to: unknown,
        text: unknown,
        optionsJson: unknown,
        finish: unknown
      ): string | true | undefined => {
        let outcome: void | Promise<void>;
        try {
          outcome = sender.send(String(to), String(text), readOptions(optionsJson));
        } catch (error) {
          return errorMessage(error);
        }
        if (!(outcome instanceof Promise)) return undefined;

        outcome.then(
          () => {
            if (typeof finish === 'function') finish(undefined);
          },
          (error: unknown) => {
            logger.warn({ stateId, chatId, err: error }, 'Message delivery failed');
            if (typeof finish === 'function') finish(errorMessage(error));
          }
        );
        return true;
      };

      const settle = (failure: unknown, json: unknown): void => {
        if (typeof failure === 'string') {
          reject(new Error(failure));
          return;
        }
        const value: unknown = typeof json === 'string' ? JSON.parse(json) : undefined;
        const result = StepResultSchema.safeParse(value);
        if (result.success) {
          resolve(result.data);
        } else {
          reject(
            new Error(
              `expected [nextStateId, context], ${describeIssues(result.error)}`
            )
          );
        }
      };

      run(
        String(chatId),
        JSON.stringify(userInput),
        JSON.stringify(conversationContext),
        deliver,
        settle
      );
    });
}

function readOptions(json: unknown): SendOptions | undefined {
  if (typeof json !== 'string') return undefined;
  const value: unknown = JSON.parse(json);
  return isRecord(value) ? value : undefined;
}

function isRecord(value: unknown): value is SendOptions {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
