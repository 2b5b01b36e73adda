/**
 * Turns one step document entry into a callable handler
 */

import * as path from 'node:path';

import { StepResolutionError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { createSandboxedHandler } from './step-sandbox';
import type { StateId, StepHandler, StepSource } from './types/step.types';
import { SourceValidator } from './validation/source-validator';

export interface StepCompilerOptions {
  /** Validator for inline sources (defaults to one with the default deny set) */
  validator?: SourceValidator;
  /** Directory dotted references are resolved against (defaults to cwd) */
  modulesRoot?: string;
  logger?: Logger;
}

const DOTTED_REFERENCE =
  /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)+$/;

/**
 * Decide, from its shape alone, whether a step value is a dotted reference
 * (`handlers.greeting.start`) or inline handler source
 */
export function classifyStepSource(value: string): StepSource {
  const trimmed = value.trim();
  if (!DOTTED_REFERENCE.test(trimmed)) {
    return { kind: 'inline', source: value };
  }

  const segments = trimmed.split('.');
  const exportName = segments.pop() ?? '';
  return {
    kind: 'reference',
    reference: trimmed,
    modulePath: segments,
    exportName,
  };
}

/**
 * Compiles step document values into handlers
 *
 * @example
 * ```typescript
 * const compiler = new StepCompiler({ modulesRoot: __dirname });
 * const fromModule = await compiler.compile('start', 'handlers.greeting.start');
 * const inline = await compiler.compile(
 *   'ask',
 *   "function ask(chatId, input, context, sender) { return ['done', { input }]; }"
 * );
 * ```
 */
export class StepCompiler {
  private readonly validator: SourceValidator;
  private readonly modulesRoot: string;
  private readonly logger: Logger;

  constructor(options: StepCompilerOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child({
      component: 'step-compiler',
    });
    this.validator =
      options.validator ?? new SourceValidator({ logger: options.logger });
    this.modulesRoot = path.resolve(options.modulesRoot ?? process.cwd());
  }

  async compile(stateId: StateId, value: string): Promise<StepHandler> {
    const source = classifyStepSource(value);
    switch (source.kind) {
      case 'reference':
        return this.resolveReference(stateId, source.reference);
      case 'inline':
        return this.compileInline(stateId, source.source);
    }
  }

  /**
   * Validate inline source and evaluate it in its own context, behind the
   * sandbox boundary. Throws StepValidationError when the validator rejects
   * the source.
   */
  compileInline(stateId: StateId, source: string): StepHandler {
    const metadata = this.validator.assertValid(source, stateId);

    const handler = createSandboxedHandler(stateId, source, this.logger);

    this.logger.debug(
      { stateId, handler: metadata.name, async: metadata.isAsync },
      'Compiled inline step'
    );
    return handler;
  }

  /**
   * Import the module a dotted reference names and take its export
   */
  async resolveReference(
    stateId: StateId,
    reference: string
  ): Promise<StepHandler> {
    const ref = classifyStepSource(reference);
    if (ref.kind !== 'reference') {
      throw new StepResolutionError(stateId, reference, 'not a dotted reference');
    }

    const modulePath = path.join(this.modulesRoot, ...ref.modulePath);
    let namespace: unknown;
    try {
      namespace = await import(modulePath);
    } catch (error) {
      throw new StepResolutionError(
        stateId,
        ref.reference,
        `module "${ref.modulePath.join('.')}" could not be imported`,
        { cause: error }
      );
    }

    const candidate: unknown =
      typeof namespace === 'object' && namespace !== null
        ? Reflect.get(namespace, ref.exportName)
        : undefined;
    if (candidate === undefined) {
      throw new StepResolutionError(
        stateId,
        ref.reference,
        `module has no export "${ref.exportName}"`
      );
    }
    if (typeof candidate !== 'function') {
      throw new StepResolutionError(
        stateId,
        ref.reference,
        `export "${ref.exportName}" is not callable`
      );
    }

    this.logger.debug(
      { stateId, reference: ref.reference },
      'Resolved step reference'
    );
    return (chatId, userInput, context, sender) =>
      candidate(chatId, userInput, context, sender);
  }
}
