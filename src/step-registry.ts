/**
 * Step registry: state id to handler
 * Bulk loads from step documents are all-or-nothing
 */

import { readFile } from 'node:fs/promises';

import { StepConfigError, UnknownStateError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import {
  StepDocumentSchema,
  describeIssues,
} from './schema/step-schema';
import { StepCompiler } from './step-compiler';
import type { StateId, StepHandler } from './types/step.types';

export interface StepRegistryOptions {
  /** Compiler for step document values (defaults to one rooted at cwd) */
  compiler?: StepCompiler;
  logger?: Logger;
}

/**
 * Holds the handler for each state id of one dispatcher
 *
 * The map is replaced, never mutated, so `resolve` always sees either the state
 * before a bulk load or the state after it.
 */
export class StepRegistry {
  private steps: ReadonlyMap<StateId, StepHandler> = new Map();
  private readonly compiler: StepCompiler;
  private readonly logger: Logger;
  private pendingLoad: Promise<unknown> = Promise.resolve();

  constructor(options: StepRegistryOptions = {}) {
    this.compiler =
      options.compiler ?? new StepCompiler({ logger: options.logger });
    this.logger = (options.logger ?? defaultLogger).child({
      component: 'step-registry',
    });
  }

  /**
   * Register a handler, replacing any previous one for the state
   */
  register(stateId: StateId, handler: StepHandler): this {
    this.commit(new Map([[stateId, handler]]));
    return this;
  }

  /**
   * Get the handler for a state
   * @throws UnknownStateError when nothing is registered for it
   */
  resolve(stateId: StateId): StepHandler {
    const handler = this.steps.get(stateId);
    if (!handler) {
      throw new UnknownStateError(stateId);
    }
    return handler;
  }

  has(stateId: StateId): boolean {
    return this.steps.has(stateId);
  }

  get stateIds(): StateId[] {
    return Array.from(this.steps.keys());
  }

  get size(): number {
    return this.steps.size;
  }

  /**
   * Compile every entry of a step document and register them together.
   * The first failing entry aborts the load and nothing from it is registered.
   *
   * @param document Mapping of state id to dotted reference or inline source
   * @returns The state ids that were registered
   */
  async bulkRegister(document: unknown): Promise<StateId[]> {
    const load = this.pendingLoad.then(() => this.load(document));
    this.pendingLoad = load.catch(() => undefined);
    return load;
  }

  /**
   * Read a JSON step document from disk and bulk register it
   */
  async bulkRegisterFromFile(filePath: string): Promise<StateId[]> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new StepConfigError(`Cannot read step document "${filePath}"`, {
        cause: error,
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new StepConfigError(
        `Step document "${filePath}" is not valid JSON`,
        { cause: error }
      );
    }
    return this.bulkRegister(document);
  }

  private async load(document: unknown): Promise<StateId[]> {
    const parsed = StepDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new StepConfigError(
        `Invalid step document: ${describeIssues(parsed.error)}`
      );
    }

    const staged = new Map<StateId, StepHandler>();
    for (const [stateId, value] of Object.entries(parsed.data)) {
      try {
        staged.set(stateId, await this.compiler.compile(stateId, value));
      } catch (error) {
        this.logger.warn(
          { stateId, err: error },
          'Step document rejected; nothing from it was registered'
        );
        throw error;
      }
    }

    this.commit(staged);
    this.logger.info(
      { steps: Array.from(staged.keys()) },
      'Registered steps from document'
    );
    return Array.from(staged.keys());
  }

  private commit(entries: ReadonlyMap<StateId, StepHandler>): void {
    this.steps = new Map([...this.steps, ...entries]);
  }
}
