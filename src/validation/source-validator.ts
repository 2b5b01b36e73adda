/**
 * Static vetting of inline step handler source
 *
 * The source is parsed with acorn and walked with acorn-walk; nothing in it is
 * ever executed here. All rules run on every source and their violations are
 * reported together, ordered by position.
 */

import { parse } from 'acorn';
import type {
  Expression,
  FunctionDeclaration,
  ModuleDeclaration,
  PrivateIdentifier,
  Program,
  Statement,
} from 'acorn';
import { full } from 'acorn-walk';

import {
  DEFAULT_BLOCKED_NAMES,
  HANDLER_PARAMETERS,
  IMPORT_FACILITY_NAMES,
} from '../constants';
import { StepValidationError } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import type { StateId } from '../types/step.types';
import {
  HandlerMetadata,
  SourceLocation,
  ValidationVerdict,
  Violation,
  ViolationRule,
} from './violations';

export interface SourceValidatorOptions {
  /** Replaces the default deny set */
  blockedNames?: Iterable<string>;
  /** Added to the deny set (default or replaced) */
  extraBlockedNames?: Iterable<string>;
  /**
   * Accept computed keys such as `obj[key]` whose name cannot be checked
   * against the deny set. Off by default.
   */
  allowComputedKeys?: boolean;
  logger?: Logger;
}

type Report = (rule: ViolationRule, message: string, offset: number) => void;

const importFacility: ReadonlySet<string> = new Set(IMPORT_FACILITY_NAMES);

/**
 * Validates that a source text defines exactly one four-parameter function and
 * cannot reach imports or any name in the deny set.
 *
 * @example
 * ```typescript
 * const verdict = new SourceValidator().validate(
 *   "function start(chatId, input, context, sender) { return ['next', {}]; }"
 * );
 * // verdict.accepted === true
 * ```
 */
export class SourceValidator {
  private readonly blockedNames: ReadonlySet<string>;
  private readonly allowComputedKeys: boolean;
  private readonly logger: Logger;

  constructor(options: SourceValidatorOptions = {}) {
    this.blockedNames = new Set([
      ...(options.blockedNames ?? DEFAULT_BLOCKED_NAMES),
      ...(options.extraBlockedNames ?? []),
    ]);
    this.allowComputedKeys = options.allowComputedKeys ?? false;
    this.logger = (options.logger ?? defaultLogger).child({
      component: 'source-validator',
    });
  }

  /** The deny set in effect */
  get deniedNames(): readonly string[] {
    return [...this.blockedNames];
  }

  validate(source: string): ValidationVerdict {
    const locate = createLocator(source);

    let program: Program;
    try {
      program = parse(source, { ecmaVersion: 2022, sourceType: 'module' });
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      const offset =
        'pos' in error && typeof error.pos === 'number' ? error.pos : 0;
      return {
        accepted: false,
        violations: [
          {
            rule: ViolationRule.Syntax,
            message: error.message.replace(/\s*\(\d+:\d+\)$/, ''),
            location: locate(offset),
          },
        ],
      };
    }

    const violations: Violation[] = [];
    const report: Report = (rule, message, offset) => {
      violations.push({ rule, message, location: locate(offset) });
    };

    this.checkReferences(program, report);
    const handler = this.checkTopLevel(program, report);
    if (handler) this.checkSignature(handler, report);

    if (violations.length > 0 || !handler) {
      violations.sort((a, b) => a.location.offset - b.location.offset);
      this.logger.debug(
        { violations: violations.length },
        'Handler source rejected'
      );
      return { accepted: false, violations };
    }

    return {
      accepted: true,
      handler: {
        name: handler.id.name,
        parameters: handler.params.flatMap((param) =>
          param.type === 'Identifier' ? [param.name] : []
        ),
        isAsync: handler.async,
      },
    };
  }

  /**
   * Validate, throwing a StepValidationError for the given state on rejection
   */
  assertValid(source: string, stateId: StateId): HandlerMetadata {
    const verdict = this.validate(source);
    if (!verdict.accepted) {
      throw new StepValidationError(stateId, verdict.violations);
    }
    return verdict.handler;
  }

  /**
   * Rules 1 and 2, plus `arguments` and unresolvable computed keys: every
   * node of the tree is inspected
   */
  private checkReferences(program: Program, report: Report): void {
    full(program, (node) => {
      switch (node.type) {
        case 'Identifier':
          this.checkIdentifier(node.name, node.start, report);
          break;

        case 'MemberExpression':
          this.checkKey(node.property, node.computed, report);
          break;

        case 'ObjectPattern':
          for (const property of node.properties) {
            // Shorthand keys are visited again as the bound identifier
            if (property.type !== 'Property' || property.shorthand) continue;
            this.checkKey(property.key, property.computed, report);
          }
          break;

        case 'ImportDeclaration':
          report(
            ViolationRule.NoImport,
            `import declaration of "${String(node.source.value)}"`,
            node.start
          );
          break;

        case 'ImportExpression':
          report(ViolationRule.NoImport, 'dynamic import()', node.start);
          break;

        case 'MetaProperty':
          if (node.meta.name === 'import') {
            report(ViolationRule.NoImport, 'import.meta', node.start);
          }
          break;
      }
    });
  }

  private checkIdentifier(name: string, offset: number, report: Report): void {
    if (importFacility.has(name)) {
      report(ViolationRule.NoImport, `reference to "${name}"`, offset);
    } else if (name === 'arguments') {
      report(
        ViolationRule.HandlerSignature,
        '"arguments" captures a variable argument list',
        offset
      );
    } else if (this.blockedNames.has(name)) {
      report(ViolationRule.BlockedName, `reference to "${name}"`, offset);
    }
  }

  private checkKey(
    key: Expression | PrivateIdentifier,
    computed: boolean,
    report: Report
  ): void {
    const name = staticKeyName(key, computed);
    if (name !== null) {
      this.checkProperty(name, key.start, report);
    } else if (computed && !this.allowComputedKeys) {
      report(
        ViolationRule.DynamicKey,
        'computed key cannot be checked against the deny set',
        key.start
      );
    }
  }

  private checkProperty(name: string, offset: number, report: Report): void {
    if (importFacility.has(name)) {
      report(ViolationRule.NoImport, `access to property "${name}"`, offset);
    } else if (this.blockedNames.has(name)) {
      report(ViolationRule.BlockedName, `access to property "${name}"`, offset);
    }
  }

  /**
   * Rule 3: exactly one top-level function declaration and nothing else
   */
  private checkTopLevel(
    program: Program,
    report: Report
  ): FunctionDeclaration | null {
    let handler: FunctionDeclaration | null = null;

    for (const statement of program.body) {
      // Already reported as an import
      if (statement.type === 'ImportDeclaration') continue;

      if (statement.type === 'FunctionDeclaration') {
        if (!handler) {
          handler = statement;
        } else {
          report(
            ViolationRule.SingleDefinition,
            `additional top-level function "${statement.id.name}"`,
            statement.start
          );
        }
        continue;
      }

      report(
        ViolationRule.SingleDefinition,
        `top-level ${describeStatement(statement)} is not permitted`,
        statement.start
      );
    }

    if (!handler) {
      report(
        ViolationRule.SingleDefinition,
        'source must define exactly one top-level function',
        0
      );
    }
    return handler;
  }

  /**
   * Rule 4: four plain positional parameters, no generator
   */
  private checkSignature(handler: FunctionDeclaration, report: Report): void {
    const name = handler.id.name;

    if (handler.generator) {
      report(
        ViolationRule.HandlerSignature,
        `handler "${name}" must not be a generator`,
        handler.start
      );
    }

    if (handler.params.length !== HANDLER_PARAMETERS.length) {
      report(
        ViolationRule.HandlerSignature,
        `handler "${name}" must take exactly ${HANDLER_PARAMETERS.length} parameters ` +
          `(${HANDLER_PARAMETERS.join(', ')}), found ${handler.params.length}`,
        handler.start
      );
    }

    for (const param of handler.params) {
      switch (param.type) {
        case 'Identifier':
          break;
        case 'RestElement':
          report(
            ViolationRule.HandlerSignature,
            'rest parameter captures a variable argument list',
            param.start
          );
          break;
        case 'AssignmentPattern':
          report(
            ViolationRule.HandlerSignature,
            'default value makes a parameter optional',
            param.start
          );
          break;
        default:
          report(
            ViolationRule.HandlerSignature,
            'parameters must be plain names, not patterns',
            param.start
          );
      }
    }
  }
}

/**
 * Name of a member or pattern key when it is known without evaluation
 */
function staticKeyName(
  key: Expression | PrivateIdentifier,
  computed: boolean
): string | null {
  if (!computed) {
    return key.type === 'Identifier' ? key.name : null;
  }
  if (
    key.type === 'Literal' &&
    (typeof key.value === 'string' || typeof key.value === 'number')
  ) {
    return String(key.value);
  }
  if (key.type === 'TemplateLiteral' && key.expressions.length === 0) {
    return key.quasis[0]?.value.cooked ?? null;
  }
  return null;
}

function describeStatement(statement: Statement | ModuleDeclaration): string {
  switch (statement.type) {
    case 'VariableDeclaration':
      return `${statement.kind} declaration`;
    case 'ClassDeclaration':
      return `class "${statement.id.name}"`;
    case 'ExpressionStatement':
      return 'expression';
    case 'ExportNamedDeclaration':
    case 'ExportDefaultDeclaration':
    case 'ExportAllDeclaration':
      return 'export';
    default:
      return `statement (${statement.type})`;
  }
}

/**
 * Map character offsets to line/column positions
 */
function createLocator(source: string): (offset: number) => SourceLocation {
  const lineStarts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === '\n') lineStarts.push(i + 1);
  }

  return (offset) => {
    let line = lineStarts.length - 1;
    while (line > 0 && lineStarts[line] > offset) line--;
    return { line: line + 1, column: offset - lineStarts[line], offset };
  };
}
