/**
 * SourceValidator Tests
 * Covers every rule, violation ordering and the configurable deny set
 */

import { describe, it, expect } from '@jest/globals';
import pino from 'pino';
import {
  SourceValidator,
  StepValidationError,
  Violation,
  ViolationRule,
} from '../src';

const logger = pino({ level: 'silent' });

const rejectedBy = (
  source: string,
  validator = new SourceValidator({ logger })
): readonly Violation[] => {
  const verdict = validator.validate(source);
  if (verdict.accepted) {
    throw new Error('Expected source to be rejected');
  }
  return verdict.violations;
};

const rulesOf = (source: string, validator?: SourceValidator) =>
  rejectedBy(source, validator).map((v) => v.rule);

describe('SourceValidator', () => {
  const validator = new SourceValidator({ logger });

  describe('Accepted sources', () => {
    it('should accept a single four-parameter function', () => {
      const verdict = validator.validate(
        "function start(chatId, userInput, context, sender) {\n  return ['next', {}];\n}"
      );

      expect(verdict).toEqual({
        accepted: true,
        handler: {
          name: 'start',
          parameters: ['chatId', 'userInput', 'context', 'sender'],
          isAsync: false,
        },
      });
    });

    it('should accept async handlers', () => {
      const verdict = validator.validate(
        "async function later(a, b, c, d) { await d.send(a, 'hi'); return ['x', c]; }"
      );

      expect(verdict.accepted).toBe(true);
      if (verdict.accepted) {
        expect(verdict.handler.isAsync).toBe(true);
      }
    });

    it('should allow helpers nested inside the handler', () => {
      const verdict = validator.validate(`
function start(chatId, userInput, context, sender) {
  function shout(text) {
    return String(text).toUpperCase();
  }
  class Counter {
    constructor(start) { this.value = start; }
  }
  return ['next', { reply: shout(userInput), count: new Counter(1).value }];
}`);

      expect(verdict.accepted).toBe(true);
    });

    it('should ignore blocked names in comments and strings', () => {
      const verdict = validator.validate(
        "function h(a, b, c, d) {\n  // process.exit()\n  return ['process', { note: 'eval' }];\n}"
      );

      expect(verdict.accepted).toBe(true);
    });
  });

  describe('Import rule', () => {
    it('should reject import declarations', () => {
      const violations = rejectedBy(
        "import path from 'path';\nfunction bad(a, b, c, d) { return ['x', {}]; }"
      );

      expect(violations).toEqual([
        {
          rule: ViolationRule.NoImport,
          message: 'import declaration of "path"',
          location: { line: 1, column: 0, offset: 0 },
        },
      ]);
    });

    it('should reject importing os', () => {
      const rules = rulesOf(
        "import os from 'os';\nfunction bad(a, b, c, d) { return ['x', {}]; }"
      );

      expect(rules).toContain('no-import');
    });

    it('should reject dynamic import()', () => {
      expect(
        rulesOf("function h(a, b, c, d) { return import('fs'); }")
      ).toEqual(['no-import']);
    });

    it('should reject require, even through an alias', () => {
      const violations = rejectedBy(
        "function h(a, b, c, d) {\n  const load = require;\n  load('child_process');\n  return ['x', {}];\n}"
      );

      expect(violations).toHaveLength(1);
      expect(violations[0]).toMatchObject({
        rule: 'no-import',
        message: 'reference to "require"',
        location: { line: 2, column: 15 },
      });
    });

    it('should reject require reached as a property', () => {
      expect(
        rejectedBy("function h(a, b, c, d) { return [d.require('fs'), {}]; }")
      ).toEqual([
        {
          rule: 'no-import',
          message: 'access to property "require"',
          location: { line: 1, column: 35, offset: 35 },
        },
      ]);
    });

    it('should reject import.meta', () => {
      expect(
        rulesOf('function h(a, b, c, d) { return [import.meta.url, {}]; }')
      ).toEqual(['no-import']);
    });
  });

  describe('Blocked names', () => {
    it('should reject bare references', () => {
      const violations = rejectedBy(
        "function h(a, b, c, d) { process.exit(1); return ['x', {}]; }"
      );

      expect(violations).toEqual([
        {
          rule: 'blocked-name',
          message: 'reference to "process"',
          location: { line: 1, column: 25, offset: 25 },
        },
      ]);
    });

    it('should reject eval and Function', () => {
      expect(
        rulesOf(
          "function h(a, b, c, d) { eval('1 + 1'); new Function('return 1'); return ['x', {}]; }"
        )
      ).toEqual(['blocked-name', 'blocked-name']);
    });

    it('should reject constructor chains off built-in containers', () => {
      const violations = rejectedBy(
        "function h(a, b, c, d) { const F = [].constructor.constructor; return [F('return 1')(), {}]; }"
      );

      expect(violations.map((v) => v.message)).toEqual([
        'access to property "constructor"',
        'access to property "constructor"',
      ]);
    });

    it('should reject computed access with literal keys', () => {
      expect(
        rulesOf(
          "function h(a, b, c, d) { const p = c['constructor']; const q = c[`__proto__`]; return ['x', {}]; }"
        )
      ).toEqual(['blocked-name', 'blocked-name']);
    });

    it('should reject destructured blocked keys', () => {
      expect(
        rulesOf(
          "function h(a, b, c, d) { const { constructor: make } = c; return ['x', {}]; }"
        )
      ).toEqual(['blocked-name']);

      expect(
        rulesOf(
          "function h(a, b, c, d) { const { constructor } = c; return ['x', {}]; }"
        )
      ).toEqual(['blocked-name']);
    });

    it('should reject blocked names reached through an aliased global', () => {
      const violations = rejectedBy(
        "function h(a, b, c, d) {\n  const g = globalThis;\n  return [g.process.pid, {}];\n}"
      );

      expect(violations.map((v) => [v.rule, v.location.line])).toEqual([
        ['blocked-name', 2],
        ['blocked-name', 3],
      ]);
    });

    it('should reject reflective helpers on a reassigned container', () => {
      expect(
        rulesOf(
          "function h(a, b, c, d) { const box = Object; return [box.getPrototypeOf(c), {}]; }"
        )
      ).toEqual(['blocked-name']);
    });

    it('should reject blocked names used as parameters', () => {
      expect(
        rulesOf("function h(process, b, c, d) { return ['x', {}]; }")
      ).toEqual(['blocked-name']);
    });

    it('should reject computed keys built at run time', () => {
      expect(
        rejectedBy(
          "function h(a, b, c, d) { const k = 'con' + 'structor'; return [d.send[k], {}]; }"
        )
      ).toEqual([
        {
          rule: 'dynamic-key',
          message: 'computed key cannot be checked against the deny set',
          location: { line: 1, column: 70, offset: 70 },
        },
      ]);
    });

    it('should reject computed keys in destructuring', () => {
      expect(
        rulesOf(
          "function h(a, b, c, d) { const { [b]: picked } = c; return ['x', {}]; }"
        )
      ).toEqual(['dynamic-key']);
    });

    it('should accept numeric and literal keys', () => {
      expect(
        validator.validate(
          "function h(a, b, c, d) { return [c.items[0], { first: c['first'] }]; }"
        ).accepted
      ).toBe(true);
    });

    it('should accept computed keys when allowed, still checking literal ones', () => {
      const permissive = new SourceValidator({ allowComputedKeys: true, logger });

      expect(
        permissive.validate(
          "function h(a, b, c, d) { return [c.items[b], {}]; }"
        ).accepted
      ).toBe(true);
      expect(
        rulesOf("function h(a, b, c, d) { return [c['constructor'], {}]; }", permissive)
      ).toEqual(['blocked-name']);
    });

    it('should use a replaced deny set', () => {
      const custom = new SourceValidator({ blockedNames: ['fetch'], logger });

      expect(
        rulesOf("function h(a, b, c, d) { fetch(b); return ['x', {}]; }", custom)
      ).toEqual(['blocked-name']);
      expect(
        custom.validate(
          "function h(a, b, c, d) { return [process.env.NEXT, {}]; }"
        ).accepted
      ).toBe(true);
    });

    it('should extend the default deny set', () => {
      const extended = new SourceValidator({
        extraBlockedNames: ['fetch'],
        logger,
      });

      expect(extended.deniedNames).toContain('fetch');
      expect(extended.deniedNames).toContain('process');
      expect(
        rulesOf(
          "function h(a, b, c, d) { fetch(b); process.exit(0); return ['x', {}]; }",
          extended
        )
      ).toEqual(['blocked-name', 'blocked-name']);
    });
  });

  describe('Single top-level definition', () => {
    it('should reject an empty source', () => {
      expect(rejectedBy('')).toEqual([
        {
          rule: 'single-definition',
          message: 'source must define exactly one top-level function',
          location: { line: 1, column: 0, offset: 0 },
        },
      ]);
    });

    it('should reject a source with no function', () => {
      expect(rejectedBy('const x = 1;').map((v) => v.message)).toEqual([
        'top-level const declaration is not permitted',
        'source must define exactly one top-level function',
      ]);
    });

    it('should reject a second top-level function', () => {
      const violations = rejectedBy(
        "function helper() {\n  return 1;\n}\n\nfunction handler(chatId, userInput, context, sender) {\n  return ['next', {}];\n}"
      );

      expect(violations.map((v) => v.rule)).toEqual([
        'handler-signature',
        'single-definition',
      ]);
      expect(violations[1]).toMatchObject({
        message: 'additional top-level function "handler"',
        location: { line: 5, column: 0 },
      });
    });

    it('should reject top-level classes and statements', () => {
      expect(
        rejectedBy(
          "class Smuggled {}\nfunction h(a, b, c, d) { return ['x', {}]; }\nh(1, 2, 3, 4);"
        ).map((v) => [v.message, v.location.line])
      ).toEqual([
        ['top-level class "Smuggled" is not permitted', 1],
        ['top-level expression is not permitted', 3],
      ]);
    });

    it('should reject exported handlers', () => {
      expect(
        rulesOf("export function h(a, b, c, d) { return ['x', {}]; }")
      ).toEqual(['single-definition', 'single-definition']);
    });
  });

  describe('Handler signature', () => {
    it('should reject the wrong parameter count', () => {
      expect(rejectedBy("function bad2(a, b) { return ['x', {}]; }")).toEqual([
        {
          rule: 'handler-signature',
          message:
            'handler "bad2" must take exactly 4 parameters (chatId, userInput, context, sender), found 2',
          location: { line: 1, column: 0, offset: 0 },
        },
      ]);
    });

    it('should reject five parameters', () => {
      expect(
        rulesOf("function h(a, b, c, d, e) { return ['x', {}]; }")
      ).toEqual(['handler-signature']);
    });

    it('should reject rest parameters', () => {
      const violations = rejectedBy(
        "function h(a, b, c, ...rest) { return ['x', {}]; }"
      );

      expect(violations).toHaveLength(1);
      expect(violations[0].message).toBe(
        'rest parameter captures a variable argument list'
      );
    });

    it('should reject default values', () => {
      expect(
        rejectedBy("function h(a, b, c, d = {}) { return ['x', {}]; }").map(
          (v) => v.message
        )
      ).toEqual(['default value makes a parameter optional']);
    });

    it('should reject destructured parameters', () => {
      expect(
        rejectedBy("function h(a, b, { name }, d) { return [name, {}]; }").map(
          (v) => v.message
        )
      ).toEqual(['parameters must be plain names, not patterns']);
    });

    it('should reject generators', () => {
      expect(rulesOf('function* h(a, b, c, d) { yield 1; }')).toEqual([
        'handler-signature',
      ]);
    });

    it('should reject use of arguments', () => {
      expect(
        rulesOf('function h(a, b, c, d) { return [arguments[0], {}]; }')
      ).toEqual(['handler-signature']);
    });
  });

  describe('Reporting', () => {
    it('should report every violation in source order', () => {
      const violations = rejectedBy(
        "import path from 'path';\nfunction bad(a, b) {\n  return [process.env.NEXT, {}];\n}\nconst extra = 1;"
      );

      expect(
        violations.map((v) => [v.rule, v.location.line, v.location.column])
      ).toEqual([
        ['no-import', 1, 0],
        ['handler-signature', 2, 0],
        ['blocked-name', 3, 10],
        ['single-definition', 5, 0],
      ]);
    });

    it('should report unparsable source as one syntax violation', () => {
      const violations = rejectedBy(
        'function broken(a, b, c, d) {\n  return [ }'
      );

      expect(violations).toHaveLength(1);
      expect(violations[0].rule).toBe('syntax');
      expect(violations[0].location.line).toBe(2);
    });

    it('should throw StepValidationError from assertValid', () => {
      let caught: unknown;
      try {
        validator.assertValid("function bad2(a, b) { return ['x', {}]; }", 'bad2');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(StepValidationError);
      if (caught instanceof StepValidationError) {
        expect(caught.stateId).toBe('bad2');
        expect(caught.violations.map((v) => v.rule)).toEqual([
          'handler-signature',
        ]);
        expect(caught.message).toBe(
          'Inline handler for state "bad2" was rejected:\n' +
            '  1:0 handler-signature handler "bad2" must take exactly 4 parameters (chatId, userInput, context, sender), found 2'
        );
      }
    });

    it('should return the handler metadata from assertValid', () => {
      expect(
        validator.assertValid(
          "function start(chatId, userInput, context, sender) { return ['next', {}]; }",
          'start'
        )
      ).toEqual({
        name: 'start',
        parameters: ['chatId', 'userInput', 'context', 'sender'],
        isAsync: false,
      });
    });
  });
});
