/**
 * Rule identifiers and violation records reported by the source validator
 */

export const ViolationRule = {
  /** Source text does not parse */
  Syntax: 'syntax',
  /** Import declaration, dynamic import, import.meta or require/module/exports */
  NoImport: 'no-import',
  /** Reference to a name in the deny set */
  BlockedName: 'blocked-name',
  /** Computed member or pattern key whose name is only known at run time */
  DynamicKey: 'dynamic-key',
  /** Anything at top level besides the one handler declaration */
  SingleDefinition: 'single-definition',
  /** Handler parameters are not four plain identifiers */
  HandlerSignature: 'handler-signature',
} as const;

export type ViolationRule = (typeof ViolationRule)[keyof typeof ViolationRule];

/**
 * Position in the inspected source
 */
export type SourceLocation = {
  /** 1-based line */
  line: number;
  /** 0-based column */
  column: number;
  /** 0-based character offset */
  offset: number;
};

export type Violation = {
  rule: ViolationRule;
  message: string;
  location: SourceLocation;
};

/**
 * Shape of the accepted handler declaration
 */
export type HandlerMetadata = {
  name: string;
  parameters: readonly string[];
  isAsync: boolean;
};

export type ValidationVerdict =
  | { accepted: true; handler: HandlerMetadata }
  | { accepted: false; violations: readonly Violation[] };

/**
 * Render a violation as `line:column rule message`
 */
export function formatViolation(violation: Violation): string {
  const { line, column } = violation.location;
  return `${line}:${column} ${violation.rule} ${violation.message}`;
}
