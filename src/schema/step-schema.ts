/**
 * Zod schemas for step documents, handler results and stored conversations
 */

import { z } from 'zod';

export const StateIdSchema = z.string().min(1, 'state id must not be empty');

/**
 * Plain key/value object; arrays and null are not contexts
 */
export const ContextSchema = z.record(z.string(), z.unknown());

/**
 * Handler result: `[nextStateId, context]`
 */
export const StepResultSchema = z.tuple([StateIdSchema, ContextSchema]);

/**
 * Step document: state id to dotted reference or inline handler source
 */
export const StepDocumentSchema = z.record(
  StateIdSchema,
  z.string().min(1, 'handler must not be empty')
);

export const ConversationSchema = z.object({
  stateId: StateIdSchema,
  context: ContextSchema,
});

export type StepDocument = z.infer<typeof StepDocumentSchema>;

/**
 * Flatten zod issues into `path: message` lines
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
