import { z } from 'zod';
import { RoleSchema } from '../types.js';
import { parseOrThrow } from '../utils.js';

export const StatementSchema = z.discriminatedUnion('predicate', [
  z.object({
    predicate: z.literal('role'),
    subject: z.string().min(1),
    value: RoleSchema,
    speaker: z.string().min(1),
    timestamp: z.number().nonnegative(),
  }),
  z.object({
    predicate: z.literal('location'),
    subject: z.string().min(1),
    // Room name.
    value: z.string().min(1),
    speaker: z.string().min(1),
    timestamp: z.number().nonnegative(),
  }),
  z.object({
    predicate: z.literal('did'),
    subject: z.string().min(1),
    // Action tag, e.g. "task" or "kill".
    value: z.string().min(1),
    speaker: z.string().min(1),
    timestamp: z.number().nonnegative(),
  }),
]);

export type Statement = Readonly<z.infer<typeof StatementSchema>>;
export type StatementInput = z.input<typeof StatementSchema>;

/**
 * Build an immutable statement. Throws on a malformed predicate/value pair.
 */
export function createStatement(input: StatementInput): Statement {
  return Object.freeze(parseOrThrow(StatementSchema, input, 'statement'));
}

export function formatStatement(s: Statement): string {
  switch (s.predicate) {
    case 'role':
      return `${s.speaker} says: ${s.subject}'s role is ${s.value}`;
    case 'location':
      return s.subject === s.speaker
        ? `${s.speaker} says: I was in ${s.value}`
        : `${s.speaker} says: I saw ${s.subject} in ${s.value}`;
    case 'did':
      return s.subject === s.speaker
        ? `${s.speaker} says: I did ${s.value}`
        : `${s.speaker} says: ${s.subject} did ${s.value}`;
  }
}
