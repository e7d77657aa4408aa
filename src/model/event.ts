import { z } from 'zod';
import { VisibilitySchema } from '../types.js';
import type { Visibility } from '../types.js';
import { parseOrThrow } from '../utils.js';
import { StatementSchema, formatStatement } from './statement.js';
import type { Statement } from './statement.js';

/** Actor id used for events the meeting announces on its own (timer-triggered meetings). */
export const SYSTEM_ACTOR = 'system';

export interface VoteOutcome {
  readonly ejectedId: string | null;
  // voter id -> target id, or null for an abstention
  readonly votes: Readonly<Record<string, string | null>>;
  readonly gameContinues: boolean;
  // Dead and living ids right after the ejection was applied.
  readonly deadIds: readonly string[];
  readonly livingIds: readonly string[];
}

interface EventBase {
  readonly seq: number;
  readonly actor: string;
  // null once the event has no physical place (e.g. a meeting result).
  readonly location: string | null;
  readonly witnesses: readonly string[];
  readonly timestamp: number;
  readonly visibility: Visibility;
}

export type EnterEvent = EventBase & { readonly action: 'enter' };
export type KillEvent = EventBase & { readonly action: 'kill'; readonly payload: { readonly target: string } };
export type SabotageEvent = EventBase & { readonly action: 'sabotage' };
export type ReportEvent = EventBase & { readonly action: 'report' };
export type SayEvent = EventBase & { readonly action: 'say'; readonly payload: Statement };
export type VoteResultEvent = EventBase & { readonly action: 'vote_result'; readonly payload: VoteOutcome };

export type GameEvent = EnterEvent | KillEvent | SabotageEvent | ReportEvent | SayEvent | VoteResultEvent;

const base = {
  seq: z.number().int().nonnegative(),
  actor: z.string().min(1),
  location: z.string().min(1).nullable(),
  witnesses: z.array(z.string().min(1)),
  timestamp: z.number().nonnegative(),
  visibility: VisibilitySchema,
};

const GameEventSchema = z.discriminatedUnion('action', [
  z.object({ ...base, action: z.literal('enter') }),
  z.object({ ...base, action: z.literal('kill'), payload: z.object({ target: z.string().min(1) }) }),
  z.object({ ...base, action: z.literal('sabotage') }),
  z.object({ ...base, action: z.literal('report') }),
  z.object({ ...base, action: z.literal('say'), payload: StatementSchema }),
  z.object({
    ...base,
    action: z.literal('vote_result'),
    payload: z.object({
      ejectedId: z.string().min(1).nullable(),
      votes: z.record(z.string(), z.string().nullable()),
      gameContinues: z.boolean(),
      deadIds: z.array(z.string()),
      livingIds: z.array(z.string()),
    }),
  }),
]);

/**
 * Build an immutable event. A malformed event is a programming error, so every
 * structural problem throws here instead of travelling further.
 */
export function createEvent(input: GameEvent): GameEvent {
  parseOrThrow(GameEventSchema, input, `${String(input.action)} event`);

  if (new Set(input.witnesses).size !== input.witnesses.length) {
    throw new Error(`Invalid ${input.action} event: duplicate witness ids`);
  }
  if (input.witnesses.includes(input.actor)) {
    throw new Error(`Invalid ${input.action} event: actor "${input.actor}" listed as its own witness`);
  }
  if (input.action === 'kill' && input.payload.target === input.actor) {
    throw new Error('Invalid kill event: actor and target are the same agent');
  }
  if (input.action === 'say' && input.payload.speaker !== input.actor) {
    throw new Error(`Invalid say event: speaker "${input.payload.speaker}" is not the actor "${input.actor}"`);
  }

  return Object.freeze({ ...input, witnesses: Object.freeze([...input.witnesses]) });
}

export function describeEvent(e: GameEvent): string {
  switch (e.action) {
    case 'enter':
      return `${e.actor} entered ${e.location ?? 'somewhere'}`;
    case 'kill':
      return `${e.actor} killed ${e.payload.target} in ${e.location ?? 'somewhere'}`;
    case 'sabotage':
      return `${e.actor} sabotaged ${e.location ?? 'something'}`;
    case 'report':
      return `${e.actor} called a meeting from ${e.location ?? 'somewhere'}`;
    case 'say':
      return formatStatement(e.payload);
    case 'vote_result':
      return e.payload.ejectedId ? `${e.payload.ejectedId} was ejected` : 'Nobody was ejected';
  }
}
