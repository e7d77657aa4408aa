import { z } from 'zod';

// --- Configuration Types ---

export const RoleSchema = z.enum(['good', 'bad']);
export type Role = z.infer<typeof RoleSchema>;

export const VisibilitySchema = z.enum(['private', 'witnessed', 'public']);
export type Visibility = z.infer<typeof VisibilitySchema>;

export const RoomConfigSchema = z.object({
  name: z.string().min(1),
  connections: z.array(z.string().min(1)).default([]),
});
export type RoomConfig = z.infer<typeof RoomConfigSchema>;

const DelayRangeSchema = z
  .tuple([z.number().nonnegative(), z.number().nonnegative()])
  .refine(([min, max]) => min <= max, { message: 'delay range must be [min, max] with min <= max' });

export const DEFAULT_ROOMS: RoomConfig[] = [
  { name: 'Reactor', connections: ['Medbay', 'Navigation'] },
  { name: 'Medbay', connections: ['Reactor', 'Storage'] },
  { name: 'Navigation', connections: ['Reactor', 'Storage'] },
  { name: 'Storage', connections: ['Medbay', 'Navigation'] },
  // The meeting room stays unconnected so nobody can walk in during a meeting.
  { name: 'Cafeteria', connections: [] },
];

const SimConfigObjectSchema = z.object({
  // Explicit agent ids. If omitted, `agent_count` ids are generated as npc0..npcN-1.
  agents: z.array(z.string().min(1)).optional(),
  agent_count: z.number().int().min(3).default(8),
  bad_count: z.number().int().positive().default(2),
  // Forced role assignment (must cover every agent when present).
  roles: z.record(z.string(), RoleSchema).optional(),
  // Forced starting rooms; agents not listed start in a random playable room.
  start_locations: z.record(z.string(), z.string()).optional(),
  rooms: z.array(RoomConfigSchema).default(DEFAULT_ROOMS),
  meeting_room: z.string().default('Cafeteria'),
  // PLAYING time between automatic meetings (measured from the end of the last one).
  meeting_interval: z.number().positive().default(60),
  // Time between two observable meeting steps (one statement, the vote, the result).
  meeting_step_interval: z.number().positive().default(2),
  // Minimum PLAYING time since the last meeting before a good agent calls an emergency without a body.
  emergency_cooldown: z.number().nonnegative().default(15),
  // How often a bad agent re-checks for a kill opportunity between scheduled actions.
  kill_check_interval: z.number().positive().default(2),
  initial_delay: DelayRangeSchema.default([1, 5]),
  action_delay: DelayRangeSchema.default([2, 8]),
  sabotage_visibility: z.enum(['witnessed', 'public']).default('witnessed'),
  seed: z.number().int().optional(),
});

export function resolveAgentIds(config: Pick<z.infer<typeof SimConfigObjectSchema>, 'agents' | 'agent_count'>): string[] {
  return config.agents ?? Array.from({ length: config.agent_count }, (_, i) => `npc${i}`);
}

export const SimConfigSchema = SimConfigObjectSchema.superRefine((config, ctx) => {
  const issue = (message: string, path: (string | number)[]) =>
    ctx.addIssue({ code: z.ZodIssueCode.custom, message, path });

  const ids = resolveAgentIds(config);
  const idSet = new Set(ids);
  if (idSet.size !== ids.length) issue('agent ids must be unique', ['agents']);
  if (ids.length < 3) issue('at least 3 agents are required', ['agents']);
  if (idSet.has('system')) issue('"system" is reserved and cannot be an agent id', ['agents']);
  if (config.bad_count >= ids.length) issue('bad_count must be smaller than the number of agents', ['bad_count']);
  // Otherwise the bad side has already won before anything happens.
  if (config.bad_count * 2 >= ids.length) issue('bad_count must leave the good agents in the majority', ['bad_count']);

  if (config.roles) {
    for (const id of Object.keys(config.roles)) {
      if (!idSet.has(id)) issue(`roles: unknown agent "${id}"`, ['roles', id]);
    }
    const missing = ids.filter(id => config.roles?.[id] === undefined);
    if (missing.length > 0) issue(`roles: no role for ${missing.join(', ')}`, ['roles']);
    const bad = Object.values(config.roles).filter(r => r === 'bad').length;
    if (bad !== config.bad_count) issue(`roles: ${bad} bad roles assigned but bad_count is ${config.bad_count}`, ['roles']);
  }

  const roomNames = new Set(config.rooms.map(r => r.name));
  if (roomNames.size !== config.rooms.length) issue('room names must be unique', ['rooms']);
  if (!roomNames.has(config.meeting_room)) issue(`meeting_room "${config.meeting_room}" is not a room`, ['meeting_room']);
  config.rooms.forEach((room, i) => {
    for (const other of room.connections) {
      if (!roomNames.has(other)) issue(`room "${room.name}" connects to unknown room "${other}"`, ['rooms', i]);
      if (other === config.meeting_room) issue(`room "${room.name}" connects to the meeting room`, ['rooms', i]);
    }
    if (room.name === config.meeting_room && room.connections.length > 0) {
      issue('the meeting room must not connect to any other room', ['rooms', i]);
    }
  });
  if (roomNames.size - (roomNames.has(config.meeting_room) ? 1 : 0) === 0) {
    issue('at least one playable room is required besides the meeting room', ['rooms']);
  }

  for (const [id, room] of Object.entries(config.start_locations ?? {})) {
    if (!idSet.has(id)) issue(`start_locations: unknown agent "${id}"`, ['start_locations', id]);
    if (!roomNames.has(room) || room === config.meeting_room) {
      issue(`start_locations: "${room}" is not a playable room`, ['start_locations', id]);
    }
  }
});
export type SimConfig = z.infer<typeof SimConfigSchema>;
export type SimConfigInput = z.input<typeof SimConfigSchema>;

// --- Simulation State Types ---

export type LifeState = 'alive' | 'dead';

export type Behavior = 'idle' | 'task' | 'voting';

export type ActionKind = 'enter' | 'kill' | 'sabotage' | 'report' | 'say' | 'vote_result';

export type Phase = 'PLAYING' | 'MEETING';

export type MeetingStep = 'STATEMENTS' | 'VOTING' | 'RESULT';

export type GameResult = 'bad_win' | 'good_win';

// --- Logging Types ---

export type LogType = 'SYSTEM' | 'MOVE' | 'ACTION' | 'SAY' | 'VOTE' | 'DEATH' | 'WIN' | 'BELIEF';

export type LogVisibility = 'public' | 'private';

export interface SimLogMetadata {
  role?: Role;
  visibility?: LogVisibility;

  seq?: number;
  action?: ActionKind;
  target?: string;
  location?: string | null;
  vote?: string;

  // Allow additional structured fields without `any`
  [key: string]: unknown;
}

export interface SimLogEntry {
  id: string;
  timestamp: string;
  // Simulation time at which the entry was produced.
  simTime?: number;
  type: LogType;
  player?: string;
  content: string;
  metadata?: SimLogMetadata;
}
