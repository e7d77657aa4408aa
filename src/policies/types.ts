import type { Behavior, MeetingStep, Phase, Role } from '../types.js';
import type { ActionIntent } from '../actions/types.js';
import type { MemoryItem } from '../model/memory.js';
import type { Statement } from '../model/statement.js';
import type { WorldState } from '../knowledge/worlds.js';
import type { Rng } from '../utils.js';

/** What a policy may read about the agent it decides for. */
export interface BeliefView {
  readonly id: string;
  readonly role: Role;
  readonly behavior: Behavior;
  readonly location: string | null;
  readonly worlds: readonly WorldState[];
  readonly memory: readonly MemoryItem[];
  suspicionOf(id: string): number;
  suspicionEntries(): Array<[string, number]>;
  isAlive(): boolean;
}

/** Another agent as everyone can see it. */
export interface PublicAgent {
  readonly id: string;
  readonly alive: boolean;
  readonly location: string | null;
}

export interface MeetingView {
  readonly step: MeetingStep;
  readonly convenerId: string | null;
  // Rooms whose bodies triggered this meeting (empty for a timer meeting).
  readonly bodyLocations: readonly string[];
  readonly preMeetingLocations: Readonly<Record<string, string | null>>;
}

export interface RoomView {
  readonly meetingRoom: string;
  has(room: string): boolean;
  isPlayable(room: string): boolean;
  neighbors(room: string): string[];
  playableRooms(): string[];
}

export interface WorldView {
  readonly time: number;
  readonly phase: Phase;
  // Ascending id order.
  readonly agents: readonly PublicAgent[];
  readonly rooms: RoomView;
  readonly timeSinceLastMeeting: number;
  readonly emergencyCooldown: number;
  readonly meeting: MeetingView | null;
  corpsesAt(room: string): string[];
}

/** Everything a decision may depend on. Randomness is lent, never owned. */
export interface PolicyContext {
  readonly view: WorldView;
  readonly rng: Rng;
}

export interface Policy {
  readonly role: Role;
  chooseAction(agent: BeliefView, ctx: PolicyContext): ActionIntent;
  // Victim to strike between scheduled actions, or null. Must not draw from `ctx.rng`.
  chooseKill(agent: BeliefView, ctx: PolicyContext): string | null;
  chooseStatement(agent: BeliefView, ctx: PolicyContext): Statement | null;
  // Target id, or null to abstain.
  chooseVote(agent: BeliefView, ctx: PolicyContext): string | null;
}
