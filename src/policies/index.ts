import type { Role } from '../types.js';
import { badPolicy } from './badPolicy.js';
import { goodPolicy } from './goodPolicy.js';
import type { Policy } from './types.js';

export type { Policy, PolicyContext, BeliefView, WorldView, PublicAgent, MeetingView, RoomView } from './types.js';

export type PolicyOverrides = Partial<Record<Role, Policy>>;

/** Picked once per agent when the world is built. */
export function policyForRole(role: Role, overrides: PolicyOverrides = {}): Policy {
  return overrides[role] ?? (role === 'bad' ? badPolicy : goodPolicy);
}
