import type { Behavior, LifeState, Role } from './types.js';
import type { ActionIntent } from './actions/types.js';
import type { MemoryItem } from './model/memory.js';
import { factConstraints, softDeltas } from './knowledge/rules.js';
import { eliminate, validateWorld } from './knowledge/worlds.js';
import type { WorldState } from './knowledge/worlds.js';
import { logger } from './logger.js';

export interface AgentInit {
  id: string;
  role: Role;
  location: string;
  // Every agent id in the game; worlds are checked against this closed set.
  agentIds: readonly string[];
  badCount: number;
  worlds: readonly WorldState[];
}

export class Agent {
  readonly id: string;
  readonly role: Role;
  readonly badCount: number;

  lifeState: LifeState = 'alive';
  behavior: Behavior = 'idle';
  // null once the agent's body has been cleared away.
  location: string | null;
  pendingAction: ActionIntent | null = null;

  // Scheduling state, owned by the world.
  nextActionTime = 0;
  lastActionTime = 0;
  nextKillCheckTime = 0;

  private candidateWorlds: readonly WorldState[];
  private readonly memoryLog: MemoryItem[] = [];
  private readonly suspicion = new Map<string, number>();

  constructor(init: AgentInit) {
    if (!init.agentIds.includes(init.id)) throw new Error(`Agent "${init.id}" is not in the agent id set`);
    for (const w of init.worlds) {
      validateWorld(w, init.agentIds);
      if (w[init.id] !== init.role) {
        throw new Error(`Agent "${init.id}" was given a world where it is not ${init.role}`);
      }
    }
    this.id = init.id;
    this.role = init.role;
    this.badCount = init.badCount;
    this.location = init.location;
    this.candidateWorlds = init.worlds;
    for (const other of init.agentIds) {
      if (other !== init.id) this.suspicion.set(other, 0);
    }
  }

  get worlds(): readonly WorldState[] {
    return this.candidateWorlds;
  }

  get memory(): readonly MemoryItem[] {
    return this.memoryLog;
  }

  isAlive(): boolean {
    return this.lifeState === 'alive';
  }

  suspicionOf(id: string): number {
    return this.suspicion.get(id) ?? 0;
  }

  suspicionEntries(): Array<[string, number]> {
    return Array.from(this.suspicion.entries());
  }

  markDead() {
    if (this.lifeState === 'dead') throw new Error(`Agent "${this.id}" is already dead`);
    this.lifeState = 'dead';
    this.behavior = 'idle';
    this.pendingAction = null;
  }

  /** Store a memory and immediately fold it into beliefs. */
  updateKnowledge(item: MemoryItem) {
    this.memoryLog.push(item);
    this.updateBelief(item);
  }

  updateBelief(item: MemoryItem) {
    switch (item.certainty) {
      case 'FACT':
        this.applyFact(item);
        return;
      case 'UNCERTAIN':
        this.applySoft(item);
        return;
      case 'VERIFIED':
      case 'DISPROVED':
        // No belief rule consumes revised certainties yet; see reviseCertainty().
        return;
    }
  }

  private applyFact(item: MemoryItem) {
    const constraints = factConstraints(item.event, { id: this.id, role: this.role, badCount: this.badCount });
    for (const { label, constraint } of constraints) {
      const result = eliminate(this.candidateWorlds, constraint);
      if (result.kind === 'contradiction') {
        logger.log({
          type: 'BELIEF',
          player: this.id,
          simTime: item.event.timestamp,
          content: `contradiction: "${label}" would rule out every remaining world; ignored`,
          metadata: { visibility: 'private', seq: item.event.seq, action: item.event.action },
        });
        continue;
      }
      if (result.kind === 'narrowed') {
        this.candidateWorlds = result.worlds;
        logger.log({
          type: 'BELIEF',
          player: this.id,
          simTime: item.event.timestamp,
          content: `${label}: ruled out ${result.removed}, ${result.worlds.length} world(s) left`,
          metadata: { visibility: 'private', seq: item.event.seq, action: item.event.action },
        });
      }
    }
  }

  private applySoft(item: MemoryItem) {
    for (const { subject, delta } of softDeltas(item, this.id)) {
      if (!this.suspicion.has(subject)) continue;
      this.suspicion.set(subject, Math.max(0, this.suspicionOf(subject) + delta));
    }
  }
}
