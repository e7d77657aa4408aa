import type { GameResult, LogType, MeetingStep, Phase, Role, SimConfig } from '../types.js';
import { resolveAgentIds } from '../types.js';
import { Agent } from '../agent.js';
import { RoomMap } from '../rooms.js';
import { logger } from '../logger.js';
import { createEvent, describeEvent, SYSTEM_ACTOR } from '../model/event.js';
import type { GameEvent } from '../model/event.js';
import { createMemoryItem } from '../model/memory.js';
import type { Certainty, SourceType } from '../model/memory.js';
import { initialWorldsFor } from '../knowledge/worlds.js';
import type { WorldState } from '../knowledge/worlds.js';
import { policyForRole } from '../policies/index.js';
import type { Policy, PolicyContext, PolicyOverrides, WorldView } from '../policies/index.js';
import { PlayingPhase } from '../phases/playingPhase.js';
import { MeetingPhase } from '../phases/meetingPhase.js';
import type { MeetingSession } from '../phases/meetingPhase.js';
import { byId, mulberry32, pickOne, shuffleInPlace, uniform } from '../utils.js';
import type { DistributiveOmit, Rng } from '../utils.js';

export type EventDraft = DistributiveOmit<GameEvent, 'seq' | 'timestamp'>;

export interface WorldOptions {
  // Replace the default policy for every agent of a role.
  policies?: PolicyOverrides;
  // Replace the policy of individual agents; wins over `policies`.
  agentPolicies?: Record<string, Policy>;
  rng?: Rng;
}

export interface AgentSnapshot {
  id: string;
  role: Role;
  lifeState: Agent['lifeState'];
  behavior: Agent['behavior'];
  location: string | null;
  worlds: readonly WorldState[];
  suspicion: Array<[string, number]>;
  memory: Array<{
    seq: number;
    description: string;
    sourceType: SourceType;
    sourceId: string | null;
    certainty: Certainty;
  }>;
}

export interface WorldSnapshot {
  phase: Phase;
  elapsedTime: number;
  turnCount: number;
  result: GameResult | null;
  timeUntilMeeting: number;
  meeting: { step: MeetingStep; convenerId: string | null; queue: string[] } | null;
  rooms: string[];
  meetingRoom: string;
  agents: AgentSnapshot[];
}

const LOG_TYPE_BY_ACTION: Record<GameEvent['action'], LogType> = {
  enter: 'MOVE',
  kill: 'ACTION',
  sabotage: 'ACTION',
  report: 'ACTION',
  say: 'SAY',
  vote_result: 'VOTE',
};

export class World {
  readonly config: SimConfig;
  readonly rooms: RoomMap;
  // Ascending id order; every deterministic iteration goes through this list.
  readonly agents: Agent[];
  readonly rng: Rng;

  currentPhase: Phase = 'PLAYING';
  elapsedTime = 0;
  turnCount = 0;
  result: GameResult | null = null;
  meeting: MeetingSession | null = null;
  lastMeetingEndTime = 0;

  private readonly agentsById = new Map<string, Agent>();
  private readonly policies = new Map<string, Policy>();
  private readonly eventLog: GameEvent[] = [];
  private nextSeq = 0;

  private playingPhaseRunner = new PlayingPhase();
  private meetingPhaseRunner = new MeetingPhase();

  constructor(config: SimConfig, options: WorldOptions = {}) {
    this.config = config;
    this.rooms = new RoomMap(config.rooms, config.meeting_room);
    this.rng = options.rng ?? mulberry32(config.seed ?? Date.now());

    const ids = [...resolveAgentIds(config)].sort(byId);
    const truth = this.assignRoles(ids);

    logger.setKnownAgents(ids);
    logger.setAgentRoles(truth);

    const playable = this.rooms.playableRooms();
    this.agents = ids.map(id => {
      const role = truth[id];
      if (role === undefined) throw new Error(`No role assigned to "${id}"`);
      const location = config.start_locations?.[id] ?? pickOne(playable, this.rng);
      if (location === undefined) throw new Error('No playable room to start in');
      const agent = new Agent({
        id,
        role,
        location,
        agentIds: ids,
        badCount: config.bad_count,
        worlds: initialWorldsFor(id, truth),
      });
      agent.nextActionTime = uniform(this.rng, config.initial_delay);
      agent.nextKillCheckTime = config.kill_check_interval;
      this.agentsById.set(id, agent);
      this.policies.set(id, options.agentPolicies?.[id] ?? policyForRole(role, options.policies));
      return agent;
    });

    for (const agent of this.agents) {
      logger.log({
        type: 'SYSTEM',
        player: agent.id,
        simTime: 0,
        content: `is ${agent.role}, starts in ${agent.location ?? '?'} with ${agent.worlds.length} candidate world(s)`,
        metadata: { role: agent.role, visibility: 'private' },
      });
    }
    this.recordPublic('SYSTEM', `Simulation starting with ${ids.length} agents (${config.bad_count} bad).`);
  }

  get events(): readonly GameEvent[] {
    return this.eventLog;
  }

  agentById(id: string): Agent | undefined {
    return this.agentsById.get(id);
  }

  policyOf(agent: Agent): Policy {
    const policy = this.policies.get(agent.id);
    if (!policy) throw new Error(`No policy for agent "${agent.id}"`);
    return policy;
  }

  listLivingAgents(): Agent[] {
    return this.agents.filter(a => a.isAlive());
  }

  /** Bodies lying in `location` that nobody has reported yet. */
  listDeadAgentsAt(location: string): Agent[] {
    return this.agents.filter(a => !a.isAlive() && a.location === location);
  }

  timeSinceLastMeeting(): number {
    return this.elapsedTime - this.lastMeetingEndTime;
  }

  advance(deltaTime: number) {
    if (!Number.isFinite(deltaTime) || deltaTime < 0) {
      throw new Error(`advance() needs a finite, non-negative delta, got ${deltaTime}`);
    }
    if (this.result) return;
    this.turnCount++;
    if (this.currentPhase === 'MEETING') {
      this.meetingPhaseRunner.update(this, deltaTime);
    } else {
      this.playingPhaseRunner.update(this, deltaTime);
    }
  }

  /**
   * Materialize an event, hand it to every recipient and log it. All recipients
   * have updated their beliefs by the time this returns.
   */
  emit(draft: EventDraft): GameEvent {
    const event = createEvent({ ...draft, seq: this.nextSeq++, timestamp: this.elapsedTime });
    this.eventLog.push(event);
    logger.log({
      type: LOG_TYPE_BY_ACTION[event.action],
      player: event.actor === SYSTEM_ACTOR ? undefined : event.actor,
      simTime: event.timestamp,
      content: describeEvent(event),
      metadata: {
        visibility: event.visibility === 'public' ? 'public' : 'private',
        seq: event.seq,
        action: event.action,
        location: event.location,
        ...(event.action === 'kill' ? { target: event.payload.target } : {}),
        ...(event.witnesses.length > 0 ? { witnesses: event.witnesses } : {}),
      },
    });
    this.distribute(event);
    return event;
  }

  distribute(event: GameEvent) {
    const observe = (id: string) => this.agentById(id)?.updateKnowledge(createMemoryItem(event, 'observation'));

    if (event.action === 'vote_result') {
      // The meeting itself announces the result: everyone still in the game sees it,
      // and so does the agent who was just thrown out.
      for (const agent of this.agents) {
        if (agent.isAlive() || agent.id === event.payload.ejectedId) observe(agent.id);
      }
      return;
    }

    switch (event.visibility) {
      case 'private':
        observe(event.actor);
        return;
      case 'witnessed':
        observe(event.actor);
        for (const id of event.witnesses) observe(id);
        return;
      case 'public':
        observe(event.actor);
        for (const agent of this.listLivingAgents()) {
          if (agent.id === event.actor) continue;
          agent.updateKnowledge(createMemoryItem(event, 'hearsay', event.actor));
        }
        return;
    }
  }

  killAgent(id: string, cause: 'killed' | 'ejected') {
    const agent = this.agentById(id);
    if (!agent) throw new Error(`Unknown agent "${id}"`);
    agent.markDead();
    // An ejected agent leaves no body behind.
    if (cause === 'ejected') agent.location = null;
    logger.log({
      type: 'DEATH',
      player: id,
      simTime: this.elapsedTime,
      content: cause === 'ejected' ? 'was ejected' : `was killed in ${agent.location ?? '?'}`,
      metadata: { visibility: cause === 'ejected' ? 'public' : 'private', cause },
    });
  }

  /** A reported body is taken away; its location becomes unknown. */
  clearBody(id: string) {
    const agent = this.agentById(id);
    if (!agent || agent.isAlive()) throw new Error(`"${id}" is not a body`);
    agent.location = null;
  }

  startMeeting(convenerId: string | null, bodyLocations: readonly string[]) {
    if (this.currentPhase === 'MEETING') throw new Error('A meeting is already in progress');
    const living = this.listLivingAgents();
    const snapshot: Record<string, string | null> = {};
    for (const agent of living) {
      snapshot[agent.id] = agent.location;
      agent.location = this.rooms.meetingRoom;
      agent.behavior = 'voting';
      agent.pendingAction = null;
    }
    this.meeting = {
      convenerId,
      queue: living.map(a => a.id).sort(byId),
      step: 'STATEMENTS',
      timer: 0,
      snapshot,
      bodyLocations: [...bodyLocations],
      votes: {},
    };
    this.currentPhase = 'MEETING';
    this.recordPublic(
      'SYSTEM',
      convenerId
        ? `Meeting called by ${convenerId}${bodyLocations.length > 0 ? ` (body found in ${bodyLocations.join(', ')})` : ''}`
        : 'Scheduled meeting'
    );
  }

  /** Leave the meeting room and go back to where everyone was. */
  endMeeting() {
    const session = this.meeting;
    if (!session) throw new Error('No meeting in progress');
    for (const agent of this.listLivingAgents()) {
      agent.location = session.snapshot[agent.id] ?? agent.location;
      agent.behavior = 'idle';
    }
    this.meeting = null;
    this.currentPhase = 'PLAYING';
    this.lastMeetingEndTime = this.elapsedTime;
  }

  /** Winner implied by who is alive right now, or null while the game goes on. */
  evaluateWin(): GameResult | null {
    const living = this.listLivingAgents();
    const bad = living.filter(a => a.role === 'bad').length;
    const good = living.length - bad;
    if (bad === 0) return 'good_win';
    if (bad >= good) return 'bad_win';
    return null;
  }

  checkWin(): boolean {
    if (this.result) return true;
    const winner = this.evaluateWin();
    if (!winner) return false;
    this.result = winner;
    this.recordPublic('WIN', `Game over: ${winner === 'good_win' ? 'good agents win' : 'bad agents win'}`);
    return true;
  }

  view(): WorldView {
    const session = this.meeting;
    return {
      time: this.elapsedTime,
      phase: this.currentPhase,
      agents: this.agents.map(a => ({ id: a.id, alive: a.isAlive(), location: a.location })),
      rooms: this.rooms,
      timeSinceLastMeeting: this.timeSinceLastMeeting(),
      emergencyCooldown: this.config.emergency_cooldown,
      meeting: session
        ? {
            step: session.step,
            convenerId: session.convenerId,
            bodyLocations: session.bodyLocations,
            preMeetingLocations: session.snapshot,
          }
        : null,
      corpsesAt: room => this.listDeadAgentsAt(room).map(a => a.id),
    };
  }

  policyContext(): PolicyContext {
    return { view: this.view(), rng: this.rng };
  }

  snapshot(): WorldSnapshot {
    const session = this.meeting;
    return {
      phase: this.currentPhase,
      elapsedTime: this.elapsedTime,
      turnCount: this.turnCount,
      result: this.result,
      timeUntilMeeting: Math.max(0, this.config.meeting_interval - this.timeSinceLastMeeting()),
      meeting: session ? { step: session.step, convenerId: session.convenerId, queue: [...session.queue] } : null,
      rooms: [...this.rooms.playableRooms(), this.rooms.meetingRoom],
      meetingRoom: this.rooms.meetingRoom,
      agents: this.agents.map(a => ({
        id: a.id,
        role: a.role,
        lifeState: a.lifeState,
        behavior: a.behavior,
        location: a.location,
        worlds: a.worlds,
        suspicion: a.suspicionEntries(),
        memory: a.memory.map(m => ({
          seq: m.event.seq,
          description: describeEvent(m.event),
          sourceType: m.sourceType,
          sourceId: m.sourceId,
          certainty: m.certainty,
        })),
      })),
    };
  }

  recordPublic(type: LogType, content: string) {
    logger.log({ type, simTime: this.elapsedTime, content, metadata: { visibility: 'public' } });
  }

  private assignRoles(ids: string[]): WorldState {
    const truth: Record<string, Role> = {};
    if (this.config.roles) {
      for (const id of ids) {
        const role = this.config.roles[id];
        if (role === undefined) throw new Error(`No role configured for "${id}"`);
        truth[id] = role;
      }
    } else {
      const shuffled = [...ids];
      shuffleInPlace(shuffled, this.rng);
      const bad = new Set(shuffled.slice(0, this.config.bad_count));
      for (const id of ids) truth[id] = bad.has(id) ? 'bad' : 'good';
    }
    return Object.freeze(truth);
  }
}
