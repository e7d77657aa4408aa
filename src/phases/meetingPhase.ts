import type { World } from '../engine/world.js';
import type { Agent } from '../agent.js';
import type { MeetingStep } from '../types.js';
import { logger } from '../logger.js';
import { SYSTEM_ACTOR } from '../model/event.js';
import type { Statement } from '../model/statement.js';

/** Everything a meeting in progress needs between ticks. Plain data only. */
export interface MeetingSession {
  convenerId: string | null;
  // Agents still owed a turn to speak, in speaking order.
  queue: string[];
  step: MeetingStep;
  timer: number;
  // Pre-meeting location of every agent alive when the meeting started.
  snapshot: Record<string, string | null>;
  bodyLocations: string[];
  // voter -> target, null for an abstention
  votes: Record<string, string | null>;
}

export function tallyVotes(votes: Readonly<Record<string, string | null>>): string | null {
  const counts = new Map<string, number>();
  for (const target of Object.values(votes)) {
    if (target !== null) counts.set(target, (counts.get(target) ?? 0) + 1);
  }
  let leader: string | null = null;
  let best = 0;
  let tied = false;
  for (const [target, n] of counts) {
    if (n > best) {
      leader = target;
      best = n;
      tied = false;
    } else if (n === best) {
      tied = true;
    }
  }
  return tied ? null : leader;
}

export class MeetingPhase {
  /**
   * Accrue meeting time and perform at most one unit of work once a full step
   * interval has passed. Simulation time does not advance during a meeting.
   */
  update(world: World, deltaTime: number) {
    const session = world.meeting;
    if (!session) throw new Error('Meeting update without a meeting session');

    session.timer += deltaTime;
    const interval = world.config.meeting_step_interval;
    if (session.timer < interval) return;
    session.timer -= interval;

    switch (session.step) {
      case 'STATEMENTS':
        this.nextStatement(world, session);
        return;
      case 'VOTING':
        this.collectVotes(world, session);
        return;
      case 'RESULT':
        this.resolve(world, session);
        return;
    }
  }

  private nextStatement(world: World, session: MeetingSession) {
    let speaker: Agent | undefined;
    while (session.queue.length > 0 && !speaker) {
      const id = session.queue.shift();
      const candidate = id === undefined ? undefined : world.agentById(id);
      if (candidate?.isAlive()) speaker = candidate;
    }

    if (speaker) {
      const statement = world.policyOf(speaker).chooseStatement(speaker, world.policyContext());
      if (statement && this.isValidStatement(world, statement, speaker.id)) {
        world.emit({
          action: 'say',
          actor: speaker.id,
          location: world.rooms.meetingRoom,
          witnesses: [],
          visibility: 'public',
          payload: statement,
        });
      } else if (statement) {
        logger.log({
          type: 'SYSTEM',
          player: speaker.id,
          simTime: world.elapsedTime,
          content: `invalid statement (${statement.predicate} ${statement.subject} ${statement.value}) ignored`,
          metadata: { visibility: 'private' },
        });
      }
    }

    if (session.queue.length === 0) session.step = 'VOTING';
  }

  private isValidStatement(world: World, s: Statement, speakerId: string): boolean {
    if (s.speaker !== speakerId) return false;
    if (!world.agentById(s.subject)) return false;
    if (s.predicate === 'location') return world.rooms.has(s.value);
    return true;
  }

  private collectVotes(world: World, session: MeetingSession) {
    world.recordPublic('SYSTEM', '--- Voting ---');
    const votes: Record<string, string | null> = {};
    for (const voter of world.listLivingAgents()) {
      const choice = world.policyOf(voter).chooseVote(voter, world.policyContext());
      const target = choice === null ? null : world.agentById(choice);
      const valid = target !== null && target !== undefined && target.isAlive() && target.id !== voter.id;
      if (choice !== null && !valid) {
        logger.log({
          type: 'SYSTEM',
          player: voter.id,
          simTime: world.elapsedTime,
          content: `invalid vote for ${choice} counted as abstain`,
          metadata: { visibility: 'private' },
        });
      }
      votes[voter.id] = valid ? choice : null;
      logger.log({
        type: 'VOTE',
        player: voter.id,
        simTime: world.elapsedTime,
        content: valid ? `votes for ${choice}` : 'abstains',
        metadata: { visibility: 'public', ...(valid && choice !== null ? { vote: choice } : {}) },
      });
    }
    session.votes = votes;
    session.step = 'RESULT';
  }

  private resolve(world: World, session: MeetingSession) {
    const ejectedId = tallyVotes(session.votes);
    if (ejectedId) world.killAgent(ejectedId, 'ejected');

    const gameContinues = world.evaluateWin() === null;
    world.emit({
      action: 'vote_result',
      actor: session.convenerId ?? SYSTEM_ACTOR,
      location: world.rooms.meetingRoom,
      witnesses: [],
      visibility: 'public',
      payload: {
        ejectedId,
        votes: { ...session.votes },
        gameContinues,
        deadIds: world.agents.filter(a => !a.isAlive()).map(a => a.id),
        livingIds: world.listLivingAgents().map(a => a.id),
      },
    });

    if (world.checkWin()) return;
    world.endMeeting();
  }
}
