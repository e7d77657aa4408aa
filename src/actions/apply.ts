import type { Agent } from '../agent.js';
import type { World } from '../engine/world.js';
import { logger } from '../logger.js';
import type { GameEvent } from '../model/event.js';
import type { ActionIntent } from './types.js';
import { describeIntent } from './types.js';

function reject(world: World, agent: Agent, intent: ActionIntent, reason: string): null {
  logger.log({
    type: 'SYSTEM',
    player: agent.id,
    simTime: world.elapsedTime,
    content: `cannot ${describeIntent(intent)} (${reason}); ignored`,
    metadata: { visibility: 'private' },
  });
  return null;
}

function onlookers(world: World, room: string, exclude: readonly string[]): string[] {
  return world
    .listLivingAgents()
    .filter(a => a.location === room && !exclude.includes(a.id))
    .map(a => a.id);
}

/**
 * Validate a policy decision against the current world and carry it out.
 * Returns the event it produced, or null for silent or rejected actions.
 */
export function applyAction(world: World, agent: Agent, intent: ActionIntent): GameEvent | null {
  if (world.currentPhase !== 'PLAYING' || world.result) return reject(world, agent, intent, 'not playing');
  if (!agent.isAlive()) return reject(world, agent, intent, 'dead');
  const here = agent.location;
  if (here === null) return reject(world, agent, intent, 'nowhere');

  switch (intent.kind) {
    case 'enter': {
      if (!world.rooms.isPlayable(intent.room)) return reject(world, agent, intent, 'no such room');
      if (!world.rooms.areConnected(here, intent.room)) return reject(world, agent, intent, `not reachable from ${here}`);
      agent.location = intent.room;
      agent.behavior = 'idle';
      const witnesses = onlookers(world, intent.room, [agent.id]);
      return world.emit({
        action: 'enter',
        actor: agent.id,
        location: intent.room,
        witnesses,
        visibility: witnesses.length > 0 ? 'witnessed' : 'private',
      });
    }

    case 'kill': {
      if (agent.role !== 'bad') return reject(world, agent, intent, 'not a killer');
      const victim = world.agentById(intent.target);
      if (!victim || !victim.isAlive()) return reject(world, agent, intent, 'no living target');
      if (victim.id === agent.id) return reject(world, agent, intent, 'self');
      if (victim.location !== here) return reject(world, agent, intent, 'target not here');
      const witnesses = onlookers(world, here, [agent.id, victim.id]);
      world.killAgent(victim.id, 'killed');
      agent.behavior = 'idle';
      const event = world.emit({
        action: 'kill',
        actor: agent.id,
        location: here,
        witnesses,
        visibility: witnesses.length > 0 ? 'witnessed' : 'private',
        payload: { target: victim.id },
      });
      world.checkWin();
      return event;
    }

    case 'sabotage': {
      if (agent.role !== 'bad') return reject(world, agent, intent, 'not a saboteur');
      agent.behavior = 'idle';
      if (world.config.sabotage_visibility === 'public') {
        return world.emit({ action: 'sabotage', actor: agent.id, location: here, witnesses: [], visibility: 'public' });
      }
      const witnesses = onlookers(world, here, [agent.id]);
      return world.emit({
        action: 'sabotage',
        actor: agent.id,
        location: here,
        witnesses,
        visibility: witnesses.length > 0 ? 'witnessed' : 'private',
      });
    }

    case 'report': {
      const bodies = world.listDeadAgentsAt(here).map(a => a.id);
      if (bodies.length === 0 && world.timeSinceLastMeeting() < world.config.emergency_cooldown) {
        return reject(world, agent, intent, 'emergency button cooling down');
      }
      const event = world.emit({ action: 'report', actor: agent.id, location: here, witnesses: [], visibility: 'public' });
      for (const id of bodies) world.clearBody(id);
      world.startMeeting(agent.id, bodies.length > 0 ? [here] : []);
      return event;
    }

    case 'task':
      agent.behavior = 'task';
      return null;

    case 'idle':
      agent.behavior = 'idle';
      return null;
  }
}
