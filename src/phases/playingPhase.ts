import type { World } from '../engine/world.js';
import { applyAction } from '../actions/apply.js';
import { uniform } from '../utils.js';

export class PlayingPhase {
  update(world: World, deltaTime: number) {
    world.elapsedTime += deltaTime;
    const config = world.config;

    if (world.timeSinceLastMeeting() >= config.meeting_interval) {
      world.startMeeting(null, []);
      return;
    }

    for (const agent of world.agents) {
      // An action earlier in this tick may have called a meeting or ended the game.
      if (world.currentPhase !== 'PLAYING' || world.result) return;
      if (!agent.isAlive()) continue;

      const now = world.elapsedTime;
      const policy = world.policyOf(agent);

      if (agent.role === 'bad' && now >= agent.nextKillCheckTime) {
        agent.nextKillCheckTime = now + config.kill_check_interval;
        // Between scheduled actions only an opportunity to kill is taken.
        const target = policy.chooseKill(agent, world.policyContext());
        if (target) {
          applyAction(world, agent, { kind: 'kill', target });
          continue;
        }
      }

      if (now >= agent.nextActionTime) {
        const intent = policy.chooseAction(agent, world.policyContext());
        agent.pendingAction = intent;
        agent.lastActionTime = now;
        agent.nextActionTime = now + uniform(world.rng, config.action_delay);
        applyAction(world, agent, intent);
        agent.pendingAction = null;
      }
    }
  }
}
