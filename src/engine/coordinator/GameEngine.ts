// ─────────────────────────────────────────────
//  GameEngine — drives discrete simulation steps
//  One state only ("ready to step"); nothing is carried between steps
//  except the world itself and the brain registrations.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { ActionResult, GameAction } from '@/engine/state/actions/GameAction';
import { checkAction, executeAction } from '@/engine/state/actions/ActionPipeline';
import type { AgentBrain } from '@/engine/systems/ai/AgentBrain';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

export class GameEngine {
  /** Map keeps registration order; re-registering keeps the original slot */
  private readonly brains = new Map<string, AgentBrain>();

  constructor(readonly world: WorldState) {}

  registerBrain(actorId: string, brain: AgentBrain): void {
    this.brains.set(actorId, brain);
  }

  unregisterBrain(actorId: string): boolean {
    return this.brains.delete(actorId);
  }

  get actorIds(): string[] {
    return [...this.brains.keys()];
  }

  /**
   * Gate an action on its precondition, then execute it. Rejected intents
   * are logged as `action_invalid:<TYPE>:<actor>` and never reach execute.
   */
  applyAction(action: GameAction): ActionResult {
    const reason = checkAction(this.world, action);
    if (reason !== null) {
      this.world.logEvent(`action_invalid:${action.type}:${action.actorId}`, reason, action.actorId);
      Logger.log(`${action.type} by ${action.actorId} rejected: ${reason}`, 'invalid');
      EventBus.emit('actionRejected', { type: action.type, actorId: action.actorId, reason });
      return { status: 'error', detail: reason };
    }

    const result = executeAction(this.world, action);
    EventBus.emit('actionApplied', { type: action.type, actorId: action.actorId, result });
    return result;
  }

  /**
   * One tick: every registered actor in registration order, every proposed
   * action in the order its brain returned them. Later actors observe the
   * mutations of earlier ones. The clock advances exactly once.
   */
  step(): ActionResult[] {
    const results: ActionResult[] = [];
    for (const [actorId, brain] of this.brains) {
      for (const action of brain.decide(this.world, actorId)) {
        results.push(this.applyAction(action));
      }
    }
    this.world.tick();
    return results;
  }

  /** Run `steps` consecutive ticks and return each tick's results */
  run(steps: number): ActionResult[][] {
    const history: ActionResult[][] = [];
    for (let i = 0; i < steps; i++) {
      history.push(this.step());
    }
    return history;
  }
}
