import type { WorldView } from '@/engine/state/WorldState';
import type { GameAction } from '@/engine/state/actions/GameAction';

/**
 * Decision policy for one actor. Must be a pure function of the view it is
 * given: propose actions, never apply them.
 */
export interface AgentBrain {
  decide(world: WorldView, actorId: string): GameAction[];
}
