// ─────────────────────────────────────────────
//  Typed Event Bus
//  Observers subscribe here; nothing in the simulation
//  depends on a listener being present.
// ─────────────────────────────────────────────

import type { ActionResult, GameActionType } from '@/engine/state/actions/GameAction';
import type { LogClass } from './Logger';

/** Centralised map of all simulation events and their payload types */
export interface SimEventMap {
  // Action pipeline
  actionApplied:  { type: GameActionType; actorId: string; result: ActionResult };
  actionRejected: { type: GameActionType; actorId: string; reason: string };

  // Entity lifecycle
  entityDefeated: { entityId: string; byId: string };

  // Quests
  questAssigned:  { entityId: string; questId: string };
  questCompleted: { entityId: string; questId: string; tick: number };

  // Clock
  tickAdvanced:   { tick: number };

  // Logging
  logMessage:     { text: string; cls: LogClass };
}

type Listener<T> = (payload: T) => void;

class TypedEventBus {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  private listeners: Map<string, Listener<any>[]> = new Map();

  on<K extends keyof SimEventMap>(
    event: K,
    listener: Listener<SimEventMap[K]>,
  ): void {
    const arr = this.listeners.get(event);
    if (arr) arr.push(listener);
    else this.listeners.set(event, [listener]);
  }

  off<K extends keyof SimEventMap>(
    event: K,
    listener: Listener<SimEventMap[K]>,
  ): void {
    const arr = this.listeners.get(event);
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof SimEventMap>(event: K, payload: SimEventMap[K]): void {
    const arr = this.listeners.get(event);
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners (test teardown) */
  clear(): void {
    this.listeners.clear();
  }
}

/** Singleton event bus — import this directly in any system */
export const EventBus = new TypedEventBus();
