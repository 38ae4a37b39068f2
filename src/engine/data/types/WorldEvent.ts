// ─────────────────────────────────────────────
//  World Event — append-only log record
// ─────────────────────────────────────────────

export interface WorldEvent {
  /** Clock value at the time of logging */
  readonly tick: number;
  /** Action name ("move", "gather", ...) or "action_invalid:<TYPE>:<actor>" */
  readonly kind: string;
  readonly detail: string;
  readonly actorId?: string;
}
