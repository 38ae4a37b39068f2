// ─────────────────────────────────────────────
//  Hard failures — wiring bugs, not game conditions.
//  Game conditions are reported as ActionResult instead.
// ─────────────────────────────────────────────

export class SimulationError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownMethodError extends SimulationError {
  constructor(public readonly methodName: string) {
    super(`Unknown method: ${methodName}`, 'UNKNOWN_METHOD');
  }
}
