// ─────────────────────────────────────────────
//  Faction — authoring record with a reputation table
// ─────────────────────────────────────────────

export interface Faction {
  id: string;
  name: string;
  description: string;
  /** Entity or faction id → standing */
  reputation: Record<string, number>;
}
