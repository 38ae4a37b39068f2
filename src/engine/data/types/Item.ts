// ─────────────────────────────────────────────
//  Item Definition — authoring catalogue entry
// ─────────────────────────────────────────────

export interface ItemDefinition {
  id: string;
  name: string;
  description: string;
  stackable: boolean;
}
