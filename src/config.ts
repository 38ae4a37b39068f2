// ─────────────────────────────────────────────
//  Simulation constants and runtime settings
// ─────────────────────────────────────────────

export const MAX_HP   = 100;
export const MAX_MANA = 50;

export const DEFAULT_HP   = MAX_HP;
export const DEFAULT_MANA = MAX_MANA;

export interface BrainTuning {
  /** Rest when hp is at or below this value */
  restThreshold: number;
  attackDamage: number;
  gatherResource: string;
  gatherAmount: number;
  restHp: number;
  restMana: number;
  /** Empty = any live co-located entity is a target */
  hostileTags: string[];
}

/** Reference policy tuning. Every field can be overridden per brain. */
export const BRAIN_DEFAULTS: Readonly<BrainTuning> = {
  restThreshold: 30,
  attackDamage: 8,
  gatherResource: 'wood',
  gatherAmount: 1,
  restHp: 10,
  restMana: 5,
  hostileTags: [],
};

/** SIM_LOG=silent turns off console echo (EventBus still receives every line). */
export const LOG_CONFIG = {
  console: (process.env['SIM_LOG'] ?? 'console') !== 'silent',
};
