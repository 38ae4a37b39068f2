// ─────────────────────────────────────────────
//  Area Types
// ─────────────────────────────────────────────

import { RecordUtils } from '@/engine/utils/RecordUtils';

/** Resource kind → quantity still available for gathering (never negative) */
export type ResourcePool = Record<string, number>;

export interface Area {
  /** Unique key */
  name: string;
  description: string;
  /** Adjacency in stable order; not necessarily symmetric */
  neighbors: string[];
  resources: ResourcePool;
}

export function createArea(
  name: string,
  description: string,
  neighbors: Iterable<string> = [],
  resources: ResourcePool = {},
): Area {
  return {
    name,
    description,
    neighbors: [...neighbors],
    resources: RecordUtils.create(resources),
  };
}
