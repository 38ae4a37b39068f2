// ─────────────────────────────────────────────
//  Method Library — named, tag-indexed mechanics
//  Ad hoc rules and tactics registered at runtime. Invoking an
//  unregistered name is a wiring bug and throws.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { Entity } from '@/engine/data/types/Entity';
import { UnknownMethodError } from '@/engine/utils/errors';

export type MethodHandler = (world: WorldState, caster: Entity, target: Entity | undefined) => string;

export interface MethodEntry {
  readonly name: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly handler: MethodHandler;
}

export class MethodLibrary {
  private readonly methods = new Map<string, MethodEntry>();

  /** Registers or replaces the method under `name` */
  register(name: string, description: string, tags: Iterable<string>, handler: MethodHandler): MethodEntry {
    const entry: MethodEntry = { name, description, tags: [...tags], handler };
    this.methods.set(name, entry);
    return entry;
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  get(name: string): MethodEntry | undefined {
    return this.methods.get(name);
  }

  listByTag(tag: string): MethodEntry[] {
    return [...this.methods.values()].filter(m => m.tags.includes(tag));
  }

  run(name: string, world: WorldState, caster: Entity, target?: Entity): string {
    const entry = this.methods.get(name);
    if (!entry) throw new UnknownMethodError(name);
    return entry.handler(world, caster, target);
  }
}
