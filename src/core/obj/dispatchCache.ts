// src/core/obj/dispatchCache.ts
// Member lookups cached by (classId, layoutVersion, name)

import { DEFAULT_RUNTIME_LIMITS } from "../config/config";
import type { ObjClass } from "./class";
import type { ObjRecord } from "./record";

export type DispatchCacheStats = {
  hits: number;
  misses: number;
  size: number;
  clears: number;
};

/**
 * A declaration on a class or any ancestor bumps the class's layout
 * version, so entries keyed on an older version are never hit again.
 * Misses are not cached. The map is cleared when it reaches capacity.
 */
export class DispatchCache {
  private readonly entries = new Map<string, ObjRecord>();
  private hits = 0;
  private misses = 0;
  private clears = 0;

  constructor(readonly capacity: number = DEFAULT_RUNTIME_LIMITS.dispatchCacheSize) {}

  static keyOf(cls: ObjClass, name: string): string {
    return `${cls.classId}:${cls.layoutVersion}:${name}`;
  }

  lookup(cls: ObjClass, name: string): ObjRecord | null {
    const key = DispatchCache.keyOf(cls, name);
    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }
    this.misses++;
    const record = cls.getInstanceMemberOrNull(name);
    if (record) {
      if (this.entries.size >= this.capacity) {
        this.entries.clear();
        this.clears++;
      }
      this.entries.set(key, record);
    }
    return record;
  }

  stats(): DispatchCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size, clears: this.clears };
  }

  clear(): void {
    this.entries.clear();
  }
}
