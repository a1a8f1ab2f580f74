import type { ModuleHandle, ScriptModule } from "../jit/module";

/**
 * Attributes that must not be folded (they are mutated, or the caller asked
 * to keep them) and, after propagation, attributes that are still read.
 * Keyed by instance identity; entries are only ever added.
 */
export class PreservedAttributes {
  private readonly table = new Map<ModuleHandle, Set<string>>();

  preserve(module: ScriptModule, name: string): void {
    let names = this.table.get(module.handle);
    if (!names) {
      names = new Set();
      this.table.set(module.handle, names);
    }
    names.add(name);
  }

  isPreserved(module: ScriptModule, name: string): boolean {
    return this.table.get(module.handle)?.has(name) ?? false;
  }

  namesFor(module: ScriptModule): ReadonlySet<string> {
    return new Set(this.table.get(module.handle));
  }

  snapshot(): Map<ModuleHandle, string[]> {
    const copy = new Map<ModuleHandle, string[]>();
    for (const [handle, names] of this.table) {
      copy.set(handle, [...names].sort());
    }
    return copy;
  }
}

/**
 * State of one freezing run. Created per freezeModule call and passed to
 * every component explicitly.
 */
export interface FreezeContext {
  readonly preserved: PreservedAttributes;
}

export function createFreezeContext(): FreezeContext {
  return { preserved: new PreservedAttributes() };
}
