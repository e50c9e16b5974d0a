import { UnknownSpeciesError } from "../errors/UnknownSpeciesError.js";
import type { Species, SpeciesDefinition, SpeciesFields } from "./types.js";

type ResolvedDefinition = { kind: string } & SpeciesFields;

function freezeSpecies(def: ResolvedDefinition): Species {
  const dependencyFiles: Record<string, readonly string[]> = {};
  for (const [group, files] of Object.entries(def.dependencyFiles)) {
    dependencyFiles[group] = Object.freeze([...files]);
  }
  const features = Object.freeze({ ...def.features });
  return Object.freeze({
    ...def,
    dependencyFiles: Object.freeze(dependencyFiles),
    activationCommand:
      typeof def.activationCommand === "function" ? def.activationCommand(features) : def.activationCommand,
    features,
    upgrades: Object.freeze([...def.upgrades]),
  });
}

/**
 * Base fields, with each field the override names replaced. A base activation
 * that depends on features sees the derived species' features.
 */
function applyOverride(kind: string, base: ResolvedDefinition, override: Partial<SpeciesFields>): ResolvedDefinition {
  return {
    kind,
    dependencyFiles: override.dependencyFiles ?? base.dependencyFiles,
    kickstart: override.kickstart ?? base.kickstart,
    refresh: override.refresh ?? base.refresh,
    welcome: override.welcome ?? base.welcome,
    activationCommand: override.activationCommand ?? base.activationCommand,
    features: override.features ?? base.features,
    upgrades: override.upgrades ?? base.upgrades,
  };
}

/**
 * Immutable kind → Species table. Derived definitions are resolved against
 * their base once, when the registry is built.
 */
export class SpeciesRegistry {
  private constructor(private readonly table: ReadonlyMap<string, Species>) {}

  static from(definitions: readonly SpeciesDefinition[]): SpeciesRegistry {
    const byKind = new Map<string, SpeciesDefinition>();
    for (const def of definitions) {
      if (byKind.has(def.kind)) throw new Error(`Duplicate species definition: ${def.kind}`);
      byKind.set(def.kind, def);
    }

    const resolved = new Map<string, ResolvedDefinition>();
    const resolve = (kind: string, chain: readonly string[]): ResolvedDefinition => {
      const done = resolved.get(kind);
      if (done) return done;
      if (chain.includes(kind)) throw new Error(`Species derivation cycle: ${[...chain, kind].join(" -> ")}`);

      const def = byKind.get(kind);
      if (!def) throw new Error(`Species ${chain[chain.length - 1]} derives from unknown species ${kind}`);

      const merged =
        def.base === undefined ? def : applyOverride(def.kind, resolve(def.base, [...chain, kind]), def.override);
      resolved.set(kind, merged);
      return merged;
    };

    const table = new Map<string, Species>();
    for (const kind of byKind.keys()) table.set(kind, freezeSpecies(resolve(kind, [])));
    return new SpeciesRegistry(table);
  }

  lookup(kind: string | null | undefined): Species {
    const species = kind ? this.table.get(kind) : undefined;
    if (!species) throw new UnknownSpeciesError(kind ?? null, this.kinds());
    return species;
  }

  has(kind: string): boolean {
    return this.table.has(kind);
  }

  kinds(): string[] {
    return [...this.table.keys()].sort();
  }
}
