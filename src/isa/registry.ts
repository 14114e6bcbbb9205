/**
 * ISA registry and target resolver.
 *
 * The registry is an immutable name -> entry map built once from the ISA
 * table. Target strings ("gfx900;gfx906:xnack-") resolve against it by exact
 * name; feature suffixes are significant.
 */
import type { Logger } from "../shared/logger.js";
import { formatIsaEntry, shortGfx, shortIsa } from "./entry.js";
import type { IsaEntry } from "./entry.js";
import { IsaTableError, loadIsaTable } from "./table.js";

export const TARGET_SEPARATOR = ";";

export class UnknownIsaError extends Error {
  /** The target token that has no registry entry. */
  readonly isa: string;

  constructor(isa: string) {
    super(`Unknown GPU ISA "${isa}"`);
    this.name = "UnknownIsaError";
    this.isa = isa;
  }
}

export interface ResolvedTargets {
  /** Variant families to keep, e.g. "gfx906". */
  shortIsas: ReadonlySet<string>;
  /** Generations to keep, e.g. "gfx9". */
  shortGfxs: ReadonlySet<string>;
}

export class IsaRegistry {
  private readonly byName: ReadonlyMap<string, IsaEntry>;
  private readonly shortIsaNames: ReadonlySet<string>;

  constructor(entries: Iterable<IsaEntry>) {
    const byName = new Map<string, IsaEntry>();
    for (const entry of entries) {
      if (byName.has(entry.name)) {
        throw new IsaTableError(`Duplicate ISA entry "${entry.name}"`);
      }
      byName.set(entry.name, Object.freeze({ ...entry }));
    }
    this.byName = byName;
    this.shortIsaNames = new Set([...byName.values()].map(shortIsa));
  }

  get size(): number {
    return this.byName.size;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Exact-match lookup.
   *
   * @throws UnknownIsaError when `name` is not a registry key.
   */
  lookup(name: string): IsaEntry {
    const entry = this.byName.get(name);
    if (!entry) {
      throw new UnknownIsaError(name);
    }
    return entry;
  }

  /** All entries in table order. */
  entries(): IsaEntry[] {
    return [...this.byName.values()];
  }

  /** Every feature-suffix variant of one family, e.g. all "gfx906*" entries. */
  byShortIsa(family: string): IsaEntry[] {
    return this.entries().filter((entry) => shortIsa(entry) === family);
  }

  isKnownShortIsa(family: string): boolean {
    return this.shortIsaNames.has(family);
  }

  /** Generation name -> major version, e.g. "gfx10" -> 10, in table order. */
  knownShortGfxs(): Map<string, number> {
    const generations = new Map<string, number>();
    for (const entry of this.byName.values()) {
      generations.set(shortGfx(entry), entry.major);
    }
    return generations;
  }

  /**
   * Resolve a ";"-separated target list into the families and generations it
   * implicates. Tokens are matched verbatim (no trimming).
   *
   * @throws UnknownIsaError on the first unknown token; nothing is returned.
   */
  resolveTargets(targetString: string, logger?: Logger): ResolvedTargets {
    const entries = targetString.split(TARGET_SEPARATOR).map((token) => this.lookup(token));

    const shortIsas = new Set<string>();
    const shortGfxs = new Set<string>();
    for (const entry of entries) {
      logger?.debug(formatIsaEntry(entry));
      shortIsas.add(shortIsa(entry));
      shortGfxs.add(shortGfx(entry));
    }
    return { shortIsas, shortGfxs };
  }
}

let bundledRegistry: IsaRegistry | null = null;

/** The registry built from the bundled ISA table, loaded on first use. */
export function defaultRegistry(): IsaRegistry {
  bundledRegistry ??= new IsaRegistry(loadIsaTable());
  return bundledRegistry;
}

export function lookup(name: string, registry: IsaRegistry = defaultRegistry()): IsaEntry {
  return registry.lookup(name);
}

export interface ResolveOptions {
  registry?: IsaRegistry;
  /** Receives one debug line per resolved entry. */
  logger?: Logger;
}

export function resolveTargets(targetString: string, options: ResolveOptions = {}): ResolvedTargets {
  const registry = options.registry ?? defaultRegistry();
  return registry.resolveTargets(targetString, options.logger);
}
