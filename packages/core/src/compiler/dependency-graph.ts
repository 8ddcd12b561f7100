import createDebug from "debug";

const debug = createDebug("formwork:core:compiler");

export type SortResult = { ok: true; order: string[] } | { ok: false; cycle: string[] };

/**
 * Depth-first topological sort over field reads. Fields are visited in
 * declaration order and dependencies are emitted first, so independent
 * fields keep their declared relative order.
 */
export function sortByDependencies(
  declarationOrder: readonly string[],
  readsOf: (name: string) => readonly string[],
): SortResult {
  const order: string[] = [];
  const visited = new Set<string>();
  const resolving = new Set<string>();

  function visit(name: string, chain: string[]): string[] | null {
    if (visited.has(name)) return null;

    if (resolving.has(name)) {
      return [...chain.slice(chain.indexOf(name)), name];
    }

    resolving.add(name);
    for (const dependency of readsOf(name)) {
      const cycle = visit(dependency, [...chain, name]);
      if (cycle) return cycle;
    }
    resolving.delete(name);

    visited.add(name);
    order.push(name);
    return null;
  }

  for (const name of declarationOrder) {
    const cycle = visit(name, []);
    if (cycle) {
      debug("sortByDependencies: cycle %s", cycle.join(" → "));
      return { ok: false, cycle };
    }
  }

  debug("sortByDependencies: %s", order.join(", "));
  return { ok: true, order };
}
