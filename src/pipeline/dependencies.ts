/**
 * Stage Dependency Graph
 *
 * The stage graph is declared explicitly; the driver derives its execution
 * order from it instead of hard-coding a call sequence.
 *
 *   download → extract → translate → package
 *
 * Unit resolution happens at the start of translate, after extraction has
 * made every category's artifacts available.
 *
 * @module pipeline/dependencies
 */

import { type StageName, STAGE_NAMES, isValidStageName } from './types.js';

export { type StageName, isValidStageName };

// ============================================================================
// Graph
// ============================================================================

/**
 * Maps each stage to the stages it directly depends on.
 */
export const STAGE_GRAPH: Readonly<Record<StageName, readonly StageName[]>> = {
  download: [],
  extract: ['download'],
  translate: ['extract'],
  package: ['translate'],
};

function assertValidStageName(name: string): asserts name is StageName {
  if (!isValidStageName(name)) {
    throw new Error(`Invalid stage name: ${name}. Must be one of: ${STAGE_NAMES.join(', ')}`);
  }
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Topologically sort a stage graph (Kahn's algorithm).
 * Ties are broken by declaration order so the result is stable.
 *
 * @throws Error if the graph has a cycle or names an unknown stage
 */
export function topologicalOrder(
  graph: Readonly<Record<StageName, readonly StageName[]>> = STAGE_GRAPH
): StageName[] {
  const remaining = new Map<StageName, Set<StageName>>();
  for (const name of STAGE_NAMES) {
    const deps = graph[name];
    for (const dep of deps) {
      assertValidStageName(dep);
    }
    remaining.set(name, new Set(deps));
  }

  const order: StageName[] = [];
  while (remaining.size > 0) {
    const ready = STAGE_NAMES.find(
      (name) => remaining.get(name)?.size === 0
    );
    if (ready === undefined) {
      throw new Error(`Stage graph has a cycle among: ${[...remaining.keys()].join(', ')}`);
    }
    order.push(ready);
    remaining.delete(ready);
    for (const deps of remaining.values()) {
      deps.delete(ready);
    }
  }

  return order;
}

/**
 * Execution order of the default graph.
 */
export const EXECUTION_ORDER: readonly StageName[] = topologicalOrder();

// ============================================================================
// Dependency Queries
// ============================================================================

/**
 * All stages a stage depends on, transitively, in execution order.
 *
 * @example
 * getUpstreamStages('translate'); // ['download', 'extract']
 */
export function getUpstreamStages(stage: string): StageName[] {
  assertValidStageName(stage);

  const seen = new Set<StageName>();
  const visit = (name: StageName): void => {
    for (const dep of STAGE_GRAPH[name]) {
      if (!seen.has(dep)) {
        seen.add(dep);
        visit(dep);
      }
    }
  };
  visit(stage);

  return EXECUTION_ORDER.filter((name) => seen.has(name));
}
