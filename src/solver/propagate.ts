/**
 * Arc consistency (AC-3) and local consistency checks
 */

import { Problem } from '../model/normalize';
import { PropagationMode, Value, VariableId } from '../model/types';
import { DomainStore } from './domains';
import { ConstraintArc, ConstraintGraph } from './graph';

export interface PropagationResult {
  /** False when a domain was wiped out */
  consistent: boolean;
  /** Values removed from domains */
  removed: number;
  /** Arcs that actually pruned something */
  revisions: number;
  wipedOut?: VariableId;
}

/**
 * Remove every value of `arc.from` that has no support in `arc.to`.
 * Returns the number of values removed.
 */
export function revise<T extends Value>(arc: ConstraintArc<T>, store: DomainStore<T>): number {
  const supports = store.get(arc.to);
  let removed = 0;
  for (const value of store.get(arc.from)) {
    if (!supports.some((other) => arc.test(value, other))) {
      store.remove(arc.from, value);
      removed++;
    }
  }
  return removed;
}

/**
 * AC-3 over the given worklist (all arcs by default)
 */
export function ac3<T extends Value>(
  graph: ConstraintGraph<T>,
  store: DomainStore<T>,
  initial: readonly ConstraintArc<T>[] = graph.arcs()
): PropagationResult {
  const queue: ConstraintArc<T>[] = [];
  const queued = new Set<ConstraintArc<T>>();
  for (const arc of initial) {
    if (!queued.has(arc)) {
      queued.add(arc);
      queue.push(arc);
    }
  }

  let removed = 0;
  let revisions = 0;
  let head = 0;

  while (head < queue.length) {
    const arc = queue[head++];
    queued.delete(arc);

    const pruned = revise(arc, store);
    if (pruned === 0) continue;

    removed += pruned;
    revisions++;

    if (store.isEmpty(arc.from)) {
      return { consistent: false, removed, revisions, wipedOut: arc.from };
    }

    // from shrank, so arcs that relied on it for support must be rechecked
    for (const incoming of graph.arcsInto(arc.from)) {
      if (incoming.from === arc.to || queued.has(incoming)) continue;
      queued.add(incoming);
      queue.push(incoming);
    }
  }

  return { consistent: true, removed, revisions };
}

/**
 * Restore arc consistency after `variable` was narrowed by an assignment
 */
export function propagateAssignment<T extends Value>(
  problem: Problem<T>,
  store: DomainStore<T>,
  variable: VariableId,
  mode: PropagationMode
): PropagationResult {
  const worklist = mode === 'full' ? problem.graph.arcs() : problem.graph.arcsInto(variable);
  return ac3(problem.graph, store, worklist);
}

/**
 * Check a candidate value against already committed variables.
 *
 * Binary arcs are only checked when `checkArcs` is set, since propagation
 * would reject the same value. Assignment checks are always evaluated once
 * their scope is complete.
 */
export function isConsistent<T extends Value>(
  problem: Problem<T>,
  assignment: ReadonlyMap<VariableId, T>,
  variable: VariableId,
  value: T,
  checkArcs: boolean
): boolean {
  if (checkArcs) {
    for (const arc of problem.graph.arcsFrom(variable)) {
      const other = assignment.get(arc.to);
      if (other !== undefined && !arc.test(value, other)) {
        return false;
      }
    }
  }

  const checks = problem.checksByVariable.get(variable);
  if (!checks) return true;

  const trial = new Map(assignment);
  trial.set(variable, value);
  for (const check of checks) {
    if (check.scope.every((v) => trial.has(v)) && !check.test(trial)) {
      return false;
    }
  }
  return true;
}

/**
 * Evaluate every assignment check over a complete assignment
 */
export function satisfiesChecks<T extends Value>(
  problem: Problem<T>,
  assignment: ReadonlyMap<VariableId, T>
): boolean {
  return problem.checks.every((check) => check.test(assignment));
}
