/**
 * Heuristics for CSP solving
 * Implements MRV (Minimum Remaining Values) with a degree tie-break, and
 * LCV (Least Constraining Value) value ordering
 */

import { Problem } from '../model/normalize';
import { TieBreak, Value, ValueOrder, VariableId } from '../model/types';
import { DomainStore } from './domains';

/**
 * Choose the next variable to assign.
 *
 * Fewest remaining values wins. With `tieBreak: 'degree'` a tie goes to the
 * variable with more unassigned neighbours; anything still tied goes to the
 * variable declared first.
 */
export function selectNextVariable<T extends Value>(
  problem: Problem<T>,
  store: DomainStore<T>,
  assignment: ReadonlyMap<VariableId, T>,
  tieBreak: TieBreak
): VariableId | null {
  let best: VariableId | null = null;
  let bestSize = Infinity;
  let bestDegree = -1;

  for (const variable of problem.variables) {
    if (assignment.has(variable)) continue;

    const size = store.size(variable);
    if (size > bestSize) continue;

    if (size < bestSize) {
      best = variable;
      bestSize = size;
      bestDegree = tieBreak === 'degree' ? unassignedDegree(problem, assignment, variable) : -1;
      continue;
    }

    if (tieBreak === 'degree') {
      const degree = unassignedDegree(problem, assignment, variable);
      if (degree > bestDegree) {
        best = variable;
        bestDegree = degree;
      }
    }
  }

  return best;
}

/**
 * Number of unassigned variables sharing a constraint with `variable`
 */
export function unassignedDegree<T extends Value>(
  problem: Problem<T>,
  assignment: ReadonlyMap<VariableId, T>,
  variable: VariableId
): number {
  let count = 0;
  for (const neighbor of problem.graph.neighbors(variable)) {
    if (!assignment.has(neighbor)) count++;
  }
  return count;
}

/**
 * Order the remaining values of a variable
 */
export function orderDomainValues<T extends Value>(
  problem: Problem<T>,
  store: DomainStore<T>,
  assignment: ReadonlyMap<VariableId, T>,
  variable: VariableId,
  order: ValueOrder
): T[] {
  const values = store.get(variable);
  if (order === 'declared') {
    return values;
  }

  values.sort(compareValues);
  if (order === 'ascending') {
    return values;
  }

  // LCV; Array.prototype.sort is stable so ties keep ascending order
  const scores = new Map<T, number>();
  for (const value of values) {
    scores.set(value, countRuledOut(problem, store, assignment, variable, value));
  }
  return values.sort((a, b) => (scores.get(a) ?? 0) - (scores.get(b) ?? 0));
}

/**
 * How many values in unassigned neighbours' domains would lose their
 * support if `variable` took `value`
 */
export function countRuledOut<T extends Value>(
  problem: Problem<T>,
  store: DomainStore<T>,
  assignment: ReadonlyMap<VariableId, T>,
  variable: VariableId,
  value: T
): number {
  let count = 0;
  for (const arc of problem.graph.arcsInto(variable)) {
    if (assignment.has(arc.from)) continue;
    for (const other of store.get(arc.from)) {
      if (!arc.test(other, value)) count++;
    }
  }
  return count;
}

const TYPE_RANK: Record<string, number> = { boolean: 0, number: 1, bigint: 2, string: 3 };

/**
 * Total order over domain values: numbers numerically, strings by code
 * unit, false before true; mixed types are grouped by type
 */
export function compareValues(a: Value, b: Value): number {
  const ta = typeof a;
  const tb = typeof b;
  if (ta !== tb) {
    return (TYPE_RANK[ta] ?? 4) - (TYPE_RANK[tb] ?? 4);
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
