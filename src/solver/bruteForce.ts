/**
 * Generate-and-test enumeration over the cartesian product of domains.
 * Exponential; meant as a reference for small problems.
 */

import { Problem } from '../model/normalize';
import { Assignment, Value, VariableId } from '../model/types';
import { satisfiesChecks } from './propagate';

export function* enumerateExhaustively<T extends Value>(problem: Problem<T>): Generator<Assignment<T>> {
  const variables = problem.variables;
  const assignment: Assignment<T> = new Map();

  function* extend(index: number): Generator<Assignment<T>> {
    if (index === variables.length) {
      if (satisfiesAll(problem, assignment)) {
        yield new Map(assignment);
      }
      return;
    }
    const variable = variables[index];
    for (const value of problem.domains.get(variable) ?? []) {
      assignment.set(variable, value);
      yield* extend(index + 1);
    }
    assignment.delete(variable);
  }

  yield* extend(0);
}

function satisfiesAll<T extends Value>(problem: Problem<T>, assignment: ReadonlyMap<VariableId, T>): boolean {
  for (const arc of problem.graph.arcs()) {
    const a = assignment.get(arc.from);
    const b = assignment.get(arc.to);
    if (a === undefined || b === undefined || !arc.test(a, b)) {
      return false;
    }
  }
  return satisfiesChecks(problem, assignment);
}
