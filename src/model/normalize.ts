/**
 * Normalize problem definitions for efficient solving
 * Builds the sealed constraint graph and indexes checks by variable
 */

import { ConstraintGraph } from '../solver/graph';
import { AssignmentCheck, ProblemDefinition, Value, VariableId } from './types';

export interface Problem<T extends Value> {
  name: string;
  variables: readonly VariableId[];
  domains: ReadonlyMap<VariableId, readonly T[]>;
  graph: ConstraintGraph<T>;
  checks: readonly AssignmentCheck<T>[];
  checksByVariable: ReadonlyMap<VariableId, readonly AssignmentCheck<T>[]>;
}

/**
 * Normalize a validated problem definition
 */
export function normalizeProblem<T extends Value>(definition: ProblemDefinition<T>): Problem<T> {
  const variables = [...definition.variables];

  const domains = new Map<VariableId, T[]>();
  for (const variable of variables) {
    domains.set(variable, dedupe(definition.domains.get(variable) ?? []));
  }

  const graph = new ConstraintGraph<T>(variables);
  for (const arc of definition.arcs) {
    graph.addArc(arc.from, arc.to, arc.predicate);
  }
  graph.seal();

  const checks = definition.checks.map((check) => ({ ...check, scope: dedupe(check.scope) }));
  const checksByVariable = new Map<VariableId, AssignmentCheck<T>[]>();
  for (const check of checks) {
    for (const variable of check.scope) {
      const list = checksByVariable.get(variable) ?? [];
      list.push(check);
      checksByVariable.set(variable, list);
    }
  }

  return {
    name: definition.name,
    variables,
    domains,
    graph,
    checks,
    checksByVariable,
  };
}

function dedupe<V>(values: readonly V[]): V[] {
  return [...new Set(values)];
}
