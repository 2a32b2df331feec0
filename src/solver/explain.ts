/**
 * Generate human-readable explanations for solver results
 */

import { Problem } from '../model/normalize';
import {
  Assignment,
  Conflict,
  Explanation,
  IncompleteReason,
  SolverStats,
  Value,
  VariableId,
} from '../model/types';
import { DomainStore } from './domains';
import { ac3 } from './propagate';

export function explainSuccess<T extends Value>(
  problem: Problem<T>,
  assignment: Assignment<T>,
  stats: SolverStats
): Explanation {
  return {
    type: 'success',
    message: `Solved ${problem.name}: ${assignment.size} variable(s) assigned`,
    details: statsDetails(stats),
  };
}

/**
 * Explain why no solution exists. `wipedOut` is the variable emptied by
 * the initial propagation pass, when that is what failed.
 */
export function explainUnsatisfiable<T extends Value>(
  problem: Problem<T>,
  stats: SolverStats,
  wipedOut?: VariableId
): Explanation {
  const conflicts: Conflict[] = [];

  if (wipedOut !== undefined) {
    conflicts.push({
      type: 'domain_wipeout',
      description: `Arc consistency emptied the domain of ${wipedOut} before any search`,
      variables: [wipedOut],
    });
  } else {
    const unsupported = findUnsupportedChecks(problem);
    for (const description of unsupported) {
      conflicts.push({ type: 'check_failed', description });
    }
    conflicts.push({
      type: 'search_exhausted',
      description: `Every branch failed after ${stats.nodes} node(s) and ${stats.backtracks} backtrack(s)`,
    });
  }

  const details = conflicts.map((c) => {
    let detail = `${c.type}: ${c.description}`;
    if (c.variables) {
      detail += ` (variables: ${c.variables.join(', ')})`;
    }
    return detail;
  });

  return {
    type: 'unsat',
    message: `${problem.name} is unsatisfiable`,
    details,
    conflicts,
  };
}

export function explainIncomplete<T extends Value>(
  problem: Problem<T>,
  reason: IncompleteReason,
  stats: SolverStats
): Explanation {
  return {
    type: 'incomplete',
    message: `Search for ${problem.name} stopped early: ${describeReason(reason)}`,
    details: statsDetails(stats),
    conflicts: [{ type: 'budget_exhausted', description: describeReason(reason) }],
  };
}

function describeReason(reason: IncompleteReason): string {
  switch (reason) {
    case 'node_limit':
      return 'node limit reached';
    case 'time_limit':
      return 'time limit reached';
    case 'cancelled':
      return 'cancelled by caller';
    case 'solution_limit':
      return 'solution limit reached';
  }
}

function statsDetails(stats: SolverStats): string[] {
  return [
    `nodes: ${stats.nodes}`,
    `backtracks: ${stats.backtracks}`,
    `prunes: ${stats.prunes}`,
    `values removed by propagation: ${stats.removals}`,
    `max depth: ${stats.maxDepth}`,
    `time: ${stats.elapsedMs}ms`,
  ];
}

/**
 * Checks whose scope domains, after initial propagation, hold only
 * combinations that fail the check. Small scopes only.
 */
function findUnsupportedChecks<T extends Value>(problem: Problem<T>): string[] {
  const store = new DomainStore(problem.domains);
  if (!ac3(problem.graph, store).consistent) return [];

  const found: string[] = [];
  problem.checks.forEach((check, i) => {
    const sizes = check.scope.map((v) => store.size(v));
    const combinations = sizes.reduce((a, b) => a * b, 1);
    if (combinations > 10_000) return;

    const values = check.scope.map((v) => store.get(v));
    const trial = new Map<VariableId, T>();
    const anySatisfies = (index: number): boolean => {
      if (index === check.scope.length) return check.test(trial);
      for (const value of values[index]) {
        trial.set(check.scope[index], value);
        if (anySatisfies(index + 1)) return true;
      }
      return false;
    };

    if (!anySatisfies(0)) {
      found.push(`${check.description ?? `Check ${i}`} cannot be satisfied by any remaining values`);
    }
  });
  return found;
}
