import { Problem } from '../model/normalize';
import { ValidationIssue, ValidationReport, Value, VariableId } from '../model/types';

/**
 * Verify an assignment against every arc and check of a problem
 */
export function validateSolution<T extends Value>(
  problem: Problem<T>,
  assignment: ReadonlyMap<VariableId, T>
): ValidationReport {
  const issues: ValidationIssue[] = [];

  for (const variable of problem.variables) {
    const value = assignment.get(variable);
    if (value === undefined) {
      issues.push({ level: 'error', message: `Variable ${variable} is unassigned` });
      continue;
    }
    const domain = problem.domains.get(variable) ?? [];
    if (!domain.includes(value)) {
      issues.push({ level: 'error', message: `${variable}=${String(value)} is outside its domain` });
    }
  }

  const declared = new Set(problem.variables);
  for (const variable of assignment.keys()) {
    if (!declared.has(variable)) {
      issues.push({ level: 'warning', message: `Assignment names unknown variable ${variable}` });
    }
  }

  for (const arc of problem.graph.arcs()) {
    const a = assignment.get(arc.from);
    const b = assignment.get(arc.to);
    if (a === undefined || b === undefined) continue;
    if (!arc.test(a, b)) {
      issues.push({
        level: 'error',
        message: `Constraint ${arc.from} -> ${arc.to} violated by ${String(a)}, ${String(b)}`,
      });
    }
  }

  problem.checks.forEach((check, i) => {
    if (!check.scope.every((v) => assignment.has(v))) return;
    if (!check.test(assignment)) {
      issues.push({ level: 'error', message: `${check.description ?? `Check ${i}`} violated` });
    }
  });

  return { ok: !issues.some((i) => i.level === 'error'), issues };
}
