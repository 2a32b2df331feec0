import { ProblemDefinition, ValidationIssue, ValidationReport, Value } from '../model/types';

/**
 * Validate a problem definition before it is built
 */
export function validateProblem<T extends Value>(definition: ProblemDefinition<T>): ValidationReport {
  const issues: ValidationIssue[] = [];
  const declared = new Set<string>();

  if (definition.variables.length === 0) {
    issues.push({ level: 'error', message: 'Problem declares no variables' });
  }

  for (const variable of definition.variables) {
    if (declared.has(variable)) {
      issues.push({ level: 'error', message: `Variable ${variable} is declared twice` });
    }
    declared.add(variable);
  }

  for (const variable of declared) {
    const domain = definition.domains.get(variable);
    if (domain === undefined) {
      issues.push({ level: 'error', message: `Variable ${variable} has no domain` });
    } else if (domain.length === 0) {
      issues.push({ level: 'error', message: `Variable ${variable} has an empty domain` });
    } else if (new Set(domain).size !== domain.length) {
      issues.push({ level: 'warning', message: `Domain of ${variable} lists a value more than once` });
    }
  }

  for (const variable of definition.domains.keys()) {
    if (!declared.has(variable)) {
      issues.push({ level: 'error', message: `Domain defined for undeclared variable ${variable}` });
    }
  }

  const constrained = new Set<string>();
  definition.arcs.forEach((arc, i) => {
    for (const variable of [arc.from, arc.to]) {
      if (!declared.has(variable)) {
        issues.push({ level: 'error', message: `Constraint ${i} references undeclared variable ${variable}` });
      }
    }
    if (arc.from === arc.to) {
      issues.push({ level: 'error', message: `Constraint ${i} relates ${arc.from} to itself` });
    }
    constrained.add(arc.from);
    constrained.add(arc.to);
  });

  definition.checks.forEach((check, i) => {
    const label = check.description ?? `Check ${i}`;
    if (check.scope.length === 0) {
      issues.push({ level: 'error', message: `${label} has an empty scope` });
    }
    for (const variable of check.scope) {
      if (!declared.has(variable)) {
        issues.push({ level: 'error', message: `${label} references undeclared variable ${variable}` });
      }
      constrained.add(variable);
    }
  });

  for (const variable of declared) {
    if (!constrained.has(variable)) {
      issues.push({ level: 'info', message: `Variable ${variable} is unconstrained` });
    }
  }

  return { ok: !issues.some((i) => i.level === 'error'), issues };
}
