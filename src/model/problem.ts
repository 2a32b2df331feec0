/**
 * Builder for constraint satisfaction problems
 */

import { validateProblem } from '../validator/validateProblem';
import { InvalidProblemError } from './errors';
import { normalizeProblem, Problem } from './normalize';
import { notEqual } from './relations';
import {
  ArcDefinition,
  AssignmentCheck,
  BinaryPredicate,
  ProblemDefinition,
  Value,
  VariableId,
} from './types';

export class ProblemBuilder<T extends Value> {
  private readonly variables: VariableId[] = [];
  private readonly domains = new Map<VariableId, T[]>();
  private readonly arcs: ArcDefinition<T>[] = [];
  private readonly checks: AssignmentCheck<T>[] = [];

  constructor(readonly name: string = 'Untitled problem') {}

  /**
   * Declare variables in order. When `values` is given it becomes the
   * domain of each of them.
   */
  defineVariables(ids: readonly VariableId[], values?: readonly T[]): this {
    for (const id of ids) {
      this.variables.push(id);
      if (values) {
        this.domains.set(id, [...values]);
      }
    }
    return this;
  }

  defineDomain(variable: VariableId, values: readonly T[]): this {
    this.domains.set(variable, [...values]);
    return this;
  }

  /** Register a single directed arc */
  addArc(from: VariableId, to: VariableId, predicate: BinaryPredicate<T>): this {
    this.arcs.push({ from, to, predicate });
    return this;
  }

  /**
   * Register a binary constraint in both directions: `predicate(a, b)` on the
   * arc (a, b) and its converse on (b, a).
   */
  addConstraint(a: VariableId, b: VariableId, predicate: BinaryPredicate<T>): this {
    this.addArc(a, b, predicate);
    this.addArc(b, a, (y, x) => predicate(x, y));
    return this;
  }

  /** Pairwise `≠` between every two of `variables` */
  addAllDifferent(variables: readonly VariableId[]): this {
    for (let i = 0; i < variables.length; i++) {
      for (let j = i + 1; j < variables.length; j++) {
        this.addConstraint(variables[i], variables[j], notEqual);
      }
    }
    return this;
  }

  addCheck(
    scope: readonly VariableId[],
    test: AssignmentCheck<T>['test'],
    description?: string
  ): this {
    this.checks.push({ scope: [...scope], test, description });
    return this;
  }

  toDefinition(): ProblemDefinition<T> {
    return {
      name: this.name,
      variables: [...this.variables],
      domains: new Map(this.domains),
      arcs: [...this.arcs],
      checks: [...this.checks],
    };
  }

  /**
   * Validate and freeze the problem. Throws `InvalidProblemError` listing
   * every error-level issue.
   */
  build(): Problem<T> {
    const definition = this.toDefinition();
    const report = validateProblem(definition);
    if (!report.ok) {
      throw new InvalidProblemError(report.issues);
    }
    return normalizeProblem(definition);
  }
}
