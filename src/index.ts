export * from './model/types';
export { InvalidProblemError } from './model/errors';
export type { Problem } from './model/normalize';
export { normalizeProblem } from './model/normalize';
export { ProblemBuilder } from './model/problem';
export { equal, notEqual, lessThan, greaterThan, relationFor } from './model/relations';
export type { ParseResult } from './model/parser';
export { ProblemSpecSchema, parseProblem, buildProblem, specToYAML, specToJSON } from './model/parser';

export type { DomainSnapshot } from './solver/domains';
export { DomainStore } from './solver/domains';
export { ConstraintArc, ConstraintGraph } from './solver/graph';
export type { PropagationResult } from './solver/propagate';
export { ac3, revise, propagateAssignment, isConsistent } from './solver/propagate';
export {
  selectNextVariable,
  unassignedDegree,
  orderDomainValues,
  countRuledOut,
  compareValues,
} from './solver/heuristics';
export { solve, solveAll, solveAsync } from './solver/solver';
export { enumerateExhaustively } from './solver/bruteForce';

export { validateProblem } from './validator/validateProblem';
export { validateSolution } from './validator/validateSolution';

export * from './samples';
