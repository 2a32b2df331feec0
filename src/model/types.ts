/**
 * Core type definitions for the constraint solver
 */

// ===== Problem Types =====

/** Variables are identified by name: "Q0", "3,4", "S", "WA". */
export type VariableId = string;

/** Domain values must be primitives so that `===` is their equality. */
export type Value = string | number | boolean | bigint;

export type BinaryPredicate<T extends Value> = (a: T, b: T) => boolean;

export type RelationOp = '=' | '<' | '>' | '≠';

export interface ArcDefinition<T extends Value> {
  from: VariableId;
  to: VariableId;
  predicate: BinaryPredicate<T>;
}

/**
 * A predicate over several variables. It is only evaluated once every
 * variable in `scope` has been explicitly assigned; it never narrows domains.
 */
export interface AssignmentCheck<T extends Value> {
  scope: VariableId[];
  test: (assignment: ReadonlyMap<VariableId, T>) => boolean;
  description?: string;
}

/** Raw problem definition as collected by the builder, before validation. */
export interface ProblemDefinition<T extends Value> {
  name: string;
  variables: VariableId[];
  domains: Map<VariableId, T[]>;
  arcs: ArcDefinition<T>[];
  checks: AssignmentCheck<T>[];
}

// ===== Declarative Problem Spec (YAML/JSON) =====

export interface RelationSpec {
  between: [VariableId, VariableId];
  op: RelationOp;
}

export interface ProblemSpec {
  name?: string;
  variables: VariableId[];
  /** Default domain for every variable without an override */
  domain?: Array<string | number>;
  domains?: Record<VariableId, Array<string | number>>;
  constraints?: RelationSpec[];
  allDifferent?: VariableId[][];
}

// ===== Solution Types =====

export type Assignment<T extends Value> = Map<VariableId, T>;

export interface SolverStats {
  nodes: number;
  backtracks: number;
  prunes: number;
  /** Values removed by propagation */
  removals: number;
  maxDepth: number;
  elapsedMs: number;
}

export type IncompleteReason = 'node_limit' | 'time_limit' | 'cancelled' | 'solution_limit';

export type SolveResult<T extends Value> =
  | {
      status: 'solved';
      assignment: Assignment<T>;
      stats: SolverStats;
      explanation: Explanation;
      validationReport: ValidationReport;
    }
  | { status: 'unsat'; stats: SolverStats; explanation: Explanation }
  | { status: 'incomplete'; reason: IncompleteReason; stats: SolverStats; explanation: Explanation };

export interface SolveAllSummary {
  solutions: number;
  /** True when every branch of the search tree was explored */
  complete: boolean;
  reason?: IncompleteReason;
  stats: SolverStats;
}

// ===== Validation Types =====

export interface ValidationIssue {
  level: 'info' | 'warning' | 'error';
  message: string;
}

export interface ValidationReport {
  ok: boolean;
  issues: ValidationIssue[];
}

// ===== Solver Types =====

export type ValueOrder = 'ascending' | 'declared' | 'lcv';

export type TieBreak = 'degree' | 'declared';

export type PropagationMode = 'full' | 'incremental';

export interface SolverConfig {
  valueOrder: ValueOrder;
  /** How MRV ties are broken; declaration order settles whatever remains */
  tieBreak: TieBreak;
  propagation: PropagationMode;
  /** Check a value against committed neighbours before propagating */
  checkConsistency: boolean;
  maxSolutions: number;
  maxNodes: number; // 0 = unlimited
  timeLimitMs: number; // 0 = unlimited
  maxIterationsPerTick: number; // For non-blocking solver
  debugLevel: 0 | 1 | 2; // 0=off, 1=basic, 2=verbose
}

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  valueOrder: 'ascending',
  tieBreak: 'degree',
  propagation: 'incremental',
  checkConsistency: true,
  maxSolutions: Infinity,
  maxNodes: 0,
  timeLimitMs: 0,
  maxIterationsPerTick: 1000,
  debugLevel: 0,
};

export interface SolverProgress {
  nodes: number;
  backtracks: number;
  prunes: number;
  currentDepth: number;
  elapsedMs: number;
}

export interface CancellationSignal {
  cancelled: boolean;
}

// ===== Explanation Types =====

export interface Explanation {
  type: 'success' | 'unsat' | 'incomplete';
  message: string;
  details: string[];
  conflicts?: Conflict[];
}

export interface Conflict {
  type: 'domain_wipeout' | 'check_failed' | 'search_exhausted' | 'budget_exhausted';
  description: string;
  variables?: VariableId[];
}

// ===== Utility Types =====

export const cellKey = (row: number, col: number): VariableId => `${row},${col}`;

export const assignmentToRecord = <T extends Value>(assignment: ReadonlyMap<VariableId, T>): Record<VariableId, T> => {
  const record: Record<VariableId, T> = {};
  for (const [variable, value] of assignment) {
    record[variable] = value;
  }
  return record;
};
