/**
 * Main CSP solver using backtracking with arc-consistency propagation
 */

import { Problem } from '../model/normalize';
import {
  Assignment,
  CancellationSignal,
  DEFAULT_SOLVER_CONFIG,
  IncompleteReason,
  SolveAllSummary,
  SolveResult,
  SolverConfig,
  SolverProgress,
  SolverStats,
  Value,
  VariableId,
} from '../model/types';
import { validateSolution } from '../validator/validateSolution';
import { DomainStore } from './domains';
import { explainIncomplete, explainSuccess, explainUnsatisfiable } from './explain';
import { orderDomainValues, selectNextVariable } from './heuristics';
import { ac3, isConsistent, propagateAssignment, satisfiesChecks } from './propagate';

interface SearchState<T extends Value> {
  problem: Problem<T>;
  config: SolverConfig;
  store: DomainStore<T>;
  assignment: Assignment<T>;
  stats: SolverStats;
  startTime: number;
  signal?: CancellationSignal;
  stopReason?: IncompleteReason;
  /** Variable emptied by the initial AC-3 pass */
  initialWipeout?: VariableId;
}

type SearchEvent<T extends Value> =
  | { type: 'solution'; assignment: Assignment<T> }
  | { type: 'tick'; progress: SolverProgress };

/**
 * Solve a problem, returning the first solution found
 */
export function solve<T extends Value>(problem: Problem<T>, config: Partial<SolverConfig> = {}): SolveResult<T> {
  const state = createState(problem, config);

  for (const event of search(state)) {
    if (event.type === 'solution') {
      return solvedResult(state, event.assignment);
    }
  }

  return unsolvedResult(state);
}

/**
 * Lazily enumerate every solution. The generator's return value summarises
 * whether the enumeration was exhaustive.
 */
export function* solveAll<T extends Value>(
  problem: Problem<T>,
  config: Partial<SolverConfig> = {}
): Generator<Assignment<T>, SolveAllSummary, undefined> {
  const state = createState(problem, config);
  let solutions = 0;

  if (state.config.maxSolutions < 1) {
    state.stopReason = 'solution_limit';
    return summarize(state, solutions);
  }

  for (const event of search(state)) {
    if (event.type !== 'solution') continue;
    solutions++;
    yield event.assignment;
    if (solutions >= state.config.maxSolutions) {
      state.stopReason = 'solution_limit';
      break;
    }
  }

  return summarize(state, solutions);
}

function summarize<T extends Value>(state: SearchState<T>, solutions: number): SolveAllSummary {
  finishStats(state);
  log(state, 1, `Enumeration finished with ${solutions} solution(s)`);
  return {
    solutions,
    complete: state.stopReason === undefined,
    reason: state.stopReason,
    stats: state.stats,
  };
}

/**
 * Non-blocking solver that yields to the event loop periodically
 */
export async function solveAsync<T extends Value>(
  problem: Problem<T>,
  config: Partial<SolverConfig> = {},
  onProgress?: (progress: SolverProgress) => void,
  signal?: CancellationSignal
): Promise<SolveResult<T>> {
  const state = createState(problem, config, signal);

  for (const event of search(state)) {
    if (event.type === 'solution') {
      return solvedResult(state, event.assignment);
    }
    onProgress?.(event.progress);
    await sleep();
  }

  return unsolvedResult(state);
}

function createState<T extends Value>(
  problem: Problem<T>,
  config: Partial<SolverConfig>,
  signal?: CancellationSignal
): SearchState<T> {
  return {
    problem,
    config: { ...DEFAULT_SOLVER_CONFIG, ...config },
    store: new DomainStore(problem.domains),
    assignment: new Map(),
    stats: {
      nodes: 0,
      backtracks: 0,
      prunes: 0,
      removals: 0,
      maxDepth: 0,
      elapsedMs: 0,
    },
    startTime: Date.now(),
    signal,
  };
}

function* search<T extends Value>(state: SearchState<T>): Generator<SearchEvent<T>, void, undefined> {
  const initial = ac3(state.problem.graph, state.store);
  state.stats.removals += initial.removed;

  if (!initial.consistent) {
    state.initialWipeout = initial.wipedOut;
    log(state, 1, `Initial propagation emptied the domain of ${initial.wipedOut}`);
    return;
  }

  yield* backtrack(state, 0);
}

/**
 * Recursive backtracking with propagation after every trial assignment
 */
function* backtrack<T extends Value>(
  state: SearchState<T>,
  depth: number
): Generator<SearchEvent<T>, void, undefined> {
  const { problem, store, assignment, stats, config } = state;

  stats.nodes++;
  if (depth > stats.maxDepth) stats.maxDepth = depth;

  if (config.maxIterationsPerTick > 0 && stats.nodes % config.maxIterationsPerTick === 0) {
    yield { type: 'tick', progress: progressOf(state, depth) };
  }

  const stop = budgetExceeded(state);
  if (stop) {
    state.stopReason = stop;
    log(state, 1, `Stopping: ${stop} after ${stats.nodes} nodes`);
    return;
  }

  if (assignment.size === problem.variables.length) {
    log(state, 1, `Found solution at node ${stats.nodes}`);
    yield { type: 'solution', assignment: new Map(assignment) };
    return;
  }

  // Every open domain is a singleton: arc consistency already guarantees
  // the binary constraints, so only the assignment checks remain
  const implied = impliedCompletion(state);
  if (implied) {
    if (satisfiesChecks(problem, implied)) {
      log(state, 1, `Found solution at node ${stats.nodes} (forced by propagation)`);
      yield { type: 'solution', assignment: implied };
    } else {
      stats.prunes++;
    }
    return;
  }

  const variable = selectNextVariable(problem, store, assignment, config.tieBreak);
  if (variable === null) {
    return;
  }

  const beforeSelection = store.snapshot();

  for (const value of orderDomainValues(problem, store, assignment, variable, config.valueOrder)) {
    if (!isConsistent(problem, assignment, variable, value, config.checkConsistency)) {
      stats.prunes++;
      log(state, 2, `Depth ${depth}: ${variable}=${String(value)} conflicts with committed values`);
      continue;
    }

    const trial = store.snapshot();
    store.assign(variable, value);
    assignment.set(variable, value);

    const result = propagateAssignment(problem, store, variable, config.propagation);
    stats.removals += result.removed;

    if (result.consistent) {
      log(state, 2, `Depth ${depth}: trying ${variable}=${String(value)}`);
      yield* backtrack(state, depth + 1);
      if (state.stopReason) return;
    } else {
      stats.prunes++;
      log(state, 2, `Depth ${depth}: ${variable}=${String(value)} wiped out ${result.wipedOut}`);
    }

    assignment.delete(variable);
    store.restore(trial);
    stats.backtracks++;
  }

  store.restore(beforeSelection);
}

/**
 * The full assignment implied by singleton domains, or null if some open
 * variable still has a choice
 */
function impliedCompletion<T extends Value>(state: SearchState<T>): Assignment<T> | null {
  const { problem, store, assignment } = state;
  const completion = new Map(assignment);
  for (const variable of problem.variables) {
    if (completion.has(variable)) continue;
    if (store.size(variable) !== 1) return null;
    const [value] = store.get(variable);
    completion.set(variable, value);
  }
  return completion;
}

function budgetExceeded<T extends Value>(state: SearchState<T>): IncompleteReason | undefined {
  const { config, stats } = state;
  if (state.signal?.cancelled) {
    return 'cancelled';
  }
  if (config.maxNodes > 0 && stats.nodes > config.maxNodes) {
    return 'node_limit';
  }
  if (config.timeLimitMs > 0 && Date.now() - state.startTime > config.timeLimitMs) {
    return 'time_limit';
  }
  return undefined;
}

function solvedResult<T extends Value>(state: SearchState<T>, assignment: Assignment<T>): SolveResult<T> {
  finishStats(state);
  return {
    status: 'solved',
    assignment,
    stats: state.stats,
    explanation: explainSuccess(state.problem, assignment, state.stats),
    validationReport: validateSolution(state.problem, assignment),
  };
}

function unsolvedResult<T extends Value>(state: SearchState<T>): SolveResult<T> {
  finishStats(state);
  if (state.stopReason) {
    return {
      status: 'incomplete',
      reason: state.stopReason,
      stats: state.stats,
      explanation: explainIncomplete(state.problem, state.stopReason, state.stats),
    };
  }
  log(state, 1, `No solution after ${state.stats.nodes} nodes`);
  return {
    status: 'unsat',
    stats: state.stats,
    explanation: explainUnsatisfiable(state.problem, state.stats, state.initialWipeout),
  };
}

function finishStats<T extends Value>(state: SearchState<T>): void {
  state.stats.elapsedMs = Date.now() - state.startTime;
}

function progressOf<T extends Value>(state: SearchState<T>, depth: number): SolverProgress {
  return {
    nodes: state.stats.nodes,
    backtracks: state.stats.backtracks,
    prunes: state.stats.prunes,
    currentDepth: depth,
    elapsedMs: Date.now() - state.startTime,
  };
}

function log<T extends Value>(state: SearchState<T>, level: 1 | 2, message: string): void {
  if (state.config.debugLevel >= level) {
    console.log(`[SOLVER] ${message}`);
  }
}

function sleep(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
