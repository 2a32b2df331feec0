import { ProblemBuilder } from '../../model/problem';
import { lessThan, notEqual } from '../../model/relations';
import { createMapColoringProblem } from '../../samples/mapColoring';
import { createNQueensProblem } from '../../samples/nQueens';
import { enumerateExhaustively } from '../bruteForce';
import { DomainStore } from '../domains';
import { ac3, isConsistent, propagateAssignment, revise } from '../propagate';

function chainProblem() {
  return new ProblemBuilder<number>('Chain')
    .defineVariables(['A', 'B', 'C'], [1, 2, 3])
    .addConstraint('A', 'B', lessThan)
    .addConstraint('B', 'C', lessThan)
    .build();
}

describe('revise', () => {
  it('removes values without support in the head', () => {
    const problem = chainProblem();
    const store = new DomainStore(problem.domains);
    const arc = problem.graph.arc('A', 'B');
    expect(arc).toBeDefined();
    if (!arc) return;

    expect(revise(arc, store)).toBe(1);
    expect(store.get('A')).toEqual([1, 2]);
    expect(revise(arc, store)).toBe(0);
  });
});

describe('ac3', () => {
  it('reduces an ordered chain to its only solution', () => {
    const problem = chainProblem();
    const store = new DomainStore(problem.domains);
    const result = ac3(problem.graph, store);

    expect(result.consistent).toBe(true);
    expect(result.removed).toBe(6);
    expect(store.toMap()).toEqual(
      new Map([
        ['A', [1]],
        ['B', [2]],
        ['C', [3]],
      ])
    );
  });

  it('reports the variable whose domain was wiped out', () => {
    const problem = new ProblemBuilder<number>('Impossible')
      .defineVariables(['A', 'B'], [1])
      .addConstraint('A', 'B', lessThan)
      .build();
    const store = new DomainStore(problem.domains);
    const result = ac3(problem.graph, store);

    expect(result.consistent).toBe(false);
    expect(result.wipedOut).toBe('A');
    expect(store.isEmpty('A')).toBe(true);
  });

  it('is idempotent', () => {
    const problem = createNQueensProblem(5);
    const store = new DomainStore(problem.domains);
    store.assign('Q0', 0);

    const first = ac3(problem.graph, store);
    const after = store.toMap();
    const second = ac3(problem.graph, store);

    expect(first.consistent).toBe(true);
    expect(first.removed).toBeGreaterThan(0);
    expect(second.removed).toBe(0);
    expect(store.toMap()).toEqual(after);
  });

  it('never removes a value that appears in a solution', () => {
    const problem = createMapColoringProblem({
      regions: ['A', 'B', 'C', 'D'],
      borders: [
        ['A', 'B'],
        ['B', 'C'],
        ['C', 'D'],
        ['D', 'A'],
        ['A', 'C'],
      ],
      colors: ['red', 'green', 'blue'],
    });
    const store = new DomainStore(problem.domains);
    store.assign('A', 'red');
    store.assign('B', 'green');
    const result = ac3(problem.graph, store);
    expect(result.consistent).toBe(true);

    let solutions = 0;
    for (const solution of enumerateExhaustively(problem)) {
      if (solution.get('A') !== 'red' || solution.get('B') !== 'green') continue;
      solutions++;
      for (const [variable, value] of solution) {
        expect(store.has(variable, value)).toBe(true);
      }
    }
    expect(solutions).toBe(1);
    expect(store.get('C')).toEqual(['blue']);
    expect(store.get('D')).toEqual(['green']);
  });
});

describe('propagateAssignment', () => {
  it('reaches the same fixpoint in incremental and full mode', () => {
    const problem = createNQueensProblem(6);

    const incremental = new DomainStore(problem.domains);
    ac3(problem.graph, incremental);
    incremental.assign('Q0', 1);
    const a = propagateAssignment(problem, incremental, 'Q0', 'incremental');

    const full = new DomainStore(problem.domains);
    ac3(problem.graph, full);
    full.assign('Q0', 1);
    const b = propagateAssignment(problem, full, 'Q0', 'full');

    expect(a.consistent).toBe(b.consistent);
    expect(incremental.toMap()).toEqual(full.toMap());
  });
});

describe('isConsistent', () => {
  const problem = new ProblemBuilder<number>('Sum')
    .defineVariables(['A', 'B', 'C'], [1, 2, 3])
    .addConstraint('A', 'B', notEqual)
    .addCheck(['A', 'B', 'C'], (values) => (values.get('A') ?? 0) + (values.get('B') ?? 0) === values.get('C'))
    .build();

  it('tests binary arcs against committed neighbours when asked', () => {
    const assignment = new Map([['A', 2]]);
    expect(isConsistent(problem, assignment, 'B', 2, true)).toBe(false);
    expect(isConsistent(problem, assignment, 'B', 2, false)).toBe(true);
    expect(isConsistent(problem, assignment, 'B', 1, true)).toBe(true);
  });

  it('evaluates checks only once their scope is complete', () => {
    const partial = new Map([['A', 1]]);
    expect(isConsistent(problem, partial, 'C', 1, true)).toBe(true);

    const almost = new Map([
      ['A', 1],
      ['B', 2],
    ]);
    expect(isConsistent(problem, almost, 'C', 3, true)).toBe(true);
    expect(isConsistent(problem, almost, 'C', 2, true)).toBe(false);
    expect(isConsistent(problem, almost, 'C', 2, false)).toBe(false);
  });
});
