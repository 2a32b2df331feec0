import { assignmentToRecord, cellKey } from '../../model/types';
import { solve, solveAll } from '../../solver/solver';
import { carryVariable, createCryptarithmeticProblem, wordValue } from '../cryptarithmetic';
import { createMapColoringProblem } from '../mapColoring';
import { createNQueensProblem, queenVariable, renderQueens } from '../nQueens';
import {
  createSudokuProblem,
  parseSudokuBoard,
  readSudokuBoard,
  renderSudoku,
  sudokuPeers,
  SUDOKU_PUZZLES,
} from '../sudoku';

function puzzle(id: string) {
  const found = SUDOKU_PUZZLES.find((p) => p.id === id);
  if (!found) throw new Error(`No puzzle ${id}`);
  return found;
}

describe('N-Queens', () => {
  it('declares one variable per column', () => {
    const problem = createNQueensProblem(5);
    expect(problem.variables).toEqual(['Q0', 'Q1', 'Q2', 'Q3', 'Q4']);
    expect(problem.domains.get(queenVariable(2))).toEqual([0, 1, 2, 3, 4]);
    expect(problem.graph.arcCount).toBe(20);
  });

  it('has no 2-Queens solution', () => {
    expect(solve(createNQueensProblem(2)).status).toBe('unsat');
  });

  it('rejects a board size below one', () => {
    expect(() => createNQueensProblem(0)).toThrow('Board size must be a positive integer, got 0');
    expect(() => createNQueensProblem(2.5)).toThrow(RangeError);
  });

  it('renders a solution row by row', () => {
    const result = solve(createNQueensProblem(4));
    expect(result.status).toBe('solved');
    if (result.status !== 'solved') return;
    expect(renderQueens(result.assignment, 4)).toEqual([
      '. . Q .',
      'Q . . .',
      '. . . Q',
      '. Q . .',
    ]);
  });
});

describe('Sudoku', () => {
  it('loads the bundled puzzles', () => {
    expect(SUDOKU_PUZZLES.map((p) => p.id)).toEqual(['classic_medium', 'conflicting_givens']);
  });

  it('parses boards with 0 or . for empty cells', () => {
    const rows = puzzle('classic_medium').puzzle.map((row) => row.replace(/0/g, '.'));
    const board = parseSudokuBoard(rows);
    expect(board[0]).toEqual([0, 0, 5, 0, 0, 4, 0, 7, 0]);
    expect(board).toEqual(parseSudokuBoard(puzzle('classic_medium').puzzle));
  });

  it('rejects malformed boards', () => {
    const rows = puzzle('classic_medium').puzzle;
    expect(() => parseSudokuBoard(rows.slice(1))).toThrow('Sudoku board must have 9 rows, got 8');
    expect(() => parseSudokuBoard(['00500407', ...rows.slice(1)])).toThrow('Sudoku row 0 must have 9 cells, got 8');
    expect(() => parseSudokuBoard(['x05004070', ...rows.slice(1)])).toThrow('Invalid sudoku cell at (0,0): x');
  });

  it('lists the twenty peers of a cell', () => {
    const peers = sudokuPeers(4, 4);
    expect(peers).toHaveLength(20);
    expect(peers).toContain(cellKey(4, 0));
    expect(peers).toContain(cellKey(0, 4));
    expect(peers).toContain(cellKey(3, 5));
    expect(peers).not.toContain(cellKey(4, 4));
    expect(peers).not.toContain(cellKey(2, 2));
  });

  it('solves to the unique solution', () => {
    const medium = puzzle('classic_medium');
    const problem = createSudokuProblem(parseSudokuBoard(medium.puzzle), medium.name);
    expect(problem.graph.arcCount).toBe(81 * 20);

    const result = solve(problem);
    expect(result.status).toBe('solved');
    if (result.status !== 'solved') return;
    expect(readSudokuBoard(result.assignment)).toEqual(parseSudokuBoard(medium.solution ?? []));
    expect(result.validationReport.ok).toBe(true);
  });

  it('has no second solution', () => {
    const medium = puzzle('classic_medium');
    const solutions = [...solveAll(createSudokuProblem(parseSudokuBoard(medium.puzzle)))];
    expect(solutions).toHaveLength(1);
  });

  it('rejects conflicting givens before search', () => {
    const conflicting = puzzle('conflicting_givens');
    const result = solve(createSudokuProblem(parseSudokuBoard(conflicting.puzzle), conflicting.name));

    expect(result.status).toBe('unsat');
    expect(result.stats.nodes).toBe(0);
    expect(result.explanation.conflicts?.[0]).toEqual({
      type: 'domain_wipeout',
      description: 'Arc consistency emptied the domain of 0,0 before any search',
      variables: ['0,0'],
    });
  });

  it('renders boxes with separators', () => {
    const lines = renderSudoku(parseSudokuBoard(puzzle('classic_medium').puzzle));
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe('. . 5 | . . 4 | . 7 .');
    expect(lines[3]).toBe('------+-------+------');
    expect(lines[10]).toBe('2 5 . | . 4 . | . . .');
  });
});

describe('map coloring', () => {
  it('adds each border once', () => {
    const problem = createMapColoringProblem({
      regions: ['A', 'B', 'C'],
      borders: [
        ['A', 'B'],
        ['B', 'A'],
        ['B', 'C'],
      ],
      colors: ['red', 'green'],
    });
    expect(problem.name).toBe('Map coloring');
    expect(problem.graph.arcCount).toBe(4);
    expect(problem.graph.arc('A', 'B')?.predicates).toHaveLength(1);
  });

  it('four-colors a wheel graph', () => {
    const rim = ['A', 'B', 'C', 'D', 'E'];
    const borders = rim.map((region, i): [string, string] => [region, rim[(i + 1) % rim.length]]);
    const problem = createMapColoringProblem({
      name: 'Wheel',
      regions: [...rim, 'Hub'],
      borders: [...borders, ...rim.map((region): [string, string] => ['Hub', region])],
      colors: ['red', 'green', 'blue', 'yellow'],
    });

    const result = solve(problem);
    expect(result.status).toBe('solved');
    if (result.status !== 'solved') return;
    expect(result.validationReport.ok).toBe(true);

    const threeColors = createMapColoringProblem({
      regions: [...rim, 'Hub'],
      borders: [...borders, ...rim.map((region): [string, string] => ['Hub', region])],
      colors: ['red', 'green', 'blue'],
    });
    expect(solve(threeColors).status).toBe('unsat');
  });

  it('colors a path with two colors', () => {
    const problem = createMapColoringProblem({
      name: 'Path',
      regions: ['A', 'B', 'C'],
      borders: [
        ['A', 'B'],
        ['B', 'C'],
      ],
      colors: ['red', 'green'],
    });
    const solutions = [...solveAll(problem)].map(assignmentToRecord);
    expect(solutions).toEqual([
      { A: 'red', B: 'green', C: 'red' },
      { A: 'green', B: 'red', C: 'green' },
    ]);
  });
});

describe('cryptarithmetic', () => {
  it('declares letters and carries column by column', () => {
    const problem = createCryptarithmeticProblem(['SEND', 'MORE'], 'MONEY');
    expect(problem.variables).toEqual(['D', 'E', 'Y', 'C1', 'N', 'R', 'C2', 'O', 'C3', 'S', 'M', 'C4']);
    expect(problem.domains.get('S')).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(problem.domains.get('O')).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(problem.domains.get(carryVariable(2))).toEqual([0, 1]);
    expect(problem.checks.map((c) => c.description)).toEqual([
      'Column 0 sum',
      'Column 1 sum',
      'Column 2 sum',
      'Column 3 sum',
    ]);
  });

  it('solves SEND + MORE = MONEY', () => {
    const result = solve(createCryptarithmeticProblem(['SEND', 'MORE'], 'MONEY'));

    expect(result.status).toBe('solved');
    if (result.status !== 'solved') return;
    const digits = result.assignment;
    expect(wordValue('SEND', digits)).toBe(9567);
    expect(wordValue('MORE', digits)).toBe(1085);
    expect(wordValue('MONEY', digits)).toBe(10652);
    expect(digits.get(carryVariable(4))).toBe(1);
    expect(result.validationReport.ok).toBe(true);
  });

  it('enumerates every answer of a small puzzle', () => {
    const solutions = [...solveAll(createCryptarithmeticProblem(['A', 'A'], 'B'))].map(assignmentToRecord);
    expect(solutions).toEqual([
      { A: 1, B: 2 },
      { A: 2, B: 4 },
      { A: 3, B: 6 },
      { A: 4, B: 8 },
    ]);
  });

  it('rejects malformed words', () => {
    expect(() => createCryptarithmeticProblem(['send'], 'MONEY')).toThrow(
      'Words must be non-empty and upper-case A-Z, got "send"'
    );
    expect(() => createCryptarithmeticProblem([], 'A')).toThrow('At least one addend is required');
    expect(() => createCryptarithmeticProblem(['ABC'], 'AB')).toThrow(
      'Result "AB" is shorter than the longest addend'
    );
  });
});
