/**
 * N-Queens: one variable per column, valued with the queen's row
 */

import { Problem } from '../model/normalize';
import { ProblemBuilder } from '../model/problem';
import { Assignment, VariableId } from '../model/types';

export const queenVariable = (column: number): VariableId => `Q${column}`;

export function createNQueensProblem(n: number): Problem<number> {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`Board size must be a positive integer, got ${n}`);
  }

  const columns = Array.from({ length: n }, (_, i) => i);
  const builder = new ProblemBuilder<number>(`${n}-Queens`);
  builder.defineVariables(columns.map(queenVariable), columns);

  for (const c1 of columns) {
    for (const c2 of columns) {
      if (c2 <= c1) continue;
      const distance = c2 - c1;
      builder.addConstraint(
        queenVariable(c1),
        queenVariable(c2),
        (r1, r2) => r1 !== r2 && Math.abs(r1 - r2) !== distance
      );
    }
  }

  return builder.build();
}

/**
 * Rows of "Q" and "." with rows down and columns across
 */
export function renderQueens(assignment: Assignment<number>, n: number): string[] {
  const lines: string[] = [];
  for (let row = 0; row < n; row++) {
    const cells: string[] = [];
    for (let col = 0; col < n; col++) {
      cells.push(assignment.get(queenVariable(col)) === row ? 'Q' : '.');
    }
    lines.push(cells.join(' '));
  }
  return lines;
}
