/**
 * Sudoku: one variable per cell, all-different over rows, columns and boxes
 */

import { Problem } from '../model/normalize';
import { ProblemBuilder } from '../model/problem';
import { notEqual } from '../model/relations';
import { Assignment, cellKey, VariableId } from '../model/types';
import sudokuData from './data/sudoku.json';

export type SudokuBoard = number[][]; // 0 = empty

export interface SudokuPuzzle {
  id: string;
  name: string;
  puzzle: string[];
  solution?: string[];
}

export const SUDOKU_PUZZLES: SudokuPuzzle[] = sudokuData.puzzles;

const DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/**
 * Parse nine rows of nine characters; "0" or "." marks an empty cell
 */
export function parseSudokuBoard(rows: readonly string[]): SudokuBoard {
  if (rows.length !== 9) {
    throw new Error(`Sudoku board must have 9 rows, got ${rows.length}`);
  }
  return rows.map((row, r) => {
    if (row.length !== 9) {
      throw new Error(`Sudoku row ${r} must have 9 cells, got ${row.length}`);
    }
    return [...row].map((ch, c) => {
      if (ch === '.' || ch === '0') return 0;
      const digit = Number(ch);
      if (!DIGITS.includes(digit)) {
        throw new Error(`Invalid sudoku cell at (${r},${c}): ${ch}`);
      }
      return digit;
    });
  });
}

/**
 * Cells sharing a row, column or box with (row, col)
 */
export function sudokuPeers(row: number, col: number): VariableId[] {
  const peers = new Set<VariableId>();
  for (let i = 0; i < 9; i++) {
    if (i !== col) peers.add(cellKey(row, i));
    if (i !== row) peers.add(cellKey(i, col));
  }
  const boxRow = 3 * Math.floor(row / 3);
  const boxCol = 3 * Math.floor(col / 3);
  for (let r = boxRow; r < boxRow + 3; r++) {
    for (let c = boxCol; c < boxCol + 3; c++) {
      if (r !== row || c !== col) peers.add(cellKey(r, c));
    }
  }
  return [...peers];
}

export function createSudokuProblem(board: SudokuBoard, name = 'Sudoku'): Problem<number> {
  const builder = new ProblemBuilder<number>(name);

  for (let row = 0; row < 9; row++) {
    for (let col = 0; col < 9; col++) {
      const given = board[row]?.[col] ?? 0;
      builder.defineVariables([cellKey(row, col)], given === 0 ? DIGITS : [given]);
    }
  }

  for (let row = 0; row < 9; row++) {
    for (let col = 0; col < 9; col++) {
      const key = cellKey(row, col);
      for (const peer of sudokuPeers(row, col)) {
        // each unordered pair once; addConstraint registers both arcs
        if (peer > key) builder.addConstraint(key, peer, notEqual);
      }
    }
  }

  return builder.build();
}

export function readSudokuBoard(assignment: Assignment<number>): SudokuBoard {
  return Array.from({ length: 9 }, (_, row) =>
    Array.from({ length: 9 }, (_, col) => assignment.get(cellKey(row, col)) ?? 0)
  );
}

/**
 * Board lines with box separators
 */
export function renderSudoku(board: SudokuBoard): string[] {
  const lines: string[] = [];
  board.forEach((cells, row) => {
    if (row % 3 === 0 && row !== 0) {
      lines.push('------+-------+------');
    }
    const groups = [cells.slice(0, 3), cells.slice(3, 6), cells.slice(6, 9)];
    lines.push(groups.map((group) => group.map((v) => (v === 0 ? '.' : String(v))).join(' ')).join(' | '));
  });
  return lines;
}
