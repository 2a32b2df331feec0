/**
 * Cryptarithmetic (e.g. SEND + MORE = MONEY)
 *
 * Letters are all-different digits and leading letters are non-zero. Each
 * column gets a carry variable and a check tying its digits together; the
 * checks fire once a column is fully assigned.
 */

import { Problem } from '../model/normalize';
import { ProblemBuilder } from '../model/problem';
import { equal } from '../model/relations';
import { Assignment, VariableId } from '../model/types';

export const carryVariable = (column: number): VariableId => `C${column}`;

export function createCryptarithmeticProblem(addends: readonly string[], result: string): Problem<number> {
  const words = [...addends, result];
  for (const word of words) {
    if (!/^[A-Z]+$/.test(word)) {
      throw new Error(`Words must be non-empty and upper-case A-Z, got "${word}"`);
    }
  }
  if (addends.length === 0) {
    throw new Error('At least one addend is required');
  }
  const longest = Math.max(...addends.map((w) => w.length));
  if (result.length < longest) {
    throw new Error(`Result "${result}" is shorter than the longest addend`);
  }

  const leading = new Set(words.filter((w) => w.length > 1).map((w) => w[0]));
  const maxCarry = Math.max(0, addends.length - 1);
  const carryDigits = Array.from({ length: maxCarry + 1 }, (_, i) => i);

  const builder = new ProblemBuilder<number>(`${addends.join(' + ')} = ${result}`);
  const letters: VariableId[] = [];
  const declare = (letter: VariableId) => {
    if (letters.includes(letter)) return;
    letters.push(letter);
    builder.defineVariables([letter], leading.has(letter) ? [1, 2, 3, 4, 5, 6, 7, 8, 9] : [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  };

  // Declared column by column from the right so that MRV ties settle
  // towards columns whose checks can fire early
  for (let column = 0; column < result.length; column++) {
    const columnLetters = addends.map((w) => letterAt(w, column)).filter((l): l is string => l !== undefined);
    const resultLetter = letterAt(result, column) ?? '';
    columnLetters.forEach(declare);
    declare(resultLetter);

    const carryIn = column > 0 ? carryVariable(column) : undefined;
    const carryOut = column < result.length - 1 ? carryVariable(column + 1) : undefined;
    if (carryOut) {
      builder.defineVariables([carryOut], carryDigits);
    }

    if (columnLetters.length === 0 && carryIn && !carryOut) {
      // Extra leading digit of the result is just the final carry
      builder.addConstraint(carryIn, resultLetter, equal);
      continue;
    }

    const scope = [...columnLetters, resultLetter];
    if (carryIn) scope.push(carryIn);
    if (carryOut) scope.push(carryOut);

    builder.addCheck(
      scope,
      (values) => {
        const digit = (v: VariableId | undefined) => (v === undefined ? 0 : values.get(v) ?? 0);
        const sum = columnLetters.reduce((acc, l) => acc + digit(l), digit(carryIn));
        return sum === digit(resultLetter) + 10 * digit(carryOut);
      },
      `Column ${column} sum`
    );
  }

  builder.addAllDifferent(letters);
  return builder.build();
}

/**
 * Numeric value of a word under an assignment
 */
export function wordValue(word: string, assignment: Assignment<number>): number {
  let value = 0;
  for (const letter of word) {
    value = value * 10 + (assignment.get(letter) ?? 0);
  }
  return value;
}

function letterAt(word: string, column: number): string | undefined {
  const index = word.length - 1 - column;
  return index >= 0 ? word[index] : undefined;
}
