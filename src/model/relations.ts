import { BinaryPredicate, RelationOp, Value } from './types';

export const equal = <T extends Value>(a: T, b: T): boolean => a === b;

export const notEqual = <T extends Value>(a: T, b: T): boolean => a !== b;

export const lessThan = <T extends Value>(a: T, b: T): boolean => a < b;

export const greaterThan = <T extends Value>(a: T, b: T): boolean => a > b;

/**
 * Predicate for a relation operator
 */
export function relationFor<T extends Value>(op: RelationOp): BinaryPredicate<T> {
  switch (op) {
    case '=':
      return equal;
    case '≠':
      return notEqual;
    case '<':
      return lessThan;
    case '>':
      return greaterThan;
  }
}
