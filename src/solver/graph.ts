/**
 * Directed constraint graph
 */

import { BinaryPredicate, Value, VariableId } from '../model/types';

export class ConstraintArc<T extends Value> {
  readonly predicates: BinaryPredicate<T>[] = [];

  constructor(
    readonly from: VariableId,
    readonly to: VariableId
  ) {}

  /** True when `a` (for `from`) and `b` (for `to`) satisfy every predicate */
  test(a: T, b: T): boolean {
    for (const predicate of this.predicates) {
      if (!predicate(a, b)) return false;
    }
    return true;
  }
}

export class ConstraintGraph<T extends Value> {
  private readonly outgoing = new Map<VariableId, Map<VariableId, ConstraintArc<T>>>();
  private readonly incoming = new Map<VariableId, ConstraintArc<T>[]>();
  private readonly adjacency = new Map<VariableId, Set<VariableId>>();
  private readonly allArcs: ConstraintArc<T>[] = [];
  private sealed = false;

  constructor(variables: readonly VariableId[]) {
    for (const variable of variables) {
      this.outgoing.set(variable, new Map());
      this.incoming.set(variable, []);
      this.adjacency.set(variable, new Set());
    }
  }

  get arcCount(): number {
    return this.allArcs.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Register the directed arc (from, to). A second predicate on the same
   * ordered pair is conjoined with the first.
   */
  addArc(from: VariableId, to: VariableId, predicate: BinaryPredicate<T>): ConstraintArc<T> {
    if (this.sealed) {
      throw new Error('Constraint graph is sealed');
    }
    if (from === to) {
      throw new Error(`Arc must join two different variables (got ${from})`);
    }
    const out = this.outgoing.get(from);
    const into = this.incoming.get(to);
    if (!out) throw new Error(`Unknown variable: ${from}`);
    if (!into) throw new Error(`Unknown variable: ${to}`);

    let arc = out.get(to);
    if (!arc) {
      arc = new ConstraintArc<T>(from, to);
      out.set(to, arc);
      into.push(arc);
      this.allArcs.push(arc);
      this.adjacency.get(from)?.add(to);
      this.adjacency.get(to)?.add(from);
    }
    arc.predicates.push(predicate);
    return arc;
  }

  seal(): void {
    this.sealed = true;
  }

  /** Arcs (Xk, variable): the arcs to revisit when `variable` shrinks */
  arcsInto(variable: VariableId): readonly ConstraintArc<T>[] {
    return this.incoming.get(variable) ?? [];
  }

  arcsFrom(variable: VariableId): ConstraintArc<T>[] {
    const out = this.outgoing.get(variable);
    return out ? [...out.values()] : [];
  }

  arc(from: VariableId, to: VariableId): ConstraintArc<T> | undefined {
    return this.outgoing.get(from)?.get(to);
  }

  arcs(): ConstraintArc<T>[] {
    return [...this.allArcs];
  }

  /** Variables sharing an arc with `variable`, in either direction */
  neighbors(variable: VariableId): ReadonlySet<VariableId> {
    return this.adjacency.get(variable) ?? new Set();
  }

  degree(variable: VariableId): number {
    return this.neighbors(variable).size;
  }
}
