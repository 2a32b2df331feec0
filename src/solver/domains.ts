/**
 * Domain store with trail-based snapshot/restore
 *
 * Every removal is pushed onto an undo log. A snapshot is the current log
 * length plus the stamp of the top entry, and restoring pops entries back
 * into their domains, so the cost of backtracking is proportional to what
 * changed since the snapshot.
 */

import { Value, VariableId } from '../model/types';

let nextStoreId = 1;

export interface DomainSnapshot {
  readonly storeId: number;
  readonly mark: number;
  /** Stamp of the trail entry just below `mark`; 0 when `mark` is 0 */
  readonly stamp: number;
}

interface VariableDomain<T extends Value> {
  values: T[]; // declaration order, never reordered
  positions: Map<T, number>;
  alive: Uint8Array;
  size: number;
}

export class DomainStore<T extends Value> {
  private readonly id = nextStoreId++;
  private readonly domains = new Map<VariableId, VariableDomain<T>>();
  /** Flattened (variable, valueIndex) pairs of removed values */
  private readonly trailVariables: VariableDomain<T>[] = [];
  private readonly trailPositions: number[] = [];
  /** Unique per removal, so a refilled trail slot is told apart from the original */
  private readonly trailStamps: number[] = [];
  private nextStamp = 1;

  constructor(initial: ReadonlyMap<VariableId, readonly T[]>) {
    for (const [variable, values] of initial) {
      const unique: T[] = [];
      const positions = new Map<T, number>();
      for (const value of values) {
        if (positions.has(value)) continue;
        positions.set(value, unique.length);
        unique.push(value);
      }
      this.domains.set(variable, {
        values: unique,
        positions,
        alive: new Uint8Array(unique.length).fill(1),
        size: unique.length,
      });
    }
  }

  get variables(): VariableId[] {
    return [...this.domains.keys()];
  }

  get trailLength(): number {
    return this.trailPositions.length;
  }

  /** Current values of a variable, in declaration order */
  get(variable: VariableId): T[] {
    const domain = this.domain(variable);
    const result: T[] = [];
    for (let i = 0; i < domain.values.length; i++) {
      if (domain.alive[i]) result.push(domain.values[i]);
    }
    return result;
  }

  size(variable: VariableId): number {
    return this.domain(variable).size;
  }

  isEmpty(variable: VariableId): boolean {
    return this.domain(variable).size === 0;
  }

  has(variable: VariableId, value: T): boolean {
    const domain = this.domain(variable);
    const position = domain.positions.get(value);
    return position !== undefined && domain.alive[position] === 1;
  }

  /** Returns false when the value was already absent */
  remove(variable: VariableId, value: T): boolean {
    const domain = this.domain(variable);
    const position = domain.positions.get(value);
    if (position === undefined || domain.alive[position] === 0) {
      return false;
    }
    this.removeAt(domain, position);
    return true;
  }

  /** Narrow a domain to exactly `[value]` */
  assign(variable: VariableId, value: T): void {
    const domain = this.domain(variable);
    const keep = domain.positions.get(value);
    if (keep === undefined || domain.alive[keep] === 0) {
      throw new RangeError(`Value ${String(value)} is not in the domain of ${variable}`);
    }
    for (let i = 0; i < domain.values.length; i++) {
      if (i !== keep && domain.alive[i]) {
        this.removeAt(domain, i);
      }
    }
  }

  snapshot(): DomainSnapshot {
    const mark = this.trailPositions.length;
    return { storeId: this.id, mark, stamp: mark > 0 ? this.trailStamps[mark - 1] : 0 };
  }

  restore(snapshot: DomainSnapshot): void {
    if (snapshot.storeId !== this.id) {
      throw new Error('Snapshot was taken from a different domain store');
    }
    if (!this.isLive(snapshot)) {
      throw new Error('Snapshot is no longer valid: an earlier state was already restored');
    }
    while (this.trailPositions.length > snapshot.mark) {
      const domain = this.trailVariables.pop();
      const position = this.trailPositions.pop();
      this.trailStamps.pop();
      if (domain === undefined || position === undefined) break;
      domain.alive[position] = 1;
      domain.size++;
    }
  }

  /** Undo every removal since construction */
  reset(): void {
    this.restore({ storeId: this.id, mark: 0, stamp: 0 });
  }

  toMap(): Map<VariableId, T[]> {
    const result = new Map<VariableId, T[]>();
    for (const variable of this.domains.keys()) {
      result.set(variable, this.get(variable));
    }
    return result;
  }

  private removeAt(domain: VariableDomain<T>, position: number): void {
    domain.alive[position] = 0;
    domain.size--;
    this.trailVariables.push(domain);
    this.trailPositions.push(position);
    this.trailStamps.push(this.nextStamp++);
  }

  /**
   * A snapshot is live while the trail entries below its mark are the ones
   * it saw. Any restore below the mark pops the entry at `mark - 1`.
   */
  private isLive(snapshot: DomainSnapshot): boolean {
    if (snapshot.mark > this.trailPositions.length) return false;
    if (snapshot.mark === 0) return true;
    return this.trailStamps[snapshot.mark - 1] === snapshot.stamp;
  }

  private domain(variable: VariableId): VariableDomain<T> {
    const domain = this.domains.get(variable);
    if (!domain) {
      throw new Error(`Unknown variable: ${variable}`);
    }
    return domain;
  }
}
