/**
 * Map coloring: one variable per region, adjacent regions differ
 */

import { Problem } from '../model/normalize';
import { ProblemBuilder } from '../model/problem';
import { notEqual } from '../model/relations';

export interface ColoringMap {
  name?: string;
  regions: string[];
  /** Unordered pairs of neighbouring regions */
  borders: Array<[string, string]>;
  colors: string[];
}

export function createMapColoringProblem(map: ColoringMap): Problem<string> {
  const builder = new ProblemBuilder<string>(map.name ?? 'Map coloring');
  builder.defineVariables(map.regions, map.colors);

  const seen = new Set<string>();
  for (const [a, b] of map.borders) {
    const key = a < b ? `${a}|${b}` : `${b}|${a}`;
    if (seen.has(key)) continue;
    seen.add(key);
    builder.addConstraint(a, b, notEqual);
  }

  return builder.build();
}
