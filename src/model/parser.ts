/**
 * Parser for YAML/JSON problem specifications
 */

import YAML from 'yaml';
import { z } from 'zod';
import { Problem } from './normalize';
import { ProblemBuilder } from './problem';
import { relationFor } from './relations';
import { ProblemSpec } from './types';

const ValueSchema = z.union([z.string(), z.number()]);

const RelationSchema = z.object({
  between: z.tuple([z.string().min(1), z.string().min(1)]),
  op: z.enum(['=', '<', '>', '≠']),
});

export const ProblemSpecSchema = z
  .object({
    name: z.string().optional(),
    variables: z.array(z.string().min(1)).min(1, 'at least one variable is required'),
    domain: z.array(ValueSchema).optional(),
    domains: z.record(z.array(ValueSchema)).optional(),
    constraints: z.array(RelationSchema).optional(),
    allDifferent: z.array(z.array(z.string().min(1))).optional(),
  })
  .strict();

export type ParseResult = { success: true; spec: ProblemSpec } | { success: false; error: string };

/**
 * Parse a YAML or JSON string into a ProblemSpec
 */
export function parseProblem(input: string): ParseResult {
  let data: unknown;
  try {
    // Try parsing as JSON first
    try {
      data = JSON.parse(input);
    } catch {
      // If JSON fails, try YAML
      data = YAML.parse(input);
    }
  } catch (error) {
    return {
      success: false,
      error: `Parse error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (data === null || data === undefined) {
    return { success: false, error: 'Empty problem specification' };
  }

  const parsed = ProblemSpecSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return { success: false, error: `Invalid problem specification at ${path}: ${issue.message}` };
  }

  return { success: true, spec: parsed.data };
}

/**
 * Build a solvable problem from a spec. Variables without an override take
 * the default `domain`.
 */
export function buildProblem(spec: ProblemSpec): Problem<string | number> {
  const builder = new ProblemBuilder<string | number>(spec.name ?? 'Untitled problem');

  builder.defineVariables(spec.variables, spec.domain);
  for (const [variable, values] of Object.entries(spec.domains ?? {})) {
    builder.defineDomain(variable, values);
  }
  for (const relation of spec.constraints ?? []) {
    const [a, b] = relation.between;
    builder.addConstraint(a, b, relationFor(relation.op));
  }
  for (const group of spec.allDifferent ?? []) {
    builder.addAllDifferent(group);
  }

  return builder.build();
}

/**
 * Convert a ProblemSpec to YAML string
 */
export function specToYAML(spec: ProblemSpec): string {
  return YAML.stringify(orderedSpec(spec));
}

/**
 * Convert a ProblemSpec to JSON string
 */
export function specToJSON(spec: ProblemSpec): string {
  return JSON.stringify(orderedSpec(spec), null, 2);
}

function orderedSpec(spec: ProblemSpec): ProblemSpec {
  return {
    name: spec.name,
    variables: spec.variables,
    domain: spec.domain,
    domains: spec.domains,
    constraints: spec.constraints,
    allDifferent: spec.allDifferent,
  };
}
