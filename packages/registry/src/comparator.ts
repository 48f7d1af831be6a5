/**
 * Comparator Evaluator
 *
 * Judges an observed value against an SLA target. Integer inputs only,
 * so every comparison is exact.
 */

import type { Comparator, Sla } from "@sla-registry/types";

/**
 * Returns true when `observed` satisfies `target` under `kind`.
 */
export function evaluate(observed: number, target: number, kind: Comparator): boolean {
  switch (kind) {
    case "LT":
      return observed < target;
    case "LE":
      return observed <= target;
    case "EQ":
      return observed === target;
    case "NE":
      return observed !== target;
    case "GE":
      return observed >= target;
    case "GT":
      return observed > target;
  }
}

const SYMBOLS: Record<Comparator, string> = {
  LT: "<",
  LE: "<=",
  EQ: "==",
  NE: "!=",
  GE: ">=",
  GT: ">",
};

export function describeComparator(kind: Comparator): string {
  return SYMBOLS[kind];
}

/** e.g. `observed <= 24` */
export function describeRule(sla: Pick<Sla, "comparator" | "target">): string {
  return `observed ${describeComparator(sla.comparator)} ${sla.target}`;
}
