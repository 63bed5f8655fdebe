// Eligibility Kernel - Comparison operators (v1)

import type { ComparisonOperatorV1 } from "./types";

export type ComparatorV1 = (actual: string | undefined, expected: string | ReadonlyArray<string>) => boolean;

function asList(expected: string | ReadonlyArray<string>): ReadonlyArray<string> {
  return typeof expected === "string" ? [expected] : expected;
}

/**
 * Operator -> predicate. A missing answer never equals anything.
 */
export const COMPARATORS_V1: { readonly [Op in ComparisonOperatorV1]: ComparatorV1 } = Object.freeze({
  equals: (actual, expected) => actual !== undefined && typeof expected === "string" && actual === expected,
  not_equals: (actual, expected) => !(actual !== undefined && typeof expected === "string" && actual === expected),
  in_list: (actual, expected) => actual !== undefined && asList(expected).includes(actual)
});

export function compareV1(
  operator: ComparisonOperatorV1,
  actual: string | undefined,
  expected: string | ReadonlyArray<string>
): boolean {
  return COMPARATORS_V1[operator](actual, expected);
}
