import type { CaseReference } from "../types/foi.js";

export type ReferenceGenerator = () => CaseReference;

const CASE_REFERENCE_PATTERN = /^CAM\d{4}$/;

/**
 * `CAM` plus a uniform integer in 1000..9999. References are not checked
 * against earlier cases, so two requests can share one.
 */
export function createReferenceGenerator(random: () => number = Math.random): ReferenceGenerator {
  return () => `CAM${1000 + Math.floor(random() * 9000)}`;
}

export function isCaseReference(value: string): value is CaseReference {
  return CASE_REFERENCE_PATTERN.test(value);
}
