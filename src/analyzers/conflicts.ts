/**
 * Conditional Access Conflict Detector
 *
 * Compares every unordered pair of enabled policies. Pairs are visited in
 * policy-id order so the verdict for (A, B) is the verdict for (B, A).
 */

import type { Policy } from "../repositories/types.js";
import type { Violation } from "../types.js";
import {
  appScope,
  isBlocking,
  isSubset,
  requirementSet,
  sameOtherConditions,
  sameScope,
  scopesOverlap,
  userScope,
} from "./policy-targets.js";
import type { ConflictResult, PolicyConflict } from "./types.js";

export function detectConflicts(policies: readonly Policy[]): ConflictResult {
  const enabled = policies.filter((p) => p.state === "enabled").sort((a, b) => a.id.localeCompare(b.id));
  const conflicts: PolicyConflict[] = [];

  for (let i = 0; i < enabled.length; i++) {
    for (let j = i + 1; j < enabled.length; j++) {
      const conflict = comparePolicies(enabled[i], enabled[j]);
      if (conflict) conflicts.push(conflict);
    }
  }

  return { conflicts, violations: conflicts.map(toViolation) };
}

/**
 * Verdict for one pair, or null when the policies do not interact.
 * The result does not depend on argument order.
 */
export function comparePolicies(first: Policy, second: Policy): PolicyConflict | null {
  const [a, b] = first.id.localeCompare(second.id) <= 0 ? [first, second] : [second, first];

  const usersA = userScope(a);
  const usersB = userScope(b);
  const appsA = appScope(a);
  const appsB = appScope(b);
  if (!scopesOverlap(usersA, usersB) || !scopesOverlap(appsA, appsB)) return null;

  const blockA = isBlocking(a);
  const blockB = isBlocking(b);
  const reqA = requirementSet(a);
  const reqB = requirementSet(b);

  if (blockA !== blockB) {
    const granting = blockA ? b : a;
    if (requirementSet(granting).size === 0) return null;
    return {
      type: "contradictory",
      severity: "critical",
      policyA: a.id,
      policyB: b.id,
      policyNames: [a.displayName, b.displayName],
      description: `"${(blockA ? a : b).displayName}" blocks access that "${granting.displayName}" grants for overlapping users and applications`,
      recommendation: "Narrow the targeting of one policy or exclude the intended population explicitly so the outcome is unambiguous.",
    };
  }
  if (blockA || !sameOtherConditions(a, b) || reqA.size === 0 || reqB.size === 0) return null;

  const sameOperator = a.controls.operator === b.controls.operator;
  const singleControl = reqA.size === 1 || reqB.size === 1;
  const contained = isSubset(reqA, reqB) || isSubset(reqB, reqA);

  if (contained && (sameOperator || singleControl)) {
    return {
      type: "redundant",
      severity: "low",
      policyA: a.id,
      policyB: b.id,
      policyNames: [a.displayName, b.displayName],
      description: `"${a.displayName}" and "${b.displayName}" apply overlapping requirements to overlapping targets`,
      recommendation: "Consolidate the two policies into one to simplify evaluation and maintenance.",
    };
  }

  const identicalTargeting = sameScope(usersA, usersB) && sameScope(appsA, appsB);
  const shared = [...reqA].some((c) => reqB.has(c));
  if (identicalTargeting && !sameOperator && shared) {
    return {
      type: "operator-mismatch",
      severity: "medium",
      policyA: a.id,
      policyB: b.id,
      policyNames: [a.displayName, b.displayName],
      description: `"${a.displayName}" (${a.controls.operator}) and "${b.displayName}" (${b.controls.operator}) combine shared controls with different grant operators`,
      recommendation: "Align the grant operators so the effective requirement is explicit.",
    };
  }

  return null;
}

function toViolation(conflict: PolicyConflict): Violation {
  return Object.freeze({
    kind: "PolicyConflict",
    severity: conflict.severity,
    subjectRef: `policy:${conflict.policyA}|${conflict.policyB}`,
    evidence: Object.freeze({
      conflictType: conflict.type,
      policyA: conflict.policyA,
      policyB: conflict.policyB,
      policyNames: Object.freeze([...conflict.policyNames]),
    }),
    recommendation: conflict.recommendation,
  });
}
