/**
 * Conditional access targeting helpers shared by the coverage and conflict
 * analyzers.
 */

import type { DirectorySnapshot, Policy, UserConditions } from "../repositories/types.js";

export const ALL = "All";
export const NONE = "None";
export const GUESTS = "GuestsOrExternalUsers";

export const MFA_CONTROLS = ["mfa", "mfaFromOtherProvider"];
export const BLOCK_CONTROL = "block";
export const LEGACY_CLIENT_APP_TYPES = ["exchangeActiveSync", "other"];

// =============================================================================
// Controls
// =============================================================================

/** Grant requirements as one set; an authentication strength counts as a control. */
export function requirementSet(policy: Policy): Set<string> {
  const set = new Set(policy.controls.builtInControls);
  if (policy.controls.authenticationStrength) set.add(`authenticationStrength:${policy.controls.authenticationStrength}`);
  return set;
}

export function isBlocking(policy: Policy): boolean {
  return policy.controls.builtInControls.includes(BLOCK_CONTROL);
}

export function requiresMfa(policy: Policy): boolean {
  if (isBlocking(policy)) return false;
  return policy.controls.authenticationStrength !== null || policy.controls.builtInControls.some((c) => MFA_CONTROLS.includes(c));
}

/** MFA cannot be bypassed by satisfying another control instead. */
export function requiresMfaStrictly(policy: Policy): boolean {
  if (!requiresMfa(policy)) return false;
  return policy.controls.operator === "AND" || requirementSet(policy).size === 1;
}

export function blocksLegacyAuth(policy: Policy): boolean {
  return isBlocking(policy) && policy.conditions.clientAppTypes.some((t) => LEGACY_CLIENT_APP_TYPES.includes(t));
}

export function usesLocations(policy: Policy): boolean {
  const { includeLocations, excludeLocations } = policy.conditions.locations;
  return includeLocations.length > 0 || excludeLocations.length > 0;
}

// =============================================================================
// Resolution against a directory snapshot
// =============================================================================

function addAll(target: Set<string>, source: Iterable<string> | undefined): void {
  if (!source) return;
  for (const id of source) target.add(id);
}

function expandUsers(
  users: readonly string[],
  groups: readonly string[],
  roles: readonly string[],
  snapshot: DirectorySnapshot,
): Set<string> {
  const result = new Set<string>();
  for (const token of users) {
    if (token === ALL) {
      addAll(result, snapshot.users.map((u) => u.id));
    } else if (token === GUESTS) {
      addAll(result, snapshot.users.filter((u) => u.userType === "Guest").map((u) => u.id));
    } else if (token !== NONE) {
      result.add(token);
    }
  }
  for (const groupId of groups) addAll(result, snapshot.groupMembers.get(groupId));
  for (const roleId of roles) addAll(result, snapshot.roleMembers.get(roleId));
  return result;
}

/** User ids a policy applies to: resolved includes minus resolved excludes. */
export function resolveUsers(conditions: UserConditions, snapshot: DirectorySnapshot): Set<string> {
  const included = expandUsers(conditions.includeUsers, conditions.includeGroups, conditions.includeRoles, snapshot);
  const excluded = expandUsers(conditions.excludeUsers, conditions.excludeGroups, conditions.excludeRoles, snapshot);
  for (const id of excluded) included.delete(id);
  return included;
}

/** Users a policy includes but then carves out again. */
export function resolveExcludedUsers(conditions: UserConditions, snapshot: DirectorySnapshot): Set<string> {
  const included = expandUsers(conditions.includeUsers, conditions.includeGroups, conditions.includeRoles, snapshot);
  const excluded = expandUsers(conditions.excludeUsers, conditions.excludeGroups, conditions.excludeRoles, snapshot);
  return new Set([...excluded].filter((id) => included.has(id)));
}

export function resolveApps(policy: Policy, snapshot: DirectorySnapshot): Set<string> {
  const { includeApplications, excludeApplications } = policy.conditions.applications;
  const result = new Set<string>();
  for (const token of includeApplications) {
    if (token === ALL) addAll(result, snapshot.applications.map((a) => a.appId));
    else if (token !== NONE) result.add(token);
  }
  for (const appId of excludeApplications) result.delete(appId);
  return result;
}

// =============================================================================
// Symbolic overlap
// =============================================================================

export type TargetScope = { include: ReadonlySet<string>; exclude: ReadonlySet<string> };

export function userScope(policy: Policy): TargetScope {
  const u = policy.conditions.users;
  return {
    include: new Set([
      ...u.includeUsers.map((t) => `user:${t}`),
      ...u.includeGroups.map((t) => `group:${t}`),
      ...u.includeRoles.map((t) => `role:${t}`),
    ]),
    exclude: new Set([
      ...u.excludeUsers.map((t) => `user:${t}`),
      ...u.excludeGroups.map((t) => `group:${t}`),
      ...u.excludeRoles.map((t) => `role:${t}`),
    ]),
  };
}

export function appScope(policy: Policy): TargetScope {
  const a = policy.conditions.applications;
  return {
    include: new Set(a.includeApplications.map((t) => `app:${t}`)),
    exclude: new Set(a.excludeApplications.map((t) => `app:${t}`)),
  };
}

function isWildcard(token: string): boolean {
  return token.endsWith(`:${ALL}`);
}

function isNothing(scope: TargetScope): boolean {
  return scope.include.size === 0 || [...scope.include].every((t) => t.endsWith(`:${NONE}`));
}

/**
 * Whether two scopes can target a common subject without a directory lookup.
 * "All" matches every token the other side includes unless an exclusion on
 * either side removes it. The relation is symmetric.
 */
export function scopesOverlap(a: TargetScope, b: TargetScope): boolean {
  if (isNothing(a) || isNothing(b)) return false;
  const aAll = [...a.include].some(isWildcard);
  const bAll = [...b.include].some(isWildcard);
  if (aAll && bAll) return true;

  const excluded = (token: string) => a.exclude.has(token) || b.exclude.has(token);
  if (aAll) return [...b.include].some((t) => !excluded(t));
  if (bAll) return [...a.include].some((t) => !excluded(t));
  return [...a.include].some((t) => b.include.has(t) && !excluded(t));
}

function sameSet(a: ReadonlySet<string> | readonly string[], b: ReadonlySet<string> | readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const v of left) if (!right.has(v)) return false;
  return true;
}

export function sameScope(a: TargetScope, b: TargetScope): boolean {
  return sameSet(a.include, b.include) && sameSet(a.exclude, b.exclude);
}

/** Conditions other than user and application targeting. */
export function sameOtherConditions(a: Policy, b: Policy): boolean {
  const ca = a.conditions;
  const cb = b.conditions;
  return (
    sameSet(ca.locations.includeLocations, cb.locations.includeLocations) &&
    sameSet(ca.locations.excludeLocations, cb.locations.excludeLocations) &&
    sameSet(ca.clientAppTypes, cb.clientAppTypes) &&
    sameSet(ca.userRiskLevels, cb.userRiskLevels) &&
    sameSet(ca.signInRiskLevels, cb.signInRiskLevels) &&
    sameSet(ca.platforms, cb.platforms)
  );
}

export function isSubset(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const v of a) if (!b.has(v)) return false;
  return true;
}
