/**
 * Domain Entities
 *
 * Normalized snapshots of Graph resources. Each analysis run re-fetches;
 * nothing here is mutated after construction.
 */

// =============================================================================
// Conditional Access
// =============================================================================

export type PolicyState = "enabled" | "disabled" | "reportOnly";

export type GrantOperator = "AND" | "OR";

export type UserConditions = {
  readonly includeUsers: readonly string[];
  readonly excludeUsers: readonly string[];
  readonly includeGroups: readonly string[];
  readonly excludeGroups: readonly string[];
  readonly includeRoles: readonly string[];
  readonly excludeRoles: readonly string[];
};

export type ApplicationConditions = {
  readonly includeApplications: readonly string[];
  readonly excludeApplications: readonly string[];
};

export type LocationConditions = {
  readonly includeLocations: readonly string[];
  readonly excludeLocations: readonly string[];
};

export type PolicyConditions = {
  readonly users: UserConditions;
  readonly applications: ApplicationConditions;
  readonly locations: LocationConditions;
  readonly clientAppTypes: readonly string[];
  readonly userRiskLevels: readonly string[];
  readonly signInRiskLevels: readonly string[];
  readonly platforms: readonly string[];
};

export type GrantControls = {
  readonly operator: GrantOperator;
  /** e.g. "mfa", "compliantDevice", "block". */
  readonly builtInControls: readonly string[];
  /** Display name (or id) of the required authentication strength. */
  readonly authenticationStrength: string | null;
};

export type Policy = {
  readonly id: string;
  readonly displayName: string;
  readonly state: PolicyState;
  readonly conditions: PolicyConditions;
  readonly controls: GrantControls;
  /** Names of the session controls that are configured and enabled. */
  readonly sessionControls: readonly string[];
  /** Epoch ms, or null when Graph reports neither modified nor created time. */
  readonly modifiedAt: number | null;
};

// =============================================================================
// Directory
// =============================================================================

export type UserType = "Member" | "Guest";

export type DirectoryUser = {
  readonly id: string;
  readonly displayName: string;
  readonly userType: UserType;
  readonly accountEnabled: boolean;
};

export type DirectoryApplication = {
  readonly appId: string;
  readonly displayName: string;
};

/** Everything the coverage analyzer needs to resolve policy targets. */
export type DirectorySnapshot = {
  readonly users: readonly DirectoryUser[];
  readonly applications: readonly DirectoryApplication[];
  readonly groupMembers: ReadonlyMap<string, ReadonlySet<string>>;
  readonly roleMembers: ReadonlyMap<string, ReadonlySet<string>>;
};

// =============================================================================
// Roles (PIM)
// =============================================================================

export type RoleDefinition = {
  readonly id: string;
  readonly displayName: string;
  readonly templateId: string | null;
  readonly isBuiltIn: boolean;
};

export type AssignmentType = "Eligible" | "Active";

export type RoleAssignment = {
  readonly id: string;
  readonly principalId: string;
  readonly roleId: string;
  readonly roleName: string;
  readonly assignmentType: AssignmentType;
  /** "Direct" or "Group". */
  readonly memberType: string;
  /** Epoch ms; null when Graph omits the start. */
  readonly start: number | null;
  /** Epoch ms; null means no expiry. */
  readonly end: number | null;
};

export type RoleActivation = {
  readonly id: string;
  readonly principalId: string;
  readonly roleId: string;
  readonly createdAt: number;
  readonly action: string;
};

// =============================================================================
// Access Reviews
// =============================================================================

export type ReviewStatus = "NotStarted" | "InProgress" | "Completed";

export type DecisionOutcome = "approve" | "deny" | "none";

export type ReviewDecision = {
  readonly id: string;
  readonly outcome: DecisionOutcome;
  /** Reviewer who recorded (or is assigned) the decision. */
  readonly reviewerId: string | null;
  readonly principalId: string | null;
};

export type ReviewInstance = {
  readonly id: string;
  readonly definitionId: string;
  readonly displayName: string;
  readonly status: ReviewStatus;
  readonly start: number | null;
  readonly end: number | null;
  readonly decisionsRequired: number;
  readonly decisionsCompleted: number;
  readonly decisions: Readonly<Record<string, ReviewDecision>>;
  /** Reviewers contacted for the instance; undecided items are assigned to each of them. */
  readonly reviewers: readonly string[];
};

// =============================================================================
// Entitlement Management
// =============================================================================

export type AccessPackageCatalog = {
  readonly id: string;
  readonly displayName: string;
  readonly description: string | null;
  readonly catalogType: string | null;
  readonly state: string | null;
  readonly isExternallyVisible: boolean;
};

/** Governance controls an access package's assignment policies impose. */
export type PackageControls = {
  readonly policyCount: number;
  /** Some policy requires approval before access is granted. */
  readonly requiresApproval: boolean;
  /** Some policy ends the assignments it grants. */
  readonly hasExpiration: boolean;
};

export type AccessPackage = {
  readonly id: string;
  readonly displayName: string;
  readonly catalogId: string | null;
  readonly isHidden: boolean;
  readonly state: string | null;
  readonly controls: PackageControls;
};

export type PackageAssignment = {
  readonly id: string;
  readonly accessPackageId: string | null;
  readonly targetId: string | null;
  readonly state: string | null;
  /** Scheduled end of the assignment; null when it does not expire. */
  readonly end: number | null;
};
