export { PolicyRepository, POLICIES_PATH, normalizePolicy } from "./policies.js";
export { DirectoryRepository, buildRoleMembers } from "./directory.js";
export { RoleRepository, ACTIVATION_ACTIONS, UNKNOWN_ROLE_NAME } from "./roles.js";
export { ReviewRepository, normalizeOutcome, normalizeStatus } from "./reviews.js";
export { EntitlementRepository, ENTITLEMENT_MANAGEMENT, normalizeAccessPackage, packageControls } from "./entitlements.js";
export type { EntitlementData } from "./entitlements.js";
export type {
  AccessPackage,
  AccessPackageCatalog,
  ApplicationConditions,
  AssignmentType,
  DecisionOutcome,
  DirectoryApplication,
  DirectorySnapshot,
  DirectoryUser,
  GrantControls,
  GrantOperator,
  LocationConditions,
  PackageAssignment,
  PackageControls,
  Policy,
  PolicyConditions,
  PolicyState,
  ReviewDecision,
  ReviewInstance,
  ReviewStatus,
  RoleActivation,
  RoleAssignment,
  RoleDefinition,
  UserConditions,
  UserType,
} from "./types.js";
