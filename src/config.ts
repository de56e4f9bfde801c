/**
 * Governance toolkit configuration schema (TypeBox) and default config.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Errors } from "@sinclair/typebox/errors";
import { Check } from "@sinclair/typebox/value";
import { DEFAULT_REVIEW_OPTIONS } from "./analyzers/access-reviews.js";
import { DEFAULT_COVERAGE_WEIGHTS } from "./analyzers/coverage.js";
import { DEFAULT_ENTITLEMENT_OPTIONS } from "./analyzers/entitlements.js";
import { DEFAULT_PIM_OPTIONS } from "./analyzers/pim.js";
import { DEFAULT_REFRESH_MARGIN_MS, GRAPH_DEFAULT_SCOPES } from "./credentials/token-manager.js";
import { ConfigError } from "./errors.js";
import { GRAPH_CLIENT_DEFAULTS, GRAPH_ENDPOINT } from "./graph/client.js";
import { isLogLevel, type GovernanceLogLevel } from "./logging/index.js";
import { DEFAULT_POSTURE_WEIGHTS } from "./report/assembler.js";
import { GRAPH_RETRY_DEFAULTS } from "./retry.js";

const RetrySchema = Type.Object({
  maxRateLimitAttempts: Type.Optional(Type.Integer({ minimum: 0 })),
  maxServerErrorAttempts: Type.Optional(Type.Integer({ minimum: 0 })),
  maxNetworkAttempts: Type.Optional(Type.Integer({ minimum: 0 })),
  baseDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
  maxDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
});

export const configSchema = Type.Object({
  tenantId: Type.Optional(Type.String({ description: "Entra ID tenant ID" })),
  clientId: Type.Optional(Type.String({ description: "App registration (client) ID" })),
  clientSecret: Type.Optional(Type.String({ description: "Client secret for the app registration" })),
  authorityHost: Type.Optional(Type.String({ description: "Override for the login authority host" })),
  graph: Type.Object({
    baseUrl: Type.String({ description: "Graph endpoint, e.g. https://graph.microsoft.com/v1.0" }),
    scopes: Type.Array(Type.String(), { minItems: 1 }),
    requestTimeoutMs: Type.Number({ exclusiveMinimum: 0 }),
    batchSize: Type.Integer({ minimum: 1, maximum: 20 }),
    maxPages: Type.Integer({ minimum: 1 }),
    maxItems: Type.Integer({ minimum: 1 }),
    cursorParam: Type.String({ minLength: 1 }),
    retry: RetrySchema,
  }),
  token: Type.Object({
    refreshMarginMs: Type.Number({ minimum: 0 }),
  }),
  coverage: Type.Object({
    weights: Type.Object({
      coverage: Type.Number({ minimum: 0, maximum: 1 }),
      mfaStrictness: Type.Number({ minimum: 0, maximum: 1 }),
      sessionControls: Type.Number({ minimum: 0, maximum: 1 }),
      exclusions: Type.Number({ minimum: 0, maximum: 1 }),
    }),
  }),
  pim: Type.Object({
    privilegedRoles: Type.Array(Type.String()),
    excessiveRoleThreshold: Type.Integer({ minimum: 1 }),
    dormancyDays: Type.Integer({ minimum: 1 }),
    permanentThresholdDays: Type.Integer({ minimum: 1 }),
    kindWeights: Type.Object({
      StandingAdminAccess: Type.Number({ minimum: 0 }),
      ExcessiveRoleAssignments: Type.Number({ minimum: 0 }),
      DormantEligibility: Type.Number({ minimum: 0 }),
    }),
    severityWeights: Type.Object({
      low: Type.Number({ minimum: 0 }),
      medium: Type.Number({ minimum: 0 }),
      high: Type.Number({ minimum: 0 }),
      critical: Type.Number({ minimum: 0 }),
    }),
  }),
  reviews: Type.Object({
    participationThreshold: Type.Number({ minimum: 0, maximum: 1 }),
    overdueHighAfterDays: Type.Integer({ minimum: 0 }),
  }),
  entitlements: Type.Object({
    assignmentThreshold: Type.Integer({ minimum: 0 }),
    expiringWithinDays: Type.Integer({ minimum: 0 }),
  }),
  posture: Type.Object({
    conditionalAccessWeight: Type.Number({ minimum: 0, maximum: 1 }),
    pimWeight: Type.Number({ minimum: 0, maximum: 1 }),
  }),
  logLevel: Type.Union([
    Type.Literal("trace"),
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("fatal"),
  ]),
  diagnostics: Type.Object({
    enabled: Type.Boolean(),
  }),
});

export type GovernanceConfig = Static<typeof configSchema>;

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** Partial input accepted by resolveConfig; anything omitted takes its default. */
export type GovernanceConfigInput = DeepPartial<GovernanceConfig>;

export function getDefaultConfig(): GovernanceConfig {
  return {
    graph: {
      baseUrl: GRAPH_ENDPOINT,
      scopes: [...GRAPH_DEFAULT_SCOPES],
      requestTimeoutMs: GRAPH_CLIENT_DEFAULTS.requestTimeoutMs,
      batchSize: GRAPH_CLIENT_DEFAULTS.batchSize,
      maxPages: GRAPH_CLIENT_DEFAULTS.maxPages,
      maxItems: GRAPH_CLIENT_DEFAULTS.maxItems,
      cursorParam: GRAPH_CLIENT_DEFAULTS.cursorParam,
      retry: { ...GRAPH_RETRY_DEFAULTS },
    },
    token: { refreshMarginMs: DEFAULT_REFRESH_MARGIN_MS },
    coverage: { weights: { ...DEFAULT_COVERAGE_WEIGHTS } },
    pim: {
      privilegedRoles: [...DEFAULT_PIM_OPTIONS.privilegedRoles],
      excessiveRoleThreshold: DEFAULT_PIM_OPTIONS.excessiveRoleThreshold,
      dormancyDays: DEFAULT_PIM_OPTIONS.dormancyDays,
      permanentThresholdDays: DEFAULT_PIM_OPTIONS.permanentThresholdDays,
      kindWeights: { ...DEFAULT_PIM_OPTIONS.kindWeights },
      severityWeights: { ...DEFAULT_PIM_OPTIONS.severityWeights },
    },
    reviews: { ...DEFAULT_REVIEW_OPTIONS },
    entitlements: { ...DEFAULT_ENTITLEMENT_OPTIONS },
    posture: {
      conditionalAccessWeight: DEFAULT_POSTURE_WEIGHTS.conditionalAccess,
      pimWeight: DEFAULT_POSTURE_WEIGHTS.pim,
    },
    logLevel: "info",
    diagnostics: { enabled: false },
  };
}

const WEIGHT_TOLERANCE = 1e-6;

/**
 * Merge `input` over the defaults and validate the result. Schema violations
 * and semantic problems are collected together into one ConfigError.
 */
export function resolveConfig(input: GovernanceConfigInput = {}): GovernanceConfig {
  const defaults = getDefaultConfig();
  const merged: unknown = {
    ...defaults,
    ...input,
    graph: { ...defaults.graph, ...input.graph, retry: { ...defaults.graph.retry, ...input.graph?.retry } },
    token: { ...defaults.token, ...input.token },
    coverage: { weights: { ...defaults.coverage.weights, ...input.coverage?.weights } },
    pim: {
      ...defaults.pim,
      ...input.pim,
      kindWeights: { ...defaults.pim.kindWeights, ...input.pim?.kindWeights },
      severityWeights: { ...defaults.pim.severityWeights, ...input.pim?.severityWeights },
    },
    reviews: { ...defaults.reviews, ...input.reviews },
    entitlements: { ...defaults.entitlements, ...input.entitlements },
    posture: { ...defaults.posture, ...input.posture },
    diagnostics: { ...defaults.diagnostics, ...input.diagnostics },
  };

  if (!Check(configSchema, merged)) {
    const issues = [...Errors(configSchema, merged)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(issues);
  }

  const issues = semanticIssues(merged);
  if (issues.length > 0) throw new ConfigError(issues);
  return merged;
}

function semanticIssues(config: GovernanceConfig): string[] {
  const issues: string[] = [];
  const w = config.coverage.weights;
  const coverageSum = w.coverage + w.mfaStrictness + w.sessionControls + w.exclusions;
  if (Math.abs(coverageSum - 1) > WEIGHT_TOLERANCE) {
    issues.push(`/coverage/weights: must sum to 1 (got ${coverageSum})`);
  }
  const postureSum = config.posture.conditionalAccessWeight + config.posture.pimWeight;
  if (Math.abs(postureSum - 1) > WEIGHT_TOLERANCE) {
    issues.push(`/posture: weights must sum to 1 (got ${postureSum})`);
  }
  const retry = config.graph.retry;
  if (retry.baseDelayMs !== undefined && retry.maxDelayMs !== undefined && retry.baseDelayMs > retry.maxDelayMs) {
    issues.push("/graph/retry: baseDelayMs must not exceed maxDelayMs");
  }
  return issues;
}

/**
 * Build configuration input from process environment variables.
 * Unset variables are left to the defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GovernanceConfigInput {
  const input: GovernanceConfigInput = {};
  if (env.AZURE_TENANT_ID) input.tenantId = env.AZURE_TENANT_ID;
  if (env.AZURE_CLIENT_ID) input.clientId = env.AZURE_CLIENT_ID;
  if (env.AZURE_CLIENT_SECRET) input.clientSecret = env.AZURE_CLIENT_SECRET;
  if (env.AZURE_AUTHORITY_HOST) input.authorityHost = env.AZURE_AUTHORITY_HOST;
  if (env.GRAPH_BASE_URL) input.graph = { baseUrl: env.GRAPH_BASE_URL };

  const level = env.GOVERNANCE_LOG_LEVEL?.toLowerCase();
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigError([`GOVERNANCE_LOG_LEVEL: unknown level "${env.GOVERNANCE_LOG_LEVEL}"`]);
    }
    const resolved: GovernanceLogLevel = level;
    input.logLevel = resolved;
  }
  if (env.GOVERNANCE_DIAGNOSTICS === "1" || env.GOVERNANCE_DIAGNOSTICS === "true") {
    input.diagnostics = { enabled: true };
  }
  return input;
}
