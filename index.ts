/**
 * Entra Governance: Entry Point
 *
 * Wires configuration, token acquisition, the Graph client and the analysis
 * service into one toolkit, and re-exports the public modules.
 */

import { resolveConfig, type GovernanceConfig, type GovernanceConfigInput } from "./src/config.js";
import { createClientSecretTokenManager } from "./src/credentials/index.js";
import type { TokenProvider } from "./src/credentials/index.js";
import { enableGovernanceDiagnostics } from "./src/diagnostics.js";
import { ConfigError } from "./src/errors.js";
import { GraphClient } from "./src/graph/index.js";
import type { FetchLike } from "./src/graph/index.js";
import { GovernanceService } from "./src/governance/service.js";
import { createGovernanceLogger, type GovernanceLogger, type LogTransport } from "./src/logging/index.js";
import { exportReport, type Report, type ReportExportFormat, type ReportExportResult } from "./src/report/index.js";
import type { Sleep } from "./src/retry.js";
import type { Clock } from "./src/types.js";

export type GovernanceToolkitOptions = {
  /** Replaces the client-secret token manager built from the config. */
  tokenProvider?: TokenProvider;
  fetch?: FetchLike;
  sleep?: Sleep;
  clock?: Clock;
  transports?: LogTransport[];
};

export type GovernanceToolkit = {
  config: GovernanceConfig;
  logger: GovernanceLogger;
  tokens: TokenProvider;
  graph: GraphClient;
  service: GovernanceService;
  runAnalysis(): Promise<Report>;
  exportReport(report: Report, format: ReportExportFormat): ReportExportResult;
};

export function createGovernanceToolkit(
  input: GovernanceConfigInput = {},
  options: GovernanceToolkitOptions = {},
): GovernanceToolkit {
  const config = resolveConfig(input);
  const logger = createGovernanceLogger("toolkit", { level: config.logLevel, transports: options.transports });
  if (config.diagnostics.enabled) enableGovernanceDiagnostics();

  const tokens = options.tokenProvider ?? createTokenProvider(config, logger);
  const graph = new GraphClient({
    tokenProvider: tokens,
    baseUrl: config.graph.baseUrl,
    retry: config.graph.retry,
    requestTimeoutMs: config.graph.requestTimeoutMs,
    batchSize: config.graph.batchSize,
    maxPages: config.graph.maxPages,
    maxItems: config.graph.maxItems,
    cursorParam: config.graph.cursorParam,
    fetch: options.fetch,
    sleep: options.sleep,
    logger: logger.child("graph"),
  });
  const service = new GovernanceService({ graph, config, clock: options.clock, logger: logger.child("analysis") });

  return {
    config,
    logger,
    tokens,
    graph,
    service,
    runAnalysis: () => service.runAnalysis(),
    exportReport,
  };
}

function createTokenProvider(config: GovernanceConfig, logger: GovernanceLogger): TokenProvider {
  const { tenantId, clientId, clientSecret } = config;
  if (!tenantId || !clientId || !clientSecret) {
    const missing = [
      tenantId ? null : "tenantId",
      clientId ? null : "clientId",
      clientSecret ? null : "clientSecret",
    ].filter((field): field is string => field !== null);
    throw new ConfigError(missing.map((field) => `/${field}: required when no token provider is supplied`));
  }
  return createClientSecretTokenManager({
    tenantId,
    clientId,
    clientSecret,
    authorityHost: config.authorityHost,
    scopes: config.graph.scopes,
    refreshMarginMs: config.token.refreshMarginMs,
    logger: logger.child("tokens"),
  });
}

// =============================================================================
// Public API
// =============================================================================

export * from "./src/analyzers/index.js";
export * from "./src/config.js";
export * from "./src/credentials/index.js";
export * from "./src/diagnostics.js";
export * from "./src/errors.js";
export * from "./src/graph/index.js";
export { GovernanceService } from "./src/governance/service.js";
export type { GovernanceServiceOptions } from "./src/governance/service.js";
export * from "./src/logging/index.js";
export * from "./src/pagination.js";
export * from "./src/repositories/index.js";
export * from "./src/report/index.js";
export * from "./src/retry.js";
export * from "./src/types.js";
