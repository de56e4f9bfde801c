/**
 * Analysis Service
 *
 * Runs one analysis pass: fetches each dataset once, runs the five analyzers
 * concurrently and assembles the report. A failing dataset or analyzer
 * degrades only the sections that depend on it.
 */

import { detectConflicts } from "../analyzers/conflicts.js";
import { analyzeCoverage } from "../analyzers/coverage.js";
import { detectPimViolations } from "../analyzers/pim.js";
import { analyzeReviews } from "../analyzers/access-reviews.js";
import { analyzeEntitlements } from "../analyzers/entitlements.js";
import type { ConflictResult, CoverageResult, EntitlementResult, PimResult, ReviewResult } from "../analyzers/types.js";
import { getDefaultConfig, type GovernanceConfig } from "../config.js";
import { AnalyzerError, formatErrorMessage, isGovernanceError } from "../errors.js";
import type { GraphApi } from "../graph/types.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { DirectoryRepository } from "../repositories/directory.js";
import { EntitlementRepository, type EntitlementData } from "../repositories/entitlements.js";
import { PolicyRepository } from "../repositories/policies.js";
import { ReviewRepository } from "../repositories/reviews.js";
import { RoleRepository } from "../repositories/roles.js";
import type { DirectorySnapshot, Policy, ReviewInstance, RoleActivation, RoleAssignment, RoleDefinition } from "../repositories/types.js";
import { assembleReport, sectionFailed, sectionOk } from "../report/assembler.js";
import type { Report, SectionName, SectionResult } from "../report/types.js";
import { systemClock, type Clock } from "../types.js";

export type GovernanceServiceOptions = {
  graph: GraphApi;
  config?: GovernanceConfig;
  clock?: Clock;
  logger?: GovernanceLogger;
};

type RoleData = {
  definitions: RoleDefinition[];
  assignments: RoleAssignment[];
};

/** Datasets of one run, each fetched at most once. */
class AnalysisRun {
  private policiesLoad?: Promise<Policy[]>;
  private rolesLoad?: Promise<RoleData>;
  private activationsLoad?: Promise<RoleActivation[]>;
  private reviewsLoad?: Promise<ReviewInstance[]>;
  private snapshotLoad?: Promise<DirectorySnapshot>;
  private entitlementsLoad?: Promise<EntitlementData>;

  constructor(
    private readonly repos: {
      policies: PolicyRepository;
      directory: DirectoryRepository;
      roles: RoleRepository;
      reviews: ReviewRepository;
      entitlements: EntitlementRepository;
    },
    private readonly config: GovernanceConfig,
    private readonly now: number,
    private readonly logger: GovernanceLogger,
  ) {}

  policies(): Promise<Policy[]> {
    this.policiesLoad ??= this.repos.policies.fetchPolicies();
    return this.policiesLoad;
  }

  roles(): Promise<RoleData> {
    this.rolesLoad ??= (async () => {
      const definitions = await this.repos.roles.fetchRoleDefinitions();
      const assignments = await this.repos.roles.fetchRoleAssignments(definitions);
      return { definitions, assignments };
    })();
    return this.rolesLoad;
  }

  activations(): Promise<RoleActivation[]> {
    this.activationsLoad ??= this.repos.roles.fetchActivations(this.config.pim.dormancyDays);
    return this.activationsLoad;
  }

  reviews(): Promise<ReviewInstance[]> {
    this.reviewsLoad ??= this.repos.reviews.fetchReviewInstances();
    return this.reviewsLoad;
  }

  entitlements(): Promise<EntitlementData> {
    this.entitlementsLoad ??= this.repos.entitlements.fetchEntitlements();
    return this.entitlementsLoad;
  }

  /**
   * Role membership only refines role-targeted policies, so a failed role
   * fetch leaves it empty instead of failing coverage.
   */
  snapshot(): Promise<DirectorySnapshot> {
    this.snapshotLoad ??= (async () => {
      const policies = await this.policies();
      const roles = await this.roles().catch((error: unknown): RoleData => {
        this.logger.warn(`Role data unavailable for coverage resolution: ${formatErrorMessage(error)}`);
        return { definitions: [], assignments: [] };
      });
      return this.repos.directory.fetchSnapshot(policies, roles.assignments, roles.definitions, this.now);
    })();
    return this.snapshotLoad;
  }
}

export class GovernanceService {
  private readonly graph: GraphApi;
  private readonly config: GovernanceConfig;
  private readonly clock: Clock;
  private readonly logger: GovernanceLogger;

  constructor(options: GovernanceServiceOptions) {
    this.graph = options.graph;
    this.config = options.config ?? getDefaultConfig();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Fetch, analyze and assemble one report. Never rejects for a single section's failure. */
  async runAnalysis(): Promise<Report> {
    const now = this.clock();
    const run = new AnalysisRun(
      {
        policies: new PolicyRepository(this.graph, this.logger.child("policies")),
        directory: new DirectoryRepository(this.graph, this.logger.child("directory")),
        roles: new RoleRepository(this.graph, { logger: this.logger.child("roles"), clock: this.clock }),
        reviews: new ReviewRepository(this.graph, this.logger.child("reviews")),
        entitlements: new EntitlementRepository(this.graph, this.logger.child("entitlements")),
      },
      this.config,
      now,
      this.logger,
    );

    this.logger.info("Starting governance analysis");
    const [conditionalAccess, conflicts, pim, accessReviews, entitlements] = await Promise.all([
      this.section<CoverageResult>("conditionalAccess", async () =>
        analyzeCoverage(await run.policies(), await run.snapshot(), { weights: this.config.coverage.weights }),
      ),
      this.section<ConflictResult>("conflicts", async () => detectConflicts(await run.policies())),
      this.section<PimResult>("pim", async () => {
        const [roles, activations] = await Promise.all([run.roles(), run.activations()]);
        return detectPimViolations(
          { assignments: roles.assignments, activations, definitions: roles.definitions, now },
          this.config.pim,
        );
      }),
      this.section<ReviewResult>("accessReviews", async () =>
        analyzeReviews(await run.reviews(), now, this.config.reviews),
      ),
      this.section<EntitlementResult>("entitlements", async () =>
        analyzeEntitlements(await run.entitlements(), now, this.config.entitlements),
      ),
    ]);

    const report = assembleReport(
      { conditionalAccess, conflicts, pim, accessReviews, entitlements },
      {
        generatedAt: new Date(now),
        postureWeights: { conditionalAccess: this.config.posture.conditionalAccessWeight, pim: this.config.posture.pimWeight },
      },
    );

    if (report.degradedSections.length > 0) {
      this.logger.warn(`Analysis completed with degraded sections: ${report.degradedSections.map((d) => d.section).join(", ")}`);
    } else {
      this.logger.info(`Analysis completed with ${report.summaryCounts.total} violations`);
    }
    return report;
  }

  private async section<T>(name: SectionName, compute: () => Promise<T>): Promise<SectionResult<T>> {
    try {
      return sectionOk(await compute());
    } catch (error) {
      this.logger.error(`Section ${name} failed: ${formatErrorMessage(error)}`);
      return sectionFailed(isGovernanceError(error) ? error : new AnalyzerError(name, formatErrorMessage(error), { cause: error }));
    }
  }
}
