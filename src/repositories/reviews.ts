/**
 * Access Review Repository
 *
 * Walks definitions → instances → decisions. Instances of all definitions are
 * requested in one $batch round; decisions and contacted reviewers of all
 * instances in the next.
 */

import type { GraphApi } from "../graph/types.js";
import { isRecord, readRecord, readString, readTimestamp, type JsonRecord } from "../json.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { mapRecords, readBatchCollection } from "./records.js";
import type { DecisionOutcome, ReviewDecision, ReviewInstance, ReviewStatus } from "./types.js";

const REVIEWS_PATH = "identityGovernance/accessReviews/definitions";

/** Graph reports a reviewer of all zeroes for items nobody has decided. */
const EMPTY_GUID = "00000000-0000-0000-0000-000000000000";

const COMPLETED_STATUSES = new Set(["Completed", "Applied", "Applying", "AutoReviewed"]);
const NOT_STARTED_STATUSES = new Set(["NotStarted", "Initializing", "Starting"]);

type DefinitionRef = { id: string; displayName: string };

export class ReviewRepository {
  private readonly logger: GovernanceLogger;

  constructor(
    private readonly graph: GraphApi,
    logger?: GovernanceLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  /** All review instances with their decisions. Zero instances is a normal state. */
  async fetchReviewInstances(): Promise<ReviewInstance[]> {
    const definitionsRaw = await this.graph.getAllPages(REVIEWS_PATH);
    const definitions = mapRecords(definitionsRaw, "access review definition", (record, id): DefinitionRef => ({
      id,
      displayName: readString(record, "displayName") ?? id,
    }));
    this.logger.info(`Retrieved ${definitions.length} access review definitions`);
    if (definitions.length === 0) return [];

    const instanceResults = await this.graph.batch(
      definitions.map((d) => ({ id: d.id, method: "GET" as const, path: `${REVIEWS_PATH}/${encodeURIComponent(d.id)}/instances` })),
    );

    const pending: Array<{ definition: DefinitionRef; record: JsonRecord; id: string }> = [];
    for (const [i, result] of instanceResults.entries()) {
      const definition = definitions[i];
      const raw = await readBatchCollection(this.graph, result);
      pending.push(...mapRecords(raw, "access review instance", (record, id) => ({ definition, record, id })));
    }
    if (pending.length === 0) return [];

    const detailResults = await this.graph.batch(
      pending.flatMap(({ definition, id }) => {
        const base = `${REVIEWS_PATH}/${encodeURIComponent(definition.id)}/instances/${encodeURIComponent(id)}`;
        return [
          { method: "GET" as const, path: `${base}/decisions` },
          { method: "GET" as const, path: `${base}/contactedReviewers` },
        ];
      }),
    );

    const instances: ReviewInstance[] = [];
    for (const [i, { definition, record, id }] of pending.entries()) {
      const decisionsRaw = await readBatchCollection(this.graph, detailResults[2 * i]);
      const reviewersRaw = await readBatchCollection(this.graph, detailResults[2 * i + 1]);
      instances.push(normalizeInstance(definition, record, id, decisionsRaw, reviewersRaw));
    }
    this.logger.info(`Retrieved ${instances.length} access review instances`);
    return instances;
  }
}

// =============================================================================
// Normalization
// =============================================================================

export function normalizeStatus(raw: string | undefined): ReviewStatus {
  if (raw && COMPLETED_STATUSES.has(raw)) return "Completed";
  if (!raw || NOT_STARTED_STATUSES.has(raw)) return "NotStarted";
  return "InProgress";
}

export function normalizeOutcome(raw: string | undefined): DecisionOutcome {
  switch (raw) {
    case "Approve":
      return "approve";
    case "Deny":
      return "deny";
    default:
      // NotReviewed and DontKnow leave the item open.
      return "none";
  }
}

function normalizeInstance(
  definition: DefinitionRef,
  record: JsonRecord,
  id: string,
  decisionsRaw: readonly unknown[],
  reviewersRaw: readonly unknown[],
): ReviewInstance {
  const decisions: Record<string, ReviewDecision> = {};
  for (const decision of mapRecords(decisionsRaw, "access review decision", toDecision)) {
    decisions[decision.id] = decision;
  }
  const decided = Object.values(decisions).filter((d) => d.outcome !== "none").length;

  const reviewers = new Set<string>();
  for (const raw of reviewersRaw) {
    const reviewerId = isRecord(raw) ? readString(raw, "id") : undefined;
    if (reviewerId) reviewers.add(reviewerId);
  }

  return {
    id,
    definitionId: definition.id,
    displayName: readString(record, "displayName") ?? definition.displayName,
    status: normalizeStatus(readString(record, "status")),
    start: readTimestamp(record, "startDateTime"),
    end: readTimestamp(record, "endDateTime"),
    decisionsRequired: Object.keys(decisions).length,
    decisionsCompleted: decided,
    decisions,
    reviewers: [...reviewers].sort(),
  };
}

function toDecision(record: JsonRecord, id: string): ReviewDecision {
  const reviewedBy = readRecord(record, "reviewedBy");
  const reviewerId = reviewedBy ? readString(reviewedBy, "id") : undefined;
  const principal = readRecord(record, "principal");
  return {
    id,
    outcome: normalizeOutcome(readString(record, "decision")),
    reviewerId: reviewerId && reviewerId !== EMPTY_GUID ? reviewerId : null,
    principalId: principal ? (readString(principal, "id") ?? null) : null,
  };
}
