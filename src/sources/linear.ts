/**
 * Linear issues source - GraphQL API with cursor pagination
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { defineSource } from "./definition.js";
import { paginate } from "./pagination.js";
import { Nullable, parseItem, parseTimestamp } from "./validation.js";
import { SYNC_DEFAULTS } from "../types/index.js";
import {
  UNAUTHORIZED,
  classifyStatus,
  fetchJson,
  type JsonResponse,
} from "../utils/http.js";
import { Fatal, Ok, Retryable, parseRetryAfter } from "../utils/retry.js";

import type { AdapterOptions, SourceAdapter } from "./types.js";
import type { FetchWindow, RawRecord } from "../types/index.js";
import type { Attempt } from "../utils/retry.js";

export const LINEAR_API_URL = "https://api.linear.app/graphql";
const PAGE_SIZE = 100;

// ============================================================================
// Definition
// ============================================================================

export const linearIssuesDefinition = defineSource({
  name: "linear-issues",
  dataset: "linear",
  table: "issues",
  columns: [
    { name: "id", type: "string", nullable: false },
    { name: "identifier", type: "string", nullable: true },
    { name: "title", type: "string", nullable: true },
    { name: "state", type: "string", nullable: true },
    { name: "assignee", type: "string", nullable: true },
    { name: "priority", type: "integer", nullable: true },
    { name: "created_at", type: "timestamp", nullable: true },
    { name: "updated_at", type: "timestamp", nullable: true },
    { name: "project_name", type: "string", nullable: true },
    { name: "labels", type: "string[]", nullable: true },
    { name: "cycle_id", type: "string", nullable: true },
  ],
  primaryKey: ["id"],
  incrementalLookbackDays: 7,
  fullSync: { since: "2019-01-01T00:00:00.000Z" },
});

// ============================================================================
// Schemas
// ============================================================================

const Named = Type.Object({ name: Type.String() });

export const LinearIssueSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  identifier: Type.String(),
  title: Type.String(),
  state: Nullable(Named),
  assignee: Nullable(Named),
  priority: Type.Integer(),
  createdAt: Type.String(),
  updatedAt: Type.String(),
  project: Nullable(Named),
  labels: Type.Object({ nodes: Type.Array(Named) }),
  cycle: Nullable(Type.Object({ id: Type.String() })),
});

export type LinearIssue = Static<typeof LinearIssueSchema>;

const IssuesPageSchema = Type.Object({
  nodes: Type.Array(Type.Unknown()),
  pageInfo: Type.Object({
    hasNextPage: Type.Boolean(),
    endCursor: Nullable(Type.String()),
  }),
});

type IssuesPage = Static<typeof IssuesPageSchema>;

const IssuesResponseSchema = Type.Object({
  data: Type.Object({ issues: IssuesPageSchema }),
});

const GraphQLErrorsSchema = Type.Object({
  errors: Type.Array(
    Type.Object({
      message: Type.String(),
      extensions: Type.Optional(
        Type.Object({ code: Type.Optional(Type.String()) })
      ),
    })
  ),
});

const ISSUES_QUERY = `
query GetIssues($after: String, $filter: IssueFilter) {
  issues(first: ${String(PAGE_SIZE)}, after: $after, filter: $filter) {
    pageInfo { hasNextPage endCursor }
    nodes {
      id
      identifier
      title
      state { name }
      assignee { name }
      priority
      createdAt
      updatedAt
      project { name }
      labels { nodes { name } }
      cycle { id }
    }
  }
}
`;

// ============================================================================
// Response Classification
// ============================================================================

/**
 * Linear reports rate limiting and auth failures as GraphQL errors,
 * sometimes with a 200 or 400 status, so errors are inspected first.
 */
export function classifyLinearResponse(
  response: JsonResponse
): Attempt<IssuesPage> {
  const errors = Value.Check(GraphQLErrorsSchema, response.body)
    ? response.body.errors
    : [];
  const codes = errors.map((e) => e.extensions?.code);

  if (codes.includes("RATELIMITED")) {
    return Retryable("Linear rate limit (RATELIMITED)", {
      throttled: true,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }
  if (codes.includes("AUTHENTICATION_ERROR") || codes.includes("FORBIDDEN")) {
    return Fatal("Linear rejected the API key", UNAUTHORIZED);
  }

  const status = classifyStatus(response);
  if (status.status !== "ok") {
    return status;
  }
  if (errors.length > 0) {
    return Fatal(`Linear API error: ${errors.map((e) => e.message).join("; ")}`);
  }
  if (!Value.Check(IssuesResponseSchema, status.value)) {
    return Fatal("Unexpected Linear response shape");
  }
  return Ok(status.value.data.issues);
}

// ============================================================================
// Adapter
// ============================================================================

export interface LinearAdapterOptions extends AdapterOptions {
  apiKey: string;
  apiUrl?: string;
}

export class LinearIssuesAdapter implements SourceAdapter {
  readonly definition = linearIssuesDefinition;

  constructor(private options: LinearAdapterOptions) {}

  fetch(window: FetchWindow, signal?: AbortSignal): AsyncIterable<unknown> {
    const { apiKey, apiUrl = LINEAR_API_URL, retry, requestTimeoutMs } =
      this.options;
    const filter = {
      updatedAt: {
        gte: window.since.toISOString(),
        lt: window.until.toISOString(),
      },
    };

    return paginate<IssuesPage, unknown, string>(
      {
        label: this.definition.name,
        fetchPage: async (cursor, pageSignal) => {
          const sent = await fetchJson(
            apiUrl,
            {
              method: "POST",
              headers: {
                Authorization: apiKey,
                "Content-Type": "application/json",
              },
              body: JSON.stringify({
                query: ISSUES_QUERY,
                variables: { after: cursor ?? null, filter },
              }),
            },
            {
              signal: pageSignal,
              timeoutMs: requestTimeoutMs ?? SYNC_DEFAULTS.requestTimeoutMs,
            }
          );
          if (sent.status !== "ok") return sent;
          return classifyLinearResponse(sent.value);
        },
        items: (page) => page.nodes,
        nextCursor: (page) =>
          page.pageInfo.hasNextPage && page.pageInfo.endCursor !== null
            ? page.pageInfo.endCursor
            : undefined,
      },
      { retry, signal }
    );
  }

  transform(item: unknown): RawRecord {
    const issue = parseItem(LinearIssueSchema, item, "linear issue");

    return {
      id: issue.id,
      identifier: issue.identifier,
      title: issue.title,
      state: issue.state?.name ?? null,
      assignee: issue.assignee?.name ?? null,
      priority: issue.priority,
      created_at: parseTimestamp(issue.createdAt, "createdAt"),
      updated_at: parseTimestamp(issue.updatedAt, "updatedAt"),
      project_name: issue.project?.name ?? null,
      labels: issue.labels.nodes.map((label) => label.name),
      cycle_id: issue.cycle?.id ?? null,
    };
  }
}
