import { describe, it, expect, vi, afterEach } from "vitest";

import { MalformedRecord, SourceUnauthorized } from "../../../src/errors.js";
import {
  LinearIssuesAdapter,
  classifyLinearResponse,
  linearIssuesDefinition,
} from "../../../src/sources/linear.js";
import { UNAUTHORIZED, type JsonResponse } from "../../../src/utils/http.js";
import { loadFixtureList } from "../../fixtures/load.js";

const pages = loadFixtureList("linear-issues.json", "pages");

const window = {
  since: new Date("2024-06-01T00:00:00.000Z"),
  until: new Date("2024-06-08T00:00:00.000Z"),
};

const retry = {
  maxAttempts: 2,
  initialBackoffMs: 1,
  backoffMultiplier: 1,
  maxBackoffMs: 1,
  jitterRatio: 0,
};

function response(
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): JsonResponse {
  return { status, headers: new Headers(headers), body };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("sources/linear", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ============================================================================
  // Response Classification
  // ============================================================================

  describe("classifyLinearResponse", () => {
    it("should return the issues page of a successful response", () => {
      const result = classifyLinearResponse(response(200, pages[1]));

      expect(result.status).toBe("ok");
      if (result.status !== "ok") return;
      expect(result.value.pageInfo).toEqual({
        hasNextPage: false,
        endCursor: null,
      });
      expect(result.value.nodes).toHaveLength(1);
    });

    it("should treat RATELIMITED errors as throttling", () => {
      const result = classifyLinearResponse(
        response(
          400,
          {
            errors: [
              {
                message: "Rate limit exceeded",
                extensions: { code: "RATELIMITED" },
              },
            ],
          },
          { "Retry-After": "60" }
        )
      );

      expect(result).toEqual({
        status: "retryable",
        reason: "Linear rate limit (RATELIMITED)",
        throttled: true,
        retryAfterMs: 60_000,
      });
    });

    it("should flag authentication errors as unauthorized", () => {
      const result = classifyLinearResponse(
        response(200, {
          errors: [
            {
              message: "Authentication required",
              extensions: { code: "AUTHENTICATION_ERROR" },
            },
          ],
        })
      );

      expect(result).toEqual({
        status: "fatal",
        reason: "Linear rejected the API key",
        code: UNAUTHORIZED,
      });
    });

    it("should fail on other GraphQL errors", () => {
      const result = classifyLinearResponse(
        response(200, {
          errors: [{ message: "Cannot query field \"estimate\"" }],
        })
      );

      expect(result).toEqual({
        status: "fatal",
        reason: 'Linear API error: Cannot query field "estimate"',
      });
    });

    it("should fail on an unexpected body", () => {
      expect(classifyLinearResponse(response(200, { data: {} }))).toEqual({
        status: "fatal",
        reason: "Unexpected Linear response shape",
      });
    });

    it("should retry server errors", () => {
      expect(classifyLinearResponse(response(502, undefined))).toEqual({
        status: "retryable",
        reason: "Transient HTTP 502",
      });
    });
  });

  // ============================================================================
  // Adapter
  // ============================================================================

  describe("LinearIssuesAdapter.fetch", () => {
    it("should follow the cursor through every page", async () => {
      const bodies: string[] = [];
      const fetchMock = vi.fn(async (_url: string, init: RequestInit) => {
        const body = String(init.body);
        bodies.push(body);
        return jsonResponse(body.includes('"after":"cursor-1"') ? pages[1] : pages[0]);
      });
      vi.stubGlobal("fetch", fetchMock);

      const adapter = new LinearIssuesAdapter({ apiKey: "test-secret", retry });
      const ids: string[] = [];
      for await (const item of adapter.fetch(window)) {
        const row = adapter.transform(item);
        ids.push(String(row.id));
      }

      expect(ids).toEqual(["issue-a", "issue-b", "issue-c"]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://api.linear.app/graphql",
        expect.objectContaining({
          method: "POST",
          headers: {
            Authorization: "test-secret",
            "Content-Type": "application/json",
          },
        })
      );

      const first: unknown = JSON.parse(bodies[0] ?? "{}");
      expect(first).toMatchObject({
        variables: {
          after: null,
          filter: {
            updatedAt: {
              gte: "2024-06-01T00:00:00.000Z",
              lt: "2024-06-08T00:00:00.000Z",
            },
          },
        },
      });
      const second: unknown = JSON.parse(bodies[1] ?? "{}");
      expect(second).toMatchObject({ variables: { after: "cursor-1" } });
    });

    it("should stop the stream when the key is rejected", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => jsonResponse({ error: "invalid key" }, 401))
      );

      const adapter = new LinearIssuesAdapter({ apiKey: "test-secret", retry });
      const consume = async (): Promise<void> => {
        for await (const _item of adapter.fetch(window)) {
          // drain
        }
      };

      await expect(consume()).rejects.toBeInstanceOf(SourceUnauthorized);
    });
  });

  describe("LinearIssuesAdapter.transform", () => {
    const adapter = new LinearIssuesAdapter({ apiKey: "test-secret" });

    it("should flatten nested objects into columns", () => {
      const first = loadFixtureList("linear-issues.json", "pages")[0];
      const result = classifyLinearResponse(response(200, first));
      if (result.status !== "ok") throw new Error("fixture page did not parse");

      expect(adapter.transform(result.value.nodes[0])).toEqual({
        id: "issue-a",
        identifier: "ENG-1",
        title: "Fix login redirect",
        state: "In Progress",
        assignee: "Ada",
        priority: 2,
        created_at: new Date("2024-05-01T09:00:00.000Z"),
        updated_at: new Date("2024-06-02T10:30:00.000Z"),
        project_name: "Auth",
        labels: ["bug", "frontend"],
        cycle_id: "cycle-7",
      });
    });

    it("should map absent relations to null", () => {
      const first = loadFixtureList("linear-issues.json", "pages")[0];
      const result = classifyLinearResponse(response(200, first));
      if (result.status !== "ok") throw new Error("fixture page did not parse");

      expect(adapter.transform(result.value.nodes[1])).toMatchObject({
        id: "issue-b",
        state: null,
        assignee: null,
        project_name: null,
        labels: [],
        cycle_id: null,
      });
    });

    it("should reject an issue with a missing field", () => {
      expect(() =>
        adapter.transform({ id: "issue-x", identifier: "ENG-9" })
      ).toThrow(MalformedRecord);
    });

    it("should reject an unparseable timestamp", () => {
      expect(() =>
        adapter.transform({
          id: "issue-x",
          identifier: "ENG-9",
          title: "Broken",
          state: null,
          assignee: null,
          priority: 0,
          createdAt: "not-a-date",
          updatedAt: "2024-06-01T00:00:00.000Z",
          project: null,
          labels: { nodes: [] },
          cycle: null,
        })
      ).toThrow('createdAt: invalid timestamp "not-a-date"');
    });
  });

  it("should key issues by id", () => {
    expect(linearIssuesDefinition.primaryKey).toEqual(["id"]);
    expect(linearIssuesDefinition.columns.map((c) => c.name)).toContain("labels");
  });
});
