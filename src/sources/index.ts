/**
 * Source registry - maps CLI source names to definitions and adapters
 */

import { HN_API_URL, HackerNewsCommentsAdapter, hnCommentsDefinition } from "./hacker-news.js";
import { LinearIssuesAdapter, linearIssuesDefinition } from "./linear.js";

import type { SourceEntry } from "./types.js";

export const SOURCES: Readonly<Record<string, SourceEntry>> = {
  [linearIssuesDefinition.name]: {
    definition: linearIssuesDefinition,
    description: "Linear issues (GraphQL API)",
    createAdapter(env, options = {}) {
      const apiKey = env.LINEAR_API_KEY;
      if (apiKey === undefined || apiKey === "") {
        throw new Error("LINEAR_API_KEY environment variable is not set");
      }
      return new LinearIssuesAdapter({ ...options, apiKey });
    },
  },
  [hnCommentsDefinition.name]: {
    definition: hnCommentsDefinition,
    description: "Hacker News comments (Algolia search API)",
    createAdapter(env, options = {}) {
      return new HackerNewsCommentsAdapter({
        ...options,
        apiUrl: env.HN_API_URL ?? HN_API_URL,
      });
    },
  },
};

export function listSources(): SourceEntry[] {
  return Object.values(SOURCES);
}

/**
 * Look up a registered source by name
 * @throws Error naming the available sources when the name is unknown
 */
export function getSource(name: string): SourceEntry {
  const entry = SOURCES[name];
  if (entry === undefined) {
    throw new Error(
      `Unknown source "${name}". Available: ${Object.keys(SOURCES).join(", ")}`
    );
  }
  return entry;
}

export * from "./types.js";
export * from "./definition.js";
export * from "./hacker-news.js";
export * from "./linear.js";
