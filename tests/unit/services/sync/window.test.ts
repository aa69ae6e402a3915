import { describe, it, expect } from "vitest";

import { hnCommentsDefinition } from "../../../../src/sources/hacker-news.js";
import { resolveWindow } from "../../../../src/services/sync/window.js";
import { eventsDefinition } from "../../../mocks/sources.js";

const now = new Date("2024-06-08T00:00:00.000Z");

describe("services/sync/window", () => {
  it("should look back the definition's incremental days", () => {
    expect(resolveWindow(eventsDefinition, "incremental", now)).toEqual({
      since: new Date("2024-06-05T00:00:00.000Z"),
      until: now,
    });
  });

  it("should keep the time of day of now rather than flooring to midnight", () => {
    const afternoon = new Date("2024-06-08T15:30:00.000Z");

    expect(resolveWindow(eventsDefinition, "incremental", afternoon)).toEqual({
      since: new Date("2024-06-05T15:30:00.000Z"),
      until: afternoon,
    });
  });

  it("should honour a lookback override", () => {
    expect(resolveWindow(eventsDefinition, "incremental", now, 1).since).toEqual(
      new Date("2024-06-07T00:00:00.000Z")
    );
    expect(resolveWindow(eventsDefinition, "incremental", now, 0).since).toEqual(now);
  });

  it("should reject a negative lookback", () => {
    expect(() => resolveWindow(eventsDefinition, "incremental", now, -1)).toThrow(
      RangeError
    );
  });

  it("should start a full sync at the fixed start date", () => {
    expect(resolveWindow(eventsDefinition, "full", now)).toEqual({
      since: new Date("2024-01-01T00:00:00.000Z"),
      until: now,
    });
  });

  it("should start a full sync at the full lookback", () => {
    expect(resolveWindow(hnCommentsDefinition, "full", now).since).toEqual(
      new Date("2023-06-09T00:00:00.000Z")
    );
  });

  it("should not share the caller's Date instance", () => {
    const window = resolveWindow(eventsDefinition, "incremental", now);
    expect(window.until).not.toBe(now);
  });
});
