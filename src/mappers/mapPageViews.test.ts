import { describe, it, expect } from "vitest";
import { mapPageViews } from "./mapPageViews";

describe("mapPageViews", () => {
  it("should echo the requested window", () => {
    expect(mapPageViews({ views: 40 }, { year: 2024, month: 3 })).toEqual({
      views: 40,
      year: 2024,
      month: 3,
    });
  });

  it("should require a numeric views count", () => {
    expect(() => mapPageViews({ views: "40" })).toThrow('Expected a number at "views"');
  });
});
