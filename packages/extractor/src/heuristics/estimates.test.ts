import { describe, expect, it } from "vitest";
import { extractHoursAndTimeline } from "./estimates.js";

describe("extractHoursAndTimeline", () => {
  it("reads hours and days", () => {
    expect(extractHoursAndTimeline("Estimated at 40 hours over 10 days")).toEqual({
      hours: 40,
      timelineDays: 10,
    });
  });

  it("returns zeros without digits", () => {
    expect(extractHoursAndTimeline("No estimate available")).toEqual({
      hours: 0,
      timelineDays: 0,
    });
  });

  it("takes the first match of each and keeps week counts as written", () => {
    expect(extractHoursAndTimeline("Dev 30 hours, QA 10 Hours, total 2 Weeks then 5 days")).toEqual({
      hours: 30,
      timelineDays: 2,
    });
  });

  it("accepts singular units without spacing", () => {
    expect(extractHoursAndTimeline("1hour of review within 1day")).toEqual({
      hours: 1,
      timelineDays: 1,
    });
  });
});
