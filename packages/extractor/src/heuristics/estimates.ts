const HOURS_REGEX = /(\d+)\s*hours?/;
// Weeks are reported as written, not converted to days.
const TIMELINE_REGEX = /(\d+)\s*(?:days?|weeks?)/;

export interface HoursAndTimeline {
  hours: number;
  timelineDays: number;
}

function firstNumber(text: string, pattern: RegExp): number {
  const digits = text.match(pattern)?.[1];
  return digits ? Number.parseInt(digits, 10) : 0;
}

export function extractHoursAndTimeline(text: string): HoursAndTimeline {
  const lower = text.toLowerCase();
  return {
    hours: firstNumber(lower, HOURS_REGEX),
    timelineDays: firstNumber(lower, TIMELINE_REGEX),
  };
}
