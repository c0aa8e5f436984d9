/**
 * Period Domain Model
 *
 * A slot in the school day. Times are "HH:MM" (24h). A period whose end is
 * earlier than its start crosses midnight.
 */

export interface Period {
  id: string;
  name: string;
  startTime: string;
  endTime: string;
  createdAt: string;
  updatedAt?: string;
}

export interface CreatePeriodInput {
  name: string;
  startTime: string;
  endTime: string;
}

export interface UpdatePeriodInput {
  name?: string;
  startTime?: string;
  endTime?: string;
}

export const MIN_PERIOD_MINUTES = 30;

const MINUTES_PER_DAY = 24 * 60;

/**
 * Parse "HH:MM" into minutes after midnight. Returns null if malformed.
 */
export function parseTime(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return hours * 60 + minutes;
}

/**
 * Start and end in minutes, with the end pushed past midnight when needed
 */
function getRange(period: Pick<Period, "startTime" | "endTime">): [number, number] | null {
  const start = parseTime(period.startTime);
  const end = parseTime(period.endTime);
  if (start === null || end === null) {
    return null;
  }
  return [start, end < start ? end + MINUTES_PER_DAY : end];
}

export function getDurationMinutes(period: Pick<Period, "startTime" | "endTime">): number {
  const range = getRange(period);
  return range ? range[1] - range[0] : 0;
}

export function periodsOverlap(
  a: Pick<Period, "startTime" | "endTime">,
  b: Pick<Period, "startTime" | "endTime">
): boolean {
  const rangeA = getRange(a);
  const rangeB = getRange(b);
  if (!rangeA || !rangeB) {
    return false;
  }

  // Compare against b shifted by a day as well, for ranges that wrap midnight
  for (const shift of [-MINUTES_PER_DAY, 0, MINUTES_PER_DAY]) {
    if (rangeA[0] < rangeB[1] + shift && rangeB[0] + shift < rangeA[1]) {
      return true;
    }
  }
  return false;
}

export function comparePeriods(a: Period, b: Period): number {
  return (parseTime(a.startTime) ?? 0) - (parseTime(b.startTime) ?? 0);
}

/**
 * Validate a period against the periods already configured.
 */
export function validatePeriod(
  input: { name?: string; startTime: string; endTime: string },
  others: Period[]
): string[] {
  const errors: string[] = [];

  if (input.name !== undefined && input.name.trim().length === 0) {
    errors.push("name is required");
  }

  if (parseTime(input.startTime) === null) {
    errors.push("startTime must be HH:MM");
  }
  if (parseTime(input.endTime) === null) {
    errors.push("endTime must be HH:MM");
  }
  if (errors.length > 0) {
    return errors;
  }

  if (getDurationMinutes(input) < MIN_PERIOD_MINUTES) {
    errors.push(`Period must be at least ${MIN_PERIOD_MINUTES} minutes long`);
  }

  const overlapping = others.find((other) => periodsOverlap(input, other));
  if (overlapping) {
    errors.push(`This period overlaps with ${overlapping.name}`);
  }

  return errors;
}
