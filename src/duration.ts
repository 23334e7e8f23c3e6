export const DURATION_PATTERN = "^(?:\\d+)(?:ms|s|m|h|d)$";

const DURATION_REGEX = /^(\d+)(ms|s|m|h|d)$/;

type DurationUnit = "ms" | "s" | "m" | "h" | "d";

const UNIT_MULTIPLIERS: Record<DurationUnit, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const FORMAT_ORDER: readonly DurationUnit[] = ["d", "h", "m", "s"];

export const MILLISECONDS_PER_DAY = UNIT_MULTIPLIERS.d;

export class DurationParseError extends Error {
  constructor(value: unknown) {
    const display = typeof value === "string" ? value : String(value);
    super(`Invalid duration string: "${display}"`);
    this.name = "DurationParseError";
  }
}

function isDurationUnit(value: string): value is DurationUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_MULTIPLIERS, value);
}

export function parseDurationToMilliseconds(value: string): number {
  const match = DURATION_REGEX.exec(value);

  if (!match) {
    throw new DurationParseError(value);
  }

  const [, numeric, unit] = match;
  const amount = Number.parseInt(numeric, 10);

  if (!Number.isSafeInteger(amount) || !isDurationUnit(unit)) {
    throw new DurationParseError(value);
  }

  const milliseconds = amount * UNIT_MULTIPLIERS[unit];

  if (!Number.isSafeInteger(milliseconds)) {
    throw new DurationParseError(value);
  }

  return milliseconds;
}

export function formatMillisecondsToDuration(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError("Duration must be a non-negative finite number of milliseconds");
  }

  if (value === 0) {
    return "0ms";
  }

  for (const unit of FORMAT_ORDER) {
    if (value % UNIT_MULTIPLIERS[unit] === 0) {
      return `${value / UNIT_MULTIPLIERS[unit]}${unit}`;
    }
  }

  return `${value}ms`;
}
