import { DurationParseError } from './errors.js';

const HOURS_RE = /(\d+(?:\.\d+)?)h/g;
const MINUTES_RE = /(\d+(?:\.\d+)?)m/g;

export interface ParsedDuration {
  hours: number;
  minutes: number;
  /** ISO 8601, e.g. PT2H30M; a zero unit is omitted. */
  iso: string;
}

/**
 * Parse "2h", "30m", "2h 30m", "2h30m", "1.5h" (case-insensitive). Tokens of the
 * same unit add up. The total is rounded half-up to the whole minute.
 */
export function parseDuration(text: string): ParsedDuration {
  const normalized = (text ?? '').trim().toLowerCase().split(/\s+/).join(' ');
  if (!normalized) {
    throw new DurationParseError('Duration is required.');
  }
  if (normalized.includes('-')) {
    throw new DurationParseError('Negative durations are not allowed.');
  }

  const hourTokens = [...normalized.matchAll(HOURS_RE)].map((m) => m[1]);
  const minuteTokens = [...normalized.matchAll(MINUTES_RE)].map((m) => m[1]);
  if (hourTokens.length === 0 && minuteTokens.length === 0) {
    throw new DurationParseError("Duration must include hours or minutes (e.g., '2h', '30m').");
  }

  const scale = Math.max(0, ...[...hourTokens, ...minuteTokens].map(fractionDigits));
  const hours = sumScaled(hourTokens, scale);
  const minutes = sumScaled(minuteTokens, scale);

  // total and divisor share the same decimal scale, so this is exact half-up rounding
  const divisor = 10n ** BigInt(scale);
  const total = hours * 60n + minutes;
  const totalMinutes = Number((2n * total + divisor) / (2n * divisor));

  if (totalMinutes <= 0) {
    throw new DurationParseError("Duration must be greater than zero (e.g., '2h', '30m').");
  }

  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  return {
    hours: h,
    minutes: m,
    iso: `PT${h ? `${h}H` : ''}${m ? `${m}M` : ''}`,
  };
}

/** Accept a non-zero ISO value (any case), otherwise parse the human form. */
export function toIsoDuration(value: string): string {
  const trimmed = value.trim();
  const iso = trimmed.toUpperCase();
  if (/^PT(\d+H)?(\d+M)?$/.test(iso) && /[1-9]/.test(iso)) return iso;
  return parseDuration(trimmed).iso;
}

function fractionDigits(token: string): number {
  const dot = token.indexOf('.');
  return dot === -1 ? 0 : token.length - dot - 1;
}

function sumScaled(tokens: string[], scale: number): bigint {
  let sum = 0n;
  for (const token of tokens) {
    const [whole, fraction = ''] = token.split('.');
    sum += BigInt(whole + fraction.padEnd(scale, '0'));
  }
  return sum;
}
