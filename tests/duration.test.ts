import { describe, expect, it } from 'vitest';
import { parseDuration, toIsoDuration } from '../src/duration.js';
import { DurationParseError } from '../src/errors.js';

describe('parseDuration', () => {
  it.each([
    ['2h', 2, 0, 'PT2H'],
    ['30m', 0, 30, 'PT30M'],
    ['2h 30m', 2, 30, 'PT2H30M'],
    ['2H30M', 2, 30, 'PT2H30M'],
    ['1.5h', 1, 30, 'PT1H30M'],
    ['1h 1h', 2, 0, 'PT2H'],
    ['90m', 1, 30, 'PT1H30M'],
    ['0.01h', 0, 1, 'PT1M'],
    ['0.5m', 0, 1, 'PT1M'],
  ])('parses %s', (text, hours, minutes, iso) => {
    expect(parseDuration(text)).toEqual({ hours, minutes, iso });
  });

  it.each([
    ['', 'Duration is required.'],
    ['   ', 'Duration is required.'],
    ['-1h', 'Negative durations are not allowed.'],
    ['two hours', "Duration must include hours or minutes (e.g., '2h', '30m')."],
    ['0h', "Duration must be greater than zero (e.g., '2h', '30m')."],
    ['0.25m', "Duration must be greater than zero (e.g., '2h', '30m')."],
  ])('rejects %j', (text, message) => {
    expect(() => parseDuration(text)).toThrow(DurationParseError);
    expect(() => parseDuration(text)).toThrow(message);
  });
});

describe('toIsoDuration', () => {
  it('passes ISO values through and parses the rest', () => {
    expect(toIsoDuration('PT3H')).toBe('PT3H');
    expect(toIsoDuration(' 45m ')).toBe('PT45M');
    expect(toIsoDuration('pt1h30m')).toBe('PT1H30M');
  });

  it('rejects ISO-looking values that are negative, empty or zero', () => {
    expect(() => toIsoDuration('PT-1H')).toThrow('Negative durations are not allowed.');
    expect(() => toIsoDuration('pt')).toThrow(DurationParseError);
    expect(() => toIsoDuration('PTgarbage')).toThrow(DurationParseError);
    expect(() => toIsoDuration('PT0H')).toThrow("Duration must be greater than zero (e.g., '2h', '30m').");
  });
});
