/**
 * Playback timestamp arithmetic
 *
 * Times are `HH:MM:SS` strings with at least two hour digits. Durations are
 * plain differences in seconds and may be zero or negative. addSeconds works
 * on a 24-hour wall clock, takes only hours 00-23, and wraps across midnight
 * in both directions.
 */

import { TIME_STRING_PATTERN } from '@streamclip/shared';
import { InvalidTimeFormatError } from './errors.js';

const SECONDS_PER_DAY = 24 * 60 * 60;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatSeconds(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Render a playback offset as HH:MM:SS, dropping the sub-second remainder
 *
 * @example
 * millisecondsToTimeString(3_723_000) // '01:02:03'
 */
export function millisecondsToTimeString(ms: number): string {
  const totalSeconds = Number.isFinite(ms) && ms > 0 ? Math.floor(ms / 1000) : 0;
  return formatSeconds(totalSeconds);
}

/**
 * Parse HH:MM:SS into whole seconds
 *
 * @throws InvalidTimeFormatError when the string is not in HH:MM:SS form
 */
export function parseTimeString(time: string): number {
  const match = TIME_STRING_PATTERN.exec(time);
  if (!match) {
    throw new InvalidTimeFormatError(time);
  }
  const [, hours = '0', minutes = '0', seconds = '0'] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

export function timeStringToMilliseconds(time: string): number {
  return parseTimeString(time) * 1000;
}

/**
 * Shift a wall-clock time by a signed number of seconds, wrapping at midnight
 *
 * @throws InvalidTimeFormatError when time is malformed or its hour is above 23
 *
 * @example
 * addSeconds('23:59:50', 20) // '00:00:10'
 * addSeconds('00:00:05', -10) // '23:59:55'
 */
export function addSeconds(time: string, delta: number): string {
  const start = parseTimeString(time);
  // A wall-clock time names an hour of the day, 00 through 23
  if (start >= SECONDS_PER_DAY) {
    throw new InvalidTimeFormatError(time);
  }
  const shifted = start + Math.trunc(delta);
  const wrapped = ((shifted % SECONDS_PER_DAY) + SECONDS_PER_DAY) % SECONDS_PER_DAY;
  return formatSeconds(wrapped);
}

/**
 * Seconds between two playback positions (end - start), not clamped
 */
export function durationSeconds(start: string, end: string): number {
  return parseTimeString(end) - parseTimeString(start);
}
