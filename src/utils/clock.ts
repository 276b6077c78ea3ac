/**
 * Time source and time-of-day helpers
 */

import type { TimeOfDay } from '../models/SessionPhase';

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parses "HH:MM" or "HH:MM:SS" into seconds since midnight.
 * Returns null for malformed or out-of-range input.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  return hours * 3600 + minutes * 60 + seconds;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (n: number): string => n.toString().padStart(2, '0');
  const hours = Math.floor(time / 3600);
  const minutes = Math.floor((time % 3600) / 60);
  const seconds = Math.floor(time % 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Local time of day for an epoch timestamp, with sub-second precision
 */
export function timeOfDayAt(epochMs: number): number {
  const date = new Date(epochMs);
  return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds() + date.getMilliseconds() / 1000;
}

export interface ManualClock extends Clock {
  set(epochMs: number): void;
  advance(deltaMs: number): number;
}

/**
 * Clock that only moves when told to; lets tests and replays drive the gateway deterministically
 */
export function createManualClock(initialMs = 0): ManualClock {
  let current = initialMs;

  return {
    now: () => current,
    set: (epochMs: number) => {
      current = epochMs;
    },
    advance: (deltaMs: number) => {
      current += deltaMs;
      return current;
    }
  };
}
