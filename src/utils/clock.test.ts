import { describe, it, expect } from 'vitest';
import { createManualClock, formatTimeOfDay, parseTimeOfDay, timeOfDayAt } from './clock';

describe('clock', () => {
  describe('parseTimeOfDay', () => {
    it('should accept HH:MM and HH:MM:SS', () => {
      expect(parseTimeOfDay('09:15')).toBe(33300);
      expect(parseTimeOfDay('9:15:30')).toBe(33330);
      expect(parseTimeOfDay(' 00:00 ')).toBe(0);
      expect(parseTimeOfDay('23:59:59')).toBe(86399);
    });

    it('should reject malformed or out-of-range times', () => {
      for (const value of ['24:00', '12:60', '12:00:60', '1215', 'noon', '']) {
        expect(parseTimeOfDay(value)).toBeNull();
      }
    });
  });

  it('should format seconds since midnight', () => {
    expect(formatTimeOfDay(33330)).toBe('09:15:30');
    expect(formatTimeOfDay(55800.9)).toBe('15:30:00');
  });

  it('should read the local time of day from a timestamp', () => {
    expect(timeOfDayAt(new Date(2026, 0, 5, 9, 15, 30, 500).getTime())).toBe(33330.5);
  });

  it('should only move a manual clock when told to', () => {
    const clock = createManualClock(1000);

    expect(clock.advance(250)).toBe(1250);
    clock.set(0);
    expect(clock.now()).toBe(0);
  });
});
