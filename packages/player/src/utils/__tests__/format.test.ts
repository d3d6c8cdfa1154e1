/**
 * Tests for formatTime
 */

import { describe, it, expect } from 'vitest';
import { formatTime } from '../format';

describe('formatTime', () => {
  it('should pad minutes and seconds', () => {
    expect(formatTime(0)).toBe('00:00');
    expect(formatTime(7)).toBe('00:07');
    expect(formatTime(180)).toBe('03:00');
  });

  it('should drop fractions of a second', () => {
    expect(formatTime(65.9)).toBe('01:05');
  });

  it('should not wrap minutes into hours', () => {
    expect(formatTime(3600)).toBe('60:00');
    expect(formatTime(6000)).toBe('100:00');
  });

  it('should show zero for negative or non-finite input', () => {
    expect(formatTime(-3)).toBe('00:00');
    expect(formatTime(Number.NaN)).toBe('00:00');
  });
});
