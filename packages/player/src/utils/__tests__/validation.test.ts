/**
 * Tests for validation utilities
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { clamp, isValidationError, validate, validateSafe } from '../validation';
import { FiniteNumberSchema, PlayerConfigSchema } from '../validators';
import { PlayerError, ValidationError } from '../../types';

describe('validate', () => {
  const testSchema = z.object({
    name: z.string(),
    volume: z.number().min(0).max(1),
  });

  it('should return valid data', () => {
    const data = { name: 'desk', volume: 0.5 };
    expect(validate(testSchema, data)).toEqual(data);
  });

  it('should throw ValidationError listing each failing field', () => {
    expect(() => validate(testSchema, { name: 7, volume: 3 })).toThrow(ValidationError);

    try {
      validate(testSchema, { name: 'desk', volume: 3 }, 'Mixer');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe('VALIDATION_ERROR');
        expect(error.message).toBe(
          'Validation failed for Mixer: volume: Number must be less than or equal to 1'
        );
        expect(error.validationErrors).toHaveLength(1);
      }
    }
  });

  it('should omit the context when none is given', () => {
    expect(() => validate(z.string(), 1)).toThrow('Validation failed: Expected string, received number');
  });
});

describe('validateSafe', () => {
  it('should return the value or null', () => {
    expect(validateSafe(FiniteNumberSchema, 12.5)).toBe(12.5);
    expect(validateSafe(FiniteNumberSchema, Number.NaN)).toBeNull();
    expect(validateSafe(FiniteNumberSchema, Number.NEGATIVE_INFINITY)).toBeNull();
    expect(validateSafe(FiniteNumberSchema, '3')).toBeNull();
  });
});

describe('clamp', () => {
  it('should keep values inside the range', () => {
    expect(clamp(0.4, 0, 1)).toBe(0.4);
    expect(clamp(-2, 0, 1)).toBe(0);
    expect(clamp(7, 0, 1)).toBe(1);
  });
});

describe('isValidationError', () => {
  it('should only match ValidationError', () => {
    expect(isValidationError(new ValidationError('bad'))).toBe(true);
    expect(isValidationError(new PlayerError('other', 'OTHER'))).toBe(false);
    expect(isValidationError(new Error('plain'))).toBe(false);
  });
});

describe('PlayerConfigSchema', () => {
  it('should fill in defaults', () => {
    expect(PlayerConfigSchema.parse({})).toEqual({
      volume: 0.8,
      repeat: 'off',
      shuffle: false,
      tickIntervalMs: 16,
    });
  });

  it('should reject unknown keys and out-of-range values', () => {
    expect(PlayerConfigSchema.safeParse({ loop: true }).success).toBe(false);
    expect(PlayerConfigSchema.safeParse({ volume: -0.1 }).success).toBe(false);
    expect(PlayerConfigSchema.safeParse({ repeat: 'all' }).success).toBe(false);
    expect(PlayerConfigSchema.safeParse({ tickIntervalMs: 2.5 }).success).toBe(false);
  });
});
