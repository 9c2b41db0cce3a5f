import { ZodError } from 'zod';
import { clampCapacity, resolveConfig } from '../src/config';

describe('config', () => {
  describe('resolveConfig', () => {
    it('should fill in every default', () => {
      expect(resolveConfig()).toEqual({
        capacity: 10,
        totalQuota: 10000,
        burstRangeMax: 19,
        pacingDelay: 1000,
        serviceDelay: 100,
        pollInterval: 100,
        seed: 1,
        stopOnDrain: false,
      });
    });

    it('should keep supplied values', () => {
      const config = resolveConfig({ capacity: 3, totalQuota: 50, stopOnDrain: true });

      expect(config.capacity).toBe(3);
      expect(config.totalQuota).toBe(50);
      expect(config.stopOnDrain).toBe(true);
      expect(config.burstRangeMax).toBe(19);
    });

    it('should reject out-of-range values', () => {
      expect(() => resolveConfig({ capacity: 0 })).toThrow(ZodError);
      expect(() => resolveConfig({ capacity: 100001 })).toThrow(ZodError);
      expect(() => resolveConfig({ burstRangeMax: 0 })).toThrow(ZodError);
      expect(() => resolveConfig({ pollInterval: 0 })).toThrow(ZodError);
      expect(() => resolveConfig({ serviceDelay: -1 })).toThrow(ZodError);
    });
  });

  describe('clampCapacity', () => {
    it('should default to 10 when no value or no number is given', () => {
      expect(clampCapacity(undefined)).toBe(10);
      expect(clampCapacity('abc')).toBe(10);
      expect(clampCapacity('')).toBe(10);
    });

    it('should read the leading integer', () => {
      expect(clampCapacity('25')).toBe(25);
      expect(clampCapacity(' 7 ')).toBe(7);
      expect(clampCapacity('12abc')).toBe(12);
      expect(clampCapacity('3.9')).toBe(3);
    });

    it('should clamp into [1, 100000]', () => {
      expect(clampCapacity('0')).toBe(1);
      expect(clampCapacity('-5')).toBe(1);
      expect(clampCapacity('100000')).toBe(100000);
      expect(clampCapacity('250000')).toBe(100000);
    });
  });
});
