import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import {
  DEFAULT_ENGINE_CONFIG,
  correlationWeight,
  normalizeEngineConfig,
  submitThreshold,
} from '@/lib/engines/engine-config';

describe('normalizeEngineConfig', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the defaults without overrides', () => {
    expect(normalizeEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('keeps valid overrides', () => {
    const config = normalizeEngineConfig({ corrThreshold: 0.8, useLagCompensation: false, allowEmptySubmit: true });
    expect(config.corrThreshold).toBe(0.8);
    expect(config.useLagCompensation).toBe(false);
    expect(config.allowEmptySubmit).toBe(true);
    expect(config.windowMs).toBe(1250);
  });

  it('clamps out-of-range values and truncates counts', () => {
    const config = normalizeEngineConfig({
      windowMs: 900.7,
      corrThreshold: 2,
      proximityWeight: -0.5,
      toggleStableSamples: 0,
    });
    expect(config.windowMs).toBe(900);
    expect(config.corrThreshold).toBe(1);
    expect(config.proximityWeight).toBe(0);
    expect(config.toggleStableSamples).toBe(1);
    expect(console.warn).toHaveBeenCalledTimes(4);
  });

  it('falls back to the default for non-finite values', () => {
    const config = normalizeEngineConfig({ maxLagMs: Number.NaN, submitCooldownMs: Number.POSITIVE_INFINITY });
    expect(config.maxLagMs).toBe(180);
    expect(config.submitCooldownMs).toBe(1400);
  });

  it('warns when the dwell threshold sits inside the grace period', () => {
    const config = normalizeEngineConfig({ dwellThresholdMs: 500 });
    expect(config.dwellThresholdMs).toBe(500);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe('derived thresholds', () => {
  it('puts submission 0.06 above the option threshold', () => {
    expect(submitThreshold({ corrThreshold: 0.73 })).toBeCloseTo(0.79, 12);
  });

  it('gives correlation the weight proximity leaves', () => {
    expect(correlationWeight({ proximityWeight: 0.15 })).toBeCloseTo(0.85, 12);
  });
});
