/**
 * Tests for the per-event sampler.
 */

import { describe, it, expect, vi } from 'vitest';
import { Sampler } from '../../src/sampling/sampler';

describe('Sampler', () => {
  it('should always emit at rate 1 without drawing', () => {
    const random = vi.fn(() => 0.99);
    const sampler = new Sampler({ random });

    expect(sampler.sample(1)).toEqual({ emit: true });
    expect(random).not.toHaveBeenCalled();
  });

  it('should treat rates above 1 as always emit', () => {
    const sampler = new Sampler({ random: () => 0.99 });

    expect(sampler.sample(2)).toEqual({ emit: true });
  });

  it('should emit with the rate when the draw is below it', () => {
    const sampler = new Sampler({ random: () => 0.3 });

    expect(sampler.sample(0.5)).toEqual({ emit: true, rate: 0.5 });
  });

  it('should drop when the draw is at or above the rate', () => {
    expect(new Sampler({ random: () => 0.7 }).sample(0.5)).toEqual({ emit: false });
    expect(new Sampler({ random: () => 0.5 }).sample(0.5)).toEqual({ emit: false });
  });

  it('should always drop at non-positive rates', () => {
    const sampler = new Sampler({ random: () => 0 });

    expect(sampler.sample(0)).toEqual({ emit: false });
    expect(sampler.sample(-1)).toEqual({ emit: false });
  });

  it('should emit close to the requested fraction with Math.random', () => {
    const sampler = new Sampler();
    const trials = 20000;
    let emitted = 0;

    for (let i = 0; i < trials; i++) {
      if (sampler.sample(0.25).emit) {
        emitted++;
      }
    }

    expect(emitted / trials).toBeGreaterThan(0.22);
    expect(emitted / trials).toBeLessThan(0.28);
  });
});
