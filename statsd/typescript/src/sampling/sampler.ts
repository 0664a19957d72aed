/**
 * Per-event statistical sampling
 *
 * @module sampling/sampler
 */

/**
 * Sampling decision result
 */
export interface SamplingDecision {
  /** Whether to emit the event */
  emit: boolean;
  /** Rate to annotate the line with; set only for emitted events sampled below 1 */
  rate?: number;
}

/**
 * Source of uniform random values in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Sampler options
 */
export interface SamplerOptions {
  /** Random source (defaults to Math.random) */
  random?: RandomSource;
}

const ALWAYS: SamplingDecision = { emit: true };
const DROP: SamplingDecision = { emit: false };

/**
 * Decides, per event, whether to emit it and whether to tag it with its rate.
 *
 * Rates are not validated: anything >= 1 always emits, anything <= 0 never does.
 */
export class Sampler {
  private readonly random: RandomSource;

  constructor(options?: SamplerOptions) {
    this.random = options?.random ?? Math.random;
  }

  /**
   * Make a sampling decision for one event
   */
  sample(rate: number): SamplingDecision {
    if (rate >= 1) {
      return ALWAYS;
    }
    if (this.random() < rate) {
      return { emit: true, rate };
    }
    return DROP;
  }
}
