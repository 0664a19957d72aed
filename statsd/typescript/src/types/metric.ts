/**
 * Metric-related types for the StatsD wire protocol.
 *
 * A metric event is described by a {@link MetricRequest}: a closed,
 * variant-tagged union that every convenience operation on the client
 * shapes its parameters into before the single send path renders it.
 */

/**
 * Wire type tags appended after the value
 */
export enum MetricType {
  /** Counter - increments/decrements */
  COUNTER = 'c',
  /** Timing - milliseconds, also used for histograms */
  TIMING = 'ms',
  /** Gauge - absolute value, or a signed relative adjustment */
  GAUGE = 'g',
  /** Set - count of unique values */
  SET = 's',
  /** Annotation - free-form text */
  ANNOTATION = 'a',
}

/**
 * Direction of a relative gauge adjustment
 */
export type GaugeDirection = 'up' | 'down';

interface BaseRequest {
  /** Stat (bucket) name, without the client prefix */
  stat: string;
  /** Sample rate; values >= 1 always emit */
  rate: number;
}

export interface CounterRequest extends BaseRequest {
  kind: 'counter';
  value: number;
}

export interface TimingRequest extends BaseRequest {
  kind: 'timing';
  /** Whole milliseconds */
  value: number;
}

export interface GaugeRequest extends BaseRequest {
  kind: 'gauge';
  value: number;
}

export interface GaugeDeltaRequest extends BaseRequest {
  kind: 'gauge-delta';
  value: number;
  direction: GaugeDirection;
}

export interface SetRequest extends BaseRequest {
  kind: 'set';
  value: number | string;
}

export interface AnnotationRequest extends BaseRequest {
  kind: 'annotation';
  /** Already-rendered annotation text */
  text: string;
}

/**
 * A single metric event, never stored past the send that renders it
 */
export type MetricRequest =
  | CounterRequest
  | TimingRequest
  | GaugeRequest
  | GaugeDeltaRequest
  | SetRequest
  | AnnotationRequest;

/**
 * Elapsed time: fractional milliseconds as a `number`, or
 * nanoseconds as a `bigint` (from `process.hrtime.bigint()`)
 */
export type Elapsed = number | bigint;

/**
 * Observer notified with every line about to be buffered
 */
export type MetricObserver = (line: string, request: MetricRequest) => void;
