/**
 * Type definitions for the StatsD client.
 */

// Metric types
export { MetricType } from './metric';
export type {
  MetricRequest,
  CounterRequest,
  TimingRequest,
  GaugeRequest,
  GaugeDeltaRequest,
  SetRequest,
  AnnotationRequest,
  GaugeDirection,
  Elapsed,
  MetricObserver,
} from './metric';

// Configuration types
export type { StatsDConfig, OverflowFlushPolicy, Logger } from './config';
