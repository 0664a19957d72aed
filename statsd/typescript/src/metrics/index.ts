/**
 * Metrics module exports
 */

// MetricsClient interface
export type { MetricsClient } from './interface';

// Line formatting
export {
  formatLine,
  formatValue,
  formatRate,
  formatAnnotation,
  millisecondsFromDuration,
} from './format';

// Timer utility
export { Timer } from './timer';
