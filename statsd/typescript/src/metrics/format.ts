/**
 * Metric line formatting for the StatsD wire protocol.
 *
 * Lines look like `<prefix><stat>:<value>|<type>[|@<rate>]`. No function
 * here performs I/O; newline separators are the packet buffer's concern.
 */

import { format } from 'node:util';
import { MetricType, type Elapsed, type MetricRequest } from '../types';

const NANOSECONDS_PER_SECOND = 1e9;

/**
 * Render the `value|type` part of a metric line
 */
export function formatValue(request: MetricRequest): string {
  switch (request.kind) {
    case 'counter':
      return `${request.value}|${MetricType.COUNTER}`;
    case 'timing':
      return `${request.value}|${MetricType.TIMING}`;
    case 'gauge':
      return `${request.value}|${MetricType.GAUGE}`;
    case 'gauge-delta': {
      const sign = request.direction === 'up' ? '+' : '-';
      return `${sign}${request.value}|${MetricType.GAUGE}`;
    }
    case 'set':
      return `${request.value}|${MetricType.SET}`;
    case 'annotation':
      return `${request.text}|${MetricType.ANNOTATION}`;
  }
}

/**
 * Render a sample rate in compact general form: at most six significant
 * digits, no trailing zeros.
 */
export function formatRate(rate: number): string {
  return String(Number(rate.toPrecision(6)));
}

/**
 * Render a full metric line.
 *
 * @param prefix - Literal stat prefix, concatenated without a delimiter
 * @param request - The metric event
 * @param sampledRate - Rate to append as `|@rate`, when the event survived sampling below 1
 */
export function formatLine(
  prefix: string,
  request: MetricRequest,
  sampledRate?: number
): string {
  const line = `${prefix}${request.stat}:${formatValue(request)}`;
  return sampledRate === undefined ? line : `${line}|@${formatRate(sampledRate)}`;
}

/**
 * Substitute printf-style arguments into an annotation template
 */
export function formatAnnotation(template: string, ...args: unknown[]): string {
  return args.length === 0 ? template : format(template, ...args);
}

/**
 * Convert elapsed time to whole milliseconds.
 *
 * A bigint is taken as nanoseconds and goes through total seconds before
 * scaling, so no intermediate integer conversion truncates it.
 */
export function millisecondsFromDuration(elapsed: Elapsed): number {
  if (typeof elapsed === 'bigint') {
    const seconds = Number(elapsed) / NANOSECONDS_PER_SECOND;
    return Math.trunc(seconds * 1000);
  }
  return Math.trunc(elapsed);
}
