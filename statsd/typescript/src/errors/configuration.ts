/**
 * Errors for invalid client configuration and collector addresses.
 */

import { StatsDError } from './base';

export class ConfigurationError extends StatsDError {
  readonly category = 'configuration';

  /** One entry per rejected field, as `path: reason` */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  /**
   * Schema validation failed for each of `issues`
   */
  static invalidConfig(issues: readonly string[]): ConfigurationError {
    return new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, issues);
  }

  /**
   * A collector address that is not `host:port` or `[ipv6]:port`
   */
  static invalidAddress(address: string, reason: string): ConfigurationError {
    return new ConfigurationError(`Invalid collector address "${address}": ${reason}`, [
      `address: ${reason}`,
    ]);
  }
}
