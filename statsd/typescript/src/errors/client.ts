/**
 * Client lifecycle errors.
 */

import { StatsDError } from './base';

/**
 * A send, flush or close reached a client that is already closed
 */
export class ClientClosedError extends StatsDError {
  readonly category = 'client';
  readonly operation: string;

  constructor(operation: string) {
    super(`Cannot ${operation}: client is closed`);
    this.name = 'ClientClosedError';
    this.operation = operation;
  }
}
