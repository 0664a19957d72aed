/**
 * Testing module exports
 *
 * Test doubles for exercising clients without a network
 *
 * @module testing
 */

export { MemorySink } from './memory-sink';
export { InMemoryLogger, type CapturedLog } from './memory-logger';
