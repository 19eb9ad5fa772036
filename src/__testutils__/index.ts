/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { createTransportPair, useTempRuntimeDir } from '@/__testutils__/index.js';
 * ```
 */

export { FakeTransport, createTransportPair } from './FakeTransport.js';
export { useTempRuntimeDir, type RuntimeDirHelper } from './testRuntimeDir.js';
export { assertEventually, flushTurns, nextEvent } from './assertions.js';
