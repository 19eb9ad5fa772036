/**
 * IPC substrate public API.
 */

export * from './codec/index.js';
export * from './connection/index.js';
export * from './errors/index.js';
export * from './protocol/index.js';
export * from './server/index.js';
export * from './transport/index.js';
export { IpcFile, releaseDescriptors } from './file/IpcFile.js';
export { connectToServer, type ConnectOptions } from './client.js';
