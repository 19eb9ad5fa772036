/**
 * IPC Transport Layer
 *
 * Length-prefixed frames with attached descriptors over Unix domain sockets.
 */

export { FrameReader, toWireFrame } from './framing.js';
export { connectSocket } from './socket.js';
export { SocketTransport, type SocketTransportOptions } from './SocketTransport.js';
export type { Frame, Transport, TransportHandlers } from './types.js';
