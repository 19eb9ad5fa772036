export {
  ConnectionClosedError,
  DecodeError,
  EncodeError,
  IPCConnectionError,
  IPCError,
  IPCTimeoutError,
  TransportError,
  UnknownMessageError,
} from './IPCError.js';
export { formatConnectionError, formatTransportError, toIPCError } from './format.js';
