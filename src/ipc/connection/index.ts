export {
  Connection,
  type ConnectionOptions,
  type ConnectionState,
  type SyncCallOptions,
} from './Connection.js';
export { PendingCallManager, type PendingCall } from './PendingCallManager.js';
