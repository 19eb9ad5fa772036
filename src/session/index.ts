export {
  getRuntimeDir,
  getSessionId,
  getSessionDir,
  getPortalDir,
  getServiceSocketPath,
  getServicePidPath,
  ensurePortalDir,
} from './paths.js';

export {
  readPidFromFile,
  writeServicePid,
  readServicePid,
  cleanupServicePid,
  isProcessAlive,
} from './pid.js';
