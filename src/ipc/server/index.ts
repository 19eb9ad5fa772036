export { MultiServer, type MultiServerOptions } from './MultiServer.js';
