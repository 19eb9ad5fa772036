export {
  RequestClientEndpoint,
  RequestServerEndpoint,
  type RequestClientMessages,
  type RequestServerMessages,
} from './endpoints.js';
export {
  Request,
  RequestClient,
  readBody,
  type RequestClientConnectOptions,
  type RequestResult,
  type StartRequestOptions,
} from './RequestClient.js';
export { RequestService, contentTypeFor, type RequestServiceOptions } from './RequestService.js';
export * from './types.js';
