export {
  Endpoint,
  defineEndpoint,
  message,
  request,
  type AsyncMessageSpec,
  type EndpointDefinition,
  type Handlers,
  type MessageMap,
  type MessageNames,
  type MessageSpec,
  type MessagesOf,
  type OpcodeEntry,
  type OpcodeRole,
  type PayloadOf,
  type ResponseOf,
  type SyncMessageSpec,
} from './endpoint.js';
export { Message, buildMessage } from './message.js';
export { createStub, type InboundCall, type Stub } from './stub.js';
