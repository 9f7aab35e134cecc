// @relaybot/chat-client: REST transport and typed client for the chat service
export {
  ChatClient,
  BAD_EVENT_QUEUE_ID,
} from './chat-client.js';
export type {
  ChatClientOptions,
  EventQueueApi,
  QueueRegistration,
  RegisterQueueParams,
} from './chat-client.js';
export { FetchTransport, encodeParam, encodeParams } from './transport.js';
export type {
  FetchTransportOptions,
  HttpMethod,
  ParamValue,
  Transport,
  TransportRequest,
} from './transport.js';
export {
  eventSchema,
  messageSchema,
  userSchema,
  roleNameFromCode,
} from './schemas.js';
export type {
  ChatEvent,
  Message,
  PresenceStatus,
  PrivateMessageRequest,
  Recipient,
  RoleName,
  SendMessageRequest,
  StreamMessageRequest,
  User,
} from './schemas.js';
