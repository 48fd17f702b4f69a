export { buildServer, startServer } from './server/server.js';
export type { ServerOptions, RelayServer } from './server/server.js';
export { ConnectionRegistry } from './services/ConnectionRegistry.js';
export { Dispatcher } from './services/Dispatcher.js';
export type { SendOptions } from './services/Dispatcher.js';
export { LivenessPinger } from './services/LivenessPinger.js';
export { SseConnection, createResponseSink } from './services/SseConnection.js';
export type { StreamSink } from './services/SseConnection.js';
export { SseClient } from './client/SseClient.js';
export type { ClientStatus, SseClientOptions } from './client/SseClient.js';
export { HandlerRegistry } from './client/HandlerRegistry.js';
export type { EventHandler } from './client/HandlerRegistry.js';
export { DispatchQueue } from './client/DispatchQueue.js';
export type { OverflowPolicy } from './client/DispatchQueue.js';
export { EventFramer } from './core/eventFramer.js';
export type { FramedEvent } from './core/eventFramer.js';
export { Backoff, backoffDelay } from './core/backoff.js';
export { serializeMessage, formatEvent, CONNECTED_EVENT, KEEPALIVE_FRAME } from './core/message.js';
export type { Message, ConnectedPayload } from './core/message.js';
export * from './core/errors.js';
export {
  serverConfigSchema,
  clientConfigSchema,
  loadServerConfig,
  loadClientConfig,
} from './core/config.js';
export type { ServerConfig, ClientConfig } from './core/config.js';
