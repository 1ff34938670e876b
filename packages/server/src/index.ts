/**
 * @packageDocumentation
 *
 * The Chronicle gateway: persists telemetry published on the message bus and
 * serves historical and live queries over HTTP and WebSocket.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createGateway, loadConfig } from '@chronicle/server';
 *
 * const gateway = createGateway({ config: loadConfig() });
 * await gateway.start();
 * ```
 *
 * Or from the command line:
 *
 * ```bash
 * CHRONICLE_BACKEND=memory chronicle --port 5000 --debug
 * ```
 *
 * @module @chronicle/server
 */

export {
  VERSION,
  configSchema,
  envName,
  flagName,
  loadConfig,
  parseArgs,
  type ConfigKey,
  type GatewayConfig,
} from './config.js';

export { queryInputFromSearch, queryInputSchema, toQueryDescriptor, type QueryDefaults, type QueryInput } from './query-params.js';

export { HttpServer, RETRY_AFTER_SECONDS, createHttpServer, statusOf, type HttpServerConfig } from './http-server.js';

export { STREAM_PATH, StreamServer, createStreamServer, type StreamServerConfig } from './stream-server.js';

export {
  MqttMessageBus,
  connectMqttBus,
  createMqttMessageBus,
  fromMqttClient,
  type MqttConnectConfig,
  type MqttMessageBusConfig,
  type MqttTransport,
} from './mqtt-bus.js';

export { Gateway, createGateway, type GatewayOptions } from './gateway.js';
