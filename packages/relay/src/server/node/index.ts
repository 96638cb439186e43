export * from '../../index'
export {
  createChildLogger,
  createLoggerSink,
  createRootLogger,
  type LogLevel,
} from './logger'
export {
  createRelayServer,
  RECORDING_EXTENSION,
  type RelayServer,
  type RelayServerOptions,
} from './server'
export { SocketTransport, type SocketTransportOptions } from './socket-transport'
