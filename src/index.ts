export * from "./telnet/index.js";
export {
  ConnectionConfigSchema,
  DEFAULT_MAX_SUBNEGOTIATION_SIZE,
  type ConnectionConfig,
  type ConnectionConfigInput,
} from "./config.js";
export {
  createTextCodec,
  decodeText,
  encodeText,
  isEncodingSupported,
  type TextCodec,
} from "./encoding.js";
export {
  TelnetSession,
  prettyEvent,
  type LogIncomingData,
  type PrettyEvent,
  type SessionOptions,
} from "./session.js";
export { createServer, type ServerConfig } from "./server.js";
export {
  TelnetClient,
  connect,
  type ConnectOptions,
  type ExpectResult,
} from "./client.js";
