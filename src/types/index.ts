export {
  COMMAND_KINDS,
  PAYLOAD_FIELD,
  type CommandKind,
  type Command,
  type RequestMessage,
  type ResponseStatus,
  type Response,
} from './protocol.js';

export {
  ErrorKind,
  type ErrorKindValue,
  type ErrorPayload,
  ERROR_RETRIABLE_DEFAULTS,
  isErrorKind,
} from './errors.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_HOST,
  DEFAULT_PORT,
  ConfigError,
  parseConfig,
  type RelayConfig,
  type HostConfig,
  type RetryConfig,
  type LoggingConfig,
  type JournalConfig,
  type PipelineSection,
  type StageConfig,
  type SendAs,
} from './config.js';

export { RELAY_CONFIG_SCHEMA } from './config-schema.js';

export type { Endpoint, Connection, Transport } from './socket.js';
