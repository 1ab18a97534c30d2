export type {
  ConnectorConfig,
  ConnectionState,
  IConnector,
} from './connector.js';
