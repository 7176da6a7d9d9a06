// Composition root
export { createRpcRail, RpcRail } from './createRpcRail';
export type { RpcRailOptions } from './createRpcRail';

// RPC pools, probing and failover
export * from './rpc';

// Registry discovery
export {
  ChainRegistry,
  fetchChainDirectory,
  parseChainDirectory,
  candidateUrls,
  rankProbeResults,
} from './registry/ChainRegistry';
export type {
  ChainDirectoryEntry,
  ChainInfo,
  ChainRegistryOptions,
  DirectoryFetcher,
  NativeCurrency,
} from './registry/ChainRegistry';

// Chain reads
export { ChainReadService } from './services/ChainReadService';
export type {
  ChainReadServiceOptions,
  NativeBalance,
  TokenBalance,
  TokenInfo,
} from './services/ChainReadService';
export { ViemChainReader, createViemChainReader } from './adapters/ViemChainReader';
export type {
  ChainReader,
  ChainReaderFactory,
  TokenBalanceReading,
  TokenMetadata,
} from './adapters/ViemChainReader';

// Configuration and persistence
export { ConfigurationService, DEFAULT_CHAIN_LIST_URL } from './infrastructure/config/ConfigurationService';
export type {
  RailSettings,
  RailSettingsOverrides,
  RpcSettings,
  RegistrySettings,
  LoggingSettings,
  LogLevel,
} from './infrastructure/config/ConfigurationService';
export {
  InMemoryConfigStore,
  decodeSnapshot,
  encodeSnapshot,
} from './infrastructure/config/ConfigSnapshot';
export type { ConfigSnapshot, ConfigStore, DecodedSnapshot } from './infrastructure/config/ConfigSnapshot';

// Errors
export {
  IntegrationError,
  ConnectionError,
  ValidationError,
  RailError,
  AllEndpointsFailedError,
  ErrorUtils,
} from './utils/errors';
export type { EndpointFailure } from './utils/errors';
export { TimeoutError, TimeoutLevel } from './resilience/TimeoutManager';

// Utilities
export { Validators } from './utils/validators';
export { logger, createChildLogger } from './utils/logger';
export type { Logger } from './utils/logger';
