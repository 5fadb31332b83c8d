/**
 * Registry API client module
 *
 * Provides:
 * - RegistryClient with per-category sub-clients
 * - Retry logic with exponential backoff
 * - Leveled logging with secret redaction
 * - Full type definitions for remote records and write payloads
 */

// Main client
export { createRegistryClient, RegistryLookupError, slugify } from './client.js';

export type {
  RegistryClient,
  CategoryClient,
  MutationClient,
  DevicesClient,
  InterfacesClient,
  IPAddressesClient,
  VlansClient,
  CablesClient,
  InventoryClient,
  SitesClient,
} from './client.js';

// Retry utilities
export {
  withRetry,
  RegistryRequestError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  Logger,
  logger,
  createLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactContext,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  // Common
  ApiError,
  HttpMethod,
  RecordId,
  RetryConfig,
  RetryResult,
  RegistryConnection,
  RegistryClientConfig,

  // Remote records
  RemoteDevice,
  RemoteInterface,
  RemoteIPAddress,
  RemoteVlan,
  RemoteCable,
  RemoteCableEndpoint,
  RemoteInventoryItem,
  RemoteSite,

  // Write payloads
  DeviceWrite,
  InterfaceWrite,
  IPAddressWrite,
  VlanWrite,
  CableWrite,
  InventoryItemWrite,
  WithId,

  // Scopes
  DeviceListScope,
  DeviceScope,
  SiteScope,
  CableListScope,
} from './types.js';
