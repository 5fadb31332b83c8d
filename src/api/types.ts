/**
 * Types for the registry API client
 *
 * Remote records are the client's view of registry objects: references to
 * other objects are flattened to names (and ids where the reconcilers need
 * them). Write payloads reference sites, roles, tenants, manufacturers and
 * platforms by name; the client resolves them to registry ids.
 */

import type { InterfaceMode, Duplex } from '../entities/types.js';
import type { Logger } from './logger.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods used against the registry
 */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Registry object id
 */
export type RecordId = number;

/**
 * Standard API error shape
 */
export interface ApiError {
  /** HTTP status code */
  status: number;
  /** Error message from the registry */
  message: string;
  /** Error code for programmatic handling */
  code?: string;
  /** Additional error details (parsed response body) */
  details?: Record<string, unknown>;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retried operation
 */
export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  /** Total time spent including waits (ms) */
  totalTimeMs: number;
}

/**
 * Registry connection settings
 */
export interface RegistryConnection {
  /** Base URL, e.g. https://registry.example.net */
  url?: string;
  /** API token */
  token?: string;
}

/**
 * Client configuration
 */
export interface RegistryClientConfig extends RegistryConnection {
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Retry overrides */
  retry?: RetryConfig;
  /** Page size for list endpoints (default: 1000) */
  pageSize?: number;
  /** Logger for request/response tracing */
  logger?: Logger;
  /** fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

// =============================================================================
// Remote Records
// =============================================================================

export interface RemoteDevice {
  id: RecordId;
  name: string;
  serial: string;
  model: string;
  manufacturer: string | null;
  platform: string | null;
  site: string | null;
  role: string | null;
  /** Tenant slug */
  tenant: string | null;
  status: string | null;
  primaryIp4Id: RecordId | null;
}

export interface RemoteInterface {
  id: RecordId;
  deviceId: RecordId;
  device: string;
  name: string;
  type: string;
  enabled: boolean;
  description: string;
  mtu: number | null;
  /** kbit/s */
  speed: number | null;
  duplex: Duplex | null;
  mode: InterfaceMode | null;
  untaggedVlan: number | null;
  taggedVlans: number[];
  lagId: RecordId | null;
  lag: string | null;
  macAddress: string | null;
}

export interface RemoteIPAddress {
  id: RecordId;
  /** CIDR form, e.g. 10.0.0.1/24 */
  address: string;
  description: string;
  status: string | null;
  interfaceId: RecordId | null;
  interface: string | null;
  deviceId: RecordId | null;
  device: string | null;
}

export interface RemoteVlan {
  id: RecordId;
  vid: number;
  name: string;
  site: string | null;
  status: string | null;
}

export interface RemoteCableEndpoint {
  interfaceId: RecordId;
  interface: string;
  device: string;
}

export interface RemoteCable {
  id: RecordId;
  status: string | null;
  aEnd: RemoteCableEndpoint[];
  bEnd: RemoteCableEndpoint[];
}

export interface RemoteInventoryItem {
  id: RecordId;
  deviceId: RecordId;
  device: string;
  name: string;
  partId: string;
  serial: string;
  description: string;
  manufacturer: string | null;
}

export interface RemoteSite {
  id: RecordId;
  name: string;
  slug: string;
}

// =============================================================================
// Write Payloads
// =============================================================================

export interface DeviceWrite {
  name: string;
  site: string;
  role: string;
  model: string;
  manufacturer: string;
  status?: string;
  serial?: string;
  platform?: string | null;
  tenant?: string | null;
  primaryIp4Id?: RecordId | null;
}

export interface InterfaceWrite {
  deviceId: RecordId;
  name: string;
  type: string;
  enabled?: boolean;
  description?: string;
  mtu?: number | null;
  speed?: number | null;
  duplex?: Duplex | null;
  mode?: InterfaceMode | null;
  untaggedVlanId?: RecordId | null;
  taggedVlanIds?: RecordId[];
  lagId?: RecordId | null;
  macAddress?: string | null;
}

export interface IPAddressWrite {
  address: string;
  interfaceId: RecordId;
  description?: string;
  status?: string;
}

export interface VlanWrite {
  vid: number;
  name: string;
  siteId: RecordId;
  status?: string;
}

export interface CableWrite {
  aInterfaceId: RecordId;
  bInterfaceId: RecordId;
  status?: string;
}

export interface InventoryItemWrite {
  deviceId: RecordId;
  name: string;
  partId?: string;
  serial?: string;
  description?: string;
  /** Manufacturer name; null clears it */
  manufacturer?: string | null;
  discovered?: boolean;
}

/**
 * Update payload: partial write with the target id
 */
export type WithId<T> = Partial<T> & { id: RecordId };

// =============================================================================
// List Scopes
// =============================================================================

export interface DeviceListScope {
  /** Device names, matched case-insensitively */
  names?: string[];
  /** Tenant slug */
  tenant?: string;
}

export interface DeviceScope {
  deviceId: RecordId;
}

export interface SiteScope {
  siteId: RecordId;
}

export interface CableListScope {
  deviceIds: RecordId[];
}
