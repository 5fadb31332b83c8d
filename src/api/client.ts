/**
 * Registry API client
 *
 * Typed CRUD and bulk operations against a NetBox-compatible REST API with:
 * - Retry with exponential backoff (429 and transient 5xx)
 * - Request/response logging with secret redaction
 * - Name → id resolution for referenced objects on write
 * - Schema validation of every response
 */

import type { z } from 'zod';
import type {
  CableListScope,
  CableWrite,
  DeviceListScope,
  DeviceScope,
  DeviceWrite,
  HttpMethod,
  InterfaceWrite,
  InventoryItemWrite,
  IPAddressWrite,
  RecordId,
  RegistryClientConfig,
  RemoteCable,
  RemoteCableEndpoint,
  RemoteDevice,
  RemoteInterface,
  RemoteInventoryItem,
  RemoteIPAddress,
  RemoteSite,
  RemoteVlan,
  SiteScope,
  VlanWrite,
  WithId,
} from './types.js';
import type { Duplex, InterfaceMode } from '../entities/types.js';
import {
  CableSchema,
  DeviceSchema,
  InterfaceSchema,
  InventoryItemSchema,
  IPAddressSchema,
  NamedObjectSchema,
  SiteSchema,
  VlanSchema,
  paginatedSchema,
  type CablePayload,
  type CableTerminationPayload,
  type ChoicePayload,
  type DevicePayload,
  type InterfacePayload,
  type InventoryItemPayload,
  type IPAddressPayload,
  type VlanPayload,
} from './schemas.js';
import { withRetry, RegistryRequestError, parseRetryAfter, type RetryOptions } from './retry.js';
import { logger as defaultLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Mutating operations of a category, batched and single-item
 */
export interface MutationClient<TRemote, TWrite> {
  createMany(items: TWrite[]): Promise<TRemote[]>;
  create(item: TWrite): Promise<TRemote>;
  updateMany(items: WithId<TWrite>[]): Promise<TRemote[]>;
  update(item: WithId<TWrite>): Promise<TRemote>;
  deleteMany(ids: RecordId[]): Promise<boolean>;
  delete(id: RecordId): Promise<boolean>;
}

/**
 * Per-category operations used by the reconcilers
 */
export interface CategoryClient<TRemote, TWrite, TScope> extends MutationClient<TRemote, TWrite> {
  list(scope: TScope): Promise<TRemote[]>;
}

export interface DevicesClient extends CategoryClient<RemoteDevice, DeviceWrite, DeviceListScope> {
  getByName(name: string): Promise<RemoteDevice | null>;
}

export type InterfacesClient = CategoryClient<RemoteInterface, InterfaceWrite, DeviceScope>;
export type IPAddressesClient = CategoryClient<RemoteIPAddress, IPAddressWrite, DeviceScope>;
export type VlansClient = CategoryClient<RemoteVlan, VlanWrite, SiteScope>;
export type CablesClient = CategoryClient<RemoteCable, CableWrite, CableListScope>;
export type InventoryClient = CategoryClient<RemoteInventoryItem, InventoryItemWrite, DeviceScope>;

export interface SitesClient {
  getByName(name: string): Promise<RemoteSite | null>;
}

/**
 * Main registry client interface
 */
export interface RegistryClient {
  readonly devices: DevicesClient;
  readonly interfaces: InterfacesClient;
  readonly ipAddresses: IPAddressesClient;
  readonly vlans: VlansClient;
  readonly cables: CablesClient;
  readonly inventory: InventoryClient;
  readonly sites: SitesClient;

  /** Current configuration (token redacted) */
  getConfig(): { url: string; hasToken: boolean };
}

/**
 * A referenced object (site, role, tenant) does not exist in the registry
 */
export class RegistryLookupError extends Error {
  constructor(
    public readonly kind: string,
    public readonly reference: string
  ) {
    super(`${kind} not found in registry: ${reference}`);
    this.name = 'RegistryLookupError';
  }
}

// =============================================================================
// Mapping Helpers
// =============================================================================

const INTERFACE_MODES: readonly InterfaceMode[] = ['access', 'tagged', 'tagged-all'];
const DUPLEX_VALUES: readonly Duplex[] = ['full', 'half', 'auto'];

function choiceValue(choice: ChoicePayload | null | undefined): string | null {
  if (choice === null || choice === undefined) return null;
  return typeof choice === 'string' ? choice : choice.value;
}

function toMode(value: string | null): InterfaceMode | null {
  return INTERFACE_MODES.find((mode) => mode === value) ?? null;
}

function toDuplex(value: string | null): Duplex | null {
  return DUPLEX_VALUES.find((duplex) => duplex === value) ?? null;
}

/**
 * URL-safe slug for get-or-create lookups
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9_]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function toRemoteDevice(payload: DevicePayload): RemoteDevice {
  const role = payload.role ?? payload.device_role;
  return {
    id: payload.id,
    name: payload.name ?? '',
    serial: payload.serial,
    model: payload.device_type?.model ?? '',
    manufacturer: payload.device_type?.manufacturer?.name ?? null,
    platform: payload.platform?.name ?? null,
    site: payload.site?.name ?? null,
    role: role?.name ?? null,
    tenant: payload.tenant?.slug ?? null,
    status: choiceValue(payload.status),
    primaryIp4Id: payload.primary_ip4?.id ?? null,
  };
}

function toRemoteInterface(payload: InterfacePayload): RemoteInterface {
  return {
    id: payload.id,
    deviceId: payload.device.id,
    device: payload.device.name ?? '',
    name: payload.name,
    type: choiceValue(payload.type) ?? '',
    enabled: payload.enabled,
    description: payload.description,
    mtu: payload.mtu ?? null,
    speed: payload.speed ?? null,
    duplex: toDuplex(choiceValue(payload.duplex)),
    mode: toMode(choiceValue(payload.mode)),
    untaggedVlan: payload.untagged_vlan?.vid ?? null,
    taggedVlans: payload.tagged_vlans.map((vlan) => vlan.vid),
    lagId: payload.lag?.id ?? null,
    lag: payload.lag?.name ?? null,
    macAddress: payload.mac_address ? payload.mac_address.toLowerCase() : null,
  };
}

function toRemoteIPAddress(payload: IPAddressPayload): RemoteIPAddress {
  const onInterface = payload.assigned_object_type === 'dcim.interface';
  return {
    id: payload.id,
    address: payload.address,
    description: payload.description,
    status: choiceValue(payload.status),
    interfaceId: onInterface ? (payload.assigned_object_id ?? null) : null,
    interface: onInterface ? (payload.assigned_object?.name ?? null) : null,
    deviceId: onInterface ? (payload.assigned_object?.device?.id ?? null) : null,
    device: onInterface ? (payload.assigned_object?.device?.name ?? null) : null,
  };
}

function toRemoteVlan(payload: VlanPayload): RemoteVlan {
  return {
    id: payload.id,
    vid: payload.vid,
    name: payload.name,
    site: payload.site?.name ?? null,
    status: choiceValue(payload.status),
  };
}

function toEndpoints(terminations: CableTerminationPayload[]): RemoteCableEndpoint[] {
  return terminations
    .filter((termination) => termination.object_type === 'dcim.interface')
    .map((termination) => ({
      interfaceId: termination.object_id,
      interface: termination.object?.name ?? '',
      device: termination.object?.device?.name ?? '',
    }));
}

function toRemoteCable(payload: CablePayload): RemoteCable {
  return {
    id: payload.id,
    status: choiceValue(payload.status),
    aEnd: toEndpoints(payload.a_terminations),
    bEnd: toEndpoints(payload.b_terminations),
  };
}

function toRemoteInventoryItem(payload: InventoryItemPayload): RemoteInventoryItem {
  return {
    id: payload.id,
    deviceId: payload.device.id,
    device: payload.device.name ?? '',
    name: payload.name,
    partId: payload.part_id,
    serial: payload.serial,
    description: payload.description,
    manufacturer: payload.manufacturer?.name ?? null,
  };
}

/**
 * Copy the defined entries of `source` into a request body
 */
function definedEntries(source: Record<string, unknown>): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) body[key] = value;
  }
  return body;
}

// =============================================================================
// Client Implementation
// =============================================================================

type QueryValue = string | number | boolean | Array<string | number> | undefined;

interface ResourceDefinition<TPayload, TRemote, TWrite, TScope> {
  path: string;
  schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>;
  toRemote: (payload: TPayload) => TRemote;
  toBody: (write: Partial<TWrite>) => Promise<Record<string, unknown>>;
  scopeParams: (scope: TScope) => Record<string, QueryValue>;
}

/**
 * Create a registry client
 *
 * @throws Error when no URL is configured
 */
export function createRegistryClient(config: RegistryClientConfig): RegistryClient {
  if (!config.url) {
    throw new Error('Registry URL is required');
  }

  const trimmed = config.url.replace(/\/+$/, '');
  const apiRoot = trimmed.endsWith('/api') ? trimmed : `${trimmed}/api`;
  const timeoutMs = config.timeoutMs ?? 30000;
  const pageSize = config.pageSize ?? 1000;
  const log = config.logger ?? defaultLogger;
  const doFetch = config.fetch ?? fetch;

  const defaultHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
  if (config.token) {
    defaultHeaders['Authorization'] = `Token ${config.token}`;
  }

  /**
   * Make an API request with retry logic; resolves to the parsed JSON body
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: { params?: Record<string, QueryValue>; body?: unknown } = {}
  ): Promise<unknown> {
    const url = new URL(`${apiRoot}${path}`);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const item of value) url.searchParams.append(key, String(item));
      } else {
        url.searchParams.set(key, String(value));
      }
    }

    log.request(method, url.toString(), defaultHeaders);

    const makeRequest = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const startTime = Date.now();
        const response = await doFetch(url.toString(), {
          method,
          headers: defaultHeaders,
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
          signal: controller.signal,
        });
        log.response(response.status, url.toString(), Date.now() - startTime);

        if (!response.ok) {
          let message = `Registry API error (${response.status})`;
          let details: Record<string, unknown> | undefined;
          const text = await response.text().catch(() => '');
          if (text) {
            try {
              const parsed: unknown = JSON.parse(text);
              if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
                details = Object.fromEntries(Object.entries(parsed));
                message = typeof details.detail === 'string' ? details.detail : `${message}: ${text.slice(0, 200)}`;
              } else {
                message = `${message}: ${text.slice(0, 200)}`;
              }
            } catch {
              message = `${message}: ${text.slice(0, 200)}`;
            }
          }

          throw new RegistryRequestError(message, response.status, {
            details,
            retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
          });
        }

        if (response.status === 204) {
          return undefined;
        }
        const text = await response.text();
        return text ? JSON.parse(text) : undefined;
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const retryOptions: RetryOptions<unknown> = {
      ...config.retry,
      logger: log,
    };
    const result = await withRetry(makeRequest, retryOptions);
    if (!result.success) {
      throw result.error ?? new Error(`Request to ${path} failed`);
    }
    return result.data;
  }

  /**
   * Fetch every page of a list endpoint
   */
  async function listAll<T>(
    path: string,
    params: Record<string, QueryValue>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const page = paginatedSchema(schema);
    const items: T[] = [];
    let offset = 0;
    for (;;) {
      const raw = await request('GET', path, { params: { ...params, limit: pageSize, offset } });
      const parsed = page.parse(raw);
      items.push(...parsed.results);
      if (!parsed.next || parsed.results.length === 0) {
        return items;
      }
      offset += parsed.results.length;
    }
  }

  // ---------------------------------------------------------------------------
  // Reference Lookups
  // ---------------------------------------------------------------------------

  const lookupCache = new Map<string, Promise<RecordId | null>>();

  function cached(key: string, resolve: () => Promise<RecordId | null>): Promise<RecordId | null> {
    const hit = lookupCache.get(key);
    if (hit) return hit;
    // Failed lookups are not cached
    const pending = resolve().catch((error: unknown) => {
      lookupCache.delete(key);
      throw error;
    });
    lookupCache.set(key, pending);
    return pending;
  }

  async function findId(path: string, attempts: Array<Record<string, QueryValue>>): Promise<RecordId | null> {
    for (const params of attempts) {
      const found = await listAll(path, params, NamedObjectSchema);
      if (found.length > 0) return found[0].id;
    }
    return null;
  }

  async function requireId(kind: string, path: string, name: string): Promise<RecordId> {
    const id = await cached(`${path}:${name.toLowerCase()}`, () =>
      findId(path, [{ name }, { slug: slugify(name) }])
    );
    if (id === null) {
      lookupCache.delete(`${path}:${name.toLowerCase()}`);
      throw new RegistryLookupError(kind, name);
    }
    return id;
  }

  async function ensureId(path: string, name: string): Promise<RecordId> {
    const id = await cached(`${path}:${name.toLowerCase()}`, async () => {
      const existing = await findId(path, [{ name }, { slug: slugify(name) }]);
      if (existing !== null) return existing;
      log.info(`Creating missing registry object`, { path, name });
      const created = NamedObjectSchema.parse(await request('POST', path, { body: { name, slug: slugify(name) } }));
      return created.id;
    });
    if (id === null) throw new RegistryLookupError(path, name);
    return id;
  }

  async function ensureDeviceType(model: string, manufacturer: string): Promise<RecordId> {
    const manufacturerId = await ensureId('/dcim/manufacturers/', manufacturer);
    const id = await cached(`device-type:${manufacturerId}:${model.toLowerCase()}`, async () => {
      const existing = await findId('/dcim/device-types/', [{ model, manufacturer_id: manufacturerId }]);
      if (existing !== null) return existing;
      log.info('Creating missing device type', { model, manufacturer });
      const created = NamedObjectSchema.parse(
        await request('POST', '/dcim/device-types/', {
          body: { model, slug: slugify(model), manufacturer: manufacturerId },
        })
      );
      return created.id;
    });
    if (id === null) throw new RegistryLookupError('Device type', model);
    return id;
  }

  // ---------------------------------------------------------------------------
  // Generic Resource
  // ---------------------------------------------------------------------------

  function resource<TPayload, TRemote, TWrite, TScope>(
    definition: ResourceDefinition<TPayload, TRemote, TWrite, TScope>
  ): CategoryClient<TRemote, TWrite, TScope> {
    const { path, schema, toRemote, toBody } = definition;
    const parseOne = (raw: unknown): TRemote => toRemote(schema.parse(raw));
    const parseMany = (raw: unknown): TRemote[] => {
      if (!Array.isArray(raw)) {
        throw new Error(`Expected an array response from ${path}`);
      }
      return raw.map(parseOne);
    };
    const updateBody = async (item: WithId<TWrite>): Promise<Record<string, unknown>> => ({
      ...(await toBody(item)),
      id: item.id,
    });

    return {
      async list(scope: TScope): Promise<TRemote[]> {
        const payloads = await listAll(path, definition.scopeParams(scope), schema);
        return payloads.map(toRemote);
      },

      async createMany(items: TWrite[]): Promise<TRemote[]> {
        const bodies: Record<string, unknown>[] = [];
        for (const item of items) bodies.push(await toBody(item));
        return parseMany(await request('POST', path, { body: bodies }));
      },

      async create(item: TWrite): Promise<TRemote> {
        return parseOne(await request('POST', path, { body: await toBody(item) }));
      },

      async updateMany(items: WithId<TWrite>[]): Promise<TRemote[]> {
        const bodies: Record<string, unknown>[] = [];
        for (const item of items) bodies.push(await updateBody(item));
        return parseMany(await request('PATCH', path, { body: bodies }));
      },

      async update(item: WithId<TWrite>): Promise<TRemote> {
        return parseOne(await request('PATCH', `${path}${item.id}/`, { body: await toBody(item) }));
      },

      async deleteMany(ids: RecordId[]): Promise<boolean> {
        await request('DELETE', path, { body: ids.map((id) => ({ id })) });
        return true;
      },

      async delete(id: RecordId): Promise<boolean> {
        await request('DELETE', `${path}${id}/`);
        return true;
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Devices
  // ---------------------------------------------------------------------------

  const deviceResource = resource<DevicePayload, RemoteDevice, DeviceWrite, DeviceListScope>({
    path: '/dcim/devices/',
    schema: DeviceSchema,
    toRemote: toRemoteDevice,
    scopeParams: (scope) => ({ name__ie: scope.names, tenant: scope.tenant }),
    async toBody(write) {
      const body: Record<string, unknown> = definedEntries({
        name: write.name,
        serial: write.serial,
        status: write.status,
        primary_ip4: write.primaryIp4Id,
      });
      if (write.site !== undefined) body.site = await requireId('Site', '/dcim/sites/', write.site);
      if (write.role !== undefined) body.role = await requireId('Role', '/dcim/device-roles/', write.role);
      if (write.tenant !== undefined) {
        body.tenant = write.tenant === null ? null : await requireId('Tenant', '/tenancy/tenants/', write.tenant);
      }
      if (write.platform !== undefined) {
        body.platform = write.platform === null ? null : await ensureId('/dcim/platforms/', write.platform);
      }
      if (write.model !== undefined) {
        if (!write.manufacturer) {
          throw new Error(`Manufacturer is required to set model ${write.model}`);
        }
        body.device_type = await ensureDeviceType(write.model, write.manufacturer);
      }
      return body;
    },
  });

  const devices: DevicesClient = {
    ...deviceResource,
    async getByName(name: string): Promise<RemoteDevice | null> {
      for (const params of [{ name }, { name__ie: name }]) {
        const found = await listAll('/dcim/devices/', params, DeviceSchema);
        if (found.length > 0) return toRemoteDevice(found[0]);
      }
      return null;
    },
  };

  // ---------------------------------------------------------------------------
  // Per-Device Resources
  // ---------------------------------------------------------------------------

  const interfaces = resource<InterfacePayload, RemoteInterface, InterfaceWrite, DeviceScope>({
    path: '/dcim/interfaces/',
    schema: InterfaceSchema,
    toRemote: toRemoteInterface,
    scopeParams: (scope) => ({ device_id: scope.deviceId }),
    async toBody(write) {
      return definedEntries({
        device: write.deviceId,
        name: write.name,
        type: write.type,
        enabled: write.enabled,
        description: write.description,
        mtu: write.mtu,
        speed: write.speed,
        duplex: write.duplex,
        mode: write.mode,
        untagged_vlan: write.untaggedVlanId,
        tagged_vlans: write.taggedVlanIds,
        lag: write.lagId,
        mac_address: write.macAddress,
      });
    },
  });

  const ipAddresses = resource<IPAddressPayload, RemoteIPAddress, IPAddressWrite, DeviceScope>({
    path: '/ipam/ip-addresses/',
    schema: IPAddressSchema,
    toRemote: toRemoteIPAddress,
    scopeParams: (scope) => ({ device_id: scope.deviceId }),
    async toBody(write) {
      return definedEntries({
        address: write.address,
        assigned_object_type: write.interfaceId === undefined ? undefined : 'dcim.interface',
        assigned_object_id: write.interfaceId,
        description: write.description,
        status: write.status,
      });
    },
  });

  const inventory = resource<InventoryItemPayload, RemoteInventoryItem, InventoryItemWrite, DeviceScope>({
    path: '/dcim/inventory-items/',
    schema: InventoryItemSchema,
    toRemote: toRemoteInventoryItem,
    scopeParams: (scope) => ({ device_id: scope.deviceId }),
    async toBody(write) {
      const body = definedEntries({
        device: write.deviceId,
        name: write.name,
        part_id: write.partId,
        serial: write.serial,
        description: write.description,
        discovered: write.discovered,
      });
      if (write.manufacturer !== undefined) {
        body.manufacturer =
          write.manufacturer === null ? null : await ensureId('/dcim/manufacturers/', write.manufacturer);
      }
      return body;
    },
  });

  // ---------------------------------------------------------------------------
  // Site and Global Resources
  // ---------------------------------------------------------------------------

  const vlans = resource<VlanPayload, RemoteVlan, VlanWrite, SiteScope>({
    path: '/ipam/vlans/',
    schema: VlanSchema,
    toRemote: toRemoteVlan,
    scopeParams: (scope) => ({ site_id: scope.siteId }),
    async toBody(write) {
      return definedEntries({ vid: write.vid, name: write.name, site: write.siteId, status: write.status });
    },
  });

  const cables = resource<CablePayload, RemoteCable, CableWrite, CableListScope>({
    path: '/dcim/cables/',
    schema: CableSchema,
    toRemote: toRemoteCable,
    scopeParams: (scope) => ({ device_id: scope.deviceIds }),
    async toBody(write) {
      const body = definedEntries({ status: write.status });
      if (write.aInterfaceId !== undefined) {
        body.a_terminations = [{ object_type: 'dcim.interface', object_id: write.aInterfaceId }];
      }
      if (write.bInterfaceId !== undefined) {
        body.b_terminations = [{ object_type: 'dcim.interface', object_id: write.bInterfaceId }];
      }
      return body;
    },
  });

  const sites: SitesClient = {
    async getByName(name: string): Promise<RemoteSite | null> {
      for (const params of [{ name }, { slug: slugify(name) }]) {
        const found = await listAll('/dcim/sites/', params, SiteSchema);
        if (found.length > 0) {
          const [site] = found;
          return { id: site.id, name: site.name, slug: site.slug };
        }
      }
      return null;
    },
  };

  return {
    devices,
    interfaces,
    ipAddresses,
    vlans,
    cables,
    inventory,
    sites,
    getConfig() {
      return { url: trimmed, hasToken: Boolean(config.token) };
    },
  };
}
