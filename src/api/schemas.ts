/**
 * Response schemas for the registry REST API
 *
 * Responses are validated before they are mapped to remote records so that
 * a registry version mismatch surfaces as a clear parse error instead of
 * undefined fields deep inside a reconciler.
 */

import { z } from 'zod';

/**
 * Nested reference to another object ({ id, name, slug, ... })
 */
export const NestedRefSchema = z
  .object({
    id: z.number(),
    name: z.string().optional(),
    slug: z.string().optional(),
    display: z.string().optional(),
  })
  .passthrough();

/**
 * Choice field ({ value, label }); some endpoints return a bare string
 */
export const ChoiceSchema = z.union([
  z.object({ value: z.string().nullable(), label: z.string().optional() }).passthrough(),
  z.string(),
]);

export const VlanRefSchema = z.object({ id: z.number(), vid: z.number() }).passthrough();

export const DeviceRefSchema = z.object({ id: z.number(), name: z.string().nullable() }).passthrough();

export const DeviceSchema = z
  .object({
    id: z.number(),
    name: z.string().nullable(),
    serial: z.string().default(''),
    device_type: z
      .object({
        id: z.number(),
        model: z.string(),
        manufacturer: NestedRefSchema.nullish(),
      })
      .passthrough()
      .nullish(),
    role: NestedRefSchema.nullish(),
    device_role: NestedRefSchema.nullish(),
    platform: NestedRefSchema.nullish(),
    site: NestedRefSchema.nullish(),
    tenant: NestedRefSchema.nullish(),
    status: ChoiceSchema.nullish(),
    primary_ip4: z.object({ id: z.number() }).passthrough().nullish(),
  })
  .passthrough();

export const InterfaceSchema = z
  .object({
    id: z.number(),
    device: DeviceRefSchema,
    name: z.string(),
    type: ChoiceSchema.nullish(),
    enabled: z.boolean().default(true),
    description: z.string().default(''),
    mtu: z.number().nullish(),
    speed: z.number().nullish(),
    duplex: ChoiceSchema.nullish(),
    mode: ChoiceSchema.nullish(),
    untagged_vlan: VlanRefSchema.nullish(),
    tagged_vlans: z.array(VlanRefSchema).default([]),
    lag: NestedRefSchema.nullish(),
    mac_address: z.string().nullish(),
  })
  .passthrough();

export const IPAddressSchema = z
  .object({
    id: z.number(),
    address: z.string(),
    description: z.string().default(''),
    status: ChoiceSchema.nullish(),
    assigned_object_type: z.string().nullish(),
    assigned_object_id: z.number().nullish(),
    assigned_object: z
      .object({
        id: z.number(),
        name: z.string().optional(),
        device: DeviceRefSchema.optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const VlanSchema = z
  .object({
    id: z.number(),
    vid: z.number(),
    name: z.string(),
    site: NestedRefSchema.nullish(),
    status: ChoiceSchema.nullish(),
  })
  .passthrough();

export const CableTerminationSchema = z
  .object({
    object_type: z.string(),
    object_id: z.number(),
    object: z
      .object({
        id: z.number(),
        name: z.string().optional(),
        device: DeviceRefSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const CableSchema = z
  .object({
    id: z.number(),
    status: ChoiceSchema.nullish(),
    a_terminations: z.array(CableTerminationSchema).default([]),
    b_terminations: z.array(CableTerminationSchema).default([]),
  })
  .passthrough();

export const InventoryItemSchema = z
  .object({
    id: z.number(),
    device: DeviceRefSchema,
    name: z.string(),
    part_id: z.string().default(''),
    serial: z.string().default(''),
    description: z.string().default(''),
    manufacturer: NestedRefSchema.nullish(),
  })
  .passthrough();

export const SiteSchema = z.object({ id: z.number(), name: z.string(), slug: z.string() }).passthrough();

/**
 * Generic named object (roles, tenants, manufacturers, platforms, device types)
 */
export const NamedObjectSchema = z
  .object({
    id: z.number(),
    name: z.string().optional(),
    model: z.string().optional(),
    slug: z.string().optional(),
  })
  .passthrough();

export function paginatedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    count: z.number().optional(),
    next: z.string().nullish(),
    results: z.array(item),
  });
}

export type DevicePayload = z.infer<typeof DeviceSchema>;
export type InterfacePayload = z.infer<typeof InterfaceSchema>;
export type IPAddressPayload = z.infer<typeof IPAddressSchema>;
export type VlanPayload = z.infer<typeof VlanSchema>;
export type CablePayload = z.infer<typeof CableSchema>;
export type CableTerminationPayload = z.infer<typeof CableTerminationSchema>;
export type InventoryItemPayload = z.infer<typeof InventoryItemSchema>;
export type ChoicePayload = z.infer<typeof ChoiceSchema>;
