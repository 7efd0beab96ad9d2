/**
 * Schemas and types for JSS Classic API (/JSSResource) payloads.
 *
 * Detail payloads are parsed one section at a time: an absent or malformed
 * section only affects the tables built from it.
 */

import { z } from 'zod';

export type ResourceType = 'computers' | 'patches';

/** Classic API ids arrive as numbers, occasionally as numeric strings */
export const IdSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((val) => Number(val)),
]);

const optionalString = z.string().optional().catch(undefined);
const optionalId = IdSchema.optional().catch(undefined);

/**
 * Array whose unparseable entries are dropped instead of failing the whole list
 */
const lenientArray = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(z.unknown())
    .transform((entries) =>
      entries.flatMap((entry): Array<z.output<T>> => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    )
    .optional()
    .catch(undefined);

// ============================================================================
// Collections
// ============================================================================

export const CollectionEntrySchema = z
  .object({
    id: IdSchema,
    name: optionalString,
  })
  .passthrough();

export type CollectionEntry = z.infer<typeof CollectionEntrySchema>;

/** Top-level key of each collection response */
export const COLLECTION_KEYS: Record<ResourceType, readonly string[]> = {
  computers: ['computers'],
  patches: ['patch_reporting_software_titles', 'patches'],
};

/** Top-level key of each detail response */
export const DETAIL_KEYS: Record<ResourceType, string> = {
  computers: 'computer',
  patches: 'software_title',
};

// ============================================================================
// Computer detail sections
// ============================================================================

export const RemoteManagementSchema = z
  .object({
    managed: z.boolean().optional().catch(undefined),
    management_username: optionalString,
  })
  .passthrough();

export const GeneralSectionSchema = z
  .object({
    id: optionalId,
    name: optionalString,
    serial_number: optionalString,
    last_reported_ip: optionalString,
    ip_address: optionalString,
    last_contact_time: optionalString,
    last_contact_time_epoch: z.number().optional().catch(undefined),
    remote_management: RemoteManagementSchema.optional().catch(undefined),
  })
  .passthrough();

export type GeneralSection = z.infer<typeof GeneralSectionSchema>;

export const LocationSectionSchema = z
  .object({
    username: optionalString,
    real_name: optionalString,
    realname: optionalString,
    email_address: optionalString,
  })
  .passthrough();

export type LocationSection = z.infer<typeof LocationSectionSchema>;

export const HardwareSectionSchema = z
  .object({
    make: optionalString,
    model: optionalString,
    model_identifier: optionalString,
    os_name: optionalString,
    os_version: optionalString,
    os_build: optionalString,
    disk_encryption_configuration: optionalString,
  })
  .passthrough();

export type HardwareSection = z.infer<typeof HardwareSectionSchema>;

export const SoftwareItemSchema = z.object({
  name: z.string().min(1),
  path: z.string().optional().catch(undefined),
  version: z.string().optional().catch(undefined),
});

export const AvailableUpdateSchema = z.object({
  name: z.string().min(1),
  package_name: optionalString,
  version: optionalString,
});

/**
 * available_updates is an empty object, {update: {...}}, {update: [...]} or a plain list
 */
const availableUpdatesSchema = z.preprocess((value) => {
  if (Array.isArray(value)) return value;
  if (typeof value === 'object' && value !== null && 'update' in value) {
    const update = value.update;
    return Array.isArray(update) ? update : [update];
  }
  if (typeof value === 'object' && value !== null) return [];
  return value;
}, lenientArray(AvailableUpdateSchema));

export const SoftwareSectionSchema = z
  .object({
    applications: lenientArray(SoftwareItemSchema),
    plugins: lenientArray(SoftwareItemSchema),
    running_services: lenientArray(z.string()),
    available_software_updates: lenientArray(z.string()),
    available_updates: availableUpdatesSchema,
  })
  .passthrough();

export type SoftwareSection = z.infer<typeof SoftwareSectionSchema>;

export const ExtensionAttributeSchema = z.object({
  id: optionalId,
  name: z.string().min(1),
  type: optionalString,
  value: z
    .union([z.string(), z.number()])
    .transform((val) => String(val))
    .optional()
    .catch(undefined),
});

export type ExtensionAttribute = z.infer<typeof ExtensionAttributeSchema>;

export const ExtensionAttributesSchema = lenientArray(ExtensionAttributeSchema);

/**
 * The `computer` object of /JSSResource/computers/id/<id>. Sections stay
 * unknown here; the accessors in inventory/sections parse them on demand.
 */
export const ComputerRecordSchema = z
  .object({
    general: z.unknown().optional(),
    location: z.unknown().optional(),
    hardware: z.unknown().optional(),
    software: z.unknown().optional(),
    extension_attributes: z.unknown().optional(),
  })
  .passthrough();

export type ComputerRecord = z.infer<typeof ComputerRecordSchema>;

// ============================================================================
// Patch reporting
// ============================================================================

export const PatchComputerSchema = z
  .object({
    id: IdSchema,
    name: optionalString,
    serial_number: optionalString,
  })
  .passthrough();

export const PatchTitleDetailSchema = z
  .object({
    id: optionalId,
    name: z.string(),
    name_id: optionalString,
    versions: z.array(z.unknown()).optional().catch(undefined),
  })
  .passthrough();

export type PatchTitleDetail = z.infer<typeof PatchTitleDetailSchema>;

export const PatchVersionComputersSchema = lenientArray(PatchComputerSchema);
