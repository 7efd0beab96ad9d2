/**
 * Section accessors for computer detail records.
 *
 * Each accessor parses one section on demand and returns undefined when the
 * section is absent or not the expected shape.
 */

import type { z } from 'zod';
import {
  ComputerRecord,
  ExtensionAttribute,
  ExtensionAttributesSchema,
  GeneralSection,
  GeneralSectionSchema,
  HardwareSection,
  HardwareSectionSchema,
  LocationSection,
  LocationSectionSchema,
  SoftwareSection,
  SoftwareSectionSchema,
} from '../types/jss-api.js';

const parseSection = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> | undefined => {
  if (value === undefined || value === null) return undefined;
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const getGeneral = (record: ComputerRecord): GeneralSection | undefined =>
  parseSection(GeneralSectionSchema, record.general);

export const getLocation = (record: ComputerRecord): LocationSection | undefined =>
  parseSection(LocationSectionSchema, record.location);

export const getHardware = (record: ComputerRecord): HardwareSection | undefined =>
  parseSection(HardwareSectionSchema, record.hardware);

export const getSoftware = (record: ComputerRecord): SoftwareSection | undefined =>
  parseSection(SoftwareSectionSchema, record.software);

export const getExtensionAttributes = (record: ComputerRecord): ExtensionAttribute[] | undefined =>
  parseSection(ExtensionAttributesSchema, record.extension_attributes);

export const getExtensionAttribute = (record: ComputerRecord, name: string): ExtensionAttribute | undefined =>
  getExtensionAttributes(record)?.find((attribute) => attribute.name === name);

export const getUsername = (record: ComputerRecord): string | undefined => nonEmpty(getLocation(record)?.username);

export const getIpAddress = (record: ComputerRecord): string | undefined => {
  const general = getGeneral(record);
  return nonEmpty(general?.last_reported_ip) ?? nonEmpty(general?.ip_address);
};

export const getEmail = (record: ComputerRecord): string => nonEmpty(getLocation(record)?.email_address) ?? 'N/A';

/**
 * First non-empty of real name, computer name, username and email
 */
export const getCanonicalName = (record: ComputerRecord): string => {
  const location = getLocation(record);
  const general = getGeneral(record);
  return (
    nonEmpty(location?.real_name) ??
    nonEmpty(location?.realname) ??
    nonEmpty(general?.name) ??
    nonEmpty(location?.username) ??
    nonEmpty(location?.email_address) ??
    'N/A'
  );
};

/**
 * Last check-in time. The epoch field wins when present; the text form is
 * `YYYY-MM-DD HH:MM:SS` in server-local time.
 */
export const getLastContact = (record: ComputerRecord): Date | undefined => {
  const general = getGeneral(record);
  if (general?.last_contact_time_epoch !== undefined && general.last_contact_time_epoch > 0) {
    return new Date(general.last_contact_time_epoch);
  }
  const text = nonEmpty(general?.last_contact_time);
  if (!text) return undefined;
  const match = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/.exec(text);
  if (!match) return undefined;
  const [, year, month, day, hour, minute, second] = match.map(Number);
  const date = new Date(year, month - 1, day, hour, minute, second);
  return Number.isNaN(date.getTime()) ? undefined : date;
};
