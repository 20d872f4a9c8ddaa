import { z } from 'zod';

import { createTypeMismatch } from './errors';

export const RESERVED_FIELDS = ['type', 'title', 'status', 'detail', 'instance'] as const;

export type ReservedField = (typeof RESERVED_FIELDS)[number];

export type ProblemFields = {
  type?: string;
  title?: string;
  status?: number;
  detail?: string;
  instance?: string;
};

export const BLANK_PROBLEM_TYPE = 'about:blank';

export const MIN_STATUS = 100;
export const MAX_STATUS = 999;

export const statusSchema = z.number().int().min(MIN_STATUS).max(MAX_STATUS);

export const STATUS_EXPECTATION = `an integer between ${MIN_STATUS} and ${MAX_STATUS}`;

export function assertStatus(status: number): number {
  const parsed = statusSchema.safeParse(status);
  if (!parsed.success) {
    throw createTypeMismatch('status', STATUS_EXPECTATION, parsed.error);
  }

  return parsed.data;
}

// Statuses a response carrying a body can use.
export const MIN_RESPONSE_STATUS = 200;
export const MAX_RESPONSE_STATUS = 599;

export const responseStatusSchema = z.number().int().min(MIN_RESPONSE_STATUS).max(MAX_RESPONSE_STATUS);

export function assertResponseStatus(status: number): number {
  const parsed = responseStatusSchema.safeParse(status);
  if (!parsed.success) {
    throw createTypeMismatch(
      'status',
      `an integer between ${MIN_RESPONSE_STATUS} and ${MAX_RESPONSE_STATUS} to be used as a fallback`,
      parsed.error,
    );
  }

  return parsed.data;
}

export function isReservedField(name: string): name is ReservedField {
  return RESERVED_FIELDS.some((field) => field === name);
}

/** Present fixed fields in wire order: type, title, status, detail, instance. */
export function fixedFieldEntries(fields: ProblemFields): Array<[ReservedField, string | number]> {
  const entries: Array<[ReservedField, string | number]> = [];
  for (const name of RESERVED_FIELDS) {
    const value = fields[name];
    if (value !== undefined) {
      entries.push([name, value]);
    }
  }

  return entries;
}

const textFieldSchema = z.string();

/**
 * Validates one decoded fixed field and stores it on `fields`. A `null` value
 * leaves the field unset.
 */
export function readProblemField(fields: ProblemFields, name: ReservedField, value: unknown) {
  if (value === null) {
    return;
  }

  if (name === 'status') {
    const parsed = statusSchema.safeParse(value);
    if (!parsed.success) {
      throw createTypeMismatch(name, STATUS_EXPECTATION, parsed.error);
    }

    fields.status = parsed.data;
    return;
  }

  const parsed = textFieldSchema.safeParse(value);
  if (!parsed.success) {
    throw createTypeMismatch(name, 'a string', parsed.error);
  }

  fields[name] = parsed.data;
}
