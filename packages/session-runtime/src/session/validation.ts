/**
 * @module @asset-session/runtime/session/validation
 * Zod schemas for values that cross the host boundary untyped
 */

import { z } from 'zod';
import { InvalidInputError, type HostInterface, type Settings } from '@asset-session/contracts';

/**
 * Structural check for HostInterface. Methods may live on a prototype.
 */
export const hostInterfaceSchema = z.object({
  identifier: z.function(),
  displayName: z.function().optional(),
  info: z.function().optional(),
});

export const settingValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const settingsSchema: z.ZodType<Settings> = z.record(settingValueSchema);

/**
 * Narrow `value` to a HostInterface or throw InvalidInputError.
 */
export function assertHostInterface(value: unknown): asserts value is HostInterface {
  if (value === null || value === undefined) {
    throw new InvalidInputError('Host interface must be provided');
  }

  const result = hostInterfaceSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError('Host interface does not implement HostInterface', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
}

/**
 * Parse a settings mapping, throwing InvalidInputError on bad shape.
 */
export function parseSettings(value: unknown): Settings {
  const result = settingsSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError('Settings must map strings to primitive values', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
