/**
 * Common zod validators shared by config and record schemas.
 *
 * Dependency direction: validation.ts → zod
 * Used by: record schemas
 */

import { z } from 'zod';

/** Validate that a string is non-empty. */
export const nonEmptyString = z.string().min(1, 'Value cannot be empty');

/** Validate a list of strings. */
export const stringList = z.array(z.string());
