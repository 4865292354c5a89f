/**
 * Base Schemas
 *
 * Common validation schemas shared by the configuration and document schemas.
 */

import { z } from 'zod';

/**
 * Up axis of the source scene
 */
export const UpAxisSchema = z.enum(['Y', 'Z']);

/**
 * What the importer does with a reference that does not resolve
 */
export const UnresolvedAssetPolicySchema = z.enum(['skip', 'abort']);

/**
 * Log level names accepted in configuration
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Three finite numbers
 */
export const Vector3Schema = z.tuple([
  z.number().finite(),
  z.number().finite(),
  z.number().finite(),
]);
