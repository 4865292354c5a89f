/**
 * Zod Schemas for the SceneGraph interchange library
 *
 * Configuration schemas with defaults, and the document schemas.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { LogLevelSchema, UnresolvedAssetPolicySchema, UpAxisSchema } from './base-schemas';

/**
 * Framework Configuration Schema
 */
export const SceneGraphConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  logLevel: LogLevelSchema.optional(),
  sourceUpAxis: UpAxisSchema.optional().default(DEFAULT_CONFIG.SOURCE_UP_AXIS),
  overwriteMeshes: z.boolean().optional().default(DEFAULT_CONFIG.OVERWRITE_MESHES),
  overwriteMaterials: z.boolean().optional().default(DEFAULT_CONFIG.OVERWRITE_MATERIALS),
  overwriteSceneGraph: z.boolean().optional().default(DEFAULT_CONFIG.OVERWRITE_SCENE_GRAPH),
  unresolvedAssetPolicy: UnresolvedAssetPolicySchema.optional().default(DEFAULT_CONFIG.UNRESOLVED_ASSET_POLICY),
  maxDepth: z.number().int().positive().optional().default(DEFAULT_CONFIG.MAX_DEPTH),
  indent: z.number().int().min(0).max(10).optional().default(DEFAULT_CONFIG.INDENT),
});

/**
 * Scene Name Schema
 *
 * Scene names become file names, so path separators are not allowed.
 */
export const SceneNameSchema = z.string()
  .min(1, 'Scene name cannot be empty')
  .regex(/^[^/\\]+$/, 'Scene name cannot contain path separators');

/**
 * Type exports for TypeScript inference
 */
export type SceneGraphConfig = z.infer<typeof SceneGraphConfigSchema>;
export type SceneGraphConfigInput = z.input<typeof SceneGraphConfigSchema>;
export type UpAxis = z.infer<typeof UpAxisSchema>;
export type UnresolvedAssetPolicy = z.infer<typeof UnresolvedAssetPolicySchema>;
export type LogLevelName = z.infer<typeof LogLevelSchema>;

export { UpAxisSchema, UnresolvedAssetPolicySchema, LogLevelSchema, Vector3Schema } from './base-schemas';
export {
  TransformDocumentSchema,
  NodeDocumentShallowSchema,
  type TransformDocument,
  type SceneGraphDocumentNode,
} from './scene-graph-schemas';
