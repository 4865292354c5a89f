/**
 * SceneGraph Document Schemas
 *
 * Shape of a single node object in a .sgr document. Children are validated
 * as plain objects here and decoded one level at a time by the codec, so the
 * nesting depth can be bounded before anything recurses.
 */

import { z } from 'zod';
import { ERROR_MESSAGES } from '../constants/errors';
import { Vector3Schema } from './base-schemas';

export const TransformDocumentSchema = z.object({
  translate: Vector3Schema.optional(),
  rotate: Vector3Schema.optional(),
  scale: Vector3Schema.optional(),
});

export const NodeDocumentShallowSchema = z.object({
  name: z.string().min(1, ERROR_MESSAGES.EMPTY_NAME),
  transform: TransformDocumentSchema.optional(),
  mesh: z.string().min(1, ERROR_MESSAGES.EMPTY_MESH_REF).optional(),
  materials: z.array(z.string()).optional(),
  children: z.array(z.record(z.string(), z.unknown())).optional(),
});

export type TransformDocument = z.infer<typeof TransformDocumentSchema>;

/**
 * A node object as written to disk
 */
export interface SceneGraphDocumentNode {
  name: string;
  transform?: {
    translate: [number, number, number];
    rotate: [number, number, number];
    scale: [number, number, number];
  };
  mesh?: string;
  materials?: string[];
  children?: SceneGraphDocumentNode[];
}
