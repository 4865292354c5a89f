/**
 * Import Collaborator Interfaces
 *
 * The consumer drives the target engine only through these interfaces.
 */

import type { Transform } from '../core/scene-node';

/**
 * Target engine entity API. Entities are created parent-before-child.
 */
export interface EntityApi<THandle> {
  /**
   * Existing entity with this name under `parent`, or null. When present, the
   * consumer updates a found entity instead of creating a new one, so
   * importing the same scene twice leaves one hierarchy.
   */
  findEntity?(name: string, parent: THandle | null): THandle | null;
  createEntity(name: string, parent: THandle | null): THandle;
  setTransform(entity: THandle, transform: Transform): void;
  attachMesh(entity: THandle, assetPath: string): void;
  /** Index i binds mesh slot i; an empty string leaves the slot unbound */
  attachMaterials(entity: THandle, assetPaths: readonly string[]): void;
}

/**
 * Resolves document references to engine asset paths. Returns null when the
 * referenced asset does not exist.
 */
export interface AssetResolver {
  resolveMesh(meshRef: string): string | null;
  resolveMaterial(materialRef: string): string | null;
}
