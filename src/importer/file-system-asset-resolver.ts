/**
 * File System Asset Resolver
 *
 * Resolves references against the Meshes/ and Materials/ folders of a scene
 * layout, requiring the file to exist.
 */

import { SceneLayout } from '../core/scene-layout';
import { isFile } from '../utils/file-utils';
import { AssetResolver } from './entity-api';

export class FileSystemAssetResolver implements AssetResolver {
  constructor(private readonly layout: SceneLayout) {}

  resolveMesh(meshRef: string): string | null {
    return this.existing(this.layout.resolveMeshPath(meshRef));
  }

  resolveMaterial(materialRef: string): string | null {
    return this.existing(this.layout.resolveMaterialPath(materialRef));
  }

  private existing(filePath: string | null): string | null {
    return filePath !== null && isFile(filePath) ? filePath : null;
  }
}
