/**
 * Asset Export Collaborators
 *
 * The tree builder only records the paths these collaborators return. Both
 * default implementations register assets while the tree is walked and write
 * them afterwards with `writeAll`.
 */

import * as path from 'path';
import { Document, Material, Mesh } from '@gltf-transform/core';
import { cloneDocument, prune, transformMesh } from '@gltf-transform/functions';
import { FILE_EXTENSIONS } from '../constants/config';
import { MATERIAL_FILE } from '../constants/scene-graph';
import type { UpAxis } from '../schemas';
import { Logger } from '../utils/logger';
import { claimUniqueName, sanitizeAssetName } from '../utils/name-utils';
import { pathExists, writeFileChecked } from '../utils/file-utils';
import { Y_UP_TO_Z_UP_MAT4 } from '../utils/matrix-utils';
import { createNodeIO } from './gltf-reader';

/**
 * Maps a source mesh to a path relative to Meshes/
 */
export interface MeshExporter {
  exportMesh(mesh: Mesh): string;
}

/**
 * Maps a source material to a path relative to Materials/
 */
export interface MaterialExporter {
  exportMaterial(material: Material): string;
}

/**
 * Outcome of writing registered assets
 */
export interface AssetWriteResult {
  written: string[];
  skipped: string[];
}

/**
 * Registers each distinct property once under a unique, sanitized file name.
 * Names are unique ignoring case so files stay distinct on case-insensitive
 * filesystems.
 */
class AssetRegistry<T> {
  private readonly paths = new Map<T, string>();
  private readonly takenStems = new Set<string>();

  constructor(private readonly extension: string) {}

  register(asset: T, name: string, fallback: string): string {
    const existing = this.paths.get(asset);
    if (existing !== undefined) {
      return existing;
    }
    const stem = claimUniqueName(sanitizeAssetName(name, fallback), this.takenStems, candidate => candidate.toLowerCase());
    const relativePath = `${stem}${this.extension}`;
    this.paths.set(asset, relativePath);
    return relativePath;
  }

  entries(): Array<[T, string]> {
    return Array.from(this.paths.entries());
  }
}

/**
 * Writes each mesh as a standalone GLB holding a single node
 */
export class GltfMeshAssetExporter implements MeshExporter {
  private readonly registry = new AssetRegistry<Mesh>(FILE_EXTENSIONS.GLB);

  constructor(
    private readonly document: Document,
    private readonly sourceUpAxis: UpAxis,
    private readonly logger?: Logger
  ) {}

  exportMesh(mesh: Mesh): string {
    const index = this.document.getRoot().listMeshes().indexOf(mesh);
    return this.registry.register(mesh, mesh.getName(), `Mesh_${index}`);
  }

  /**
   * Registered meshes and their relative paths, in registration order
   */
  listAssets(): Array<{ mesh: Mesh; path: string }> {
    return this.registry.entries().map(([mesh, relativePath]) => ({ mesh, path: relativePath }));
  }

  async writeAll(meshesDir: string, overwrite: boolean): Promise<AssetWriteResult> {
    const result: AssetWriteResult = { written: [], skipped: [] };
    const io = createNodeIO();

    for (const { mesh, path: relativePath } of this.listAssets()) {
      const outputPath = path.join(meshesDir, relativePath);
      if (!overwrite && pathExists(outputPath)) {
        this.logger?.info(`Skipped existing mesh '${outputPath}'`, { filePath: outputPath });
        result.skipped.push(relativePath);
        continue;
      }

      const meshDocument = await this.buildMeshDocument(mesh, path.basename(relativePath, FILE_EXTENSIONS.GLB));
      const bytes = await io.writeBinary(meshDocument);
      writeFileChecked(outputPath, bytes);
      this.logger?.logFileOperation('write_mesh', outputPath, bytes.byteLength, { mesh: mesh.getName() });
      result.written.push(relativePath);
    }

    return result;
  }

  /**
   * Copies the source document and reduces the copy to one scene with one
   * node referencing the mesh, then prunes everything else
   */
  async buildMeshDocument(mesh: Mesh, name: string): Promise<Document> {
    const meshIndex = this.document.getRoot().listMeshes().indexOf(mesh);
    const copy = cloneDocument(this.document);
    const root = copy.getRoot();
    const target = root.listMeshes()[meshIndex];

    for (const animation of root.listAnimations()) animation.dispose();
    for (const skin of root.listSkins()) skin.dispose();
    for (const scene of root.listScenes()) scene.dispose();
    for (const node of root.listNodes()) node.dispose();

    const scene = copy.createScene(name);
    scene.addChild(copy.createNode(name).setMesh(target));
    root.setDefaultScene(scene);

    if (this.sourceUpAxis === 'Y') {
      transformMesh(target, Y_UP_TO_Z_UP_MAT4);
    }

    await copy.transform(prune());
    return copy;
  }
}

/**
 * Engine material file written for each exported material
 */
export interface EngineMaterialFile {
  materialType: string;
  materialTypeVersion: number;
  propertyValues: Record<string, number | string | boolean | number[]>;
}

/**
 * Builds the engine material description from a glTF material's scalar
 * PBR factors. Texture maps are not converted.
 */
export function buildEngineMaterial(material: Material): EngineMaterialFile {
  const [r, g, b, alpha] = material.getBaseColorFactor();
  const alphaMode = material.getAlphaMode();
  const opaque = alphaMode === 'OPAQUE'
    || (alphaMode === 'MASK' && alpha > MATERIAL_FILE.OPAQUE_ALPHA_THRESHOLD);

  return {
    materialType: MATERIAL_FILE.MATERIAL_TYPE,
    materialTypeVersion: MATERIAL_FILE.MATERIAL_TYPE_VERSION,
    propertyValues: {
      'baseColor.color': [r, g, b],
      'metallic.factor': material.getMetallicFactor(),
      'roughness.factor': material.getRoughnessFactor(),
      'opacity.factor': alpha,
      'opacity.mode': opaque ? MATERIAL_FILE.OPACITY_MODE_OPAQUE : MATERIAL_FILE.OPACITY_MODE_BLENDED,
    },
  };
}

/**
 * Writes each material as an engine .material JSON file
 */
export class MaterialAssetExporter implements MaterialExporter {
  private readonly registry = new AssetRegistry<Material>(FILE_EXTENSIONS.MATERIAL);

  constructor(
    private readonly document: Document,
    private readonly indent: number,
    private readonly logger?: Logger
  ) {}

  exportMaterial(material: Material): string {
    const index = this.document.getRoot().listMaterials().indexOf(material);
    return this.registry.register(material, material.getName(), `Material_${index}`);
  }

  listAssets(): Array<{ material: Material; path: string }> {
    return this.registry.entries().map(([material, relativePath]) => ({ material, path: relativePath }));
  }

  async writeAll(materialsDir: string, overwrite: boolean): Promise<AssetWriteResult> {
    const result: AssetWriteResult = { written: [], skipped: [] };

    for (const { material, path: relativePath } of this.listAssets()) {
      const outputPath = path.join(materialsDir, relativePath);
      if (!overwrite && pathExists(outputPath)) {
        this.logger?.info(`Skipped existing material '${outputPath}'`, { filePath: outputPath });
        result.skipped.push(relativePath);
        continue;
      }

      const text = JSON.stringify(buildEngineMaterial(material), null, this.indent);
      writeFileChecked(outputPath, text);
      this.logger?.logFileOperation('write_material', outputPath, text.length, { material: material.getName() });
      result.written.push(relativePath);
    }

    return result;
  }
}
