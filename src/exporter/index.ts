/**
 * Export Direction
 *
 * glTF scene -> SceneNode tree -> .sgr document and asset folders.
 */

export { exportScene, type SceneExportOptions, type SceneExportResult } from './scene-exporter';
export { buildSceneTree, collectMaterialRefs, type BuilderCollaborators, type SceneTreeBuilderOptions } from './scene-tree-builder';
export {
  GltfMeshAssetExporter,
  MaterialAssetExporter,
  buildEngineMaterial,
  type MeshExporter,
  type MaterialExporter,
  type AssetWriteResult,
  type EngineMaterialFile,
} from './asset-exporters';
export { readSceneInput, createNodeIO, GltfParserFactory, type SceneInput, type IGltfParser } from './gltf-reader';
