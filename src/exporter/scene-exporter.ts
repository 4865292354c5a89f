/**
 * Scene Exporter
 *
 * Exports a glTF scene into a scene root: Materials/, Meshes/ and the .sgr
 * document describing the hierarchy.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { SceneGraphErrorFactory } from '../errors';
import { SceneNode, countSceneNodes } from '../core/scene-node';
import { SceneLayout } from '../core/scene-layout';
import { serializeSceneGraph } from '../codec/scene-graph-codec';
import { writeSceneGraphText } from '../codec/scene-graph-file';
import type { UpAxis } from '../schemas';
import { Logger, LoggerFactory } from '../utils/logger';
import { getBasenameWithoutExt, pathExists } from '../utils/file-utils';
import { GltfMeshAssetExporter, MaterialAssetExporter } from './asset-exporters';
import { readSceneInput, SceneInput } from './gltf-reader';
import { buildSceneTree } from './scene-tree-builder';

/**
 * Export Stage Names
 */
const EXPORT_STAGES = {
  PARSING: 'source_parsing',
  DIRECTORIES: 'create_directories',
  TREE: 'build_tree',
  MATERIALS: 'write_materials',
  MESHES: 'write_meshes',
  SCENE_GRAPH: 'write_scene_graph',
} as const;

/**
 * Scene Export Options
 */
export interface SceneExportOptions {
  sceneName?: string;
  sourceUpAxis?: UpAxis;
  overwriteMeshes?: boolean;
  overwriteMaterials?: boolean;
  overwriteSceneGraph?: boolean;
  indent?: number;
  maxDepth?: number;
  signal?: AbortSignal;
  logger?: Logger;
  /** Receives one entry per file written or skipped */
  fileLogger?: Logger;
}

/**
 * Scene Export Result
 */
export interface SceneExportResult {
  sceneGraphPath: string;
  layout: SceneLayout;
  root: SceneNode;
  /** Mesh paths relative to Meshes/ */
  meshPaths: string[];
  /** Material paths relative to Materials/ */
  materialPaths: string[];
  /** Files left untouched because they existed and overwrite was off */
  skipped: string[];
  sceneGraphWritten: boolean;
}

function resolveSceneName(input: SceneInput, explicitName: string | undefined, gltfSceneName: string): string {
  if (explicitName) return explicitName;
  if (gltfSceneName) return gltfSceneName;
  if (typeof input === 'string') return getBasenameWithoutExt(input);
  return DEFAULT_CONFIG.SCENE_NAME;
}

/**
 * Export a glTF scene to `<sceneRoot>/<sceneName>.sgr` and its asset folders
 */
export async function exportScene(
  input: SceneInput,
  sceneRoot: string,
  options: SceneExportOptions = {}
): Promise<SceneExportResult> {
  const logger = options.logger ?? LoggerFactory.forExport();
  const fileLogger = options.fileLogger ?? LoggerFactory.forFileOperations(logger.getLevel());

  return logger.withTiming('export_scene', async () => {
    logger.logStage(EXPORT_STAGES.PARSING, { inputType: typeof input === 'string' ? 'file' : 'memory' });
    const document = await readSceneInput(input);
    const root = document.getRoot();
    const scene = root.getDefaultScene() ?? root.listScenes()[0];
    if (!scene) {
      throw SceneGraphErrorFactory.exportError(ERROR_MESSAGES.NO_SCENES, EXPORT_STAGES.PARSING);
    }

    const layout = new SceneLayout(sceneRoot, resolveSceneName(input, options.sceneName, scene.getName()));
    const created = layout.createDirectories();
    logger.logStage(EXPORT_STAGES.DIRECTORIES, { sceneRoot: layout.sceneRoot, created: created.length });

    const sourceUpAxis = options.sourceUpAxis ?? DEFAULT_CONFIG.SOURCE_UP_AXIS;
    const indent = options.indent ?? DEFAULT_CONFIG.INDENT;
    const meshExporter = new GltfMeshAssetExporter(document, sourceUpAxis, fileLogger);
    const materialExporter = new MaterialAssetExporter(document, indent, fileLogger);

    const tree = buildSceneTree(scene, { meshExporter, materialExporter }, {
      sceneName: layout.sceneName,
      sourceUpAxis,
      signal: options.signal,
    });
    logger.logStage(EXPORT_STAGES.TREE, {
      nodeCount: countSceneNodes(tree),
      meshCount: meshExporter.listAssets().length,
      materialCount: materialExporter.listAssets().length,
    });

    // Encode before any asset is written
    const sceneGraphText = serializeSceneGraph(tree, { indent, maxDepth: options.maxDepth });

    logger.logStage(EXPORT_STAGES.MATERIALS);
    const materials = await materialExporter.writeAll(
      layout.getMaterialsDir(),
      options.overwriteMaterials ?? DEFAULT_CONFIG.OVERWRITE_MATERIALS
    );

    logger.logStage(EXPORT_STAGES.MESHES);
    const meshes = await meshExporter.writeAll(
      layout.getMeshesDir(),
      options.overwriteMeshes ?? DEFAULT_CONFIG.OVERWRITE_MESHES
    );

    const skipped = [
      ...materials.skipped.map(file => layout.resolveMaterialPath(file) ?? file),
      ...meshes.skipped.map(file => layout.resolveMeshPath(file) ?? file),
    ];

    const sceneGraphPath = layout.getSceneGraphPath();
    const overwriteSceneGraph = options.overwriteSceneGraph ?? DEFAULT_CONFIG.OVERWRITE_SCENE_GRAPH;
    let sceneGraphWritten = false;
    if (!overwriteSceneGraph && pathExists(sceneGraphPath)) {
      fileLogger.info(`Skipped existing SceneGraph '${sceneGraphPath}'`, { filePath: sceneGraphPath });
      skipped.push(sceneGraphPath);
    } else {
      logger.logStage(EXPORT_STAGES.SCENE_GRAPH);
      const size = writeSceneGraphText(sceneGraphPath, sceneGraphText);
      fileLogger.logFileOperation('write_scene_graph', sceneGraphPath, size);
      sceneGraphWritten = true;
    }

    return {
      sceneGraphPath,
      layout,
      root: tree,
      meshPaths: meshExporter.listAssets().map(asset => asset.path),
      materialPaths: materialExporter.listAssets().map(asset => asset.path),
      skipped,
      sceneGraphWritten,
    };
  }, { sceneRoot });
}
