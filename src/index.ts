/**
 * SceneGraph Interchange
 *
 * Exports glTF scenes to the SceneGraph (.sgr) interchange format with mesh
 * and material assets, and imports .sgr scenes into a target engine.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'scenegraph-interchange';
 *
 * const sgr = defineConfig({ sourceUpAxis: 'Y', overwriteMeshes: false });
 *
 * const { sceneGraphPath } = await sgr.exportScene('./kitchen.glb', './Assets/Scenes/Kitchen');
 * const report = sgr.importScene('./Assets/Scenes/Kitchen', 'Kitchen', engineEntityApi);
 * ```
 */

import { ZodError } from 'zod';
import { SceneGraphErrorFactory } from './errors';
import {
  SceneGraphConfigSchema,
  type LogLevelName,
  type SceneGraphConfig,
  type SceneGraphConfigInput,
  type SceneGraphDocumentNode,
} from './schemas';
import { SceneNode } from './core/scene-node';
import {
  decodeSceneGraph,
  encodeSceneGraph,
  parseSceneGraph,
  readSceneGraphFile,
  serializeSceneGraph,
  writeSceneGraphFile,
} from './codec';
import { exportScene, SceneExportOptions, SceneExportResult } from './exporter/scene-exporter';
import { SceneInput } from './exporter/gltf-reader';
import { importScene, SceneImportOptions, SceneImportResult } from './importer/scene-importer';
import { SceneImportSystem } from './importer/scene-import-system';
import { EntityApi } from './importer/entity-api';
import { Logger, LoggerFactory, LogLevel } from './utils';

const LOG_LEVELS: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

type ExportCallOptions = Pick<SceneExportOptions, 'sceneName' | 'signal'>;
type ImportCallOptions = Pick<SceneImportOptions, 'resolver' | 'signal'>;

/**
 * Main framework class
 */
export class SceneGraphFramework {
  private config: SceneGraphConfig;
  private readonly exportLogger: Logger;
  private readonly importLogger: Logger;
  private readonly fileLogger: Logger;

  constructor(config: SceneGraphConfigInput = {}) {
    try {
      this.config = SceneGraphConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw SceneGraphErrorFactory.configError(
          'Invalid configuration',
          'SceneGraphConfig',
          { zodError: error }
        );
      }
      throw error;
    }

    const level = this.config.logLevel
      ? LOG_LEVELS[this.config.logLevel]
      : this.config.debug ? LogLevel.DEBUG : LogLevel.INFO;
    this.exportLogger = LoggerFactory.forExport(level);
    this.importLogger = LoggerFactory.forImport(level);
    this.fileLogger = LoggerFactory.forFileOperations(level);
    this.exportLogger.logConfig({ ...this.config });
  }

  /**
   * Export a glTF scene into `sceneRoot`
   *
   * @param input - .glb/.gltf path, GLB bytes, or a loaded gltf-transform Document
   * @param sceneRoot - Folder receiving `<SceneName>.sgr`, `Meshes/`, `Materials/` and `Textures/`
   */
  async exportScene(input: SceneInput, sceneRoot: string, options: ExportCallOptions = {}): Promise<SceneExportResult> {
    return exportScene(input, sceneRoot, {
      ...options,
      sourceUpAxis: this.config.sourceUpAxis,
      overwriteMeshes: this.config.overwriteMeshes,
      overwriteMaterials: this.config.overwriteMaterials,
      overwriteSceneGraph: this.config.overwriteSceneGraph,
      indent: this.config.indent,
      maxDepth: this.config.maxDepth,
      logger: this.exportLogger,
      fileLogger: this.fileLogger,
    });
  }

  /**
   * Import `<sceneRoot>/<sceneName>.sgr` through the engine's entity API
   */
  importScene<THandle>(
    sceneRoot: string,
    sceneName: string,
    entityApi: EntityApi<THandle>,
    options: ImportCallOptions = {}
  ): SceneImportResult {
    return importScene(sceneRoot, sceneName, entityApi, {
      ...options,
      unresolvedAssetPolicy: this.config.unresolvedAssetPolicy,
      maxDepth: this.config.maxDepth,
      logger: this.importLogger,
    });
  }

  /**
   * Create an import system bound to an entity API, using this configuration
   */
  createImportSystem<THandle>(entityApi: EntityApi<THandle>): SceneImportSystem<THandle> {
    return new SceneImportSystem(entityApi, {
      unresolvedAssetPolicy: this.config.unresolvedAssetPolicy,
      maxDepth: this.config.maxDepth,
      logger: this.importLogger,
    });
  }

  readSceneGraph(filePath: string): SceneNode {
    return readSceneGraphFile(filePath, { maxDepth: this.config.maxDepth });
  }

  writeSceneGraph(filePath: string, root: SceneNode): number {
    const size = writeSceneGraphFile(filePath, root, { indent: this.config.indent, maxDepth: this.config.maxDepth });
    this.fileLogger.logFileOperation('write_scene_graph', filePath, size);
    return size;
  }

  encode(root: SceneNode): SceneGraphDocumentNode {
    return encodeSceneGraph(root, { maxDepth: this.config.maxDepth });
  }

  decode(document: unknown): SceneNode {
    return decodeSceneGraph(document, { maxDepth: this.config.maxDepth });
  }

  /**
   * Get current configuration
   */
  getConfig(): SceneGraphConfig {
    return { ...this.config };
  }
}

/**
 * Create framework instance with configuration
 *
 * @example
 * ```typescript
 * const sgr = defineConfig({ unresolvedAssetPolicy: 'abort' });
 * ```
 */
export function defineConfig(config: SceneGraphConfigInput = {}): SceneGraphFramework {
  return new SceneGraphFramework(config);
}

/**
 * Type exports
 */
export type * from './types';

/**
 * Direct exports
 */
export {
  createSceneNode,
  createTransform,
  identityTransform,
  isIdentityTransform,
  sceneNodesEqual,
  transformsEqual,
  traverseSceneNodes,
  countSceneNodes,
  findSceneNode,
} from './core/scene-node';
export { SceneLayout } from './core/scene-layout';
export { encodeSceneGraph, decodeSceneGraph, serializeSceneGraph, parseSceneGraph };
export { readSceneGraphFile, writeSceneGraphFile };
export { exportScene, buildSceneTree, GltfMeshAssetExporter, MaterialAssetExporter, buildEngineMaterial } from './exporter';
export { importScene, consumeSceneTree, SceneImportSystem, FileSystemAssetResolver, type ImportReport } from './importer';
export {
  BaseSceneGraphError,
  SchemaError,
  UnresolvedAssetError,
  SceneGraphIoError,
  SceneGraphConfigError,
  SceneGraphExportError,
  SceneGraphImportError,
  SceneGraphErrorFactory,
  isSceneGraphError,
  type SceneGraphError,
} from './errors';
export { Logger, LoggerFactory, LogLevel, createLogger } from './utils';
