/**
 * Scene Importer
 *
 * Reads `<sceneRoot>/<sceneName>.sgr` and instantiates it through an entity API.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { SceneLayout } from '../core/scene-layout';
import { countSceneNodes } from '../core/scene-node';
import { readSceneGraphFile } from '../codec/scene-graph-file';
import type { UnresolvedAssetPolicy } from '../schemas';
import { Logger, LoggerFactory } from '../utils/logger';
import { AssetResolver, EntityApi } from './entity-api';
import { FileSystemAssetResolver } from './file-system-asset-resolver';
import { consumeSceneTree, ImportReport } from './scene-tree-consumer';

/**
 * Scene Import Options
 */
export interface SceneImportOptions {
  /** Defaults to a FileSystemAssetResolver over the scene layout */
  resolver?: AssetResolver;
  unresolvedAssetPolicy?: UnresolvedAssetPolicy;
  maxDepth?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Scene Import Result
 */
export interface SceneImportResult extends ImportReport {
  sceneGraphPath: string;
}

export function importScene<THandle>(
  sceneRoot: string,
  sceneName: string,
  entityApi: EntityApi<THandle>,
  options: SceneImportOptions = {}
): SceneImportResult {
  const logger = options.logger ?? LoggerFactory.forImport();
  const layout = new SceneLayout(sceneRoot, sceneName);
  const sceneGraphPath = layout.getSceneGraphPath();

  logger.logStage('read_scene_graph', { filePath: sceneGraphPath });
  const root = readSceneGraphFile(sceneGraphPath, { maxDepth: options.maxDepth ?? DEFAULT_CONFIG.MAX_DEPTH });

  logger.logStage('instantiate_entities', { nodeCount: countSceneNodes(root) });
  const report = consumeSceneTree(root, entityApi, options.resolver ?? new FileSystemAssetResolver(layout), {
    unresolvedAssetPolicy: options.unresolvedAssetPolicy,
    signal: options.signal,
    logger,
  });

  logger.info(`Imported scene '${sceneName}'`, {
    entityCount: report.entityCount,
    createdCount: report.createdCount,
    reusedCount: report.reusedCount,
    meshCount: report.meshCount,
    materialSlotCount: report.materialSlotCount,
    unresolvedCount: report.unresolved.length,
  });

  return { ...report, sceneGraphPath };
}
