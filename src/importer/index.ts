/**
 * Import Direction
 *
 * .sgr document -> SceneNode tree -> engine entities.
 */

export { importScene, type SceneImportOptions, type SceneImportResult } from './scene-importer';
export { consumeSceneTree, type SceneTreeConsumerOptions, type ImportReport } from './scene-tree-consumer';
export { SceneImportSystem } from './scene-import-system';
export { FileSystemAssetResolver } from './file-system-asset-resolver';
export type { EntityApi, AssetResolver } from './entity-api';
