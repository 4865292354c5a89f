/**
 * Core Types
 *
 * Re-export of the public types for consumers that only need declarations.
 */

export type { SceneNode, SceneNodeInit, Transform, Vector3 } from './core/scene-node';
export type {
  SceneGraphConfig,
  SceneGraphConfigInput,
  SceneGraphDocumentNode,
  UpAxis,
  UnresolvedAssetPolicy,
  LogLevelName,
} from './schemas';
export type { EntityApi, AssetResolver } from './importer/entity-api';
export type { MeshExporter, MaterialExporter } from './exporter/asset-exporters';
