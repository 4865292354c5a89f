/**
 * SceneNode Tree Consumer
 *
 * Instantiates engine entities from a decoded tree, depth-first and
 * parent-before-child. Unresolved assets are either skipped per node or abort
 * the whole import, depending on the policy.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { UNBOUND_MATERIAL_SLOT, UNIFORM_SCALE_TOLERANCE } from '../constants/scene-graph';
import { SceneGraphErrorFactory, UnresolvedAssetError } from '../errors';
import { identityTransform, SceneNode } from '../core/scene-node';
import type { UnresolvedAssetPolicy } from '../schemas';
import { Logger, LoggerFactory } from '../utils/logger';
import { isUniformScale } from '../utils/matrix-utils';
import { AssetResolver, EntityApi } from './entity-api';

/**
 * Tree Consumer Options
 */
export interface SceneTreeConsumerOptions {
  unresolvedAssetPolicy?: UnresolvedAssetPolicy;
  /** Checked once per node */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Summary of one import
 */
export interface ImportReport {
  /** Entities visited, created plus reused */
  entityCount: number;
  createdCount: number;
  /** Existing entities returned by `findEntity` */
  reusedCount: number;
  meshCount: number;
  /** Material slots that were bound to a resolved asset */
  materialSlotCount: number;
  /** Populated under the 'skip' policy */
  unresolved: UnresolvedAssetError[];
}

interface ConsumerContext<THandle> {
  entityApi: EntityApi<THandle>;
  resolver: AssetResolver;
  policy: UnresolvedAssetPolicy;
  signal?: AbortSignal;
  logger: Logger;
  report: ImportReport;
}

/**
 * Instantiate entities for every node of the tree
 */
export function consumeSceneTree<THandle>(
  root: SceneNode,
  entityApi: EntityApi<THandle>,
  resolver: AssetResolver,
  options: SceneTreeConsumerOptions = {}
): ImportReport {
  const context: ConsumerContext<THandle> = {
    entityApi,
    resolver,
    policy: options.unresolvedAssetPolicy ?? DEFAULT_CONFIG.UNRESOLVED_ASSET_POLICY,
    signal: options.signal,
    logger: options.logger ?? LoggerFactory.forImport(),
    report: { entityCount: 0, createdCount: 0, reusedCount: 0, meshCount: 0, materialSlotCount: 0, unresolved: [] },
  };

  consumeNode(root, null, context);
  return context.report;
}

function consumeNode<THandle>(node: SceneNode, parent: THandle | null, context: ConsumerContext<THandle>): void {
  context.signal?.throwIfAborted();

  const { entityApi, report } = context;
  const entity = getOrCreateEntity(node.name, parent, context);
  report.entityCount++;

  const transform = node.transform ?? identityTransform();
  entityApi.setTransform(entity, transform);
  if (node.children.length > 0 && !isUniformScale(transform.scale, UNIFORM_SCALE_TOLERANCE)) {
    context.logger.warn(`Entity '${node.name}' has a non-uniform scale and ${node.children.length} children`, {
      scale: transform.scale,
    });
  }

  if (node.meshRef !== undefined) {
    attachMesh(node, node.meshRef, entity, context);
  }

  if (node.materialRefs.length > 0) {
    attachMaterials(node, entity, context);
  }

  for (const child of node.children) {
    consumeNode(child, entity, context);
  }
}

function getOrCreateEntity<THandle>(name: string, parent: THandle | null, context: ConsumerContext<THandle>): THandle {
  const existing = context.entityApi.findEntity?.(name, parent) ?? null;
  if (existing !== null) {
    context.report.reusedCount++;
    context.logger.debug(`Reusing entity '${name}'`);
    return existing;
  }
  context.report.createdCount++;
  return context.entityApi.createEntity(name, parent);
}

function attachMesh<THandle>(node: SceneNode, meshRef: string, entity: THandle, context: ConsumerContext<THandle>): void {
  const assetPath = context.resolver.resolveMesh(meshRef);
  if (assetPath === null) {
    handleUnresolved(
      SceneGraphErrorFactory.unresolvedAsset(
        `${ERROR_MESSAGES.MESH_NOT_FOUND}: '${meshRef}' on node '${node.name}'`,
        node.name,
        'mesh',
        meshRef
      ),
      context
    );
    return;
  }
  context.entityApi.attachMesh(entity, assetPath);
  context.report.meshCount++;
}

function attachMaterials<THandle>(node: SceneNode, entity: THandle, context: ConsumerContext<THandle>): void {
  let bound = 0;
  const assetPaths = node.materialRefs.map((materialRef, slotIndex) => {
    if (materialRef === UNBOUND_MATERIAL_SLOT) {
      return UNBOUND_MATERIAL_SLOT;
    }
    const assetPath = context.resolver.resolveMaterial(materialRef);
    if (assetPath === null) {
      handleUnresolved(
        SceneGraphErrorFactory.unresolvedAsset(
          `${ERROR_MESSAGES.MATERIAL_NOT_FOUND}: '${materialRef}' in slot ${slotIndex} on node '${node.name}'`,
          node.name,
          'material',
          materialRef,
          slotIndex
        ),
        context
      );
      return UNBOUND_MATERIAL_SLOT;
    }
    bound++;
    return assetPath;
  });

  if (bound > 0) {
    context.entityApi.attachMaterials(entity, assetPaths);
    context.report.materialSlotCount += bound;
  }
}

function handleUnresolved<THandle>(error: UnresolvedAssetError, context: ConsumerContext<THandle>): void {
  if (context.policy === 'abort') {
    throw error;
  }
  context.report.unresolved.push(error);
  context.logger.warn(error.message, {
    nodeName: error.nodeName,
    assetKind: error.assetKind,
    assetRef: error.assetRef,
  });
}
