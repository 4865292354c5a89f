/**
 * SceneNode Tree Builder
 *
 * Walks a glTF scene depth-first and produces the SceneNode tree written to
 * the .sgr document. The source document is only read.
 */

import { Mesh, Node as GltfNode, Scene } from '@gltf-transform/core';
import { DEFAULT_CONFIG } from '../constants/config';
import { UNBOUND_MATERIAL_SLOT } from '../constants/scene-graph';
import { SceneNode } from '../core/scene-node';
import type { UpAxis } from '../schemas';
import { localTrsToTransform } from '../utils/matrix-utils';
import { claimUniqueName, normalizeNodeName } from '../utils/name-utils';
import { MaterialExporter, MeshExporter } from './asset-exporters';

/**
 * Collaborators that turn source assets into relative asset paths
 */
export interface BuilderCollaborators {
  meshExporter: MeshExporter;
  materialExporter: MaterialExporter;
}

/**
 * Tree Builder Options
 */
export interface SceneTreeBuilderOptions {
  /** Name of the root node, defaults to the glTF scene name */
  sceneName?: string;
  sourceUpAxis?: UpAxis;
  /** Checked once per node */
  signal?: AbortSignal;
}

interface BuilderContext extends BuilderCollaborators {
  sourceUpAxis: UpAxis;
  signal?: AbortSignal;
}

/**
 * Builds the tree for a glTF scene. The root is a synthetic node named after
 * the scene whose children are the scene's top-level nodes.
 */
export function buildSceneTree(
  scene: Scene,
  collaborators: BuilderCollaborators,
  options: SceneTreeBuilderOptions = {}
): SceneNode {
  const context: BuilderContext = {
    ...collaborators,
    sourceUpAxis: options.sourceUpAxis ?? DEFAULT_CONFIG.SOURCE_UP_AXIS,
    signal: options.signal,
  };

  context.signal?.throwIfAborted();

  return {
    name: normalizeNodeName(options.sceneName ?? (scene.getName() || DEFAULT_CONFIG.SCENE_NAME)),
    materialRefs: [],
    children: buildChildren(scene.listChildren(), context),
  };
}

function buildChildren(nodes: GltfNode[], context: BuilderContext): SceneNode[] {
  const siblingNames = new Set<string>();
  return nodes.map(node =>
    buildNode(node, claimUniqueName(normalizeNodeName(node.getName()), siblingNames), context)
  );
}

function buildNode(gltfNode: GltfNode, name: string, context: BuilderContext): SceneNode {
  context.signal?.throwIfAborted();

  const node: SceneNode = {
    name,
    transform: localTrsToTransform(
      gltfNode.getTranslation(),
      gltfNode.getRotation(),
      gltfNode.getScale(),
      context.sourceUpAxis
    ),
    materialRefs: [],
    children: [],
  };

  const mesh = gltfNode.getMesh();
  if (mesh) {
    node.meshRef = context.meshExporter.exportMesh(mesh);
    node.materialRefs = collectMaterialRefs(mesh, context.materialExporter);
  }

  node.children = buildChildren(gltfNode.listChildren(), context);
  return node;
}

/**
 * One material slot per primitive, in primitive order. Unbound slots before
 * the last bound slot keep their index with a placeholder; trailing unbound
 * slots are dropped.
 */
export function collectMaterialRefs(mesh: Mesh, materialExporter: MaterialExporter): string[] {
  const refs = mesh.listPrimitives().map(primitive => {
    const material = primitive.getMaterial();
    return material ? materialExporter.exportMaterial(material) : UNBOUND_MATERIAL_SLOT;
  });

  let length = refs.length;
  while (length > 0 && refs[length - 1] === UNBOUND_MATERIAL_SLOT) {
    length--;
  }
  return refs.slice(0, length);
}
