/**
 * SceneNode
 *
 * In-memory representation of a SceneGraph tree. Trees are built fresh for
 * every export or import and owned by the operation that built them.
 */

import { IDENTITY_ROTATE, IDENTITY_SCALE, IDENTITY_TRANSLATE } from '../constants/scene-graph';

export type Vector3 = [number, number, number];

/**
 * Parent-relative pose. Rotation is XYZ Euler in degrees, composed as
 * Rz * Ry * Rx. Document convention is Z-up, Y-forward, X-right.
 */
export interface Transform {
  translate: Vector3;
  rotate: Vector3;
  scale: Vector3;
}

export interface SceneNode {
  name: string;
  /** Absent means identity */
  transform?: Transform;
  /** Relative to the Meshes/ folder */
  meshRef?: string;
  /** Relative to the Materials/ folder, index i binds mesh slot i */
  materialRefs: string[];
  children: SceneNode[];
}

/**
 * Fields accepted by {@link createSceneNode}
 */
export interface SceneNodeInit {
  name: string;
  transform?: Partial<Transform>;
  meshRef?: string;
  materialRefs?: string[];
  children?: SceneNode[];
}

export function identityTransform(): Transform {
  return {
    translate: [...IDENTITY_TRANSLATE],
    rotate: [...IDENTITY_ROTATE],
    scale: [...IDENTITY_SCALE],
  };
}

/**
 * Builds a transform, defaulting each missing component to identity
 */
export function createTransform(partial: Partial<Transform> = {}): Transform {
  return {
    translate: partial.translate ? [...partial.translate] : [...IDENTITY_TRANSLATE],
    rotate: partial.rotate ? [...partial.rotate] : [...IDENTITY_ROTATE],
    scale: partial.scale ? [...partial.scale] : [...IDENTITY_SCALE],
  };
}

export function createSceneNode(init: SceneNodeInit): SceneNode {
  const node: SceneNode = {
    name: init.name,
    materialRefs: init.materialRefs ? [...init.materialRefs] : [],
    children: init.children ? [...init.children] : [],
  };
  if (init.transform) {
    node.transform = createTransform(init.transform);
  }
  if (init.meshRef !== undefined) {
    node.meshRef = init.meshRef;
  }
  return node;
}

function arraysEqual<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

export function transformsEqual(a: Transform, b: Transform): boolean {
  return arraysEqual(a.translate, b.translate)
    && arraysEqual(a.rotate, b.rotate)
    && arraysEqual(a.scale, b.scale);
}

export function isIdentityTransform(transform: Transform | undefined): boolean {
  return transform === undefined || transformsEqual(transform, identityTransform());
}

/**
 * Structural tree equality. A missing transform equals identity.
 */
export function sceneNodesEqual(a: SceneNode, b: SceneNode): boolean {
  if (a.name !== b.name) return false;
  if (!transformsEqual(a.transform ?? identityTransform(), b.transform ?? identityTransform())) return false;
  if (a.meshRef !== b.meshRef) return false;
  if (!arraysEqual(a.materialRefs, b.materialRefs)) return false;
  if (a.children.length !== b.children.length) return false;
  return a.children.every((child, index) => sceneNodesEqual(child, b.children[index]));
}

/**
 * Depth-first pre-order visit. `depth` is 0 for the root.
 */
export function traverseSceneNodes(
  root: SceneNode,
  visit: (node: SceneNode, parent: SceneNode | null, depth: number) => void
): void {
  const walk = (node: SceneNode, parent: SceneNode | null, depth: number): void => {
    visit(node, parent, depth);
    for (const child of node.children) {
      walk(child, node, depth + 1);
    }
  };
  walk(root, null, 0);
}

export function countSceneNodes(root: SceneNode): number {
  let count = 0;
  traverseSceneNodes(root, () => {
    count++;
  });
  return count;
}

/**
 * Finds the first node with the given name, depth-first
 */
export function findSceneNode(root: SceneNode, name: string): SceneNode | undefined {
  if (root.name === name) return root;
  for (const child of root.children) {
    const found = findSceneNode(child, name);
    if (found) return found;
  }
  return undefined;
}
