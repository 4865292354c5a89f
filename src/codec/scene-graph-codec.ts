/**
 * SceneGraph Document Codec
 *
 * Maps an in-memory SceneNode tree to the .sgr JSON document and back.
 * decode(encode(tree)) is tree-equal to the input, not byte-identical to any
 * document it was read from.
 */

import { ZodError } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { SceneGraphErrorFactory } from '../errors';
import { createTransform, isIdentityTransform, SceneNode, Transform, Vector3 } from '../core/scene-node';
import { NodeDocumentShallowSchema, SceneGraphDocumentNode, Vector3Schema } from '../schemas';

/**
 * Codec Options
 */
export interface CodecOptions {
  /** Maximum nesting depth, the root counts as one level */
  maxDepth?: number;
}

/**
 * Text serialization options
 */
export interface SerializeOptions extends CodecOptions {
  /** JSON indentation, 0 writes a single line */
  indent?: number;
}

const ROOT_PATH = '$';

function joinPath(base: string, segments: ReadonlyArray<string | number>): string {
  return segments.length === 0 ? base : `${base}.${segments.join('.')}`;
}

function firstIssuePath(base: string, error: ZodError): string {
  const issue = error.issues[0];
  return issue ? joinPath(base, issue.path) : base;
}

function assertDepth(depth: number, maxDepth: number, path: string): void {
  if (depth >= maxDepth) {
    throw SceneGraphErrorFactory.schemaError(
      `${ERROR_MESSAGES.MAX_DEPTH_EXCEEDED} (${maxDepth})`,
      path
    );
  }
}

function assertUniqueSiblings(children: readonly SceneNode[], path: string): void {
  const seen = new Set<string>();
  children.forEach((child, index) => {
    if (seen.has(child.name)) {
      throw SceneGraphErrorFactory.schemaError(
        `${ERROR_MESSAGES.DUPLICATE_SIBLING}: '${child.name}'`,
        joinPath(path, ['children', index, 'name'])
      );
    }
    seen.add(child.name);
  });
}

/**
 * Encode a tree into a document node. Identity transforms, absent meshes and
 * empty lists are omitted.
 */
export function encodeSceneGraph(root: SceneNode, options: CodecOptions = {}): SceneGraphDocumentNode {
  const maxDepth = options.maxDepth ?? DEFAULT_CONFIG.MAX_DEPTH;
  return encodeNode(root, ROOT_PATH, 0, maxDepth);
}

function encodeVector(vector: Vector3, path: string): [number, number, number] {
  const result = Vector3Schema.safeParse(vector);
  if (!result.success) {
    throw SceneGraphErrorFactory.schemaError(ERROR_MESSAGES.NON_FINITE_NUMBER, path, result.error);
  }
  return [result.data[0], result.data[1], result.data[2]];
}

function encodeTransform(transform: Transform, path: string): NonNullable<SceneGraphDocumentNode['transform']> {
  return {
    translate: encodeVector(transform.translate, `${path}.translate`),
    rotate: encodeVector(transform.rotate, `${path}.rotate`),
    scale: encodeVector(transform.scale, `${path}.scale`),
  };
}

function encodeNode(node: SceneNode, path: string, depth: number, maxDepth: number): SceneGraphDocumentNode {
  assertDepth(depth, maxDepth, path);

  if (node.name.length === 0) {
    throw SceneGraphErrorFactory.schemaError(ERROR_MESSAGES.EMPTY_NAME, `${path}.name`);
  }

  const document: SceneGraphDocumentNode = { name: node.name };

  if (node.transform && !isIdentityTransform(node.transform)) {
    document.transform = encodeTransform(node.transform, `${path}.transform`);
  }

  if (node.meshRef !== undefined) {
    if (node.meshRef.length === 0) {
      throw SceneGraphErrorFactory.schemaError(ERROR_MESSAGES.EMPTY_MESH_REF, `${path}.mesh`);
    }
    document.mesh = node.meshRef;
  }

  if (node.materialRefs.length > 0) {
    document.materials = [...node.materialRefs];
  }

  if (node.children.length > 0) {
    assertUniqueSiblings(node.children, path);
    document.children = node.children.map((child, index) =>
      encodeNode(child, joinPath(path, ['children', index]), depth + 1, maxDepth)
    );
  }

  return document;
}

/**
 * Decode a parsed JSON value into a tree, applying every default.
 * Throws SchemaError on the first malformed node; no partial tree is returned.
 */
export function decodeSceneGraph(document: unknown, options: CodecOptions = {}): SceneNode {
  const maxDepth = options.maxDepth ?? DEFAULT_CONFIG.MAX_DEPTH;
  return decodeNode(document, ROOT_PATH, 0, maxDepth);
}

function decodeNode(value: unknown, path: string, depth: number, maxDepth: number): SceneNode {
  assertDepth(depth, maxDepth, path);

  const result = NodeDocumentShallowSchema.safeParse(value);
  if (!result.success) {
    const issuePath = firstIssuePath(path, result.error);
    const detail = result.error.issues[0]?.message;
    throw SceneGraphErrorFactory.schemaError(
      detail ? `${ERROR_MESSAGES.INVALID_NODE} at ${issuePath}: ${detail}` : ERROR_MESSAGES.INVALID_NODE,
      issuePath,
      result.error
    );
  }

  const parsed = result.data;
  const node: SceneNode = {
    name: parsed.name,
    transform: createTransform(parsed.transform ?? {}),
    materialRefs: parsed.materials ?? [],
    children: (parsed.children ?? []).map((child, index) =>
      decodeNode(child, joinPath(path, ['children', index]), depth + 1, maxDepth)
    ),
  };

  if (parsed.mesh !== undefined) {
    node.meshRef = parsed.mesh;
  }

  assertUniqueSiblings(node.children, path);
  return node;
}

/**
 * Encode and stringify a tree
 */
export function serializeSceneGraph(root: SceneNode, options: SerializeOptions = {}): string {
  const indent = options.indent ?? DEFAULT_CONFIG.INDENT;
  return JSON.stringify(encodeSceneGraph(root, options), null, indent);
}

/**
 * Parse document text and decode it
 */
export function parseSceneGraph(text: string, options: CodecOptions = {}): SceneNode {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw SceneGraphErrorFactory.schemaError(
      `${ERROR_MESSAGES.INVALID_JSON}: ${error instanceof Error ? error.message : String(error)}`,
      ROOT_PATH
    );
  }
  return decodeSceneGraph(document, options);
}
