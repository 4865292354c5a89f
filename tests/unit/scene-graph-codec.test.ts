/**
 * Tests for the .sgr document codec: encode omissions, decode defaults,
 * round trips and SchemaError paths.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeSceneGraph,
  encodeSceneGraph,
  parseSceneGraph,
  serializeSceneGraph,
} from '../../src/codec/scene-graph-codec';
import { createSceneNode, identityTransform, sceneNodesEqual, type SceneNode } from '../../src/core/scene-node';
import { SchemaError } from '../../src/errors';

function captureSchemaError(fn: () => unknown): SchemaError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchemaError) return error;
    throw error;
  }
  throw new Error('Expected a SchemaError');
}

function nestedDocument(depth: number): Record<string, unknown> {
  let node: Record<string, unknown> = { name: `n${depth - 1}` };
  for (let level = depth - 2; level >= 0; level--) {
    node = { name: `n${level}`, children: [node] };
  }
  return node;
}

// ---- Encode ----------------------------------------------------------------

describe('encodeSceneGraph', () => {
  it('emits only the name for a bare node', () => {
    const document = encodeSceneGraph(createSceneNode({ name: 'Empty' }));
    expect(Object.keys(document)).toEqual(['name']);
    expect(document.name).toBe('Empty');
  });

  it('omits an identity transform', () => {
    const document = encodeSceneGraph(createSceneNode({ name: 'Box', transform: {} }));
    expect(document.transform).toBeUndefined();
    expect(Object.keys(document)).toEqual(['name']);
  });

  it('emits all three transform components once any differs from identity', () => {
    const document = encodeSceneGraph(createSceneNode({ name: 'Box', transform: { scale: [2, 2, 2] } }));
    expect(document.transform).toEqual({
      translate: [0, 0, 0],
      rotate: [0, 0, 0],
      scale: [2, 2, 2],
    });
  });

  it('emits keys in document order', () => {
    const node = createSceneNode({
      name: 'Table',
      transform: { translate: [1, 0, 0] },
      meshRef: 'table.glb',
      materialRefs: ['oak.material'],
      children: [createSceneNode({ name: 'Leg' })],
    });
    expect(Object.keys(encodeSceneGraph(node))).toEqual(['name', 'transform', 'mesh', 'materials', 'children']);
  });

  it('keeps placeholder material slots in position', () => {
    const document = encodeSceneGraph(createSceneNode({ name: 'Box', meshRef: 'box.glb', materialRefs: ['', 'steel.material'] }));
    expect(document.materials).toEqual(['', 'steel.material']);
  });

  it('rejects duplicate sibling names', () => {
    const root = createSceneNode({
      name: 'Root',
      children: [createSceneNode({ name: 'Chair' }), createSceneNode({ name: 'Chair' })],
    });
    const error = captureSchemaError(() => encodeSceneGraph(root));
    expect(error.path).toBe('$.children.1.name');
  });

  it('rejects an empty node name with its path', () => {
    const root = createSceneNode({ name: 'Root', children: [createSceneNode({ name: '' })] });
    expect(captureSchemaError(() => encodeSceneGraph(root)).path).toBe('$.children.0.name');
  });

  it('rejects an empty mesh reference', () => {
    const error = captureSchemaError(() => encodeSceneGraph(createSceneNode({ name: 'Box', meshRef: '' })));
    expect(error.path).toBe('$.mesh');
  });

  it('rejects non-finite transform values', () => {
    const node = createSceneNode({ name: 'Box', transform: { translate: [Number.NaN, 0, 0] } });
    const error = captureSchemaError(() => encodeSceneGraph(node));
    expect(error.path).toBe('$.transform.translate');
    expect(error.message).toBe('Transform values must be finite numbers');

    const infinite = createSceneNode({ name: 'Box', transform: { scale: [1, Number.POSITIVE_INFINITY, 1] } });
    expect(captureSchemaError(() => encodeSceneGraph(infinite)).path).toBe('$.transform.scale');
  });

  it('enforces the maximum depth', () => {
    const root = createSceneNode({
      name: 'a',
      children: [createSceneNode({ name: 'b', children: [createSceneNode({ name: 'c' })] })],
    });
    expect(captureSchemaError(() => encodeSceneGraph(root, { maxDepth: 2 })).path).toBe('$.children.0.children.0');
    expect(encodeSceneGraph(root, { maxDepth: 3 }).name).toBe('a');
  });
});

// ---- Decode ----------------------------------------------------------------

describe('decodeSceneGraph', () => {
  it('defaults an absent transform to identity', () => {
    const node = decodeSceneGraph({ name: 'Box' });
    expect(node.transform).toEqual({ translate: [0, 0, 0], rotate: [0, 0, 0], scale: [1, 1, 1] });
    expect(node.materialRefs).toEqual([]);
    expect(node.children).toEqual([]);
    expect(node.meshRef).toBeUndefined();
  });

  it('decodes a single mesh node with one material slot', () => {
    const node = decodeSceneGraph({ name: 'Box', mesh: 'box.fbx', materials: ['metallic.material'] });
    expect(node).toEqual({
      name: 'Box',
      transform: identityTransform(),
      meshRef: 'box.fbx',
      materialRefs: ['metallic.material'],
      children: [],
    });
  });

  it('keeps child order and parent-relative transforms', () => {
    const root = decodeSceneGraph({
      name: 'Box',
      children: [
        { name: 'LeftBox', transform: { translate: [-0.5, 0, 0], rotate: [0, 0, 0], scale: [0.5, 0.5, 0.5] } },
        { name: 'RightBox', transform: { translate: [1, 0, 0], rotate: [0, 0, 0], scale: [1, 1, 1] } },
      ],
    });

    expect(root.children.map(child => child.name)).toEqual(['LeftBox', 'RightBox']);
    expect(root.children[0]?.transform).toEqual({ translate: [-0.5, 0, 0], rotate: [0, 0, 0], scale: [0.5, 0.5, 0.5] });
    expect(root.children[1]?.transform).toEqual({ translate: [1, 0, 0], rotate: [0, 0, 0], scale: [1, 1, 1] });
    expect(root.children[0]?.children).toEqual([]);
  });

  it('defaults each transform component independently', () => {
    const node = decodeSceneGraph({ name: 'Lamp', transform: { rotate: [0, 0, 90] } });
    expect(node.transform).toEqual({ translate: [0, 0, 0], rotate: [0, 0, 90], scale: [1, 1, 1] });
  });

  it('treats an empty children array like an absent one', () => {
    expect(decodeSceneGraph({ name: 'A', children: [] })).toEqual(decodeSceneGraph({ name: 'A' }));
  });

  it('fails with SchemaError when name is missing', () => {
    const error = captureSchemaError(() => decodeSceneGraph({ mesh: 'box.glb' }));
    expect(error).toBeInstanceOf(SchemaError);
    expect(error.path).toBe('$.name');
    expect(error.code).toBe('SGR_SCHEMA_ERROR');
    expect(error.getValidationIssues()).toHaveLength(1);
  });

  it('fails when the document is not an object', () => {
    expect(captureSchemaError(() => decodeSceneGraph('Box')).path).toBe('$');
    expect(captureSchemaError(() => decodeSceneGraph(null)).path).toBe('$');
  });

  it.each([
    [{ name: 7 }, '$.name'],
    [{ name: '' }, '$.name'],
    [{ name: 'A', mesh: 5 }, '$.mesh'],
    [{ name: 'A', mesh: null }, '$.mesh'],
    [{ name: 'A', materials: 'steel.material' }, '$.materials'],
    [{ name: 'A', materials: [1] }, '$.materials.0'],
    [{ name: 'A', transform: [0, 0, 0] }, '$.transform'],
    [{ name: 'A', transform: { translate: [1, 2] } }, '$.transform.translate'],
    [{ name: 'A', transform: { scale: [1, '2', 3] } }, '$.transform.scale.1'],
    [{ name: 'A', children: {} }, '$.children'],
    [{ name: 'A', children: [5] }, '$.children.0'],
    [{ name: 'A', children: [{ name: 'B' }, { mesh: 'x.glb' }] }, '$.children.1.name'],
  ])('rejects %j at %s', (document, expectedPath) => {
    expect(captureSchemaError(() => decodeSceneGraph(document)).path).toBe(expectedPath);
  });

  it('rejects duplicate sibling names', () => {
    const error = captureSchemaError(() => decodeSceneGraph({ name: 'R', children: [{ name: 'A' }, { name: 'A' }] }));
    expect(error.path).toBe('$.children.1.name');
  });

  it('bounds the nesting depth', () => {
    expect(captureSchemaError(() => decodeSceneGraph(nestedDocument(3), { maxDepth: 2 })).path)
      .toBe('$.children.0.children.0');
    expect(decodeSceneGraph(nestedDocument(3), { maxDepth: 3 }).children[0]?.children[0]?.name).toBe('n2');
    expect(captureSchemaError(() => decodeSceneGraph(nestedDocument(600))).message)
      .toBe('SceneGraph nesting exceeds the maximum depth (512)');
  });
});

// ---- Round trip --------------------------------------------------------------

describe('SceneGraph round trip', () => {
  const tree: SceneNode = createSceneNode({
    name: 'Kitchen',
    children: [
      createSceneNode({
        name: 'Table',
        transform: { translate: [0.1, 2.5, -3], rotate: [0, 0, 45], scale: [1, 1, 0.75] },
        meshRef: 'Table.glb',
        materialRefs: ['Oak.material', '', 'Steel.material'],
        children: [
          createSceneNode({ name: 'Cup', meshRef: 'Cup.glb', transform: { translate: [0, 0, 0.8] } }),
          createSceneNode({ name: 'Plate' }),
        ],
      }),
      createSceneNode({ name: 'Lamp', transform: { rotate: [-90, 12.5, 180] } }),
    ],
  });

  it('decode(encode(tree)) is tree-equal to the tree', () => {
    expect(sceneNodesEqual(decodeSceneGraph(encodeSceneGraph(tree)), tree)).toBe(true);
  });

  it('survives serialization to text', () => {
    expect(sceneNodesEqual(parseSceneGraph(serializeSceneGraph(tree)), tree)).toBe(true);
    expect(sceneNodesEqual(parseSceneGraph(serializeSceneGraph(tree, { indent: 0 })), tree)).toBe(true);
  });

  it('re-encodes a decoded identity transform without the transform key', () => {
    const decoded = decodeSceneGraph({ name: 'Box', transform: { translate: [0, 0, 0], rotate: [0, 0, 0], scale: [1, 1, 1] } });
    expect(encodeSceneGraph(decoded)).toEqual({ name: 'Box' });
  });
});

// ---- Text ------------------------------------------------------------------

describe('serializeSceneGraph / parseSceneGraph', () => {
  it('indents with four spaces by default', () => {
    expect(serializeSceneGraph(createSceneNode({ name: 'A' }))).toBe('{\n    "name": "A"\n}');
  });

  it('writes a single line with indent 0', () => {
    const node = createSceneNode({ name: 'A', meshRef: 'a.glb' });
    expect(serializeSceneGraph(node, { indent: 0 })).toBe('{"name":"A","mesh":"a.glb"}');
  });

  it('reports invalid JSON as a SchemaError at the root', () => {
    const error = captureSchemaError(() => parseSceneGraph('{"name": '));
    expect(error.path).toBe('$');
    expect(error.message.startsWith('SceneGraph document is not valid JSON: ')).toBe(true);
  });
});
