import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Document } from '@gltf-transform/core';
import {
  GltfMeshAssetExporter,
  MaterialAssetExporter,
  buildEngineMaterial,
} from '../../src/exporter/asset-exporters';
import { createNodeIO } from '../../src/exporter/gltf-reader';
import { createTempDir, createTriangleMesh, removeTempDir, silentLogger } from '../helpers/fakes';

const MATERIAL_TYPE = '@gemroot:Atom_Feature_Common@/Assets/Materials/Types/StandardPBR.materialtype';

function expectVectorClose(actual: readonly number[], expected: readonly number[]): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, index) => {
    expect(actual[index]).toBeCloseTo(value, 6);
  });
}

let tempDir: string;

beforeEach(() => {
  tempDir = createTempDir();
});

afterEach(() => {
  removeTempDir(tempDir);
});

// ---- Meshes ----------------------------------------------------------------

describe('GltfMeshAssetExporter', () => {
  it('registers each mesh once under a sanitized unique name', () => {
    const document = new Document();
    const first = document.createMesh('Cube.001');
    const second = document.createMesh('Cube.001');
    const unnamed = document.createMesh();
    const exporter = new GltfMeshAssetExporter(document, 'Y', silentLogger());

    expect(exporter.exportMesh(first)).toBe('Cube_001.glb');
    expect(exporter.exportMesh(first)).toBe('Cube_001.glb');
    expect(exporter.exportMesh(second)).toBe('Cube_001_1.glb');
    expect(exporter.exportMesh(unnamed)).toBe('Mesh_2.glb');
    expect(exporter.listAssets().map(asset => asset.path)).toEqual(['Cube_001.glb', 'Cube_001_1.glb', 'Mesh_2.glb']);
  });

  it('keeps file names distinct when mesh names differ only in case', () => {
    const document = new Document();
    const exporter = new GltfMeshAssetExporter(document, 'Y', silentLogger());

    expect(exporter.exportMesh(document.createMesh('Box'))).toBe('Box.glb');
    expect(exporter.exportMesh(document.createMesh('box'))).toBe('box_1.glb');
    expect(exporter.exportMesh(document.createMesh('BOX'))).toBe('BOX_2.glb');
  });

  it('writes a standalone GLB with geometry converted to Z-up', async () => {
    const document = new Document();
    const mesh = createTriangleMesh(document, 'Triangle');
    document.createScene('Room').addChild(document.createNode('Holder').setMesh(mesh));
    const exporter = new GltfMeshAssetExporter(document, 'Y', silentLogger());
    exporter.exportMesh(mesh);

    const result = await exporter.writeAll(tempDir, true);

    expect(result).toEqual({ written: ['Triangle.glb'], skipped: [] });
    const written = await createNodeIO().read(path.join(tempDir, 'Triangle.glb'));
    const root = written.getRoot();
    expect(root.listMeshes()).toHaveLength(1);
    expect(root.listNodes().map(node => node.getName())).toEqual(['Triangle']);
    const position = root.listMeshes()[0]?.listPrimitives()[0]?.getAttribute('POSITION');
    expectVectorClose(position?.getElement(1, []) ?? [], [-1, 0, 0]);
    expectVectorClose(position?.getElement(2, []) ?? [], [0, 0, 1]);

    const source = mesh.listPrimitives()[0]?.getAttribute('POSITION');
    expect(source?.getElement(1, [])).toEqual([1, 0, 0]);
  });

  it('keeps source vertices for Z-up input', async () => {
    const document = new Document();
    const mesh = createTriangleMesh(document, 'Triangle');
    const exporter = new GltfMeshAssetExporter(document, 'Z', silentLogger());
    exporter.exportMesh(mesh);

    await exporter.writeAll(tempDir, true);

    const written = await createNodeIO().read(path.join(tempDir, 'Triangle.glb'));
    const position = written.getRoot().listMeshes()[0]?.listPrimitives()[0]?.getAttribute('POSITION');
    expectVectorClose(position?.getElement(2, []) ?? [], [0, 1, 0]);
  });

  it('skips existing files unless overwrite is on', async () => {
    const document = new Document();
    const mesh = createTriangleMesh(document, 'Triangle');
    const exporter = new GltfMeshAssetExporter(document, 'Y', silentLogger());
    exporter.exportMesh(mesh);
    const outputPath = path.join(tempDir, 'Triangle.glb');
    fs.writeFileSync(outputPath, 'placeholder');

    expect(await exporter.writeAll(tempDir, false)).toEqual({ written: [], skipped: ['Triangle.glb'] });
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('placeholder');

    expect(await exporter.writeAll(tempDir, true)).toEqual({ written: ['Triangle.glb'], skipped: [] });
    expect(fs.readFileSync(outputPath, 'utf8')).not.toBe('placeholder');
  });
});

// ---- Materials -------------------------------------------------------------

describe('buildEngineMaterial', () => {
  it('maps the scalar PBR factors', () => {
    const document = new Document();
    const material = document
      .createMaterial('Steel')
      .setBaseColorFactor([0.5, 0.25, 1, 1])
      .setMetallicFactor(0.8)
      .setRoughnessFactor(0.3);

    expect(buildEngineMaterial(material)).toEqual({
      materialType: MATERIAL_TYPE,
      materialTypeVersion: 5,
      propertyValues: {
        'baseColor.color': [0.5, 0.25, 1],
        'metallic.factor': 0.8,
        'roughness.factor': 0.3,
        'opacity.factor': 1,
        'opacity.mode': 'Opaque',
      },
    });
  });

  it.each<['OPAQUE' | 'MASK' | 'BLEND', number, string]>([
    ['OPAQUE', 0.5, 'Opaque'],
    ['MASK', 0.99, 'Opaque'],
    ['MASK', 0.5, 'Blended'],
    ['BLEND', 1, 'Blended'],
  ])('alpha mode %s with alpha %d is %s', (alphaMode, alpha, expected) => {
    const document = new Document();
    const material = document.createMaterial('Glass').setAlphaMode(alphaMode).setBaseColorFactor([1, 1, 1, alpha]);
    expect(buildEngineMaterial(material).propertyValues['opacity.mode']).toBe(expected);
  });
});

describe('MaterialAssetExporter', () => {
  it('writes one JSON file per registered material', async () => {
    const document = new Document();
    const steel = document.createMaterial('Brushed.Steel').setMetallicFactor(1).setRoughnessFactor(0.4);
    const unnamed = document.createMaterial();
    const exporter = new MaterialAssetExporter(document, 2, silentLogger());

    expect(exporter.exportMaterial(steel)).toBe('Brushed_Steel.material');
    expect(exporter.exportMaterial(unnamed)).toBe('Material_1.material');
    expect(exporter.exportMaterial(document.createMaterial('brushed.steel'))).toBe('brushed_steel_1.material');

    const result = await exporter.writeAll(tempDir, true);

    expect(result.written).toEqual(['Brushed_Steel.material', 'Material_1.material', 'brushed_steel_1.material']);
    const text = fs.readFileSync(path.join(tempDir, 'Brushed_Steel.material'), 'utf8');
    expect(text.startsWith('{\n  "materialType": ')).toBe(true);
    expect(JSON.parse(text)).toEqual({
      materialType: MATERIAL_TYPE,
      materialTypeVersion: 5,
      propertyValues: {
        'baseColor.color': [1, 1, 1],
        'metallic.factor': 1,
        'roughness.factor': 0.4,
        'opacity.factor': 1,
        'opacity.mode': 'Opaque',
      },
    });
  });

  it('skips existing files unless overwrite is on', async () => {
    const document = new Document();
    const exporter = new MaterialAssetExporter(document, 4, silentLogger());
    exporter.exportMaterial(document.createMaterial('Oak'));
    const outputPath = path.join(tempDir, 'Oak.material');
    fs.writeFileSync(outputPath, 'keep');

    expect(await exporter.writeAll(tempDir, false)).toEqual({ written: [], skipped: ['Oak.material'] });
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('keep');
  });
});
