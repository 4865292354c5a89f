import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SceneLayout } from '../../src/core/scene-layout';
import { FileSystemAssetResolver } from '../../src/importer/file-system-asset-resolver';
import { SceneGraphConfigError } from '../../src/errors';
import { resolveContainedPath } from '../../src/utils/file-utils';
import { claimUniqueName, normalizeNodeName, sanitizeAssetName } from '../../src/utils/name-utils';
import { createTempDir, removeTempDir } from '../helpers/fakes';

let tempDir: string;

beforeEach(() => {
  tempDir = createTempDir();
});

afterEach(() => {
  removeTempDir(tempDir);
});

describe('SceneLayout', () => {
  it('places the document and asset folders under the scene root', () => {
    const layout = new SceneLayout(tempDir, 'Kitchen');
    expect(layout.getSceneGraphPath()).toBe(path.join(tempDir, 'Kitchen.sgr'));
    expect(layout.getTexturesDir()).toBe(path.join(tempDir, 'Textures'));
    expect(layout.getMaterialsDir()).toBe(path.join(tempDir, 'Materials'));
    expect(layout.getMeshesDir()).toBe(path.join(tempDir, 'Meshes'));
  });

  it('creates missing folders once', () => {
    const sceneRoot = path.join(tempDir, 'Kitchen');
    const layout = new SceneLayout(sceneRoot, 'Kitchen');

    expect(layout.createDirectories()).toEqual([
      sceneRoot,
      path.join(sceneRoot, 'Textures'),
      path.join(sceneRoot, 'Materials'),
      path.join(sceneRoot, 'Meshes'),
    ]);
    expect(fs.statSync(layout.getMeshesDir()).isDirectory()).toBe(true);
    expect(layout.createDirectories()).toEqual([]);
  });

  it.each(['', 'a/b', 'a\\b'])('rejects scene name %j', sceneName => {
    try {
      new SceneLayout(tempDir, sceneName);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SceneGraphConfigError);
      if (error instanceof SceneGraphConfigError) {
        expect(error.configKey).toBe('sceneName');
      }
    }
  });

  it('resolves references inside the asset folders only', () => {
    const layout = new SceneLayout(tempDir, 'Kitchen');
    expect(layout.resolveMeshPath('props/Cup.glb')).toBe(path.join(tempDir, 'Meshes', 'props', 'Cup.glb'));
    expect(layout.resolveMaterialPath('Oak.material')).toBe(path.join(tempDir, 'Materials', 'Oak.material'));
    expect(layout.resolveMeshPath('../Materials/Oak.material')).toBeNull();
  });
});

describe('resolveContainedPath', () => {
  const base = path.resolve('/scenes/Kitchen/Meshes');

  it('joins relative references', () => {
    expect(resolveContainedPath(base, 'Cup.glb')).toBe(path.join(base, 'Cup.glb'));
    expect(resolveContainedPath(base, 'props\\Cup.glb')).toBe(path.join(base, 'props', 'Cup.glb'));
  });

  it('accepts file names that start with two dots', () => {
    expect(resolveContainedPath(base, '..hidden.glb')).toBe(path.join(base, '..hidden.glb'));
    expect(resolveContainedPath(base, 'props/..Cup.glb')).toBe(path.join(base, 'props', '..Cup.glb'));
  });

  it.each(['', '.', '../Cup.glb', 'props/../../Cup.glb', '/etc/Cup.glb', 'C:\\Cup.glb'])(
    'rejects %j',
    reference => {
      expect(resolveContainedPath(base, reference)).toBeNull();
    }
  );
});

describe('FileSystemAssetResolver', () => {
  it('returns absolute paths of existing assets only', () => {
    const layout = new SceneLayout(tempDir, 'Kitchen');
    layout.createDirectories();
    fs.writeFileSync(path.join(layout.getMeshesDir(), 'Cup.glb'), 'glb');
    fs.writeFileSync(path.join(layout.getMaterialsDir(), 'Oak.material'), '{}');
    const resolver = new FileSystemAssetResolver(layout);

    expect(resolver.resolveMesh('Cup.glb')).toBe(path.join(tempDir, 'Meshes', 'Cup.glb'));
    expect(resolver.resolveMaterial('Oak.material')).toBe(path.join(tempDir, 'Materials', 'Oak.material'));
    expect(resolver.resolveMesh('Plate.glb')).toBeNull();
    expect(resolver.resolveMaterial('../Meshes/Cup.glb')).toBeNull();
  });

  it('does not resolve a folder as an asset', () => {
    const layout = new SceneLayout(tempDir, 'Kitchen');
    layout.createDirectories();
    fs.mkdirSync(path.join(layout.getMeshesDir(), 'props'));
    expect(new FileSystemAssetResolver(layout).resolveMesh('props')).toBeNull();
  });

  it('resolves an asset whose name starts with two dots', () => {
    const layout = new SceneLayout(tempDir, 'Kitchen');
    layout.createDirectories();
    fs.writeFileSync(path.join(layout.getMeshesDir(), '..hidden.glb'), 'glb');
    expect(new FileSystemAssetResolver(layout).resolveMesh('..hidden.glb')).toBe(path.join(tempDir, 'Meshes', '..hidden.glb'));
  });
});

describe('naming rules', () => {
  it('sanitizes asset file stems', () => {
    expect(sanitizeAssetName('Cube.001', 'Mesh_0')).toBe('Cube_001');
    expect(sanitizeAssetName(' Table Top/Left ', 'Mesh_0')).toBe('Table_Top_Left');
    expect(sanitizeAssetName('...', 'Mesh_3')).toBe('Mesh_3');
  });

  it('claims unique names in order', () => {
    const taken = new Set<string>();
    expect(['A', 'A', 'B', 'A'].map(name => claimUniqueName(name, taken))).toEqual(['A', 'A_1', 'B', 'A_2']);
  });

  it('defaults empty node names', () => {
    expect(normalizeNodeName('  ')).toBe('Unnamed');
    expect(normalizeNodeName(' Chair ')).toBe('Chair');
  });
});
