/**
 * Scene Layout
 *
 * Fixed folder convention around a scene root:
 *
 * ```
 * <SceneRoot>/<SceneName>.sgr
 * <SceneRoot>/Textures/
 * <SceneRoot>/Materials/
 * <SceneRoot>/Meshes/
 * ```
 */

import * as path from 'path';
import { DIRECTORY_NAMES, FILE_EXTENSIONS } from '../constants/config';
import { SceneNameSchema } from '../schemas';
import { SceneGraphErrorFactory } from '../errors';
import { ensureDirectory, resolveContainedPath } from '../utils/file-utils';

export class SceneLayout {
  readonly sceneRoot: string;
  readonly sceneName: string;

  constructor(sceneRoot: string, sceneName: string) {
    const parsed = SceneNameSchema.safeParse(sceneName);
    if (!parsed.success) {
      throw SceneGraphErrorFactory.configError(
        parsed.error.issues[0]?.message ?? 'Invalid scene name',
        'sceneName',
        { zodError: parsed.error }
      );
    }
    this.sceneRoot = path.resolve(sceneRoot);
    this.sceneName = parsed.data;
  }

  getSceneGraphPath(): string {
    return path.join(this.sceneRoot, `${this.sceneName}${FILE_EXTENSIONS.SCENE_GRAPH}`);
  }

  getTexturesDir(): string {
    return path.join(this.sceneRoot, DIRECTORY_NAMES.TEXTURES);
  }

  getMaterialsDir(): string {
    return path.join(this.sceneRoot, DIRECTORY_NAMES.MATERIALS);
  }

  getMeshesDir(): string {
    return path.join(this.sceneRoot, DIRECTORY_NAMES.MESHES);
  }

  /**
   * Creates the scene root and its asset folders. Returns the folders that
   * did not exist before.
   */
  createDirectories(): string[] {
    return [this.sceneRoot, this.getTexturesDir(), this.getMaterialsDir(), this.getMeshesDir()]
      .filter(dir => ensureDirectory(dir));
  }

  /**
   * Absolute path of a mesh reference, or null if it escapes Meshes/
   */
  resolveMeshPath(meshRef: string): string | null {
    return resolveContainedPath(this.getMeshesDir(), meshRef);
  }

  /**
   * Absolute path of a material reference, or null if it escapes Materials/
   */
  resolveMaterialPath(materialRef: string): string | null {
    return resolveContainedPath(this.getMaterialsDir(), materialRef);
  }
}
