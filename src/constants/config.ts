/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  SOURCE_UP_AXIS: 'Y' as const,
  OVERWRITE_MESHES: true,
  OVERWRITE_MATERIALS: true,
  OVERWRITE_SCENE_GRAPH: true,
  UNRESOLVED_ASSET_POLICY: 'skip' as const,
  MAX_DEPTH: 512,
  INDENT: 4,
  SCENE_NAME: 'Scene',
} as const;

/**
 * File Extensions
 */
export const FILE_EXTENSIONS = {
  SCENE_GRAPH: '.sgr',
  GLB: '.glb',
  GLTF: '.gltf',
  MATERIAL: '.material',
} as const;

/**
 * Directory Names
 *
 * Fixed folders under a scene root. Mesh and material references inside a
 * document are relative to MESHES and MATERIALS respectively.
 */
export const DIRECTORY_NAMES = {
  TEXTURES: 'Textures',
  MATERIALS: 'Materials',
  MESHES: 'Meshes',
} as const;
