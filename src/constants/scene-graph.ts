/**
 * SceneGraph Document Constants
 */

/**
 * Identity pose components
 */
export const IDENTITY_TRANSLATE = [0, 0, 0] as const;
export const IDENTITY_ROTATE = [0, 0, 0] as const;
export const IDENTITY_SCALE = [1, 1, 1] as const;

/**
 * Placeholder written into `materials` for an unbound slot that precedes a bound one
 */
export const UNBOUND_MATERIAL_SLOT = '';

/**
 * Tolerance used when deciding whether a scale is uniform
 */
export const UNIFORM_SCALE_TOLERANCE = 0.01;

/**
 * Engine material file constants
 */
export const MATERIAL_FILE = {
  MATERIAL_TYPE: '@gemroot:Atom_Feature_Common@/Assets/Materials/Types/StandardPBR.materialtype',
  MATERIAL_TYPE_VERSION: 5,
  OPAQUE_ALPHA_THRESHOLD: 0.98,
  OPACITY_MODE_OPAQUE: 'Opaque',
  OPACITY_MODE_BLENDED: 'Blended',
} as const;
