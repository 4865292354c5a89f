/**
 * Error Constants for the SceneGraph interchange library
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  SCHEMA_ERROR: 'SGR_SCHEMA_ERROR',
  UNRESOLVED_ASSET_ERROR: 'SGR_UNRESOLVED_ASSET_ERROR',
  IO_ERROR: 'SGR_IO_ERROR',
  CONFIG_VALIDATION_ERROR: 'SGR_CONFIG_VALIDATION_ERROR',
  EXPORT_ERROR: 'SGR_EXPORT_ERROR',
  IMPORT_ERROR: 'SGR_IMPORT_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  INVALID_JSON: 'SceneGraph document is not valid JSON',
  INVALID_NODE: 'SceneGraph node does not match the document schema',
  DUPLICATE_SIBLING: 'Sibling nodes must have unique names',
  MAX_DEPTH_EXCEEDED: 'SceneGraph nesting exceeds the maximum depth',
  EMPTY_NAME: 'Node name cannot be empty',
  EMPTY_MESH_REF: 'Mesh reference cannot be empty',
  NON_FINITE_NUMBER: 'Transform values must be finite numbers',
  MESH_NOT_FOUND: 'Mesh asset could not be resolved',
  MATERIAL_NOT_FOUND: 'Material asset could not be resolved',
  READ_FAILED: 'Failed to read file',
  WRITE_FAILED: 'Failed to write file',
  MKDIR_FAILED: 'Failed to create directory',
  NO_SCENES: 'glTF document has no scenes',
  UNSUPPORTED_INPUT: 'Unsupported input format',
  SYSTEM_INACTIVE: 'Scene import system is not active',
} as const;
