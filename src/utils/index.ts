/**
 * Utilities
 */

export { Logger, LoggerFactory, LogLevel, createLogger, type LoggerOptions, type LoggerContext } from './logger';
export {
  isDirectory,
  isFile,
  pathExists,
  ensureDirectory,
  writeFileChecked,
  getBasenameWithoutExt,
  resolveContainedPath,
} from './file-utils';
export { normalizeNodeName, sanitizeAssetName, claimUniqueName, DEFAULT_NODE_NAME } from './name-utils';
export {
  Y_UP_TO_Z_UP,
  Y_UP_TO_Z_UP_MAT4,
  multiplyMatrix3,
  transposeMatrix3,
  transformVector3,
  quaternionToMatrix3,
  matrix3ToEulerDegrees,
  quaternionToEulerDegrees,
  eulerDegreesToQuaternion,
  localTrsToTransform,
  isUniformScale,
  type Matrix3,
  type Quaternion,
} from './matrix-utils';
