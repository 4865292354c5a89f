/**
 * Custom Error Classes for SceneGraph Operations
 *
 * Tagged union error hierarchy with Zod validation details where available.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base SceneGraph Error Class
 */
export abstract class BaseSceneGraphError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Schema Error
 *
 * Malformed document on decode, or a tree that cannot be encoded.
 * `path` is the JSON path of the offending value, e.g. `children.1.transform.scale`.
 */
export class SchemaError extends BaseSceneGraphError {
  readonly _tag = 'SchemaError' as const;
  readonly code = ERROR_CODES.SCHEMA_ERROR;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, zodError });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Kind of asset a node references
 */
export type AssetKind = 'mesh' | 'material';

/**
 * Unresolved Asset Error
 *
 * A mesh or material reference that does not resolve to an existing asset.
 */
export class UnresolvedAssetError extends BaseSceneGraphError {
  readonly _tag = 'UnresolvedAssetError' as const;
  readonly code = ERROR_CODES.UNRESOLVED_ASSET_ERROR;
  readonly nodeName: string;
  readonly assetKind: AssetKind;
  readonly assetRef: string;
  readonly slotIndex?: number;

  constructor(message: string, nodeName: string, assetKind: AssetKind, assetRef: string, slotIndex?: number) {
    super(message, { nodeName, assetKind, assetRef, slotIndex });
    this.nodeName = nodeName;
    this.assetKind = assetKind;
    this.assetRef = assetRef;
    this.slotIndex = slotIndex;
  }
}

/**
 * SceneGraph IO Error
 *
 * Filesystem failure while reading or writing a document or an asset.
 */
export class SceneGraphIoError extends BaseSceneGraphError {
  readonly _tag = 'SceneGraphIoError' as const;
  readonly code = ERROR_CODES.IO_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * SceneGraph Configuration Error
 */
export class SceneGraphConfigError extends BaseSceneGraphError {
  readonly _tag = 'SceneGraphConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * SceneGraph Export Error
 */
export class SceneGraphExportError extends BaseSceneGraphError {
  readonly _tag = 'SceneGraphExportError' as const;
  readonly code = ERROR_CODES.EXPORT_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * SceneGraph Import Error
 */
export class SceneGraphImportError extends BaseSceneGraphError {
  readonly _tag = 'SceneGraphImportError' as const;
  readonly code = ERROR_CODES.IMPORT_ERROR;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * Union type for all SceneGraph errors
 */
export type SceneGraphError =
  | SchemaError
  | UnresolvedAssetError
  | SceneGraphIoError
  | SceneGraphConfigError
  | SceneGraphExportError
  | SceneGraphImportError;

/**
 * Error factory functions
 */
export const SceneGraphErrorFactory = {
  schemaError(message: string, path: string, zodError?: ZodError): SchemaError {
    return new SchemaError(message, path, zodError);
  },

  unresolvedAsset(message: string, nodeName: string, assetKind: AssetKind, assetRef: string, slotIndex?: number): UnresolvedAssetError {
    return new UnresolvedAssetError(message, nodeName, assetKind, assetRef, slotIndex);
  },

  ioError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): SceneGraphIoError {
    return new SceneGraphIoError(message, filePath, operation, context);
  },

  configError(message: string, configKey: string, context?: Record<string, unknown>): SceneGraphConfigError {
    return new SceneGraphConfigError(message, configKey, context);
  },

  exportError(message: string, stage: string, context?: Record<string, unknown>): SceneGraphExportError {
    return new SceneGraphExportError(message, stage, context);
  },

  importError(message: string, stage: string, context?: Record<string, unknown>): SceneGraphImportError {
    return new SceneGraphImportError(message, stage, context);
  },
};

/**
 * Narrow an unknown value to a SceneGraph error
 */
export function isSceneGraphError(error: unknown): error is SceneGraphError {
  return error instanceof BaseSceneGraphError;
}
