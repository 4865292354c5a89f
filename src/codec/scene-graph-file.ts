/**
 * SceneGraph File I/O
 *
 * Reads and writes .sgr documents. Schema problems surface as SchemaError,
 * filesystem problems as SceneGraphIoError carrying the path.
 */

import * as fs from 'fs';
import { ERROR_MESSAGES } from '../constants/errors';
import { SceneGraphErrorFactory } from '../errors';
import { SceneNode } from '../core/scene-node';
import { CodecOptions, parseSceneGraph, serializeSceneGraph, SerializeOptions } from './scene-graph-codec';

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Serialize a tree and write it as UTF-8. Returns the number of bytes written.
 */
export function writeSceneGraphFile(filePath: string, root: SceneNode, options: SerializeOptions = {}): number {
  return writeSceneGraphText(filePath, serializeSceneGraph(root, options));
}

/**
 * Write already serialized document text as UTF-8
 */
export function writeSceneGraphText(filePath: string, text: string): number {
  try {
    fs.writeFileSync(filePath, text, 'utf8');
  } catch (error) {
    throw SceneGraphErrorFactory.ioError(
      `${ERROR_MESSAGES.WRITE_FAILED}: ${filePath}`,
      filePath,
      'write',
      { cause: describeCause(error) }
    );
  }
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Read and decode a .sgr document
 */
export function readSceneGraphFile(filePath: string, options: CodecOptions = {}): SceneNode {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw SceneGraphErrorFactory.ioError(
      `${ERROR_MESSAGES.READ_FAILED}: ${filePath}`,
      filePath,
      'read',
      { cause: describeCause(error) }
    );
  }
  return parseSceneGraph(text, options);
}
