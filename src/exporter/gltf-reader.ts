/**
 * glTF Reader
 *
 * Factory pattern for selecting the parser that loads the source scene.
 */

import * as path from 'path';
import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { FILE_EXTENSIONS } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { SceneGraphErrorFactory } from '../errors';
import { isFile } from '../utils/file-utils';

/**
 * Source scene input: a .glb/.gltf path, GLB bytes, or a loaded document
 */
export type SceneInput = string | ArrayBuffer | Uint8Array | Document;

/**
 * Parser interface
 */
export interface IGltfParser {
  parse(input: string | Uint8Array): Promise<Document>;
  getType(): string;
}

/**
 * Creates the NodeIO used for every read and write, with all official extensions
 */
export function createNodeIO(): NodeIO {
  return new NodeIO().registerExtensions(ALL_EXTENSIONS);
}

/**
 * GLB Parser - binary GLB bytes
 */
class GlbParser implements IGltfParser {
  private io = createNodeIO();

  async parse(input: string | Uint8Array): Promise<Document> {
    if (typeof input === 'string') {
      throw SceneGraphErrorFactory.exportError('GlbParser expects bytes, received a path', 'parsing');
    }
    try {
      return await this.io.readBinary(input);
    } catch (error) {
      throw SceneGraphErrorFactory.exportError(
        `Failed to parse GLB: ${error instanceof Error ? error.message : String(error)}`,
        'parsing',
        { byteLength: input.byteLength }
      );
    }
  }

  getType(): string {
    return 'GLB';
  }
}

/**
 * File Parser - .gltf (with external resources) or .glb on disk
 */
class FileParser implements IGltfParser {
  private io = createNodeIO();

  async parse(input: string | Uint8Array): Promise<Document> {
    if (typeof input !== 'string') {
      throw SceneGraphErrorFactory.exportError('FileParser expects a path, received bytes', 'parsing');
    }
    if (!isFile(input)) {
      throw SceneGraphErrorFactory.ioError(`${ERROR_MESSAGES.READ_FAILED}: ${input}`, input, 'read');
    }
    try {
      return await this.io.read(input);
    } catch (error) {
      throw SceneGraphErrorFactory.ioError(
        `${ERROR_MESSAGES.READ_FAILED}: ${input}`,
        input,
        'read',
        { cause: error instanceof Error ? error.message : String(error) }
      );
    }
  }

  getType(): string {
    return 'FILE';
  }
}

/**
 * Parser Factory
 */
export class GltfParserFactory {
  static createParser(input: string | ArrayBuffer | Uint8Array): IGltfParser {
    if (typeof input !== 'string') {
      return new GlbParser();
    }
    const extension = path.extname(input).toLowerCase();
    if (extension === FILE_EXTENSIONS.GLB || extension === FILE_EXTENSIONS.GLTF) {
      return new FileParser();
    }
    throw SceneGraphErrorFactory.exportError(
      `${ERROR_MESSAGES.UNSUPPORTED_INPUT}: ${extension || input}`,
      'parsing',
      { input }
    );
  }
}

/**
 * Loads a source scene from any supported input
 */
export async function readSceneInput(input: SceneInput): Promise<Document> {
  if (input instanceof Document) {
    return input;
  }
  const parser = GltfParserFactory.createParser(input);
  const source = typeof input === 'string' ? input : input instanceof Uint8Array ? input : new Uint8Array(input);
  return parser.parse(source);
}
