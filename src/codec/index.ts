/**
 * SceneGraph Codec
 */

export {
  encodeSceneGraph,
  decodeSceneGraph,
  serializeSceneGraph,
  parseSceneGraph,
  type CodecOptions,
  type SerializeOptions,
} from './scene-graph-codec';
export { writeSceneGraphFile, writeSceneGraphText, readSceneGraphFile } from './scene-graph-file';

