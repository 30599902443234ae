/**
 * glTF Input and Output
 */

export { readGltfDocument, writeGltfDocument } from './gltf-io';
