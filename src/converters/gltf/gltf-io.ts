/**
 * glTF Document IO
 *
 * Reads scenes for export and writes imported scenery, with every
 * glTF-Transform extension registered.
 */

import * as path from 'path';
import { Document, NodeIO } from '@gltf-transform/core';
import { ALL_EXTENSIONS } from '@gltf-transform/extensions';
import { dequantize, prune } from '@gltf-transform/functions';
import { Ls3ErrorFactory } from '../../errors';
import { Logger } from '../../utils/logger';
import { pathExists } from '../../utils/path-utils';

const SUPPORTED_EXTENSIONS = ['.gltf', '.glb'] as const;

function createIO(): NodeIO {
  return new NodeIO().registerExtensions(ALL_EXTENSIONS);
}

/**
 * Reads a .gltf or .glb file. Quantized attributes are expanded to floats,
 * since the scene host reads positions and normals as plain numbers.
 */
export async function readGltfDocument(filePath: string, logger: Logger): Promise<Document> {
  const absolute = path.resolve(filePath);
  const extension = path.extname(absolute).toLowerCase();

  if (!SUPPORTED_EXTENSIONS.some(supported => supported === extension)) {
    throw Ls3ErrorFactory.conversionError(`Unsupported file format: ${extension}`, 'unsupported_format', {
      filePath: absolute,
    });
  }
  if (!pathExists(absolute)) {
    throw Ls3ErrorFactory.missingResource(`File not found: ${absolute}`, absolute);
  }

  logger.logFileOperation('read', absolute);
  const document = await createIO().read(absolute);

  logger.debug('Dequantizing mesh attributes', { stage: 'preprocessing', operation: 'dequantize' });
  await document.transform(dequantize());
  return document;
}

/**
 * Writes an imported document. Unused accessors and materials are pruned
 * first; the format follows the file extension.
 */
export async function writeGltfDocument(document: Document, filePath: string, logger: Logger): Promise<void> {
  const absolute = path.resolve(filePath);
  await document.transform(prune({ keepLeaves: true }));

  try {
    await createIO().write(absolute, document);
  } catch (error) {
    throw Ls3ErrorFactory.fileSystemError(
      `Failed to write ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
      absolute,
      'write'
    );
  }
  logger.logFileOperation('write', absolute);
}
