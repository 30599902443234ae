/**
 * Path Utilities
 *
 * File naming and the path form written into LS3 files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FILE_EXTENSIONS } from '../constants/config';

/**
 * Splits an output file name at its first dot: "a.lod1.ls3" -> ["a", ".lod1.ls3"].
 */
export function splitOutputName(fileName: string): [string, string] {
  const dot = fileName.indexOf('.');
  return dot === -1 ? [fileName, ''] : [fileName.slice(0, dot), fileName.slice(dot)];
}

/**
 * Name of a generated sub-file: `{basename}_{rootName}{extension}`.
 */
export function subFileName(mainFileName: string, rootName: string): string {
  const [basename, ext] = splitOutputName(mainFileName);
  return `${basename}_${rootName}${ext}`;
}

/**
 * Binary companion path: the last extension is replaced by ".lsb".
 */
export function lsbPathFor(ls3Path: string): string {
  const parsed = path.parse(ls3Path);
  return path.join(parsed.dir, parsed.name + FILE_EXTENSIONS.LSB);
}

/**
 * Resolves a path as stored in scene metadata (either separator) against
 * a base directory.
 */
export function resolveScenePath(filePath: string, baseDirectory: string): string {
  const normalized = filePath.replace(/[\\/]/g, path.sep);
  return path.isAbsolute(normalized) ? path.normalize(normalized) : path.resolve(baseDirectory, normalized);
}

/**
 * Path as written into an LS3 file:
 *  - the bare file name if the file sits next to the exported file
 *  - relative to the data directory if it lies below it
 *  - absolute otherwise
 * Separators are always backslashes.
 */
export function toZusiPath(filePath: string, exportDirectory: string, dataDirectory: string): string {
  const absolute = path.resolve(filePath);
  if (path.dirname(absolute) === path.resolve(exportDirectory)) {
    return path.basename(absolute);
  }

  if (dataDirectory !== '') {
    const relative = path.relative(path.resolve(dataDirectory), absolute);
    if (relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative)) {
      return relative.split(path.sep).join('\\');
    }
  }
  return absolute.split(path.sep).join('\\');
}

/**
 * Locates a file referenced from an LS3 file: as given, next to the
 * referencing file, then below the data directory. Returns undefined if
 * none exists.
 */
export function locateZusiFile(zusiPath: string, currentDirectory: string, dataDirectory: string): string | undefined {
  const normalized = zusiPath.replace(/[\\/]/g, path.sep);
  const candidates = [
    normalized,
    path.join(currentDirectory, normalized),
    ...(dataDirectory !== '' ? [path.join(dataDirectory, normalized)] : []),
  ];
  return candidates.find(candidate => pathExists(candidate));
}

/**
 * Check if path exists
 */
export function pathExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
