/**
 * LS3 Importer
 *
 * Reads an LS3 file with its binary companion into a glTF-Transform
 * Document: one node per subset, linked files embedded under a placement
 * node or kept as placeholder markers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Buffer as GltfBuffer, Document, Node, Scene } from '@gltf-transform/core';
import { ZodError } from 'zod';
import { ERROR_MESSAGES } from '../../constants/errors';
import { XmlNode } from '../../core/xml-node';
import { Ls3ErrorFactory } from '../../errors';
import { fromHostAxes, type AxisConversion } from '../../scene/up-axis';
import { ImportConfigSchema, type ImportConfig, type ImportConfigInput } from '../../schemas';
import { Logger, LoggerFactory } from '../../utils/logger';
import { locateZusiFile } from '../../utils/path-utils';
import { WarningCollector, type Ls3Warning } from '../../utils/warnings';
import {
  applyPlacement,
  createSubsetMaterial,
  createSubsetNode,
  linkMetadata,
} from '../helpers/gltf-document-builder';
import { readLs3Document, type Ls3FileRecord, type Ls3SubsetRecord } from '../helpers/ls3-document-reader';
import { compactVertices, optimizeMesh, remapFaces } from '../helpers/mesh-optimizer';
import { LsbReader } from '../shared/lsb-codec';
import type { Face, MeshVertex } from '../shared/mesh-types';

export interface ImportResult {
  document: Document;
  warnings: readonly Ls3Warning[];
  /** LS3 files read, the requested one first */
  files: string[];
}

export interface ImportOptions {
  logger?: Logger;
}

type ImportParent = Scene | Node;

/**
 * Validates import options; invalid values raise Ls3ConfigError.
 */
export function parseImportConfig(input: ImportConfigInput = {}): ImportConfig {
  try {
    return ImportConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw Ls3ErrorFactory.configError(ERROR_MESSAGES.INVALID_IMPORT_CONFIG, 'ImportConfig', {
        issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    throw error;
  }
}

/**
 * File name without every extension: "a.lod1.ls3" -> "a".
 */
function baseName(filePath: string): string {
  const name = path.basename(filePath);
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

export class Ls3Importer {
  private readonly logger: Logger;
  private readonly warnings: WarningCollector;
  private readonly axes: AxisConversion;
  private readonly document = new Document();
  private readonly buffer: GltfBuffer;
  private readonly files: string[] = [];

  constructor(
    private readonly config: ImportConfig,
    options: ImportOptions = {}
  ) {
    this.logger = options.logger ?? LoggerFactory.silent();
    this.warnings = new WarningCollector(this.logger);
    this.axes = fromHostAxes(config.upAxis);
    this.buffer = this.document.createBuffer();
  }

  import(filePath: string): ImportResult {
    const absolute = path.resolve(filePath);
    if (!fs.existsSync(absolute)) {
      throw Ls3ErrorFactory.missingResource(`${ERROR_MESSAGES.FILE_NOT_FOUND}: ${absolute}`, absolute);
    }

    const scene = this.document.createScene(baseName(absolute));
    this.document.getRoot().setDefaultScene(scene);
    this.importFile(absolute, scene, 0, new Set());

    this.logger.logConversionStage('import_complete', {
      files: this.files.length,
      warnings: this.warnings.size,
    });
    return { document: this.document, warnings: this.warnings.list(), files: this.files };
  }

  private importFile(filePath: string, parent: ImportParent, depth: number, stack: ReadonlySet<string>): void {
    this.logger.logFileOperation('read', filePath);
    this.files.push(filePath);

    const record = readLs3Document(XmlNode.parse(fs.readFileSync(filePath, 'utf8')));
    const directory = path.dirname(filePath);
    const name = baseName(filePath);

    if (depth === 0 && this.config.loadAuthorInformation && parent instanceof Scene) {
      parent.setExtras({ ...parent.getExtras(), zusi: { info: record.info } });
    }

    this.importSubsets(record, filePath, name, parent);
    this.importLinks(record, directory, parent, depth, new Set([...stack, filePath]));
    this.importAnchors(record, name, parent);
  }

  private meshData(record: Ls3FileRecord, filePath: string): { vertices: MeshVertex[]; faces: Face[] }[] {
    const needsBinary = record.subsets.some(subset => subset.inline === null && (subset.vertexCount > 0 || subset.indexCount > 0));
    let reader: LsbReader | null = null;

    if (needsBinary) {
      const lsbPath = record.lsbFile !== null
        ? locateZusiFile(record.lsbFile, path.dirname(filePath), this.config.dataDirectory)
        : undefined;
      if (lsbPath === undefined) {
        throw Ls3ErrorFactory.missingResource(ERROR_MESSAGES.MISSING_BINARY_STREAM, record.lsbFile ?? filePath, {
          file: filePath,
        });
      }
      reader = new LsbReader(fs.readFileSync(lsbPath));
    }

    return record.subsets.map(subset => {
      if (subset.inline !== null) {
        return subset.inline;
      }
      if (reader === null) {
        return { vertices: [], faces: [] };
      }
      return reader.readSubset(subset.vertexCount, Math.floor(subset.indexCount / 3));
    });
  }

  private weld(vertices: MeshVertex[], faces: Face[]): { vertices: MeshVertex[]; faces: Face[] } {
    if (!this.config.weldVertices) {
      return { vertices, faces };
    }
    const result = optimizeMesh(
      vertices.map((vertex, i) => ({ ...vertex, originalIndex: i, noMerge: false })),
      {
        maxCoordDelta: this.config.weldCoordDelta,
        maxUVDelta: this.config.weldUVDelta,
        maxNormalAngle: this.config.weldNormalAngle,
      }
    );
    return { vertices: compactVertices(result.vertices), faces: remapFaces(faces, result.indexMap) };
  }

  private textureUri(zusiPath: string, directory: string): string {
    const located = locateZusiFile(zusiPath, directory, this.config.dataDirectory);
    if (located === undefined) {
      this.warnings.missingResource(`Texture not found: ${zusiPath}`, zusiPath);
      return zusiPath.replace(/\\/g, '/');
    }
    return path.resolve(located);
  }

  private importSubsets(record: Ls3FileRecord, filePath: string, name: string, parent: ImportParent): void {
    const directory = path.dirname(filePath);
    const meshes = this.meshData(record, filePath);

    record.subsets.forEach((subset: Ls3SubsetRecord, index) => {
      const nodeName = `${name}.${index}`;
      const { vertices, faces } = this.weld(meshes[index].vertices, meshes[index].faces);
      const [base, ...extra] = subset.textures.map(texture => this.textureUri(texture, directory));
      const material = subset.texturePreset !== undefined || subset.diffuse !== undefined
        ? createSubsetMaterial(this.document, nodeName, subset, { base, extra })
        : null;

      parent.addChild(createSubsetNode(this.document, this.buffer, nodeName, vertices, faces, material, this.axes));
    });
  }

  private importLinks(record: Ls3FileRecord, directory: string, parent: ImportParent, depth: number, stack: ReadonlySet<string>): void {
    if (this.config.linkedFiles === 'ignore') {
      return;
    }

    for (const link of record.links) {
      if ((link.lodMask & this.config.lodMask) === 0) {
        this.logger.debug(`Skipping link outside the LOD mask: ${link.file}`, { lodMask: link.lodMask });
        continue;
      }

      const node = applyPlacement(
        this.document.createNode(link.groupName || baseName(link.file.replace(/\\/g, '/'))),
        link.position,
        link.rotation,
        link.scale,
        this.axes
      );
      parent.addChild(node);

      const located = locateZusiFile(link.file, directory, this.config.dataDirectory);
      const resolved = located !== undefined ? path.resolve(located) : undefined;
      const embed = this.config.linkedFiles === 'embed' && depth < this.config.maxEmbedDepth;

      if (embed && resolved !== undefined && !stack.has(resolved)) {
        this.importFile(resolved, node, depth + 1, stack);
        continue;
      }
      if (resolved === undefined) {
        this.warnings.missingResource(`Linked file not found: ${link.file}`, link.file);
      }
      node.setExtras({ zusi: { link: linkMetadata(link, link.file) } });
    }
  }

  private importAnchors(record: Ls3FileRecord, name: string, parent: ImportParent): void {
    record.anchors.forEach((anchor, index) => {
      const node = applyPlacement(
        this.document.createNode(`${name}.anchor.${index}`),
        anchor.position,
        anchor.rotation,
        [1, 1, 1],
        this.axes
      );
      node.setExtras({
        zusi: {
          anchor: {
            category: anchor.category,
            type: anchor.type,
            description: anchor.description,
            files: anchor.files,
          },
        },
      });
      parent.addChild(node);
    });
  }
}

/**
 * Imports an LS3 file (and, depending on options, its linked files).
 */
export function importLs3(filePath: string, config: ImportConfigInput = {}, options: ImportOptions = {}): ImportResult {
  const parsed = parseImportConfig(config);
  const logger = options.logger ?? (parsed.debug ? LoggerFactory.forDebug() : LoggerFactory.silent());
  return new Ls3Importer(parsed, { logger }).import(filePath);
}
