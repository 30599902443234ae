/**
 * Zusi LS3 Kit
 *
 * Exports glTF scenes to Zusi LS3/LSB scenery files and imports them back.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'zusi-ls3-kit';
 *
 * const ls3 = defineConfig({
 *   exportAnimations: true,
 *   dataDirectory: 'C:/Zusi3/Daten'
 * });
 *
 * const result = await ls3.exportFile('./signal.glb', './out/signal.ls3');
 * const { document } = ls3.importFile('./out/signal.ls3');
 * ```
 */

import * as path from 'path';
import { Document } from '@gltf-transform/core';
import { readGltfDocument, writeGltfDocument } from './converters/gltf';
import { exportScene, importLs3, parseExportConfig, type ExportResult, type ImportResult } from './converters/ls3';
import { GltfSceneHost } from './scene/gltf-scene-host';
import type { ExportConfig, ExportConfigInput, ImportConfigInput } from './schemas';
import { Logger, LoggerFactory } from './utils/logger';
import { WarningCollector } from './utils/warnings';

export interface ExportDocumentOptions {
  /** Directory relative texture and link paths of the document are resolved against */
  baseDirectory?: string;
}

/**
 * Main framework class
 */
export class Ls3Framework {
  private readonly config: ExportConfig;
  private readonly logger: Logger;

  constructor(config: ExportConfigInput = {}, logger?: Logger) {
    this.config = parseExportConfig(config);
    this.logger = logger ?? (this.config.debug ? LoggerFactory.forDebug() : LoggerFactory.forExport());
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Export a glTF-Transform document already in memory.
   *
   * Warnings raised while reading the document's metadata come first in
   * the result, followed by those of the export itself.
   */
  async exportDocument(document: Document, outputPath: string, options: ExportDocumentOptions = {}): Promise<ExportResult> {
    const hostWarnings = new WarningCollector(this.logger);
    const host = new GltfSceneHost(document, {
      upAxis: this.config.upAxis,
      framesPerSecond: this.config.framesPerSecond,
      baseDirectory: options.baseDirectory ?? process.cwd(),
      warnings: hostWarnings,
    });

    const result = await exportScene(host, outputPath, this.config, {
      logger: this.logger,
      sceneDirectory: options.baseDirectory,
    });
    return { ...result, warnings: [...hostWarnings.list(), ...result.warnings] };
  }

  /**
   * Export a .gltf or .glb file.
   *
   * @example
   * ```typescript
   * const { files, warnings } = await ls3.exportFile('./bridge.glb', './out/bridge.ls3');
   * ```
   */
  async exportFile(inputPath: string, outputPath: string): Promise<ExportResult> {
    const document = await readGltfDocument(inputPath, this.logger);
    return this.exportDocument(document, outputPath, { baseDirectory: path.dirname(path.resolve(inputPath)) });
  }

  /**
   * Import an LS3 file into a glTF-Transform document. Axis convention
   * follows the framework's configuration unless the import options name one.
   */
  importFile(ls3Path: string, config: ImportConfigInput = {}): ImportResult {
    return importLs3(ls3Path, {
      upAxis: this.config.upAxis,
      dataDirectory: this.config.dataDirectory,
      debug: this.config.debug,
      ...config,
    }, { logger: this.logger });
  }

  /**
   * Import an LS3 file and write it as .gltf or .glb.
   */
  async convertToGltf(ls3Path: string, outputPath: string, config: ImportConfigInput = {}): Promise<ImportResult> {
    const result = this.importFile(ls3Path, config);
    await writeGltfDocument(result.document, outputPath, this.logger);
    return result;
  }

  /**
   * Get current configuration
   */
  getConfig(): ExportConfig {
    return { ...this.config };
  }
}

/**
 * Create framework instance with configuration
 *
 * @example
 * ```typescript
 * const ls3 = defineConfig({ exportScope: 'SELECTED_OBJECTS', selectedNodes: ['Mast'] });
 * ```
 */
export function defineConfig(config: ExportConfigInput = {}, logger?: Logger): Ls3Framework {
  return new Ls3Framework(config, logger);
}

/**
 * TypeScript type exports
 */
export type {
  ExportConfig,
  ExportConfigInput,
  ImportConfig,
  ImportConfigInput,
  ExportScope,
  LinkedFilesMode,
  UpAxis,
  SceneInfo,
  LinkMetadata,
  AnchorMetadata,
  AuthorMetadata,
  NodeExtras,
  SceneExtras,
  PrimitiveExtras,
  ClipExtras,
  TextureMetadata,
} from './schemas';
export type { SceneHost, SceneNode, SceneMaterial, SceneMesh, AnimationClip } from './scene/scene-types';
export type { Ls3Warning, Ls3WarningKind } from './utils/warnings';
export type { ExportResult, ExportedFile, ImportResult } from './converters/ls3';

/**
 * Direct converter exports
 */
export { exportScene, importLs3, parseExportConfig, parseImportConfig } from './converters/ls3';
export { readGltfDocument, writeGltfDocument } from './converters/gltf';
export { GltfSceneHost } from './scene/gltf-scene-host';
export { LsbReader, LsbWriter, encodeSubset } from './converters/shared/lsb-codec';
export { optimizeMesh } from './converters/helpers/mesh-optimizer';
export { Logger, LoggerFactory, LogLevel } from './utils/logger';
export * from './errors';
