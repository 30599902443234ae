/**
 * LS3 Exporter
 *
 * Exports a scene host to the main LS3 file, one generated file per nested
 * animation level and the binary LSB companions. All documents are built
 * in memory first, so a failure leaves no partial forest on disk unless
 * best-effort mode is on.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ERROR_MESSAGES } from '../../constants/errors';
import { Ls3ErrorFactory, Ls3SchemaError, isLs3Error } from '../../errors';
import type { SceneHost, SceneNode } from '../../scene/scene-types';
import { isVisible } from '../../scene/variant-visibility';
import { ExportConfigSchema, type ExportConfig, type ExportConfigInput } from '../../schemas';
import { buildZBiasMap } from '../../utils/color-utils';
import { Logger, LoggerFactory } from '../../utils/logger';
import { lsbPathFor } from '../../utils/path-utils';
import { WarningCollector, type Ls3Warning } from '../../utils/warnings';
import { AnimationResolver } from '../helpers/animation-resolver';
import { postOrderFiles } from '../helpers/bounding-radius-aggregator';
import { FileTreeBuilder, type FileForest, type FileNode } from '../helpers/file-tree-builder';
import { writeLs3Document, type WrittenDocument } from '../helpers/ls3-document-writer';
import { assembleSubsets } from '../helpers/subset-assembler';

/**
 * Export Stage Names
 */
const EXPORT_STAGES = {
  START: 'export_start',
  FILE_TREE: 'file_tree',
  SUBSETS: 'subset_assembly',
  DOCUMENTS: 'document_generation',
  WRITING: 'file_writing',
  COMPLETE: 'export_complete',
} as const;

export interface ExportedFile {
  path: string;
  kind: 'ls3' | 'lsb';
  size: number;
}

export interface ExportResult {
  files: ExportedFile[];
  warnings: readonly Ls3Warning[];
  /** Bounding radius of the main file */
  boundingRadius: number;
  mergedVertices: number;
}

export interface ExportOptions {
  logger?: Logger;
  /** Directory relative texture and link paths of the scene are resolved against */
  sceneDirectory?: string;
}

/**
 * Validates export options; invalid values raise Ls3ConfigError.
 */
export function parseExportConfig(input: ExportConfigInput = {}): ExportConfig {
  try {
    return ExportConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw Ls3ErrorFactory.configError(ERROR_MESSAGES.INVALID_EXPORT_CONFIG, 'ExportConfig', {
        issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    throw error;
  }
}

/**
 * Drops generated files that ended up with nothing to show, e.g. because
 * the export scope filtered all their geometry away.
 */
function pruneEmptyFiles(forest: FileForest): void {
  for (const file of postOrderFiles(forest)) {
    file.links = file.links.filter(link =>
      link.kind !== 'generated' || link.file.subsets.length > 0 || link.file.links.length > 0);
  }
  const reachable = new Set(postOrderFiles(forest));
  forest.files = forest.files.filter(file => reachable.has(file));
}

function describeError(error: unknown): string {
  if (error instanceof Ls3SchemaError && error.getValidationIssues().length > 0) {
    return `${error.message} (${error.getFormattedErrors().join('; ')})`;
  }
  return error instanceof Error ? error.message : String(error);
}

export class Ls3Exporter {
  private readonly logger: Logger;
  private readonly warnings: WarningCollector;
  private readonly resolver: AnimationResolver;

  constructor(
    private readonly host: SceneHost,
    private readonly config: ExportConfig,
    private readonly options: ExportOptions = {}
  ) {
    this.logger = options.logger ?? LoggerFactory.silent();
    this.warnings = new WarningCollector(this.logger);
    this.resolver = new AnimationResolver(config.exportAnimations, this.warnings);
  }

  /**
   * Builds the file forest with assembled subsets, without writing anything.
   */
  buildForest(outputPath: string): FileForest {
    const { config, host } = this;
    const selected = new Set(config.selectedNodes);

    this.logger.logConversionStage(EXPORT_STAGES.FILE_TREE, { nodes: host.nodes.length });
    const forest = new FileTreeBuilder(host.nodes, this.resolver).build({
      mainFileName: path.basename(outputPath),
      contributesGeometry: (node: SceneNode) =>
        node.mesh !== null && node.mesh.polygons.length > 0 && isVisible(node.visibility, config.variantIds),
      includeLink: (node: SceneNode) =>
        isVisible(node.visibility, config.variantIds) && (config.exportScope === 'ALL' || selected.has(node.name)),
    });

    this.logger.logConversionStage(EXPORT_STAGES.SUBSETS, { files: forest.files.length });
    for (const file of forest.files) {
      file.subsets = assembleSubsets(file.members, host.nodes, this.resolver, {
        scope: config.exportScope,
        selectedNodes: config.selectedNodes,
        variantIds: config.variantIds,
      });
    }
    pruneEmptyFiles(forest);
    return forest;
  }

  async export(outputPath: string): Promise<ExportResult> {
    const exportDirectory = path.dirname(path.resolve(outputPath));
    this.logger.logConversionStage(EXPORT_STAGES.START, { outputPath, scope: this.config.exportScope });

    const forest = this.buildForest(outputPath);
    const documents = this.generateDocuments(forest, exportDirectory);
    const files = this.writeDocuments(documents, exportDirectory);

    const main = documents.find(doc => doc.file.isMainFile);
    const result: ExportResult = {
      files,
      warnings: this.warnings.list(),
      boundingRadius: main?.boundingRadius ?? 0,
      mergedVertices: documents.reduce((sum, doc) => sum + doc.mergedVertices, 0),
    };

    this.logger.logConversionStage(EXPORT_STAGES.COMPLETE, {
      files: files.length,
      warnings: result.warnings.length,
      boundingRadius: result.boundingRadius,
      mergedVertices: result.mergedVertices,
    });
    return result;
  }

  private generateDocuments(forest: FileForest, exportDirectory: string): WrittenDocument[] {
    this.logger.logConversionStage(EXPORT_STAGES.DOCUMENTS);
    const context = {
      host: this.host,
      resolver: this.resolver,
      config: this.config,
      exportDirectory,
      sceneDirectory: this.options.sceneDirectory ?? exportDirectory,
      zBiasMap: buildZBiasMap(this.host.materials),
      warnings: this.warnings,
      logger: this.logger,
    };

    const documents: WrittenDocument[] = [];
    for (const file of postOrderFiles(forest)) {
      try {
        const document = writeLs3Document(file, context);
        file.boundingRadius = document.boundingRadius;
        documents.push(document);
      } catch (error) {
        this.handleFileFailure(file, error);
      }
    }
    return documents;
  }

  private writeDocuments(documents: readonly WrittenDocument[], exportDirectory: string): ExportedFile[] {
    this.logger.logConversionStage(EXPORT_STAGES.WRITING, { documents: documents.length });
    if (!fs.existsSync(exportDirectory)) {
      fs.mkdirSync(exportDirectory, { recursive: true });
    }

    const written: ExportedFile[] = [];
    for (const document of documents) {
      const ls3Path = path.join(exportDirectory, document.file.filename);
      try {
        const text = document.xml.serializeDocument(this.config.lineSeparator);
        fs.writeFileSync(ls3Path, text, 'utf8');
        written.push({ path: ls3Path, kind: 'ls3', size: Buffer.byteLength(text, 'utf8') });
        this.logger.logFileOperation('write', ls3Path, Buffer.byteLength(text, 'utf8'));

        if (document.lsb !== null) {
          const lsbPath = lsbPathFor(ls3Path);
          fs.writeFileSync(lsbPath, document.lsb);
          written.push({ path: lsbPath, kind: 'lsb', size: document.lsb.length });
          this.logger.logFileOperation('write', lsbPath, document.lsb.length);
        }
      } catch (error) {
        const wrapped = isLs3Error(error)
          ? error
          : Ls3ErrorFactory.fileSystemError(`Failed to write ${ls3Path}: ${describeError(error)}`, ls3Path, 'write');
        this.handleFileFailure(document.file, wrapped);
      }
    }
    return written;
  }

  private handleFileFailure(file: FileNode, error: unknown): void {
    if (!this.config.bestEffort) {
      throw error;
    }
    this.warnings.skippedFile(`Skipped ${file.filename}: ${describeError(error)}`, file.filename, {
      error: isLs3Error(error) ? error.getDetails() : describeError(error),
    });
  }
}

/**
 * Exports `host` to `outputPath` (the main LS3 file).
 */
export async function exportScene(
  host: SceneHost,
  outputPath: string,
  config: ExportConfigInput = {},
  options: ExportOptions = {}
): Promise<ExportResult> {
  const parsed = parseExportConfig(config);
  const logger = options.logger ?? (parsed.debug ? LoggerFactory.forDebug() : LoggerFactory.silent());
  const exporter = new Ls3Exporter(host, parsed, { ...options, logger });
  return logger.withTiming('ls3_export', () => exporter.export(outputPath));
}
