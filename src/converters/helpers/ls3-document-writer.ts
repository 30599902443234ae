/**
 * LS3 Document Writer
 *
 * Turns one FileNode into its LS3 element tree and, when binary output is
 * enabled, the matching LSB stream. Linked generated files must already be
 * written so their bounding radius is known.
 */

import * as path from 'path';
import { ANIMATION } from '../../constants/animation';
import { LINK_FLAGS, LS3_ELEMENTS, LS3_INFO, LSB_LAYOUT } from '../../constants/ls3';
import { ERROR_MESSAGES } from '../../constants/errors';
import { XmlNode } from '../../core/xml-node';
import { Ls3ErrorFactory } from '../../errors';
import type { SceneHost, SceneNode } from '../../scene/scene-types';
import { isVisible } from '../../scene/variant-visibility';
import type { ExportConfig, LinkMetadata, SceneInfo } from '../../schemas';
import type { Transform } from '../../types';
import type { Logger } from '../../utils/logger';
import { decomposeMatrix } from '../../utils/matrix-utils';
import { lsbPathFor, pathExists, resolveScenePath, toZusiPath } from '../../utils/path-utils';
import type { WarningCollector } from '../../utils/warnings';
import { formatFloat, isZeroVector, setXYZ, setXYZW } from '../../utils/xml-formatter';
import { horizontalLength, toZusiRotation, toZusiScale, toZusiVector } from '../../utils/zusi-coordinates';
import { LsbWriter } from '../shared/lsb-codec';
import type { Face, MeshVertex } from '../shared/mesh-types';
import type { AnimationResolver } from './animation-resolver';
import { buildDeclarations, collectFileClips, numberAnimations, type AnimationNumbering } from './animation-declarations';
import { sampleAnimation, type SampledAnimation } from './animation-sampler';
import { BoundingRadiusAggregator } from './bounding-radius-aggregator';
import type { ExternalLink, FileNode, GeneratedLink } from './file-tree-builder';
import { writeMaterialAttributes, writeMaterialChildren } from './material-writer';
import { optimizeMesh, remapFaces } from './mesh-optimizer';
import { relativeTransform, worldTransform } from './relative-transform';
import { buildSubsetMesh } from './subset-mesh-builder';

export interface DocumentWriterContext {
  host: SceneHost;
  resolver: AnimationResolver;
  config: ExportConfig;
  /** Directory the LS3 files are written to */
  exportDirectory: string;
  /** Directory relative scene paths are resolved against */
  sceneDirectory: string;
  zBiasMap: ReadonlyMap<number, number>;
  warnings: WarningCollector;
  logger: Logger;
}

export interface WrittenDocument {
  file: FileNode;
  xml: XmlNode;
  /** Binary companion; null when binary output is disabled or nothing needs it */
  lsb: Buffer | null;
  boundingRadius: number;
  mergedVertices: number;
}

const EMPTY_NUMBERING: AnimationNumbering = { subsets: [], links: [] };

function isIdentityRotation(transform: Transform): boolean {
  const [x, y, z] = transform.rotation;
  return x === 0 && y === 0 && z === 0;
}

function isUnitScale(transform: Transform): boolean {
  return transform.scale.every(s => s === 1);
}

function maxScale(transform: Transform): number {
  return Math.max(...transform.scale.map(Math.abs));
}

function writeInfo(parent: XmlNode, info: SceneInfo, isMainFile: boolean): void {
  const element = parent.appendChild(LS3_ELEMENTS.INFO)
    .setAttribute('DateiTyp', LS3_INFO.FILE_TYPE)
    .setAttribute('Version', LS3_INFO.VERSION)
    .setAttribute('MinVersion', LS3_INFO.MIN_VERSION);

  if (info.objectId !== '') element.setAttribute('ObjektID', info.objectId);
  if (info.license !== '') element.setAttribute('Lizenz', info.license);
  if (info.description !== '') element.setAttribute('Beschreibung', info.description);

  for (const author of info.authors) {
    const entry = element.appendChild(LS3_ELEMENTS.AUTHOR);
    if (author.id !== 0) entry.setAttribute('AutorID', author.id);
    if (author.name !== '') entry.setAttribute('AutorName', author.name);
    if (author.email !== '') entry.setAttribute('AutorEmail', author.email);
    // Effort is counted once per export, in the main file
    if (isMainFile && author.effort !== 0) entry.setAttribute('AutorAufwand', formatFloat(author.effort));
    if (author.license !== '0') entry.setAttribute('AutorLizenz', author.license);
    if (author.remarks !== '') entry.setAttribute('AutorBeschreibung', author.remarks);
  }
}

class Ls3DocumentWriter {
  private readonly root = new XmlNode(LS3_ELEMENTS.ROOT);
  private readonly landscape: XmlNode;
  private readonly radius = new BoundingRadiusAggregator();
  private readonly numbering: AnimationNumbering;
  private readonly subsetAnimations = new Map<number, SampledAnimation>();
  private readonly linkAnimations = new Map<number, SampledAnimation>();
  private mergedVertices = 0;

  constructor(
    private readonly file: FileNode,
    private readonly context: DocumentWriterContext
  ) {
    writeInfo(this.root, context.host.info, file.isMainFile);
    this.landscape = this.root.appendChild(LS3_ELEMENTS.LANDSCAPE);
    this.numbering = context.resolver.exportAnimations
      ? numberAnimations(file, context.resolver)
      : EMPTY_NUMBERING;
  }

  write(): WrittenDocument {
    this.sampleAnimations();
    this.file.links.forEach((link, index) => {
      if (link.kind === 'generated') {
        this.writeGeneratedLink(link, index);
      } else {
        this.writeExternalLink(link, index);
      }
    });
    const lsb = this.writeSubsets();
    this.writeAnimations();
    if (this.file.isMainFile) {
      this.writeAnchorPoints();
    }

    return {
      file: this.file,
      xml: this.root,
      lsb,
      boundingRadius: this.radius.value,
      mergedVertices: this.mergedVertices,
    };
  }

  private sampleAnimations(): void {
    const { host, resolver } = this.context;
    const sample = (node: SceneNode): SampledAnimation | undefined => {
      const clip = resolver.drivingClip(node);
      if (clip === null) return undefined;
      return sampleAnimation(host, clip, node, this.file.root, {
        writeTranslation: resolver.hasTrack(node, 'translation'),
        writeRotation: resolver.hasTrack(node, 'rotation'),
      });
    };

    for (const entry of this.numbering.subsets) {
      const node = entry.subset.identifier.animatingNode;
      const sampled = node === null ? undefined : sample(node);
      if (sampled !== undefined) this.subsetAnimations.set(entry.index, sampled);
    }
    for (const entry of this.numbering.links) {
      const sampled = sample(entry.link.node);
      if (sampled !== undefined) this.linkAnimations.set(entry.index, sampled);
    }
  }

  private placement(node: SceneNode): Transform {
    return decomposeMatrix(relativeTransform(node, this.file.root, this.file.root));
  }

  private translationLength(index: number, transform: Transform, animated: boolean): number {
    const sampled = this.linkAnimations.get(index);
    if (animated && sampled !== undefined) {
      return sampled.maxTranslation;
    }
    return horizontalLength(transform.translation);
  }

  private writeGeneratedLink(link: GeneratedLink, index: number): void {
    const { resolver } = this.context;
    const transform = this.placement(link.node);
    const scale = maxScale(transform);
    const animatedTranslation = resolver.hasTrack(link.node, 'translation');
    const animatedRotation = resolver.hasTrack(link.node, 'rotation');

    const element = this.landscape.appendChild(LS3_ELEMENTS.LINK)
      .setAttribute('BoundingR', Math.ceil(scale * link.file.boundingRadius));
    element.appendChild(LS3_ELEMENTS.FILE).setAttribute('Dateiname', link.file.filename);

    if (!animatedTranslation && !isZeroVector(transform.translation)) {
      setXYZ(element.appendChild(LS3_ELEMENTS.POSITION), toZusiVector(transform.translation));
    }
    if (!animatedRotation && !isIdentityRotation(transform)) {
      setXYZ(element.appendChild(LS3_ELEMENTS.ROTATION), toZusiRotation(transform.rotation));
    }
    if (!isUnitScale(transform)) {
      setXYZ(element.appendChild(LS3_ELEMENTS.SCALE), toZusiScale(transform.scale));
    }

    this.radius.addLink(link.file.boundingRadius, scale, this.translationLength(index, transform, animatedTranslation));
  }

  private writeExternalLink(link: ExternalLink, index: number): void {
    const { resolver, config, exportDirectory, sceneDirectory, warnings } = this.context;
    const meta: LinkMetadata = link.metadata;
    const transform = this.placement(link.node);
    const animatedTranslation = resolver.isAnimated(link.node) && resolver.hasTrack(link.node, 'translation');
    const animatedRotation = resolver.isAnimated(link.node) && resolver.hasTrack(link.node, 'rotation');

    const element = this.landscape.appendChild(LS3_ELEMENTS.LINK);
    if (meta.groupName !== '') element.setAttribute('GruppenName', meta.groupName);
    if (meta.visibleFrom !== 0) element.setAttribute('SichtbarAb', formatFloat(meta.visibleFrom));
    if (meta.visibleTo !== 0) element.setAttribute('SichtbarBis', formatFloat(meta.visibleTo));
    if (meta.preloadFactor !== 0) element.setAttribute('Vorlade', formatFloat(meta.preloadFactor));
    if (meta.radius > 0) element.setAttribute('BoundingR', formatFloat(meta.radius));
    if (meta.brightness !== 0) element.setAttribute('Helligkeit', formatFloat(meta.brightness));
    element.setAttribute('LODbit', meta.lodMask);
    const flags = (meta.tile ? LINK_FLAGS.TILE : 0)
      + (meta.billboard ? LINK_FLAGS.BILLBOARD : 0)
      + (meta.readOnly ? LINK_FLAGS.READ_ONLY : 0)
      + (meta.detailTile ? LINK_FLAGS.DETAIL_TILE : 0);
    if (flags !== 0) element.setAttribute('Flags', flags);

    const target = resolveScenePath(meta.file, config.dataDirectory !== '' ? config.dataDirectory : sceneDirectory);
    if (!pathExists(target)) {
      warnings.missingResource(`Linked file of "${link.node.name}" not found`, target);
    }
    element.appendChild(LS3_ELEMENTS.FILE)
      .setAttribute('Dateiname', toZusiPath(target, exportDirectory, config.dataDirectory));

    setXYZ(element.appendChild(LS3_ELEMENTS.POSITION), animatedTranslation ? [0, 0, 0] : toZusiVector(transform.translation));
    setXYZ(element.appendChild(LS3_ELEMENTS.ROTATION), animatedRotation ? [0, 0, 0] : toZusiRotation(transform.rotation));
    setXYZ(element.appendChild(LS3_ELEMENTS.SCALE), toZusiScale(transform.scale));

    this.radius.addLink(meta.radius, maxScale(transform), this.translationLength(index, transform, animatedTranslation));
  }

  private writeSubsets(): Buffer | null {
    const { config, warnings } = this.context;
    const lsbWriter = config.writeLsb ? new LsbWriter() : null;

    if (lsbWriter !== null && this.file.subsets.length > 0) {
      this.landscape.appendChild(LS3_ELEMENTS.LSB)
        .setAttribute('Dateiname', path.basename(lsbPathFor(this.file.filename)));
    }

    this.file.subsets.forEach((subset, index) => {
      const mesh = buildSubsetMesh(subset, this.file.root, config.variantIds);
      let vertices: (MeshVertex | null)[] = mesh.vertices;
      let faces: Face[] = mesh.faces;

      if (config.optimizeMesh) {
        const result = optimizeMesh(mesh.vertices, {
          maxCoordDelta: config.maxCoordDelta,
          maxUVDelta: config.maxUVDelta,
          maxNormalAngle: config.maxNormalAngle,
        });
        vertices = result.vertices;
        faces = remapFaces(mesh.faces, result.indexMap);
        this.mergedVertices += result.mergedCount;
      }

      const surviving = vertices.filter((v): v is MeshVertex => v !== null);
      if (surviving.length > LSB_LAYOUT.MAX_INDEX + 1) {
        throw Ls3ErrorFactory.conversionError(ERROR_MESSAGES.INDEX_OVERFLOW, 'subset_mesh', {
          file: this.file.filename,
          vertexCount: surviving.length,
        });
      }

      const material = subset.identifier.material;
      const materialContext = {
        zBiasMap: this.context.zBiasMap,
        variantIds: config.variantIds,
        exportDirectory: this.context.exportDirectory,
        dataDirectory: config.dataDirectory,
        warnings,
      };
      const element = this.landscape.appendChild(LS3_ELEMENTS.SUBSET);
      writeMaterialAttributes(element, material, materialContext);

      if (lsbWriter !== null) {
        const counts = lsbWriter.addSubset(vertices, faces);
        element.setAttribute('MeshV', counts.vertexCount).setAttribute('MeshI', counts.indexCount);
      }
      writeMaterialChildren(element, material, materialContext);
      if (lsbWriter === null) {
        this.writeInlineMesh(element, surviving, faces);
      }

      const sampled = this.subsetAnimations.get(index);
      if (sampled !== undefined) {
        this.radius.addAnimatedSubset(mesh.boundingRadius, sampled.maxTranslation);
      } else {
        this.radius.addSubset(mesh.boundingRadius);
      }
    });

    return lsbWriter !== null && this.file.subsets.length > 0 ? lsbWriter.toBuffer() : null;
  }

  private writeInlineMesh(element: XmlNode, vertices: readonly MeshVertex[], faces: readonly Face[]): void {
    for (const vertex of vertices) {
      const child = element.appendChild(LS3_ELEMENTS.VERTEX)
        .setAttribute('U', formatFloat(vertex.uv1[0]))
        .setAttribute('V', formatFloat(vertex.uv1[1]))
        .setAttribute('U2', formatFloat(vertex.uv2[0]))
        .setAttribute('V2', formatFloat(vertex.uv2[1]));
      setXYZ(child.appendChild(LS3_ELEMENTS.POSITION), vertex.position);
      setXYZ(child.appendChild(LS3_ELEMENTS.NORMAL), vertex.normal);
    }
    // Same on-disk winding as the binary stream
    for (const [a, b, c] of faces) {
      element.appendChild(LS3_ELEMENTS.FACE).setAttribute('i', `${c};${b};${a}`);
    }
  }

  private writeAnimations(): void {
    if (!this.context.resolver.exportAnimations) {
      return;
    }

    const clips = collectFileClips(this.file, this.context.resolver);
    for (const declaration of buildDeclarations(clips, this.numbering)) {
      const element = this.landscape.appendChild(LS3_ELEMENTS.ANIMATION)
        .setAttribute('AniID', declaration.type)
        .setAttribute('AniBeschreibung', declaration.description);
      if (declaration.loop) {
        element.setAttribute('AniLoopen', 1);
      }
      for (const number of declaration.numbers) {
        element.appendChild(LS3_ELEMENTS.ANIMATION_NUMBER).setAttribute('AniNr', number);
      }
    }

    for (const entry of this.numbering.subsets) {
      this.writeKeyframes(LS3_ELEMENTS.MESH_ANIMATION, entry.number, entry.index, entry.clip.speed, this.subsetAnimations.get(entry.index));
    }
    for (const entry of this.numbering.links) {
      this.writeKeyframes(LS3_ELEMENTS.LINK_ANIMATION, entry.number, entry.index, entry.clip.speed, this.linkAnimations.get(entry.index));
    }
  }

  private writeKeyframes(name: string, number: number, index: number, speed: number, sampled: SampledAnimation | undefined): void {
    const element = this.landscape.appendChild(name)
      .setAttribute('AniNr', number)
      .setAttribute('AniIndex', index)
      .setAttribute('AniGeschw', formatFloat(speed));

    for (const keyframe of sampled?.keyframes ?? []) {
      const point = element.appendChild(LS3_ELEMENTS.KEYFRAME).setAttribute('AniZeit', formatFloat(keyframe.time));
      if (keyframe.translation !== undefined) {
        setXYZ(point.appendChild(LS3_ELEMENTS.POSITION), keyframe.translation);
      }
      if (keyframe.rotation !== undefined) {
        setXYZW(point.appendChild(LS3_ELEMENTS.QUATERNION), keyframe.rotation, ANIMATION.ROTATION_EPSILON);
      }
    }
  }

  private writeAnchorPoints(): void {
    const { host, config, exportDirectory, sceneDirectory } = this.context;

    for (const node of host.nodes) {
      if (node.anchor === null || !isVisible(node.visibility, config.variantIds)) continue;
      const anchor = node.anchor;
      const transform = decomposeMatrix(worldTransform(node));

      const element = this.landscape.appendChild(LS3_ELEMENTS.ANCHOR_POINT)
        .setAttribute('AnkerKat', anchor.category)
        .setAttribute('AnkerTyp', anchor.type);
      if (anchor.description !== '') {
        element.setAttribute('Beschreibung', anchor.description);
      }
      setXYZ(element.appendChild(LS3_ELEMENTS.POSITION), toZusiVector(transform.translation));
      setXYZ(element.appendChild(LS3_ELEMENTS.ROTATION), toZusiRotation(transform.rotation));

      for (const file of anchor.files) {
        const target = resolveScenePath(file, config.dataDirectory !== '' ? config.dataDirectory : sceneDirectory);
        element.appendChild(LS3_ELEMENTS.FILE)
          .setAttribute('Dateiname', toZusiPath(target, exportDirectory, config.dataDirectory))
          .setAttribute('NurInfo', 1);
      }
    }
  }
}

export function writeLs3Document(file: FileNode, context: DocumentWriterContext): WrittenDocument {
  context.logger.debug(`Writing ${file.filename}`, {
    subsets: file.subsets.length,
    links: file.links.length,
  });
  return new Ls3DocumentWriter(file, context).write();
}
