/**
 * glTF Scene Host
 *
 * Presents a glTF-Transform Document as a SceneHost. LS3-specific data
 * lives in `extras.zusi` of nodes, meshes' primitives, materials,
 * animations and the scene, validated on load.
 */

import {
  Accessor,
  Animation,
  Document,
  Material,
  Mesh,
  Node,
  Primitive,
  type Property,
} from '@gltf-transform/core';
import { z } from 'zod';
import { DEFAULT_HOST_CONFIG } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { Ls3ErrorFactory } from '../errors';
import {
  ClipExtrasSchema,
  MaterialExtrasSchema,
  NodeExtrasSchema,
  PrimitiveExtrasSchema,
  SceneExtrasSchema,
  SceneInfoSchema,
  type AnchorMetadata,
  type LinkMetadata,
  type SceneInfo,
  type UpAxis,
  type VariantVisibilityMetadata,
} from '../schemas';
import type { Quat, Transform, Vec2, Vec3 } from '../types';
import { normalize } from '../utils/matrix-utils';
import { resolveScenePath } from '../utils/path-utils';
import type { WarningCollector } from '../utils/warnings';
import { sampleCurve, type ChannelCurve, type Interpolation } from './channel-sampler';
import type {
  AnimationClip,
  AnimationTrack,
  SceneConstraint,
  SceneHost,
  SceneMaterial,
  SceneMesh,
  SceneNode,
  ScenePolygon,
  SceneTexture,
  TrackPath,
  VariantVisibility,
} from './scene-types';
import { edgeKey } from './scene-types';
import { toHostAxes, type AxisConversion } from './up-axis';

export interface GltfSceneHostOptions {
  upAxis?: UpAxis;
  framesPerSecond?: number;
  /** Directory relative texture URIs are resolved against */
  baseDirectory?: string;
  warnings?: WarningCollector;
}

const TRACK_PATHS: readonly TrackPath[] = ['translation', 'rotation', 'scale'];

function isTrackPath(value: string | null): value is TrackPath {
  return value !== null && TRACK_PATHS.some(path => path === value);
}

function isInterpolation(value: string): value is Interpolation {
  return value === 'LINEAR' || value === 'STEP' || value === 'CUBICSPLINE';
}

/**
 * Reads and validates `extras.zusi` of a glTF property.
 */
function readZusiExtras<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, property: Property, where: string): T {
  const raw = property.getExtras()['zusi'] ?? {};
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw Ls3ErrorFactory.schemaError(`${ERROR_MESSAGES.INVALID_EXTRAS} on ${where}`, where, result.error);
  }
  return result.data;
}

function elementAt(accessor: Accessor, index: number): number[] {
  return accessor.getElement(index, new Array<number>());
}

function toVisibility(metadata: VariantVisibilityMetadata | undefined): VariantVisibility | null {
  return metadata === undefined ? null : { mode: metadata.mode, ids: metadata.ids };
}

interface NodeChannel {
  path: TrackPath;
  curve: ChannelCurve;
}

class GltfSceneNode implements SceneNode {
  parent: SceneNode | null = null;
  readonly children: GltfSceneNode[] = [];
  constraints: SceneConstraint[] = [];
  constraintTargets: string[] = [];
  clip: AnimationClip | null = null;
  channels: NodeChannel[] = [];

  constructor(
    readonly id: string,
    readonly name: string,
    private readonly source: Node,
    private readonly host: GltfSceneHost,
    readonly mesh: SceneMesh | null,
    readonly subsetName: string,
    readonly link: LinkMetadata | null,
    readonly anchor: AnchorMetadata | null,
    readonly visibility: VariantVisibility | null
  ) { }

  localTransform(): Transform {
    let translation: Vec3 = this.source.getTranslation();
    let rotation: Quat = this.source.getRotation();
    let scale: Vec3 = this.source.getScale();

    const time = this.host.getCurrentFrame() / this.host.framesPerSecond;
    for (const channel of this.channels) {
      const value = sampleCurve(channel.curve, time);
      if (channel.path === 'translation') translation = [value[0], value[1], value[2]];
      else if (channel.path === 'rotation') rotation = [value[0], value[1], value[2], value[3]];
      else scale = [value[0], value[1], value[2]];
    }

    const axes = this.host.axes;
    return {
      translation: axes.vector(translation),
      rotation: axes.quat(rotation),
      scale: axes.scale(scale),
    };
  }
}

export class GltfSceneHost implements SceneHost {
  readonly nodes: SceneNode[] = [];
  readonly materials: SceneMaterial[] = [];
  readonly frameStart: number;
  readonly frameEnd: number;
  readonly info: SceneInfo;
  readonly framesPerSecond: number;
  readonly axes: AxisConversion;

  private currentFrame: number;
  private readonly baseDirectory: string;
  private readonly warnings: WarningCollector | undefined;
  private readonly materialMap = new Map<Material, SceneMaterial>();
  private readonly meshMap = new Map<Mesh, SceneMesh>();
  private readonly nodeMap = new Map<Node, GltfSceneNode>();

  constructor(readonly document: Document, options: GltfSceneHostOptions = {}) {
    this.framesPerSecond = options.framesPerSecond ?? DEFAULT_HOST_CONFIG.FRAMES_PER_SECOND;
    this.axes = toHostAxes(options.upAxis ?? DEFAULT_HOST_CONFIG.UP_AXIS);
    this.baseDirectory = options.baseDirectory ?? process.cwd();
    this.warnings = options.warnings;

    const root = document.getRoot();
    root.listMaterials().forEach((material, index) => {
      const converted = this.convertMaterial(material, index);
      this.materialMap.set(material, converted);
      this.materials.push(converted);
    });

    const scene = root.getDefaultScene() ?? root.listScenes()[0] ?? null;
    const sceneExtras = scene !== null
      ? readZusiExtras(SceneExtrasSchema, scene, 'scene')
      : SceneExtrasSchema.parse({});
    this.info = sceneExtras.info ?? SceneInfoSchema.parse({});

    const nodeIndex = new Map(root.listNodes().map((node, i) => [node, i] as const));
    const visit = (node: Node, parent: GltfSceneNode | null): void => {
      const converted = this.convertNode(node, nodeIndex.get(node) ?? this.nodes.length);
      converted.parent = parent;
      parent?.children.push(converted);
      this.nodes.push(converted);
      this.nodeMap.set(node, converted);
      node.listChildren().forEach(child => visit(child, converted));
    };
    scene?.listChildren().forEach(node => visit(node, null));

    this.resolveConstraints();
    const lastKeyTime = this.bindAnimations(root.listAnimations());

    this.frameStart = sceneExtras.frameStart ?? 0;
    this.frameEnd = sceneExtras.frameEnd ?? Math.round(lastKeyTime * this.framesPerSecond);
    this.currentFrame = this.frameStart;
  }

  getCurrentFrame(): number {
    return this.currentFrame;
  }

  setCurrentFrame(frame: number): void {
    this.currentFrame = frame;
  }

  private convertMaterial(material: Material, index: number): SceneMaterial {
    const id = `material:${index}`;
    const name = material.getName() || id;
    const extras = readZusiExtras(MaterialExtrasSchema, material, `material "${name}"`);
    const [r, g, b, a] = material.getBaseColorFactor();
    const emissive = material.getEmissiveFactor();

    const textures: SceneTexture[] = [];
    const baseTexture = material.getBaseColorTexture();
    const baseUri = baseTexture?.getURI() ?? '';
    if (baseUri !== '') {
      textures.push({
        path: resolveScenePath(baseUri, this.baseDirectory),
        uvLayer: `TEXCOORD_${material.getBaseColorTextureInfo()?.getTexCoord() ?? 0}`,
        visibility: toVisibility(extras.baseTextureVariants),
      });
    } else if (baseTexture !== null) {
      this.warnings?.missingResource(`Base color texture of "${name}" has no file path`, name);
    }
    for (const texture of extras.textures) {
      textures.push({
        path: resolveScenePath(texture.path, this.baseDirectory),
        uvLayer: `TEXCOORD_${texture.texCoord}`,
        visibility: toVisibility(texture.variants),
      });
    }

    return {
      id,
      name,
      diffuse: [r, g, b],
      alpha: a,
      ambient: extras.ambient ?? null,
      emit: [emissive[0], emissive[1], emissive[2]],
      overexposure: extras.overexposure ?? null,
      overexposureAmbient: extras.overexposureAmbient ?? null,
      landscapeType: extras.landscapeType,
      gfType: extras.gfType,
      forceBrightness: extras.forceBrightness,
      signalMagnification: extras.signalMagnification,
      zOffset: extras.zOffset,
      doubleSided: material.getDoubleSided(),
      texturePreset: extras.texturePreset,
      renderState: extras.renderState,
      textures,
    };
  }

  private convertNode(node: Node, index: number): GltfSceneNode {
    const name = node.getName() || `Node${index}`;
    const extras = readZusiExtras(NodeExtrasSchema, node, `node "${name}"`);
    const gltfMesh = node.getMesh();

    const converted = new GltfSceneNode(
      `node:${index}`,
      name,
      node,
      this,
      gltfMesh !== null ? this.convertMesh(gltfMesh) : null,
      extras.subsetName,
      extras.link ?? null,
      extras.anchor ?? null,
      toVisibility(extras.variants)
    );
    // Targets are resolved by name once every node exists
    converted.constraintTargets = extras.constraints.map(constraint => constraint.target);
    return converted;
  }

  private resolveConstraints(): void {
    const byName = new Map<string, SceneNode>();
    for (const node of this.nodes) {
      if (!byName.has(node.name)) byName.set(node.name, node);
    }
    for (const node of this.nodeMap.values()) {
      node.constraints = node.constraintTargets.map(target => ({ target: byName.get(target) ?? null }));
    }
  }

  private convertMesh(mesh: Mesh): SceneMesh {
    const cached = this.meshMap.get(mesh);
    if (cached !== undefined) {
      return cached;
    }

    const positions: Vec3[] = [];
    const polygons: ScenePolygon[] = [];
    const slotMaterials: (SceneMaterial | null)[] = [];
    const sharpEdges = new Set<string>();
    const primitives = mesh.listPrimitives();
    const uvLayers = [...new Set(primitives.flatMap(p => p.listSemantics().filter(s => s.startsWith('TEXCOORD_'))))].sort();
    const hasMaterials = primitives.some(p => p.getMaterial() !== null);

    for (const primitive of primitives) {
      const position = primitive.getAttribute('POSITION');
      if (position === null || primitive.getMode() !== Primitive.Mode.TRIANGLES) continue;

      const material = primitive.getMaterial();
      const converted = material !== null ? this.materialMap.get(material) ?? null : null;
      let slot = slotMaterials.indexOf(converted);
      if (hasMaterials && slot === -1) {
        slot = slotMaterials.length;
        slotMaterials.push(converted);
      }

      const base = positions.length;
      for (let i = 0; i < position.getCount(); i++) {
        const p = elementAt(position, i);
        positions.push(this.axes.vector([p[0], p[1], p[2]]));
      }

      const normal = primitive.getAttribute('NORMAL');
      const uvAccessors = uvLayers.map(layer => primitive.getAttribute(layer));
      const indices = primitive.getIndices();
      const count = indices !== null ? indices.getCount() : position.getCount();
      const indexAt = (i: number): number => indices !== null ? indices.getScalar(i) : i;

      for (let t = 0; t + 2 < count; t += 3) {
        const local = [indexAt(t), indexAt(t + 1), indexAt(t + 2)];
        const corners = local.map(i => base + i);
        const faceNormal = this.faceNormal(positions, corners);
        const normals = local.map((i): Vec3 => {
          if (normal === null) return faceNormal;
          const n = elementAt(normal, i);
          return normalize(this.axes.vector([n[0], n[1], n[2]]));
        });
        const uvs = uvAccessors.map(accessor => local.map((i): Vec2 => {
          if (accessor === null) return [0, 1];
          const uv = elementAt(accessor, i);
          return [uv[0], 1 - uv[1]];
        }));
        polygons.push({ corners, normals, uvs, materialIndex: Math.max(slot, 0) });
      }

      const extras = readZusiExtras(PrimitiveExtrasSchema, primitive, `mesh "${mesh.getName()}"`);
      for (const [a, b] of extras.sharpEdges) {
        sharpEdges.add(edgeKey(base + a, base + b));
      }
    }

    const converted: SceneMesh = { positions, polygons, materials: slotMaterials, uvLayers, sharpEdges };
    this.meshMap.set(mesh, converted);
    return converted;
  }

  private faceNormal(positions: readonly Vec3[], corners: readonly number[]): Vec3 {
    const [a, b, c] = corners.map(i => positions[i]);
    const u: Vec3 = [b[0] - a[0], b[1] - a[1], b[2] - a[2]];
    const v: Vec3 = [c[0] - a[0], c[1] - a[1], c[2] - a[2]];
    return normalize([u[1] * v[2] - u[2] * v[1], u[2] * v[0] - u[0] * v[2], u[0] * v[1] - u[1] * v[0]]);
  }

  /**
   * Attaches clips and channel curves to nodes. Returns the last key time
   * in seconds over all animations.
   */
  private bindAnimations(animations: readonly Animation[]): number {
    let lastKeyTime = 0;

    animations.forEach((animation, index) => {
      const id = `animation:${index}`;
      const name = animation.getName() || id;
      const extras = readZusiExtras(ClipExtrasSchema, animation, `animation "${name}"`);
      const tracks: AnimationTrack[] = [];
      const targets = new Map<GltfSceneNode, NodeChannel[]>();

      for (const channel of animation.listChannels()) {
        const path = channel.getTargetPath();
        const target = channel.getTargetNode();
        const sampler = channel.getSampler();
        const input = sampler?.getInput() ?? null;
        const output = sampler?.getOutput() ?? null;
        if (!isTrackPath(path) || target === null || sampler === null || input === null || output === null) continue;

        const times: number[] = [];
        for (let i = 0; i < input.getCount(); i++) times.push(input.getScalar(i));
        const values: number[][] = [];
        for (let i = 0; i < output.getCount(); i++) values.push(elementAt(output, i));

        const interpolation = sampler.getInterpolation();
        lastKeyTime = Math.max(lastKeyTime, ...times);
        tracks.push({ path, frames: times.map(t => t * this.framesPerSecond) });

        const node = this.nodeMap.get(target);
        if (node === undefined) continue;
        const nodeChannels = targets.get(node) ?? [];
        nodeChannels.push({
          path,
          curve: {
            times,
            values,
            interpolation: isInterpolation(interpolation) ? interpolation : 'LINEAR',
            isRotation: path === 'rotation',
          },
        });
        targets.set(node, nodeChannels);
      }

      const clip: AnimationClip = {
        id,
        name,
        type: extras.type,
        nameTags: extras.names,
        speed: extras.speed,
        loop: extras.loop,
        description: extras.description,
        tracks,
      };

      for (const [node, channels] of targets) {
        if (node.clip !== null) {
          this.warnings?.ambiguousAnimation(
            `Node "${node.name}" is animated by "${node.clip.name}" and "${name}"; using "${node.clip.name}"`,
            { node: node.name }
          );
          continue;
        }
        node.clip = clip;
        node.channels = channels;
      }
    });

    return lastKeyTime;
  }
}
