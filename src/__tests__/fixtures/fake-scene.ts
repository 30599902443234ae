import type {
  AnimationClip,
  SceneConstraint,
  SceneHost,
  SceneMaterial,
  SceneMesh,
  SceneNode,
  VariantVisibility,
} from '../../scene/scene-types';
import { RenderStateSchema, SceneInfoSchema, type AnchorMetadata, type LinkMetadata, type SceneInfo } from '../../schemas';
import type { Transform, Vec3 } from '../../types';

export type Pose = Partial<Transform>;

export interface FakeNodeOptions {
  name: string;
  parent?: FakeNode;
  clip?: AnimationClip;
  mesh?: SceneMesh;
  subsetName?: string;
  link?: LinkMetadata;
  anchor?: AnchorMetadata;
  visibility?: VariantVisibility;
  pose?: Pose | ((frame: number) => Pose);
}

export class FakeNode implements SceneNode {
  readonly children: FakeNode[] = [];
  constraints: SceneConstraint[] = [];
  readonly parent: FakeNode | null;
  readonly name: string;
  readonly clip: AnimationClip | null;
  readonly mesh: SceneMesh | null;
  readonly subsetName: string;
  readonly link: LinkMetadata | null;
  readonly anchor: AnchorMetadata | null;
  readonly visibility: VariantVisibility | null;
  private readonly pose: Pose | ((frame: number) => Pose);

  constructor(readonly id: string, options: FakeNodeOptions, private readonly host: FakeSceneHost) {
    this.name = options.name;
    this.parent = options.parent ?? null;
    this.clip = options.clip ?? null;
    this.mesh = options.mesh ?? null;
    this.subsetName = options.subsetName ?? '';
    this.link = options.link ?? null;
    this.anchor = options.anchor ?? null;
    this.visibility = options.visibility ?? null;
    this.pose = options.pose ?? {};
  }

  localTransform(): Transform {
    const pose = typeof this.pose === 'function' ? this.pose(this.host.getCurrentFrame()) : this.pose;
    return {
      translation: pose.translation ?? [0, 0, 0],
      rotation: pose.rotation ?? [0, 0, 0, 1],
      scale: pose.scale ?? [1, 1, 1],
    };
  }
}

/**
 * In-memory scene; nodes must be added parents first.
 */
export class FakeSceneHost implements SceneHost {
  readonly nodes: FakeNode[] = [];
  readonly materials: SceneMaterial[] = [];
  info: SceneInfo = SceneInfoSchema.parse({});
  frameStart = 0;
  frameEnd = 10;
  private frame = 0;

  getCurrentFrame(): number {
    return this.frame;
  }

  setCurrentFrame(frame: number): void {
    this.frame = frame;
  }

  addNode(options: FakeNodeOptions): FakeNode {
    const node = new FakeNode(`node:${this.nodes.length}`, options, this);
    options.parent?.children.push(node);
    this.nodes.push(node);
    return node;
  }

  addMaterial(name: string, overrides: Partial<SceneMaterial> = {}): SceneMaterial {
    const material: SceneMaterial = {
      id: `material:${this.materials.length}`,
      name,
      diffuse: [1, 1, 1],
      alpha: 1,
      ambient: null,
      emit: null,
      overexposure: null,
      overexposureAmbient: null,
      landscapeType: '0',
      gfType: '0',
      forceBrightness: 0,
      signalMagnification: 0,
      zOffset: 0,
      doubleSided: false,
      texturePreset: '1',
      renderState: RenderStateSchema.parse({}),
      textures: [],
      ...overrides,
    };
    this.materials.push(material);
    return material;
  }
}

export function makeClip(name: string, overrides: Partial<AnimationClip> = {}): AnimationClip {
  return {
    id: `clip:${name}`,
    name,
    type: '1',
    nameTags: [],
    speed: 0,
    loop: false,
    description: undefined,
    tracks: [{ path: 'translation', frames: [0, 10] }],
    ...overrides,
  };
}

/**
 * One triangle with up-facing normals and no UV layers.
 */
export function triangleMesh(positions: Vec3[], material: SceneMaterial | null = null): SceneMesh {
  return {
    positions,
    polygons: [{
      corners: [0, 1, 2],
      normals: [[0, 0, 1], [0, 0, 1], [0, 0, 1]],
      uvs: [],
      materialIndex: 0,
    }],
    materials: material === null ? [] : [material],
    uvLayers: [],
    sharpEdges: new Set(),
  };
}

export const UNIT_TRIANGLE: Vec3[] = [[0, 0, 0], [1, 0, 0], [0, 1, 0]];
