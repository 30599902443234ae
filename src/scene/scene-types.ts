/**
 * Scene Graph Interfaces
 *
 * The read-only view of a host scene that export works on. Host space is
 * right-handed and Z-up; frame numbers are the host's animation frames.
 */

import type { Transform, Vec2, Vec3 } from '../types';
import type { AnchorMetadata, LinkMetadata, RenderState, SceneInfo } from '../schemas';

export type TrackPath = 'translation' | 'rotation' | 'scale';

export interface VariantVisibility {
  mode: 'show' | 'hide';
  ids: readonly number[];
}

export interface SceneTexture {
  /** Absolute path of the image file */
  path: string;
  /** Name of the UV layer the texture uses; empty means the first layer */
  uvLayer: string;
  visibility: VariantVisibility | null;
}

export interface SceneMaterial {
  readonly id: string;
  readonly name: string;
  readonly diffuse: Vec3;
  readonly alpha: number;
  readonly ambient: [number, number, number, number] | null;
  readonly emit: Vec3 | null;
  readonly overexposure: Vec3 | null;
  readonly overexposureAmbient: Vec3 | null;
  readonly landscapeType: string;
  readonly gfType: string;
  readonly forceBrightness: number;
  readonly signalMagnification: number;
  /** Raw depth offset; mapped to a small integer bucket per export */
  readonly zOffset: number;
  readonly doubleSided: boolean;
  readonly texturePreset: string;
  /** Written only with the custom texture preset */
  readonly renderState: RenderState;
  readonly textures: readonly SceneTexture[];
}

export interface ScenePolygon {
  /** Indices into the mesh's positions, 3 or more */
  readonly corners: readonly number[];
  /** One normal per corner */
  readonly normals: readonly Vec3[];
  /** Per UV layer, one coordinate per corner (bottom-left origin) */
  readonly uvs: readonly (readonly Vec2[])[];
  readonly materialIndex: number;
}

export interface SceneMesh {
  readonly positions: readonly Vec3[];
  readonly polygons: readonly ScenePolygon[];
  /** Material slots; an empty list means a single null material */
  readonly materials: readonly (SceneMaterial | null)[];
  readonly uvLayers: readonly string[];
  /** Edges that must not be welded, see edgeKey() */
  readonly sharpEdges: ReadonlySet<string>;
}

export function edgeKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

export interface AnimationTrack {
  readonly path: TrackPath;
  /** Keyframe positions in frames, not rounded */
  readonly frames: readonly number[];
}

export interface AnimationClip {
  readonly id: string;
  readonly name: string;
  /** Animation type tag (AniID) */
  readonly type: string;
  readonly nameTags: readonly string[];
  readonly speed: number;
  readonly loop: boolean;
  readonly description: string | undefined;
  readonly tracks: readonly AnimationTrack[];
}

export interface SceneConstraint {
  /** Node whose animation drives the constrained node, if resolvable */
  readonly target: SceneNode | null;
}

export interface SceneNode {
  /** Unique and stable within one host */
  readonly id: string;
  readonly name: string;
  readonly parent: SceneNode | null;
  readonly children: readonly SceneNode[];
  readonly constraints: readonly SceneConstraint[];
  /** Clip animating this node's own channels */
  readonly clip: AnimationClip | null;
  readonly mesh: SceneMesh | null;
  readonly subsetName: string;
  /** Set when the node marks a reference to an existing LS3 file */
  readonly link: LinkMetadata | null;
  readonly anchor: AnchorMetadata | null;
  readonly visibility: VariantVisibility | null;

  /**
   * Transform relative to the parent at the host's current frame.
   */
  localTransform(): Transform;
}

export interface SceneHost {
  /** All nodes in pre-order */
  readonly nodes: readonly SceneNode[];
  readonly materials: readonly SceneMaterial[];
  readonly frameStart: number;
  readonly frameEnd: number;
  readonly info: SceneInfo;

  getCurrentFrame(): number;
  setCurrentFrame(frame: number): void;
}
