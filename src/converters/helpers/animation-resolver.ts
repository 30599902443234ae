/**
 * Animation Resolver
 *
 * Decides which clip drives a node. A node is driven by its own clip, else
 * by whatever drives its parent, else by whatever drives one of its
 * constraint targets. Results are memoized per export run.
 */

import type { AnimationClip, SceneNode, TrackPath } from '../../scene/scene-types';
import type { WarningCollector } from '../../utils/warnings';

export class AnimationResolver {
  private readonly drivingCache = new Map<string, AnimationClip | null>();
  private readonly resolving = new Set<string>();
  private readonly reported = new Set<string>();

  constructor(
    readonly exportAnimations: boolean,
    private readonly warnings?: WarningCollector
  ) { }

  drivingClip(node: SceneNode): AnimationClip | null {
    const cached = this.drivingCache.get(node.id);
    if (cached !== undefined) {
      return cached;
    }
    // Constraint cycles resolve to no animation
    if (this.resolving.has(node.id)) {
      return null;
    }

    this.resolving.add(node.id);
    let clip: AnimationClip | null = node.clip;
    try {
      if (clip === null && node.parent !== null) {
        clip = this.drivingClip(node.parent);
      }
      for (const constraint of node.constraints) {
        if (clip !== null) break;
        if (constraint.target !== null) {
          clip = this.drivingClip(constraint.target);
        }
      }
    } finally {
      this.resolving.delete(node.id);
    }

    this.drivingCache.set(node.id, clip);
    return clip;
  }

  /**
   * Whether the node moves on its own, either through its clip or through
   * a constraint that resolves to one.
   */
  isAnimated(node: SceneNode): boolean {
    if (!this.exportAnimations) {
      return false;
    }
    if (node.clip !== null) {
      return true;
    }
    if (node.constraints.length === 0) {
      return false;
    }

    const animated = this.drivingClip(node) !== null;
    if (!animated && !this.reported.has(node.id)) {
      this.reported.add(node.id);
      this.warnings?.ambiguousAnimation(
        `Constraints on "${node.name}" resolve to no animation; exporting it as static`,
        { node: node.name }
      );
    }
    return animated;
  }

  /**
   * Nearest animated ancestor-or-self, or null.
   */
  animatingNode(node: SceneNode): SceneNode | null {
    for (let current: SceneNode | null = node; current !== null; current = current.parent) {
      if (this.isAnimated(current)) {
        return current;
      }
    }
    return null;
  }

  hasTrack(node: SceneNode, path: TrackPath): boolean {
    const clip = this.drivingClip(node);
    return clip !== null && clip.tracks.some(track => track.path === path);
  }
}
