/**
 * Animation Sampler
 *
 * Samples one driving clip at its keyframe positions, relative to a file
 * root, and turns the poses into LS3 keyframes. Frames are extended so the
 * sampled range starts and ends on whole multiples of the scene's playback
 * span; times are normalized to that span.
 */

import type { Quat, Vec3 } from '../../types';
import type { AnimationClip, SceneHost, SceneNode } from '../../scene/scene-types';
import { withFrameCursor } from '../../scene/frame-scope';
import { decomposeMatrix, eulerToQuat, matrixToCompatibleEuler, matrixToEuler } from '../../utils/matrix-utils';
import { horizontalLength, toZusiQuat, toZusiVector } from '../../utils/zusi-coordinates';
import { isZeroVector } from '../../utils/xml-formatter';
import { relativeTransform } from './relative-transform';

export interface Keyframe {
  /** Normalized time; may lie outside [0, 1] */
  time: number;
  /** Zusi coordinates */
  translation?: Vec3;
  /** Zusi component order */
  rotation?: Quat;
}

export interface SampledAnimation {
  keyframes: Keyframe[];
  /** Largest horizontal translation over all keyframes */
  maxTranslation: number;
}

export interface SampleOptions {
  writeTranslation: boolean;
  writeRotation: boolean;
}

/**
 * Frames to sample, ascending. Source keyframes are rounded to whole
 * frames; the smallest and largest are widened to whole multiples of the
 * span (measured from `frameStart`).
 */
export function collectFrames(clip: AnimationClip, frameStart: number, frameEnd: number): number[] {
  const span = frameEnd - frameStart;
  if (span === 0) {
    return [frameStart];
  }

  const frames = new Set<number>();
  for (const track of clip.tracks) {
    for (const frame of track.frames) {
      frames.add(Math.round(frame));
    }
  }
  if (frames.size === 0) {
    return [];
  }

  const min = Math.min(...frames);
  const max = Math.max(...frames);
  frames.add(frameStart + Math.floor((min - frameStart) / span) * span);
  frames.add(frameStart + Math.ceil((max - frameStart) / span) * span);
  return [...frames].sort((a, b) => a - b);
}

export function normalizedTime(frame: number, frameStart: number, frameEnd: number): number {
  const span = frameEnd - frameStart;
  return span === 0 ? 0 : (frame - frameStart) / span;
}

/**
 * Samples `node` relative to `root` at every frame of `clip`. The host's
 * frame cursor is restored afterwards, also when sampling throws.
 */
export function sampleAnimation(
  host: SceneHost,
  clip: AnimationClip,
  node: SceneNode,
  root: SceneNode | null,
  options: SampleOptions
): SampledAnimation {
  const frames = collectFrames(clip, host.frameStart, host.frameEnd);

  return withFrameCursor(host, () => {
    const keyframes: Keyframe[] = [];
    let maxTranslation = 0;
    let previousEuler: Vec3 | undefined;

    for (const frame of frames) {
      host.setCurrentFrame(frame);
      const matrix = relativeTransform(node, root, root);
      const keyframe: Keyframe = { time: normalizedTime(frame, host.frameStart, host.frameEnd) };

      if (options.writeTranslation) {
        const { translation } = decomposeMatrix(matrix);
        if (!isZeroVector(translation)) {
          keyframe.translation = toZusiVector(translation);
          maxTranslation = Math.max(maxTranslation, horizontalLength(translation));
        }
      }

      if (options.writeRotation) {
        const euler = previousEuler === undefined
          ? matrixToEuler(matrix)
          : matrixToCompatibleEuler(matrix, previousEuler);
        previousEuler = euler;
        keyframe.rotation = toZusiQuat(eulerToQuat(euler, 'XYZ'));
      }

      keyframes.push(keyframe);
    }

    return { keyframes, maxTranslation };
  });
}
