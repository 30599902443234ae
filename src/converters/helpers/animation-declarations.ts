/**
 * Animation Declarations
 *
 * Numbers the animated subsets and links of a file and groups the clips
 * seen in the file (and in the files it generates) into `<Animation>`
 * declarations the simulator can trigger.
 */

import { ANIMATION, getAnimationTypeDescription } from '../../constants/animation';
import type { AnimationClip } from '../../scene/scene-types';
import type { AnimationResolver } from './animation-resolver';
import type { FileNode, LinkReference } from './file-tree-builder';
import type { Subset } from './subset-assembler';

export interface NumberedSubset {
  number: number;
  /** Position of the subset in the file's subset list */
  index: number;
  subset: Subset;
  clip: AnimationClip;
}

export interface NumberedLink {
  number: number;
  /** Position of the link in the file's link list */
  index: number;
  link: LinkReference;
  clip: AnimationClip;
}

export interface AnimationNumbering {
  subsets: NumberedSubset[];
  links: NumberedLink[];
}

export interface AnimationDeclaration {
  type: string;
  description: string;
  loop: boolean;
  numbers: number[];
}

/**
 * Animated subsets get 1..K in subset order; animated links continue
 * from K+1 in link order. Subsets moved by the file root itself are
 * static within the file.
 */
export function numberAnimations(file: FileNode, resolver: AnimationResolver): AnimationNumbering {
  const subsets: NumberedSubset[] = [];
  const links: NumberedLink[] = [];
  let next = 1;

  file.subsets.forEach((subset, index) => {
    const node = subset.identifier.animatingNode;
    if (node === null || node === file.root) return;
    const clip = resolver.drivingClip(node);
    if (clip !== null) {
      subsets.push({ number: next++, index, subset, clip });
    }
  });

  file.links.forEach((link, index) => {
    if (!resolver.isAnimated(link.node)) return;
    const clip = resolver.drivingClip(link.node);
    if (clip !== null) {
      links.push({ number: next++, index, link, clip });
    }
  });

  return { subsets, links };
}

/**
 * Clips driving nodes of `file` and of every generated file below it.
 * The root's own clip only counts for linked files, where the parent file
 * animates the link.
 */
export function collectFileClips(file: FileNode, resolver: AnimationResolver, includeRoot = false): AnimationClip[] {
  const clips = new Map<string, AnimationClip>();
  const add = (clip: AnimationClip | null): void => {
    if (clip !== null && !clips.has(clip.id)) {
      clips.set(clip.id, clip);
    }
  };

  for (const member of file.members) {
    if (member === file.root && !includeRoot) continue;
    if (resolver.isAnimated(member)) {
      add(resolver.drivingClip(member));
    }
  }
  for (const link of file.links) {
    if (link.kind === 'generated') {
      collectFileClips(link.file, resolver, true).forEach(add);
    }
  }
  return [...clips.values()];
}

interface DeclarationGroup {
  type: string;
  description: string;
  loop: boolean;
  clipIds: Set<string>;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function buildDeclarations(clips: readonly AnimationClip[], numbering: AnimationNumbering): AnimationDeclaration[] {
  const groups = new Map<string, DeclarationGroup>();

  for (const clip of clips) {
    const generic = getAnimationTypeDescription(clip.type, clip.description ?? '');
    const names = clip.type === ANIMATION.NAMED_ANIMATION_TYPE && clip.nameTags.length > 0
      ? clip.nameTags
      : [generic];

    for (const name of names) {
      const description = clip.loop && name === generic ? `${name}${ANIMATION.LOOP_SUFFIX}` : name;
      // Non-named types collapse to one declaration per type
      const groupName = clip.type === ANIMATION.NAMED_ANIMATION_TYPE ? description : '';
      const key = JSON.stringify([clip.type, groupName, clip.loop]);

      let group = groups.get(key);
      if (group === undefined) {
        group = { type: clip.type, description, loop: clip.loop, clipIds: new Set() };
        groups.set(key, group);
      }
      group.clipIds.add(clip.id);
    }
  }

  const items = [...numbering.subsets, ...numbering.links];
  return [...groups.values()]
    .sort((a, b) =>
      compareText(a.type, b.type)
      || compareText(a.description, b.description)
      || Number(a.loop) - Number(b.loop))
    .map(group => ({
      type: group.type,
      description: group.description,
      loop: group.loop,
      numbers: items
        .filter(item => group.clipIds.has(item.clip.id))
        .map(item => item.number)
        .sort((a, b) => a - b),
    }));
}
