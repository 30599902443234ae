/**
 * Bounding Radius Aggregator
 *
 * A file's radius covers its own subsets (moved by their animation, if any)
 * and every linked file scaled and moved by the link's placement. Files are
 * processed in post-order so a link's radius is final before its parent
 * reads it.
 */

import type { FileForest, FileNode } from './file-tree-builder';

export class BoundingRadiusAggregator {
  private radius = 0;

  get value(): number {
    return this.radius;
  }

  private include(candidate: number): void {
    if (candidate > this.radius) {
      this.radius = candidate;
    }
  }

  addSubset(subsetRadius: number): void {
    this.include(subsetRadius);
  }

  /**
   * Subset moved by its animation: the keyframe translation adds to the
   * subset's own extent.
   */
  addAnimatedSubset(subsetRadius: number, maxTranslation: number): void {
    this.include(subsetRadius + maxTranslation);
  }

  addLink(linkRadius: number, maxScale: number, translation: number): void {
    this.include(Math.abs(maxScale) * linkRadius + translation);
  }
}

/**
 * Files of the forest with every generated file before the file linking it.
 */
export function postOrderFiles(forest: FileForest): FileNode[] {
  const ordered: FileNode[] = [];
  const visit = (file: FileNode): void => {
    for (const link of file.links) {
      if (link.kind === 'generated') {
        visit(link.file);
      }
    }
    ordered.push(file);
  };
  visit(forest.main);
  return ordered;
}
