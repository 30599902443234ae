/**
 * File Tree Builder
 *
 * Splits a scene into the main file and one generated file per nested
 * animation level. A node becomes the root of a generated file when it is
 * the second animated node on the way up from some exported geometry:
 * the first one moves inside its file, the second one moves that whole
 * file as a linked object.
 */

import type { SceneNode } from '../../scene/scene-types';
import type { LinkMetadata } from '../../schemas';
import { subFileName } from '../../utils/path-utils';
import type { AnimationResolver } from './animation-resolver';
import type { Subset } from './subset-assembler';

export interface FileNode {
  filename: string;
  isMainFile: boolean;
  /** Root of a generated file; null for the main file */
  root: SceneNode | null;
  /** Nodes owned by this file, in scene order */
  members: SceneNode[];
  subsets: Subset[];
  links: LinkReference[];
  /** Set after the file's contents have been written */
  boundingRadius: number;
}

/**
 * A link to a file this export generates.
 */
export interface GeneratedLink {
  kind: 'generated';
  node: SceneNode;
  file: FileNode;
}

/**
 * A link to a pre-existing LS3 file, placed at a marker node.
 */
export interface ExternalLink {
  kind: 'external';
  node: SceneNode;
  metadata: LinkMetadata;
}

export type LinkReference = GeneratedLink | ExternalLink;

export interface FileForest {
  main: FileNode;
  /** Main file first, generated files in scene order */
  files: FileNode[];
}

export interface FileTreeOptions {
  mainFileName: string;
  /** Whether a node carries geometry that will be exported */
  contributesGeometry: (node: SceneNode) => boolean;
  /** Whether a link marker is exported at all */
  includeLink: (node: SceneNode) => boolean;
}

function createFileNode(filename: string, root: SceneNode | null): FileNode {
  return {
    filename,
    isMainFile: root === null,
    root,
    members: [],
    subsets: [],
    links: [],
    boundingRadius: 0,
  };
}

export class FileTreeBuilder {
  private readonly rootCache = new Map<string, SceneNode | null>();

  constructor(
    private readonly nodes: readonly SceneNode[],
    private readonly resolver: AnimationResolver
  ) { }

  /**
   * Root of the file the node's geometry is written relative to, or null
   * for the main file. Link markers are their own root.
   */
  fileRoot(node: SceneNode): SceneNode | null {
    if (!this.resolver.exportAnimations) {
      return null;
    }
    if (node.link !== null) {
      return node;
    }

    const cached = this.rootCache.get(node.id);
    if (cached !== undefined) {
      return cached;
    }

    let root: SceneNode | null = null;
    let count = this.resolver.isAnimated(node) ? 1 : 0;
    for (let current = node.parent; current !== null; current = current.parent) {
      if (this.resolver.isAnimated(current)) {
        count++;
      }
      if (count === 2) {
        root = current;
        break;
      }
    }

    this.rootCache.set(node.id, root);
    return root;
  }

  build(options: FileTreeOptions): FileForest {
    const main = createFileNode(options.mainFileName, null);
    const generated = new Map<SceneNode, FileNode>();

    const queue = this.nodes.filter(node =>
      node.link !== null ? options.includeLink(node) : options.contributesGeometry(node));
    const visited = new Set<SceneNode>(queue);

    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      const root = this.fileRoot(node);
      if (root === null || root.link !== null) continue;

      if (!generated.has(root)) {
        generated.set(root, createFileNode(subFileName(options.mainFileName, root.name), root));
      }
      if (!visited.has(root)) {
        visited.add(root);
        queue.push(root);
      }
    }

    const order = new Map(this.nodes.map((node, i) => [node, i] as const));
    const position = (node: SceneNode): number => order.get(node) ?? Number.MAX_SAFE_INTEGER;

    const owner = (node: SceneNode | null): FileNode => {
      for (let current = node; current !== null; current = current.parent) {
        const file = generated.get(current);
        if (file !== undefined) return file;
      }
      return main;
    };

    for (const node of this.nodes) {
      owner(node).members.push(node);
    }

    const links: LinkReference[] = [];
    for (const [root, file] of generated) {
      links.push({ kind: 'generated', node: root, file });
    }
    for (const node of this.nodes) {
      if (node.link !== null && options.includeLink(node)) {
        links.push({ kind: 'external', node, metadata: node.link });
      }
    }
    links
      .sort((a, b) => position(a.node) - position(b.node))
      .forEach(link => owner(link.node.parent).links.push(link));

    const files = [...generated.entries()]
      .sort(([a], [b]) => position(a) - position(b))
      .map(([, file]) => file);
    return { main, files: [main, ...files] };
  }
}
