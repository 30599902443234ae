import type { SceneHost } from './scene-types';

/**
 * Runs `fn` and puts the host's frame cursor back where it was, whether
 * `fn` returns or throws.
 */
export function withFrameCursor<T>(host: SceneHost, fn: () => T): T {
  const saved = host.getCurrentFrame();
  try {
    return fn();
  } finally {
    host.setCurrentFrame(saved);
  }
}
