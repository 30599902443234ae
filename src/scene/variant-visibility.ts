import type { VariantVisibility } from './scene-types';

/**
 * Whether an object shows up when exporting the given variants. With no
 * variants requested, or no setting on the object, everything is visible.
 */
export function isVisible(visibility: VariantVisibility | null, activeVariantIds: readonly number[]): boolean {
  if (activeVariantIds.length === 0 || visibility === null) {
    return true;
  }
  const listed = activeVariantIds.some(id => visibility.ids.includes(id));
  return visibility.mode === 'show' ? listed : !listed;
}
