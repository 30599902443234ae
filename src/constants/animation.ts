/**
 * Animation Constants
 */
export const ANIMATION = {
  /**
   * Keyframe quaternion components with a smaller magnitude are not written.
   */
  ROTATION_EPSILON: 1e-4,

  /**
   * Normals closer than this per component are treated as equal when welding,
   * so the first normal is kept instead of computing a bisector.
   */
  NORMAL_EQUALITY_EPSILON: 1e-5,

  /**
   * The animation type whose clips are declared once per name tag.
   */
  NAMED_ANIMATION_TYPE: '0',

  LOOP_SUFFIX: ' (loop)',
} as const;

/**
 * Generic descriptions of the animation types, keyed by AniID.
 */
export const ANIMATION_TYPE_DESCRIPTIONS: Readonly<Record<string, string>> = {
  '0': 'Undefiniert/signalgesteuert',
  '1': 'Zeitlich kontinuierlich',
  '2': 'Geschwindigkeit (angetrieben, gebremst)',
  '3': 'Geschwindigkeit (gebremst)',
  '4': 'Geschwindigkeit (angetrieben)',
  '5': 'Geschwindigkeit',
  '8': 'Stromabnehmer A',
  '9': 'Stromabnehmer B',
  '10': 'Stromabnehmer C',
  '11': 'Stromabnehmer D',
};

export function getAnimationTypeDescription(type: string, fallback = ''): string {
  return ANIMATION_TYPE_DESCRIPTIONS[type] ?? fallback;
}
