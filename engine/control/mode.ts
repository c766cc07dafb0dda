/**
 * Content modes and their overlay labels.
 */

export type Mode = 'sequential' | 'random' | 'category' | 'weather';

/** Modes that draw from the phrase catalogue. */
export type PhraseMode = Exclude<Mode, 'weather'>;

export const MODE_LABELS = {
  sequential: 'Режим: подряд',
  random: 'Режим: рандом',
  category: 'Режим: по разделу',
  weather: 'Режим: погода',
} as const satisfies Record<Mode, string>;

export function modeLabel(mode: Mode): string {
  return MODE_LABELS[mode];
}

/** Short-press cycle; weather is entered only through its own button. */
export function nextPhraseMode(mode: PhraseMode): PhraseMode {
  switch (mode) {
    case 'sequential':
      return 'random';
    case 'random':
      return 'category';
    case 'category':
      return 'sequential';
    default: {
      const unreachable: never = mode;
      return unreachable;
    }
  }
}

export function isPhraseMode(mode: Mode): mode is PhraseMode {
  return mode !== 'weather';
}

export function categoryLabel(categoryName: string): string {
  return `Раздел: ${categoryName}`;
}
