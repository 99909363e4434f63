import type { Steering } from '../contracts/catalog.js';

const ENERGY_MODIFIERS: Record<number, string> = {
  [-2]: 'slow ambient calm relaxing',
  [-1]: 'chill mellow laid back',
  0: '',
  1: 'upbeat energetic',
  2: 'hype intense bangers high energy',
};

/** Search words for an energy level; levels past ±2 use the nearest one. */
export function energyModifier(energy: number): string {
  const level = Math.max(-2, Math.min(2, Math.round(energy)));
  return ENERGY_MODIFIERS[level] ?? '';
}

function joinWords(...parts: string[]): string {
  return parts.map((p) => p.trim()).filter(Boolean).join(' ');
}

export function buildRadioQuery(description: string, energy: number): string {
  return joinWords(description, energyModifier(energy), 'music');
}

export function buildArtistQuery(artist: string): string {
  return joinWords(artist, 'official audio');
}

/** Text a catalog should search for a steering request. */
export function steeringQuery(steering: Steering): string {
  return steering.intent === 'artist'
    ? buildArtistQuery(steering.description)
    : buildRadioQuery(steering.description, steering.energy);
}
