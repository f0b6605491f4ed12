import { randomInt } from 'crypto';
import { ConfigurationError } from '../errors/index.js';
import type { GenerationPolicy } from '../types/index.js';

const LOWER = 'abcdefghijklmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const NUMERIC = '0123456789';
const SPECIAL = '~!@#$%^&*()_+-={}[]:;<>,.?';

export const DEFAULT_GENERATED_LENGTH = 16;

export type RandomIndex = (max: number) => number;

interface CharacterClass {
  name: string;
  characters: string;
  excluded: boolean;
  minimum: number;
}

/**
 * Generates a value satisfying `policy`: every non-excluded class is allowed, and each class
 * contributes at least its declared minimum.
 */
export function generateValue(policy: GenerationPolicy = {}, random: RandomIndex = randomInt): string {
  const length = policy.length ?? DEFAULT_GENERATED_LENGTH;
  const classes: CharacterClass[] = [
    { name: 'lower', characters: LOWER, excluded: policy.noLower ?? false, minimum: policy.minLower ?? 0 },
    { name: 'upper', characters: UPPER, excluded: policy.noUpper ?? false, minimum: policy.minUpper ?? 0 },
    { name: 'numeric', characters: NUMERIC, excluded: policy.noNumeric ?? false, minimum: policy.minNumeric ?? 0 },
    { name: 'special', characters: SPECIAL, excluded: policy.noSpecial ?? false, minimum: policy.minSpecial ?? 0 }
  ];

  for (const characterClass of classes) {
    if (characterClass.excluded && characterClass.minimum > 0) {
      throw new ConfigurationError(
        `Generation policy excludes ${characterClass.name} characters but requires at least ${characterClass.minimum}`
      );
    }
  }

  const allowed = classes.filter(characterClass => !characterClass.excluded);
  if (allowed.length === 0) {
    throw new ConfigurationError('Generation policy excludes every character class');
  }

  const required = allowed.reduce((total, characterClass) => total + characterClass.minimum, 0);
  if (required > length) {
    throw new ConfigurationError(
      `Generation policy requires ${required} characters from minimums but the length is ${length}`
    );
  }

  const characters: string[] = [];
  for (const characterClass of allowed) {
    for (let i = 0; i < characterClass.minimum; i++) {
      characters.push(pick(characterClass.characters, random));
    }
  }

  const pool = allowed.map(characterClass => characterClass.characters).join('');
  while (characters.length < length) {
    characters.push(pick(pool, random));
  }

  // Fisher-Yates, so the minimums are not always at the front
  for (let i = characters.length - 1; i > 0; i--) {
    const j = random(i + 1);
    [characters[i], characters[j]] = [characters[j], characters[i]];
  }

  return characters.join('');
}

function pick(characters: string, random: RandomIndex): string {
  return characters[random(characters.length)];
}
