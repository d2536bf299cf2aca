/**
 * Conveyor Bros - Difficulty Presets
 *
 * Each difficulty has:
 * - belts: number of stacked belts (always odd, so the top belt ends on Luigi's side)
 * - speedC0 / speedEven / speedOdd: belt speed multipliers (1 = one step every 9 frames)
 * - randomPerBelt: every belt picks speed 1 or 2 at level start
 * - minPackageIncrement: one more package in play per this many points
 * - truckRemoveEvery: every Nth truck delivery forgives one miss (null = never)
 * - invertControls: up and down swap for both workers
 */

export type DifficultyName = 'easy' | 'medium' | 'extreme' | 'crazy';

export interface Difficulty {
  readonly name: DifficultyName;
  readonly label: string;
  readonly belts: number;
  readonly speedC0: number;
  readonly speedEven: number;
  readonly speedOdd: number;
  readonly randomPerBelt: boolean;
  readonly minPackageIncrement: number;
  readonly truckRemoveEvery: number | null;
  readonly invertControls: boolean;
}

export const DIFFICULTIES: readonly Difficulty[] = [
  {
    name: 'easy',
    label: 'EASY',
    belts: 5,
    speedC0: 1,
    speedEven: 1,
    speedOdd: 1,
    randomPerBelt: false,
    minPackageIncrement: 50,
    truckRemoveEvery: 3,
    invertControls: false,
  },
  {
    name: 'medium',
    label: 'MEDIUM',
    belts: 7,
    speedC0: 1,
    speedEven: 1,
    speedOdd: 1.5,
    randomPerBelt: false,
    minPackageIncrement: 30,
    truckRemoveEvery: 5,
    invertControls: false,
  },
  {
    name: 'extreme',
    label: 'EXTREME',
    belts: 9,
    speedC0: 1,
    speedEven: 1.5,
    speedOdd: 2,
    randomPerBelt: false,
    minPackageIncrement: 30,
    truckRemoveEvery: 5,
    invertControls: false,
  },
  // Crazy - random belt speeds, reversed controls, no forgiveness
  {
    name: 'crazy',
    label: 'CRAZY',
    belts: 5,
    speedC0: 1,
    speedEven: 1,
    speedOdd: 1,
    randomPerBelt: true,
    minPackageIncrement: 20,
    truckRemoveEvery: null,
    invertControls: true,
  },
];

/** Number key that picks each difficulty on the menu */
export const DIFFICULTY_KEYS: Record<DifficultyName, string> = {
  easy: '1',
  medium: '2',
  extreme: '3',
  crazy: '4',
};

const RANDOM_SPEEDS = [1, 2];

export function isDifficultyName(value: string): value is DifficultyName {
  return DIFFICULTIES.some(d => d.name === value);
}

export function getDifficulty(name: string): Difficulty | undefined {
  return DIFFICULTIES.find(d => d.name === name);
}

export function getDifficultyByKey(key: string): Difficulty | undefined {
  return DIFFICULTIES.find(d => DIFFICULTY_KEYS[d.name] === key);
}

/**
 * Speed multiplier for one belt. Belt 0 is fed straight from the chute and
 * keeps its own speed; the rest alternate by parity.
 */
export function beltSpeed(
  difficulty: Difficulty,
  belt: number,
  random: () => number = Math.random
): number {
  if (difficulty.randomPerBelt) {
    return RANDOM_SPEEDS[Math.floor(random() * RANDOM_SPEEDS.length)];
  }
  if (belt === 0) return difficulty.speedC0;
  return belt % 2 === 0 ? difficulty.speedEven : difficulty.speedOdd;
}

/**
 * Packages the spawner keeps in play: starts at one, plus one per increment.
 */
export function maxPackages(difficulty: Difficulty, score: number): number {
  return 1 + Math.floor(score / difficulty.minPackageIncrement);
}
