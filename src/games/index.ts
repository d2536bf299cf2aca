/**
 * conveyor-bros
 *
 * Terminal conveyor-belt arcade game for xterm.js and CLI
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run a game: runGame('conveyor', terminal, { difficulty: 'easy' })
 * 3. Handle game events: listen for GAME_EVENTS on window
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  getSubtleBackgroundColor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,
} from './utils';

export type { PhosphorMode, GameTerminal, GameKeyEvent } from './utils';

// Re-export transitions
export {
  GAME_EVENTS,
  playBootTransition,
  playExitTransition,
  dispatchGameQuit,
} from './gameTransitions';

// Re-export menu utilities
export {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
} from './shared/menu';

export type { SimpleMenuItem } from './shared/menu';

import type { GameTerminal } from './utils';
import type { ConveyorGameOptions } from './conveyor/engine';
import { runConveyorGame, type ConveyorController } from './conveyor';

/**
 * Game registry with metadata
 */
export interface GameInfo {
  id: string;
  name: string;
  description: string;
  run: (terminal: GameTerminal, options?: ConveyorGameOptions) => ConveyorController;
}

export const games: GameInfo[] = [
  { id: 'conveyor', name: 'Conveyor Bros', description: 'Pass the packages up to the truck', run: runConveyorGame },
];

/**
 * Get a game by ID
 */
export function getGame(id: string): GameInfo | undefined {
  return games.find(g => g.id === id);
}

/**
 * Run a game by ID
 */
export function runGame(
  id: string,
  terminal: GameTerminal,
  options?: ConveyorGameOptions
): ConveyorController | undefined {
  const game = getGame(id);
  return game?.run(terminal, options);
}

// Also export the game runner and session for direct use
export { runConveyorGame, ConveyorGame, FRAME_MS } from './conveyor';
export type { ConveyorController } from './conveyor';
export type { ConveyorGameOptions, GameEvent, GamePhase } from './conveyor/engine';
export {
  DIFFICULTIES,
  getDifficulty,
  isDifficultyName,
  type Difficulty,
  type DifficultyName,
} from './conveyor/difficulty';

// Re-export shared game effects (particles, popups, flash)
export {
  spawnParticles,
  updateParticles,
  addScorePopup,
  updatePopups,
  createFlashState,
  triggerFlash,
  updateFlash,
  isFlashVisible,
  MAX_PARTICLES,
  PARTICLE_CHARS,
} from './shared/effects';
export type {
  Particle,
  ScorePopup,
  FlashState,
} from './shared/effects';
