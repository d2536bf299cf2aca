/**
 * conveyor-bros
 *
 * Conveyor-belt arcade game for xterm.js and CLI.
 *
 * Library usage (xterm.js):
 *   import { runConveyorGame, setTheme } from 'conveyor-bros';
 *   setTheme('cyan');
 *   const controller = runConveyorGame(terminal, { difficulty: 'easy' });
 *
 * CLI usage:
 *   conveyor-bros --difficulty medium
 */

export {
  // Game registry
  games,
  getGame,
  runGame,
  type GameInfo,

  // Game
  runConveyorGame,
  ConveyorGame,
  FRAME_MS,
  DIFFICULTIES,
  getDifficulty,
  isDifficultyName,
  type ConveyorController,
  type ConveyorGameOptions,
  type GameEvent,
  type GamePhase,
  type Difficulty,
  type DifficultyName,

  // Theme utilities
  setTheme,
  getTheme,
  getCurrentThemeColor,
  isLightTheme,
  getSubtleBackgroundColor,
  type PhosphorMode,
  type GameTerminal,
  type GameKeyEvent,

  // Terminal buffer management
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,

  // Transitions
  GAME_EVENTS,
  playBootTransition,
  playExitTransition,
  dispatchGameQuit,

  // Menu system
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  type SimpleMenuItem,

  // Shared game effects (particles, popups, flash)
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
  type Particle,
  type ScorePopup,
  type FlashState,
} from './games';
