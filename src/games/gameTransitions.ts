/**
 * Game Transitions - shift-start and shift-end screens
 *
 * The host plays these around a game; games only dispatch events.
 */

import { getCurrentThemeColor, type GameTerminal } from './utils';

// Transition timing constants
const BOOT_DURATION = 800;  // ms for boot sequence
const EXIT_DURATION = 400;  // ms for exit sequence

const BOOT_MESSAGES = [
  'STARTING BELT MOTORS...',
  'OILING ROLLERS...',
  'CLOCKING IN...',
  'LOADING DOCK OPEN...',
  'CHECKING TRUCK TYRES...',
];

const EXIT_MESSAGES = [
  'SHIFT OVER',
  'FACTORY CLOSED',
  'BELTS STOPPED',
  'CLOCKED OUT',
];

// Belt sliding under a package
const LOADING_FRAMES = [
  '[▣   ]',
  '[ ▣  ]',
  '[  ▣ ]',
  '[   ▣]',
  '[  ▣ ]',
  '[ ▣  ]',
];

/**
 * Get random message from array
 */
function randomMessage(messages: string[]): string {
  return messages[Math.floor(Math.random() * messages.length)];
}

/**
 * Sleep helper
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Boot transition - plays before the game starts
 */
export async function playBootTransition(terminal: GameTerminal): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const centerX = Math.floor(terminal.cols / 2);
  const centerY = Math.floor(terminal.rows / 2);

  terminal.write('\x1b[?1049h');
  terminal.write('\x1b[?25l'); // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  const bootMsg = randomMessage(BOOT_MESSAGES);
  const msgX = Math.max(1, centerX - Math.floor(bootMsg.length / 2));
  terminal.write(`\x1b[${centerY - 1};${msgX}H${themeColor}${bootMsg}\x1b[0m`);

  const label = 'LOADING: ';
  const barX = Math.max(1, centerX - Math.floor((label.length + 6) / 2));
  for (const frame of LOADING_FRAMES) {
    terminal.write(`\x1b[${centerY + 1};${barX}H\x1b[2m${themeColor}${label}${frame}\x1b[0m`);
    await sleep(BOOT_DURATION / LOADING_FRAMES.length);
  }

  terminal.write(`\x1b[${centerY + 1};${barX}H${themeColor}\x1b[1m${label}[DONE]\x1b[0m`);
  await sleep(100);

  // Exit alternate buffer - game will re-enter
  terminal.write('\x1b[2J\x1b[H');
  terminal.write('\x1b[?1049l');
  terminal.write('\x1b[?25h');
}

/**
 * Exit transition - plays when the game quits back to the shell
 */
export async function playExitTransition(terminal: GameTerminal): Promise<void> {
  const themeColor = getCurrentThemeColor();
  const cols = terminal.cols;
  const rows = terminal.rows;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);

  const exitMsg = randomMessage(EXIT_MESSAGES);
  const msgX = Math.max(1, centerX - Math.floor(exitMsg.length / 2));

  // Flash the message
  for (let i = 0; i < 3; i++) {
    terminal.write(`\x1b[${centerY};${msgX}H\x1b[1;91m${exitMsg}\x1b[0m`);
    await sleep(60);
    terminal.write(`\x1b[${centerY};${msgX}H${' '.repeat(exitMsg.length)}`);
    await sleep(40);
  }
  terminal.write(`\x1b[${centerY};${msgX}H\x1b[2m${themeColor}${exitMsg}\x1b[0m`);
  await sleep(150);

  // Screen wipe down effect
  for (let y = 1; y <= rows; y += 2) {
    terminal.write(`\x1b[${y};1H${' '.repeat(cols)}`);
    if (y + 1 <= rows) {
      terminal.write(`\x1b[${y + 1};1H${' '.repeat(cols)}`);
    }
    await sleep(EXIT_DURATION / (rows / 2));
  }
}

// Export event types for games to dispatch
export const GAME_EVENTS = {
  // Game wants to quit back to shell
  QUIT: 'conveyor-bros:game-quit',
} as const;

/**
 * Helper for games to dispatch quit event
 * The host plays the exit transition and tears down the terminal
 */
export function dispatchGameQuit(terminal: GameTerminal): void {
  window.dispatchEvent(new CustomEvent(GAME_EVENTS.QUIT, {
    detail: { terminal }
  }));
}
