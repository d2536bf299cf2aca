/**
 * Conveyor Bros - Rendering
 *
 * Pure functions from game state to ANSI strings. The logical 256x192 screen
 * maps to a 64-column grid at 4px per column and 8px per row; only logical
 * rows 1-22 hold anything, so the field fits an 80x24 terminal with a HUD
 * line above and a hint line below.
 */

import { getCurrentThemeColor, getSubtleBackgroundColor, isLightTheme } from '../utils';
import { renderSimpleMenu } from '../shared/menu';
import type { FlashState, Particle, ScorePopup } from '../shared/effects';
import { isFlashVisible } from '../shared/effects';
import type { ConveyorGame } from './engine';
import { MAX_FAILURES, MENU_ITEMS, PAUSE_ITEMS } from './engine';
import type { Character, Conveyor, Package, Truck } from './entities';
import { LAYOUT, SCREEN_HEIGHT, SCREEN_WIDTH } from './geometry';

// ============================================================================
// Layout
// ============================================================================

export const PX_PER_COL = 4;
export const PX_PER_ROW = 8;
export const FIELD_COLS = SCREEN_WIDTH / PX_PER_COL;
// Logical rows 0 and 23 never hold anything
export const FIELD_ROWS = SCREEN_HEIGHT / PX_PER_ROW - 2;
export const MIN_COLS = FIELD_COLS;
export const MIN_ROWS = FIELD_ROWS + 2;

export interface Viewport {
  cols: number;
  rows: number;
  /** Screen column of logical x = 0 */
  left: number;
  /** Screen row of logical row 1 */
  top: number;
}

export interface EffectsState {
  particles: Particle[];
  popups: ScorePopup[];
  flash: FlashState;
}

const RESET = '\x1b[0m';
const PACKAGE_COLOR = '\x1b[93m';
const FALLING_COLOR = '\x1b[91m';
const MARIO_COLOR = '\x1b[1;91m';
const LUIGI_COLOR = '\x1b[1;92m';
const BOSS_COLOR = '\x1b[1;95m';

const TITLE = [
  '█▀▀ █▀█ █▄ █ █ █ █▀▀ █ █ █▀█ █▀█   █▀▄ █▀█ █▀█ █▀▀',
  '█▄▄ █▄█ █ ▀█ ▀▄▀ ██▄ ▀▄▀ █▄█ █▀▄   █▄▀ █▀▄ █▄█ ▄▄█',
];

/**
 * Fit the field in the terminal, or null when it is too small.
 */
export function computeViewport(cols: number, rows: number): Viewport | null {
  if (cols < MIN_COLS || rows < MIN_ROWS) return null;
  return {
    cols,
    rows,
    left: Math.floor((cols - FIELD_COLS) / 2) + 1,
    top: Math.floor((rows - MIN_ROWS) / 2) + 2,
  };
}

/**
 * Logical pixel position to 1-based screen cell.
 */
export function worldToCell(x: number, y: number, view: Viewport): { col: number; row: number } {
  return {
    col: view.left + Math.floor(x / PX_PER_COL),
    row: view.top + Math.floor(y / PX_PER_ROW) - 1,
  };
}

/**
 * Cursor-addressed text clipped to the field. Returns '' when nothing is visible.
 */
function putText(view: Viewport, col: number, row: number, text: string, style: string): string {
  if (row < view.top || row >= view.top + FIELD_ROWS) return '';
  const minCol = view.left;
  const maxCol = view.left + FIELD_COLS - 1;
  const chars = [...text];
  const start = Math.max(col, minCol);
  const end = Math.min(col + chars.length - 1, maxCol);
  if (end < start) return '';
  const visible = chars.slice(start - col, end - col + 1).join('');
  return `\x1b[${row};${start}H${style}${visible}${RESET}`;
}

function centerX(view: Viewport): number {
  return view.left + Math.floor(FIELD_COLS / 2);
}

// ============================================================================
// Playfield
// ============================================================================

export function renderBelt(conveyor: Conveyor, view: Viewport): string {
  const { row } = worldToCell(conveyor.x, conveyor.y + PX_PER_ROW, view);
  const subtle = getSubtleBackgroundColor();
  const arrow = conveyor.direction === 'left' ? '◂' : '▸';
  const themeColor = getCurrentThemeColor();

  let output = '';
  const firstCol = Math.floor(conveyor.x / PX_PER_COL);
  const lastCol = Math.floor((conveyor.x + conveyor.length) / PX_PER_COL) - 1;
  for (let c = firstCol; c <= lastCol; c++) {
    const px = c * PX_PER_COL;
    // Stair column
    if (px > LAYOUT.GAP_MIN_X && px < LAYOUT.GAP_MAX_X) continue;
    const char = c % 4 === 0 ? arrow : '═';
    output += putText(view, view.left + c, row, char, c % 4 === 0 ? themeColor : subtle);
  }
  return output;
}

function renderStairs(game: ConveyorGame, view: Viewport): string {
  const subtle = getSubtleBackgroundColor();
  const leftCol = view.left + Math.floor(LAYOUT.GAP_MIN_X / PX_PER_COL) + 1;
  const rightCol = view.left + Math.floor(LAYOUT.GAP_MAX_X / PX_PER_COL) - 1;
  let output = '';
  for (const conveyor of game.conveyors) {
    const { row } = worldToCell(0, conveyor.y + PX_PER_ROW, view);
    output += putText(view, leftCol, row, '┘', subtle);
    output += putText(view, rightCol, row, '└', subtle);
  }
  return output;
}

export function renderPackage(pkg: Package, view: Viewport): string {
  const { col, row } = worldToCell(pkg.x, pkg.y, view);
  if (pkg.state === 'falling') {
    return putText(view, col, row, '▼', FALLING_COLOR);
  }
  return putText(view, col, row, '▣', PACKAGE_COLOR);
}

export function renderWorker(worker: Character, view: Viewport): string {
  const { col, row } = worldToCell(worker.x, worker.y, view);
  const color = worker.name === 'Mario' ? MARIO_COLOR : LUIGI_COLOR;
  const initial = worker.name === 'Mario' ? 'M' : 'L';

  let output = '';
  switch (worker.state) {
    case 'carrying':
      output += putText(view, col, row - 1, '▣', PACKAGE_COLOR);
      output += putText(view, col, row, initial, color);
      break;
    case 'prepared': {
      // Arms out toward the belt
      const arms = worker.side === 'left' ? `${initial}╼` : `╾${initial}`;
      output += putText(view, worker.side === 'left' ? col : col - 1, row, arms, color);
      break;
    }
    default:
      output += putText(view, col, row, initial, color);
  }
  return output;
}

export function renderTruck(truck: Truck, view: Viewport): string {
  const themeColor = getCurrentThemeColor();
  const { col, row } = worldToCell(truck.x, truck.y, view);
  const barWidth = Math.floor(LAYOUT.TRUCK_WIDTH / PX_PER_COL) - 2;
  const filled = Math.round((truck.load / truck.capacity) * barWidth);
  const body = `▐${'█'.repeat(filled)}${'░'.repeat(barWidth - filled)}▌`;

  let output = putText(view, col, row, body, themeColor);
  output += putText(view, col, row + 1, ' o    o ', '\x1b[2m');
  if (truck.state !== 'waiting') {
    const label = truck.state === 'delivering' ? 'DELIVERY' : 'RETURN';
    output += putText(view, view.left, row - 1, label, `\x1b[2m${themeColor}`);
  }
  return output;
}

function renderBoss(game: ConveyorGame, view: Viewport): string {
  if (!game.boss.isVisible) return '';
  const text = game.boss.side === 'left' ? '☹ BOSS!' : 'BOSS! ☹';
  const col = game.boss.side === 'left' ? view.left : view.left + FIELD_COLS - text.length;
  return putText(view, col, view.top + FIELD_ROWS - 1, text, BOSS_COLOR);
}

export function renderHud(game: ConveyorGame, view: Viewport): string {
  const themeColor = getCurrentThemeColor();
  const misses = '✗'.repeat(game.failures) + '·'.repeat(Math.max(0, MAX_FAILURES - game.failures));
  const stats =
    `${game.difficulty.label}  SCORE: ${game.score.toString().padStart(4, '0')}` +
    `  MISS: ${misses}  TRUCK: ${game.truck.load}/${game.truck.capacity}` +
    `  TRIPS: ${game.truck.deliveries}`;
  const x = Math.max(1, centerX(view) - Math.floor([...stats].length / 2));
  return `\x1b[${view.top - 1};${x}H${themeColor}${stats}${RESET}`;
}

function renderEffects(effects: EffectsState, view: Viewport): string {
  let output = '';
  for (const p of effects.particles) {
    output += putText(view, view.left + Math.round(p.x), view.top + Math.round(p.y), p.char, p.color);
  }
  for (const popup of effects.popups) {
    output += putText(view, view.left + Math.round(popup.x), view.top + Math.round(popup.y), popup.text, popup.color);
  }
  return output;
}

export function renderPlayfield(game: ConveyorGame, view: Viewport, effects: EffectsState): string {
  let output = '';
  for (const conveyor of game.conveyors) {
    output += renderBelt(conveyor, view);
  }
  output += renderStairs(game, view);
  output += renderTruck(game.truck, view);
  for (const pkg of game.packages) {
    output += renderPackage(pkg, view);
  }
  output += renderWorker(game.luigi, view);
  output += renderWorker(game.mario, view);
  output += renderBoss(game, view);
  output += renderEffects(effects, view);
  output += renderHud(game, view);

  if (isFlashVisible(effects.flash)) {
    const edge = '▔'.repeat(FIELD_COLS);
    output += `\x1b[${view.top + FIELD_ROWS};${view.left}H${FALLING_COLOR}${edge}${RESET}`;
  }
  return output;
}

// ============================================================================
// Screens
// ============================================================================

export function renderTooSmall(cols: number, rows: number): string {
  const themeColor = getCurrentThemeColor();
  const msg1 = 'Terminal too small!';
  const msg2 = `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`;
  const hint = cols < MIN_COLS && rows < MIN_ROWS ? 'Make pane larger'
    : cols < MIN_COLS ? 'Make pane wider →' : 'Make pane taller ↓';
  const cx = Math.floor(cols / 2);
  const cy = Math.floor(rows / 2);
  let output = '';
  output += `\x1b[${cy - 1};${Math.max(1, cx - Math.floor(msg1.length / 2))}H${themeColor}${msg1}${RESET}`;
  output += `\x1b[${cy + 1};${Math.max(1, cx - Math.floor(msg2.length / 2))}H\x1b[2m${msg2}${RESET}`;
  output += `\x1b[${cy + 3};${Math.max(1, cx - Math.floor(hint.length / 2))}H${themeColor}${hint}${RESET}`;
  return output;
}

export function renderMenuScreen(game: ConveyorGame, view: Viewport): string {
  const themeColor = getCurrentThemeColor();
  const cx = centerX(view);
  let output = '';

  TITLE.forEach((line, i) => {
    const x = Math.max(1, cx - Math.floor([...line].length / 2));
    output += `\x1b[${view.top + 1 + i};${x}H${themeColor}\x1b[1m${line}${RESET}`;
  });

  const prompt = 'SELECT DIFFICULTY';
  output += `\x1b[${view.top + 5};${cx - Math.floor(prompt.length / 2)}H\x1b[5m${themeColor}${prompt}${RESET}`;
  output += renderSimpleMenu(MENU_ITEMS, game.menuSelection, { centerX: cx, startY: view.top + 7 });

  const controls = [
    'MARIO ↑ ↓     LUIGI W S',
    'Pass every package up the belts to the truck',
    '1-4 Pick   ESC Pause   Q Quit',
  ];
  controls.forEach((line, i) => {
    const x = Math.max(1, cx - Math.floor([...line].length / 2));
    output += `\x1b[${view.top + 14 + i * 2};${x}H\x1b[2m${line}${RESET}`;
  });
  return output;
}

export function renderPauseOverlay(game: ConveyorGame, view: Viewport): string {
  const themeColor = getCurrentThemeColor();
  const cx = centerX(view);
  const pauseY = view.top + Math.floor(FIELD_ROWS / 2) - 3;
  const pauseMsg = '══ PAUSED ══';
  let output = `\x1b[${pauseY};${cx - Math.floor(pauseMsg.length / 2)}H\x1b[5m${themeColor}${pauseMsg}${RESET}`;
  output += renderSimpleMenu(PAUSE_ITEMS, game.pauseSelection, { centerX: cx, startY: pauseY + 2 });
  return output;
}

export function renderGameOverOverlay(game: ConveyorGame, view: Viewport): string {
  const themeColor = getCurrentThemeColor();
  const cx = centerX(view);
  const overY = view.top + Math.floor(FIELD_ROWS / 2) - 1;

  const lines: [string, string][] = [
    ['╔══ GAME OVER ══╗', '\x1b[1;91m'],
    [`SCORE: ${game.score}  TRIPS: ${game.truck.deliveries}`, themeColor],
    ['╚ [R] RETRY  [M] MENU  [Q] QUIT ╝', '\x1b[2m'],
  ];
  let output = '';
  lines.forEach(([text, style], i) => {
    const x = cx - Math.floor([...text].length / 2);
    output += `\x1b[${overY + i};${x}H${style}${text}${RESET}`;
  });
  return output;
}

/**
 * Full frame: clear, then whatever the current phase shows.
 */
export function renderFrame(game: ConveyorGame, cols: number, rows: number, effects: EffectsState): string {
  let output = '\x1b[2J\x1b[H';
  if (isLightTheme()) output += '\x1b[30m';

  const view = computeViewport(cols, rows);
  if (!view) return output + renderTooSmall(cols, rows);

  switch (game.phase) {
    case 'menu':
      return output + renderMenuScreen(game, view);
    case 'paused':
      return output + renderPlayfield(game, view, effects) + renderPauseOverlay(game, view);
    case 'gameOver':
      return output + renderPlayfield(game, view, effects) + renderGameOverOverlay(game, view);
    default: {
      const hint = '[ ESC ] MENU   [ Q ] QUIT';
      const hintX = Math.max(1, centerX(view) - Math.floor(hint.length / 2));
      output += renderPlayfield(game, view, effects);
      return output + `\x1b[${view.top + FIELD_ROWS};${hintX}H\x1b[2m${hint}${RESET}`;
    }
  }
}
