#!/usr/bin/env node
/**
 * CLI entry point for conveyor-bros
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout
 * to the xterm.js-compatible GameTerminal interface, so the game
 * runs directly in any terminal emulator.
 */

// ---------------------------------------------------------------------------
// Window polyfill — MUST run before any game code is imported.
// The game reports quitting through window.dispatchEvent + CustomEvent.
// ---------------------------------------------------------------------------

type EventHandler = (event: Event) => void;
const eventListeners = new Map<string, Set<EventHandler>>();

const windowPolyfill = {
  addEventListener(type: string, handler: EventHandler) {
    let handlers = eventListeners.get(type);
    if (!handlers) {
      handlers = new Set();
      eventListeners.set(type, handlers);
    }
    handlers.add(handler);
  },
  removeEventListener(type: string, handler: EventHandler) {
    eventListeners.get(type)?.delete(handler);
  },
  dispatchEvent(event: Event): boolean {
    const handlers = eventListeners.get(event.type);
    if (handlers) {
      for (const handler of handlers) {
        handler(event);
      }
    }
    return true;
  },
};

if (typeof globalThis.window === 'undefined') {
  Object.defineProperty(globalThis, 'window', { value: windowPolyfill, configurable: true });
}

// Now safe to import game code
import {
  DIFFICULTIES,
  GAME_EVENTS,
  isDifficultyName,
  playBootTransition,
  runConveyorGame,
  setTheme,
  type ConveyorGameOptions,
  type GameKeyEvent,
  type GameTerminal,
} from './games';
import { getThemeModes, isValidThemeMode } from './themes';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface Disposable {
  dispose: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

function createDomEvent(key: string): GameKeyEvent['domEvent'] {
  return {
    key,
    preventDefault: () => {},
    stopPropagation: () => {},
  };
}

function cleanup() {
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
  }
  process.stdin.pause();
  process.stdout.write('\x1b[?1049l');
  process.stdout.write('\x1b[?25h');
  process.stdout.write('\x1b[0m');
}

function createNodeTerminal(): GameTerminal {
  const keyListeners: ((event: GameKeyEvent) => void)[] = [];

  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    if (data === '\x03') {
      cleanup();
      process.exit(0);
    }

    const key = parseKey(data);
    const domEvent = createDomEvent(key);

    for (const listener of [...keyListeners]) {
      listener({ key, domEvent });
    }
  });

  // Synchronized output: wrap writes with DEC sync sequences so the
  // terminal batches clear + redraw into a single atomic paint.
  // Supported by Warp, iTerm2, kitty, foot, WezTerm, etc.
  const SYNC_START = '\x1b[?2026h';
  const SYNC_END = '\x1b[?2026l';

  const terminal: GameTerminal = {
    write: (data: string | Uint8Array) => {
      const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
      process.stdout.write(SYNC_START + text + SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onKey: (callback: (event: GameKeyEvent) => void): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        }
      };
    },
  };

  process.on('exit', cleanup);
  process.on('SIGINT', () => { cleanup(); process.exit(0); });
  process.on('SIGTERM', () => { cleanup(); process.exit(0); });

  return terminal;
}

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

function setupGameEvents() {
  // The game has already played its exit transition
  windowPolyfill.addEventListener(GAME_EVENTS.QUIT, () => {
    cleanup();
    process.exit(0);
  });
}

async function launchGame(terminal: GameTerminal, options: ConveyorGameOptions) {
  await playBootTransition(terminal);
  runConveyorGame(terminal, options);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

const difficultyNames = DIFFICULTIES.map(d => d.name);

function printHelp() {
  console.log(`
  conveyor-bros — Keep the packages moving

  Usage:
    conveyor-bros                        Difficulty menu
    conveyor-bros --difficulty <level>   Start straight on a difficulty
    conveyor-bros --theme <theme>        Set color theme
    conveyor-bros --list                 List difficulties
    conveyor-bros --help                 Show this help

  Difficulties:
    ${difficultyNames.join(', ')}

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    ↑ / ↓                Move Mario (right side)
    W / S                Move Luigi (left side)
    Enter                Confirm / select
    ESC                  Pause menu
    Q                    Quit

  Examples:
    conveyor-bros --difficulty extreme
    conveyor-bros --theme amber
`);
}

function printDifficulties() {
  for (const d of DIFFICULTIES) {
    const forgiveness = d.truckRemoveEvery === null
      ? 'no forgiveness'
      : `1 miss forgiven every ${d.truckRemoveEvery} trucks`;
    console.log(`  ${d.name.padEnd(10)} ${d.belts} belts, ${forgiveness}${d.invertControls ? ', reversed controls' : ''}`);
  }
}

/**
 * Value following a flag, removed from args with the flag.
 */
function takeFlag(args: string[], ...names: string[]): string | undefined {
  const idx = args.findIndex(arg => names.includes(arg));
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  args.splice(idx, 2);
  return value;
}

function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    process.exit(0);
  }

  if (args.includes('--list') || args.includes('-l')) {
    printDifficulties();
    process.exit(0);
  }

  const theme = takeFlag(args, '--theme', '-t');
  if (theme !== undefined) {
    if (!isValidThemeMode(theme)) {
      console.error(`Unknown theme: ${theme}`);
      console.error(`Available themes: ${getThemeModes().join(', ')}`);
      process.exit(1);
    }
    setTheme(theme);
  }

  const options: ConveyorGameOptions = {};
  const difficulty = takeFlag(args, '--difficulty', '-d');
  if (difficulty !== undefined) {
    if (!isDifficultyName(difficulty)) {
      console.error(`Unknown difficulty: ${difficulty}`);
      console.error(`Available difficulties: ${difficultyNames.join(', ')}`);
      process.exit(1);
    }
    options.difficulty = difficulty;
  }

  if (args.length > 0) {
    console.error(`Unknown argument: ${args[0]}`);
    console.error('Run conveyor-bros --help for usage');
    process.exit(1);
  }

  const terminal = createNodeTerminal();
  setupGameEvents();

  launchGame(terminal, options).catch((err: unknown) => {
    console.error('[CLI] Failed to start game:', err);
    cleanup();
    process.exit(1);
  });
}

main();
