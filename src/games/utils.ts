/**
 * Shared utilities for games
 *
 * Theme selection, alternate screen buffer management and the terminal
 * interface games draw to. The theme is configured by the host via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import {
  type PhosphorMode,
  getAnsiColor,
  isLightTheme as checkLightTheme,
  getSubtleColor,
} from '../themes';

// ============================================================================
// Terminal Interface
// ============================================================================

export interface GameKeyEvent {
  key: string;
  domEvent: {
    key: string;
    preventDefault: () => void;
    stopPropagation: () => void;
  };
}

/**
 * The part of an xterm.js Terminal a game needs. A browser Terminal satisfies
 * it directly; the CLI builds one over stdin/stdout.
 */
export type GameTerminal = Pick<Terminal, 'write' | 'cols' | 'rows'> & {
  onKey: (listener: (event: GameKeyEvent) => void) => { dispose: () => void };
};

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): PhosphorMode {
  return currentTheme;
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Check if a terminal is usable: present and with a non-empty grid
 */
export function isTerminalValid(terminal: GameTerminal | null | undefined): terminal is GameTerminal {
  if (!terminal) return false;
  try {
    return terminal.cols > 0 && terminal.rows > 0;
  } catch {
    // Disposed xterm instances throw from their getters
    return false;
  }
}

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer or terminal invalid
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot enter: terminal invalid (reason: ${reason})`);
    return false;
  }

  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-exit.
 *
 * @returns true if buffer was exited, false if not in buffer or terminal invalid
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!isTerminalValid(terminal)) {
    console.warn(`[AlternateBuffer] Cannot exit: terminal invalid (reason: ${reason})`);
    return false;
  }

  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Theme Color Utilities
// ============================================================================

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Check if current theme is a light theme (needs dark text)
 */
export function isLightTheme(): boolean {
  return checkLightTheme(currentTheme);
}

/**
 * Muted color for background elements like belt tracks and stairs
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// Re-export PhosphorMode type for convenience
export type { PhosphorMode } from '../themes';
