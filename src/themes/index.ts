/**
 * Terminal color themes
 *
 * ANSI escape codes for the playfield, keyed by phosphor mode.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'ice'
  | 'daylight'
  | 'cream';

export interface ThemeDefinition {
  /** Display name */
  name: string;
  /** Primary text/accent color */
  ansi: string;
  /** Muted color for background elements (belt tracks, stairs) */
  subtle: string;
  /** Light background, needs dark text */
  light: boolean;
}

export const themes: Record<PhosphorMode, ThemeDefinition> = {
  cyan: { name: 'Cyberpunk', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  amber: { name: 'Fallout', ansi: '\x1b[93m', subtle: '\x1b[38;5;236m', light: false },
  green: { name: 'Matrix', ansi: '\x1b[92m', subtle: '\x1b[38;5;236m', light: false },
  white: { name: 'Ghost', ansi: '\x1b[97m', subtle: '\x1b[38;5;238m', light: false },
  hotpink: { name: 'Synthwave', ansi: '\x1b[95m', subtle: '\x1b[38;5;236m', light: false },
  blood: { name: 'Blood', ansi: '\x1b[91m', subtle: '\x1b[38;5;236m', light: false },
  ice: { name: 'Ice', ansi: '\x1b[96m', subtle: '\x1b[38;5;236m', light: false },
  daylight: { name: 'Daylight', ansi: '\x1b[34m', subtle: '\x1b[38;5;252m', light: true },
  cream: { name: 'Cream', ansi: '\x1b[38;5;130m', subtle: '\x1b[38;5;223m', light: true },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode]?.ansi ?? '\x1b[92m';
}

/**
 * Check if a theme is light (needs dark text)
 */
export function isLightTheme(mode: PhosphorMode): boolean {
  return themes[mode]?.light ?? false;
}

/**
 * Get subtle background color for game elements
 */
export function getSubtleColor(mode: PhosphorMode): string {
  return themes[mode]?.subtle ?? '\x1b[38;5;236m';
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return Object.prototype.hasOwnProperty.call(themes, value);
}
