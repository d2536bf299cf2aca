/**
 * Shared Menu System
 *
 * Index-based menus: arrow keys (or W/S) move the selection, Enter/Space
 * confirms, and each item may carry a single-key shortcut.
 */

import { getCurrentThemeColor } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'R', '1'
}

/**
 * Handle menu navigation for one key press
 * Returns new selection index
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;

  if (key === 'ArrowUp' || key === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (key === 'ArrowDown' || key === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (key === 'Enter' || key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Check if a shortcut key was pressed
 * Returns the index of the matching item, or -1 if no match
 */
export function checkShortcut(
  items: SimpleMenuItem[],
  key: string
): number {
  for (let i = 0; i < items.length; i++) {
    const shortcut = items[i].shortcut;
    if (shortcut && key.toLowerCase() === shortcut.toLowerCase()) {
      return i;
    }
  }
  return -1;
}

/**
 * Render a simple menu (index-based, no callbacks)
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  }
): string {
  const themeColor = getCurrentThemeColor();
  const { centerX, startY, showShortcuts = true } = options;

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText = `[${item.shortcut}] ${displayText}`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;

    const itemX = centerX - Math.floor(text.length / 2);
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}
