import { describe, it, expect } from 'vitest';
import {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  type SimpleMenuItem,
} from './menu';

describe('navigateMenu', () => {
  describe('arrow key navigation', () => {
    it('moves up with ArrowUp', () => {
      const result = navigateMenu(2, 4, 'ArrowUp');
      expect(result.newSelection).toBe(1);
      expect(result.confirmed).toBe(false);
    });

    it('moves down with ArrowDown', () => {
      const result = navigateMenu(1, 4, 'ArrowDown');
      expect(result.newSelection).toBe(2);
    });

    it('treats w and s like the arrows', () => {
      expect(navigateMenu(1, 4, 'w').newSelection).toBe(0);
      expect(navigateMenu(1, 4, 's').newSelection).toBe(2);
    });
  });

  describe('wrapping behavior', () => {
    it('wraps up from first item to last', () => {
      const result = navigateMenu(0, 3, 'ArrowUp');
      expect(result.newSelection).toBe(2);
    });

    it('wraps down from last item to first', () => {
      const result = navigateMenu(2, 3, 'ArrowDown');
      expect(result.newSelection).toBe(0);
    });
  });

  describe('confirmation', () => {
    it('confirms with Enter', () => {
      const result = navigateMenu(1, 3, 'Enter');
      expect(result.confirmed).toBe(true);
      expect(result.newSelection).toBe(1); // Selection unchanged
    });

    it('confirms with Space', () => {
      const result = navigateMenu(1, 3, ' ');
      expect(result.confirmed).toBe(true);
    });
  });

  it('returns same selection for unhandled keys', () => {
    const result = navigateMenu(1, 3, 'x');
    expect(result.newSelection).toBe(1);
    expect(result.confirmed).toBe(false);
  });
});

describe('checkShortcut', () => {
  const items: SimpleMenuItem[] = [
    { label: 'Resume', shortcut: 'ESC' },
    { label: 'Restart', shortcut: 'R' },
    { label: 'Quit', shortcut: 'Q' },
    { label: 'No Shortcut' },
  ];

  it('returns index of matching shortcut (case insensitive)', () => {
    expect(checkShortcut(items, 'r')).toBe(1);
    expect(checkShortcut(items, 'Q')).toBe(2);
  });

  it('returns -1 for no match', () => {
    expect(checkShortcut(items, 'x')).toBe(-1);
  });

  it('handles ESC shortcut', () => {
    expect(checkShortcut(items, 'esc')).toBe(0);
  });

  it('matches numeric shortcuts', () => {
    const levels: SimpleMenuItem[] = [
      { label: 'EASY', shortcut: '1' },
      { label: 'MEDIUM', shortcut: '2' },
    ];
    expect(checkShortcut(levels, '2')).toBe(1);
  });
});

describe('renderSimpleMenu', () => {
  const items: SimpleMenuItem[] = [
    { label: 'EASY', shortcut: '1' },
    { label: 'QUIT', shortcut: 'Q' },
  ];

  it('highlights the selected item with markers', () => {
    const output = renderSimpleMenu(items, 0, { centerX: 20, startY: 5 });
    expect(output).toContain('\x1b[5;14H\x1b[1;93m► [1] EASY ◄\x1b[0m');
  });

  it('dims unselected items in the theme color', () => {
    const output = renderSimpleMenu(items, 0, { centerX: 20, startY: 5 });
    expect(output).toContain('\x1b[6;14H\x1b[2m\x1b[96m  [Q] QUIT  \x1b[0m');
  });

  it('can hide shortcuts', () => {
    const output = renderSimpleMenu(items, 1, { centerX: 20, startY: 5, showShortcuts: false });
    expect(output).toContain('► QUIT ◄');
    expect(output).not.toContain('[Q]');
  });
});
