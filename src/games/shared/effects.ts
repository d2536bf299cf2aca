/**
 * Shared Visual Effects
 *
 * Particle bursts, floating score popups and border flashes, kept in plain
 * arrays/objects owned by the game and advanced once per frame.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface Particle {
  x: number;
  y: number;
  char: string;
  color: string;
  vx: number;
  vy: number;
  life: number;
}

export interface ScorePopup {
  x: number;
  y: number;
  text: string;
  frames: number;
  color: string;
}

export interface FlashState {
  frames: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Maximum particles to prevent performance issues */
export const MAX_PARTICLES = 100;

export const PARTICLE_CHARS = {
  crash: ['✗', '×', '·', '▒', '░'],
  success: ['✦', '★', '◆', '●', '♦'],
} as const;

const POPUP_FRAMES = 18;

// ============================================================================
// PARTICLES
// ============================================================================

/**
 * Spawn particles in a radial burst pattern.
 * Respects MAX_PARTICLES.
 */
export function spawnParticles(
  particles: Particle[],
  x: number,
  y: number,
  count: number,
  color: string,
  chars: readonly string[] = PARTICLE_CHARS.success,
): void {
  if (particles.length >= MAX_PARTICLES) return;

  const actualCount = Math.min(count, MAX_PARTICLES - particles.length);
  for (let i = 0; i < actualCount; i++) {
    const angle = (Math.PI * 2 * i) / count + Math.random() * 0.5;
    const speed = 0.2 + Math.random() * 0.3;
    particles.push({
      x,
      y,
      char: chars[Math.floor(Math.random() * chars.length)],
      color,
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed * 0.5,
      life: 10 + Math.floor(Math.random() * 8),
    });
  }
}

/**
 * Apply velocity and gravity, drop dead particles.
 */
export function updateParticles(particles: Particle[], gravityMult: number = 1): void {
  for (let i = particles.length - 1; i >= 0; i--) {
    const p = particles[i];
    p.x += p.vx;
    p.y += p.vy;
    p.vy += 0.02 * gravityMult;
    p.life--;
    if (p.life <= 0) particles.splice(i, 1);
  }
}

// ============================================================================
// SCORE POPUPS
// ============================================================================

export function addScorePopup(
  popups: ScorePopup[],
  x: number,
  y: number,
  text: string,
  color: string = '\x1b[1;33m',
): void {
  popups.push({ x, y, text, frames: POPUP_FRAMES, color });
}

/**
 * Float popups upward and remove expired ones.
 */
export function updatePopups(popups: ScorePopup[]): void {
  for (let i = popups.length - 1; i >= 0; i--) {
    const popup = popups[i];
    popup.y -= 0.25;
    popup.frames--;
    if (popup.frames <= 0) popups.splice(i, 1);
  }
}

// ============================================================================
// FLASH EFFECTS
// ============================================================================

export function createFlashState(): FlashState {
  return { frames: 0 };
}

export function triggerFlash(state: FlashState, frames: number): void {
  state.frames = frames;
}

/**
 * Decrement once per frame. Returns true while the flash is active.
 */
export function updateFlash(state: FlashState): boolean {
  if (state.frames > 0) {
    state.frames--;
    return true;
  }
  return false;
}

/**
 * Alternating visibility for a strobing border.
 */
export function isFlashVisible(state: FlashState): boolean {
  return state.frames > 0 && state.frames % 4 < 2;
}
