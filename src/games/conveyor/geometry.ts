/**
 * Conveyor Bros - Playfield Geometry
 *
 * The simulation runs on a logical 256x192 pixel screen, a handheld's
 * resolution. Every threshold the belts, workers and truck use
 * lives in this table; render.ts scales the logical pixels to cells.
 *
 * Y=0 is top, Y increases downward. Belt 0 is the bottom belt.
 */

export type Direction = 'left' | 'right';

export const SCREEN_WIDTH = 256;
export const SCREEN_HEIGHT = 192;

export const LAYOUT = {
  // Belts
  BELT_BASE_Y: 152,      // Package y while riding belt 0
  BELT_SPACING: 16,      // One belt per 16px row
  BELT_X: 44,
  BELT_LENGTH: 160,
  FEED_LENGTH: 196,      // Belt 0 runs on under the feed chute

  // Spawning
  SPAWN_X: 230,
  SPAWN_ZONE_X: 210,

  // Movement
  STEP_X: 10,
  BASE_TICKS_PER_STEP: 9,
  GAP_MIN_X: 104,        // Stair column, exclusive on both sides
  GAP_MAX_X: 150,

  // Belt ends
  LEFT_END_X: 45,
  RIGHT_END_X: 195,
  LEFT_REACH_X: 65,
  RIGHT_REACH_X: 175,
  HANDOFF_NUDGE: 10,

  // Falling
  FALL_STEP: 5,
  GROUND_Y: 176,
  LEFT_EDGE_X: 15,
  RIGHT_EDGE_X: 240,

  // Workers
  LUIGI_X: 24,
  MARIO_X: 212,
  WORKER_OFFSET_Y: 4,    // Workers stand just below the belt they serve

  // Truck
  TRUCK_ORIGIN_X: 4,
  TRUCK_WIDTH: 32,
  TRUCK_SPEED: 2,
  TRUCK_CAPACITY: 8,
} as const;

export function beltY(belt: number): number {
  return LAYOUT.BELT_BASE_Y - belt * LAYOUT.BELT_SPACING;
}

/** Even belts run left, odd belts run right. */
export function beltDirection(belt: number): Direction {
  return belt % 2 === 0 ? 'left' : 'right';
}

/**
 * Snap a y coordinate to the 16px belt grid (grid lines sit at 8 + 16n).
 */
export function snapToGrid(y: number): number {
  return Math.round((y - 8) / LAYOUT.BELT_SPACING) * LAYOUT.BELT_SPACING + 8;
}

export function ticksPerStep(speed: number): number {
  return Math.max(1, Math.round(LAYOUT.BASE_TICKS_PER_STEP / speed));
}

/**
 * Next x after one movement step, jumping across the stair column when the
 * step would land inside it.
 */
export function stepX(x: number, direction: Direction): number {
  if (direction === 'left') {
    const next = x - LAYOUT.STEP_X;
    return next > LAYOUT.GAP_MIN_X && next < LAYOUT.GAP_MAX_X ? LAYOUT.GAP_MIN_X : next;
  }
  const next = x + LAYOUT.STEP_X;
  return next > LAYOUT.GAP_MIN_X && next < LAYOUT.GAP_MAX_X ? LAYOUT.GAP_MAX_X : next;
}

export function isInEndZone(x: number, direction: Direction): boolean {
  return direction === 'left' ? x < LAYOUT.LEFT_END_X : x > LAYOUT.RIGHT_END_X;
}

export function isInReachZone(x: number, direction: Direction): boolean {
  return direction === 'left' ? x < LAYOUT.LEFT_REACH_X : x > LAYOUT.RIGHT_REACH_X;
}

export function isPastEdge(x: number): boolean {
  return x < LAYOUT.LEFT_EDGE_X || x > LAYOUT.RIGHT_EDGE_X;
}

// ============================================================================
// Worker floors
// ============================================================================

// Luigi works the left ends (even belts), Mario the right ends (odd belts).

export function luigiFloorCount(belts: number): number {
  return Math.ceil(belts / 2);
}

export function marioFloorCount(belts: number): number {
  return Math.floor(belts / 2);
}

/** The belt whose end a worker on `floor` serves. */
export function servedBelt(side: Direction, floor: number): number {
  return side === 'left' ? floor * 2 : floor * 2 + 1;
}
