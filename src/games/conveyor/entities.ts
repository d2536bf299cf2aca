/**
 * Conveyor Bros - Entities
 *
 * Packages, belts, workers, the truck and the boss. Coordinates are logical
 * pixels (see geometry.ts) and are checked on every assignment.
 */

import {
  LAYOUT,
  type Direction,
  beltDirection,
  beltY,
  isInEndZone,
  isInReachZone,
  servedBelt,
  snapToGrid,
  stepX,
  ticksPerStep,
} from './geometry';

// ============================================================================
// Coordinate checks
// ============================================================================

function checkCoordinate(name: string, value: number, allowNegative = false): number {
  if (!Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer, got ${value}`);
  }
  if (!allowNegative && value < 0) {
    throw new RangeError(`${name} must be non-negative, got ${value}`);
  }
  return value;
}

// ============================================================================
// Conveyor
// ============================================================================

export class Conveyor {
  readonly floor: number;
  readonly length: number;
  readonly direction: Direction;
  readonly speed: number;
  /** Leading package first */
  packages: Package[] = [];

  private _x = 0;
  private _y = 0;

  constructor(floor: number, x: number, length: number, speed: number) {
    this.floor = checkCoordinate('floor', floor);
    this.x = x;
    this.y = beltY(floor);
    this.length = length;
    this.direction = beltDirection(floor);
    this.speed = speed;
  }

  get x(): number { return this._x; }
  set x(value: number) { this._x = checkCoordinate('x', value); }

  get y(): number { return this._y; }
  set y(value: number) { this._y = checkCoordinate('y', value); }

  get ticksPerStep(): number {
    return ticksPerStep(this.speed);
  }

  /**
   * Replace the riders, ordered by how close each is to the belt's end.
   */
  setPackages(riders: Package[]): void {
    const sign = this.direction === 'left' ? 1 : -1;
    this.packages = [...riders].sort((a, b) => sign * (a.x - b.x));
  }
}

// ============================================================================
// Character
// ============================================================================

export type WorkerName = 'Mario' | 'Luigi';
export type WorkerState = 'normal' | 'prepared' | 'carrying';
export type MoveDirection = 'up' | 'down';

const CARRY_FRAMES = 10;

export class Character {
  readonly name: WorkerName;
  /** Which belt ends this worker serves */
  readonly side: Direction;
  readonly floors: number;
  state: WorkerState = 'normal';

  private _floor = 0;
  private carryFrames = 0;

  constructor(name: WorkerName, side: Direction, floors: number) {
    this.name = name;
    this.side = side;
    this.floors = floors;
  }

  get floor(): number { return this._floor; }
  set floor(value: number) {
    checkCoordinate('floor', value);
    if (value >= this.floors) {
      throw new RangeError(`floor must be below ${this.floors}, got ${value}`);
    }
    this._floor = value;
  }

  get belt(): number {
    return servedBelt(this.side, this._floor);
  }

  get x(): number {
    return this.side === 'left' ? LAYOUT.LUIGI_X : LAYOUT.MARIO_X;
  }

  get y(): number {
    return beltY(this.belt) + LAYOUT.WORKER_OFFSET_Y;
  }

  /**
   * One floor per press. Returns false at the top or bottom floor.
   */
  move(direction: MoveDirection): boolean {
    const next = direction === 'up' ? this._floor + 1 : this._floor - 1;
    if (next < 0 || next >= this.floors) return false;
    this._floor = next;
    return true;
  }

  catch(): void {
    this.carryFrames = CARRY_FRAMES;
  }

  update(): void {
    if (this.carryFrames > 0) {
      this.carryFrames--;
      this.state = 'carrying';
    }
  }
}

// ============================================================================
// Package
// ============================================================================

export type PackageState = 'normal' | 'falling' | 'delivered';

/** What happened to a package during one frame */
export type PackageEvent = 'waiting' | 'moved' | 'handoff' | 'delivered' | 'dropped' | 'falling';

export interface BeltContext {
  conveyors: readonly Conveyor[];
  topBelt: number;
}

export class Package {
  state: PackageState = 'normal';
  caught = false;
  carrier: Character | null = null;
  belt: number;
  direction: Direction;
  /** Frames since the last movement step */
  aux = 0;

  private _x = 0;
  private _y = 0;

  constructor(x: number, belt: number) {
    this.x = x;
    this.y = beltY(belt);
    this.belt = belt;
    this.direction = beltDirection(belt);
  }

  get x(): number { return this._x; }
  set x(value: number) { this._x = checkCoordinate('x', value); }

  get y(): number { return this._y; }
  set y(value: number) { this._y = checkCoordinate('y', value); }

  advance(ctx: BeltContext): PackageEvent {
    const conveyor = ctx.conveyors[this.belt];
    this.aux++;
    const stepDue = this.aux >= conveyor.ticksPerStep;
    if (stepDue) this.aux = 0;

    if (this.state === 'falling') {
      this.y = Math.min(this.y + LAYOUT.FALL_STEP, LAYOUT.GROUND_Y);
      if (stepDue) {
        this.x += this.direction === 'left' ? -LAYOUT.STEP_X : LAYOUT.STEP_X;
      }
      return 'falling';
    }

    if (isInEndZone(this.x, this.direction)) {
      if (this.caught) {
        if (this.belt === ctx.topBelt) {
          this.state = 'delivered';
          return 'delivered';
        }
        this.handOff();
        return 'handoff';
      }
      if (stepDue) {
        this.state = 'falling';
        return 'dropped';
      }
      return 'waiting';
    }

    if (stepDue) {
      this.x = stepX(this.x, this.direction);
      return 'moved';
    }
    return 'waiting';
  }

  /**
   * Lift onto the belt above and start back the other way.
   */
  private handOff(): void {
    this.y = snapToGrid(this.y - LAYOUT.BELT_SPACING);
    this.x += this.direction === 'left' ? LAYOUT.HANDOFF_NUDGE : -LAYOUT.HANDOFF_NUDGE;
    this.belt += 1;
    this.direction = beltDirection(this.belt);
    this.caught = false;
    this.aux = 0;
  }

  checkProximity(worker: Character): void {
    if (this.state !== 'normal') return;
    if (worker.side !== this.direction || worker.belt !== this.belt) return;
    if (!isInReachZone(this.x, this.direction)) return;

    worker.state = 'prepared';
    if (isInEndZone(this.x, this.direction) && !this.caught) {
      this.caught = true;
      this.carrier = worker;
    }
  }
}

// ============================================================================
// Truck
// ============================================================================

export type TruckState = 'waiting' | 'delivering' | 'returning';

export class Truck {
  readonly originX: number;
  readonly capacity: number;
  load = 0;
  deliveries = 0;
  state: TruckState = 'waiting';

  private _x = 0;
  private _y = 0;

  constructor(x: number, y: number, capacity: number = LAYOUT.TRUCK_CAPACITY) {
    this.x = x;
    this.y = y;
    this.originX = x;
    this.capacity = capacity;
  }

  // The truck drives off the left edge, so x may go negative
  get x(): number { return this._x; }
  set x(value: number) { this._x = checkCoordinate('x', value, true); }

  get y(): number { return this._y; }
  set y(value: number) { this._y = checkCoordinate('y', value); }

  /**
   * Returns true when this package filled the truck and it leaves.
   */
  loadPackage(): boolean {
    if (this.state !== 'waiting') return false;
    this.load++;
    if (this.load >= this.capacity) {
      this.state = 'delivering';
      this.deliveries++;
      return true;
    }
    return false;
  }

  /**
   * Returns the new state when this frame changed it.
   */
  update(): TruckState | null {
    if (this.state === 'delivering') {
      this.x -= LAYOUT.TRUCK_SPEED;
      if (this.x < -LAYOUT.TRUCK_WIDTH) {
        this.state = 'returning';
        this.load = 0;
        return 'returning';
      }
    } else if (this.state === 'returning') {
      this.x = Math.min(this.x + LAYOUT.TRUCK_SPEED, this.originX);
      if (this.x >= this.originX) {
        this.state = 'waiting';
        return 'waiting';
      }
    }
    return null;
  }
}

// ============================================================================
// Boss
// ============================================================================

export class Boss {
  side: Direction = 'left';
  frames = 0;

  get isVisible(): boolean {
    return this.frames > 0;
  }

  appear(side: Direction, frames: number): void {
    this.side = side;
    this.frames = frames;
  }

  update(): void {
    if (this.frames > 0) this.frames--;
  }
}
