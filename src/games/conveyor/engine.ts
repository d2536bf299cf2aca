/**
 * Conveyor Bros Engine — Pure Game Logic
 *
 * One session object owns the belts, packages, workers and truck and is
 * advanced one frame at a time. No terminal, timers or rendering here:
 * key presses are queued with pressKey() and consumed by the next update().
 */

import { checkShortcut, navigateMenu, type SimpleMenuItem } from '../shared/menu';
import {
  DIFFICULTIES,
  DIFFICULTY_KEYS,
  type Difficulty,
  type DifficultyName,
  beltSpeed,
  getDifficulty,
  getDifficultyByKey,
  maxPackages,
} from './difficulty';
import {
  Boss,
  Character,
  Conveyor,
  Package,
  Truck,
  type BeltContext,
  type MoveDirection,
} from './entities';
import {
  LAYOUT,
  type Direction,
  beltY,
  isInEndZone,
  isPastEdge,
  luigiFloorCount,
  marioFloorCount,
} from './geometry';

// ============================================================================
// Types
// ============================================================================

export type GamePhase = 'menu' | 'playing' | 'paused' | 'gameOver';

export type GameEvent =
  | { type: 'delivered'; x: number; y: number }
  | { type: 'failure'; side: Direction; x: number; y: number }
  | { type: 'truckFull' }
  | { type: 'failureForgiven' }
  | { type: 'gameOver' };

export interface ConveyorGameOptions {
  /** Skip the menu and start on this difficulty */
  difficulty?: DifficultyName;
  random?: () => number;
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_FAILURES = 3;
const INITIAL_SPAWN_TIMER = 100;
const SPAWN_TIMER_MIN = 35;
const SPAWN_TIMER_MAX = 40;
const BOSS_MISS_FRAMES = 60;
const BOSS_RETURN_FRAMES = 30;
export const FULL_TRUCK_BONUS = 10;

export const MENU_ITEMS: SimpleMenuItem[] = [
  ...DIFFICULTIES.map(d => ({ label: d.label, shortcut: DIFFICULTY_KEYS[d.name] })),
  { label: 'QUIT', shortcut: 'Q' },
];

export const PAUSE_ITEMS: SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC' },
  { label: 'RESTART', shortcut: 'R' },
  { label: 'MENU', shortcut: 'M' },
  { label: 'QUIT', shortcut: 'Q' },
];

/**
 * Single-character keys are matched case-insensitively; named keys
 * (ArrowUp, Escape, Enter) pass through.
 */
export function normalizeKey(key: string): string {
  return key.length === 1 ? key.toLowerCase() : key;
}

// ============================================================================
// Session
// ============================================================================

export class ConveyorGame {
  phase: GamePhase = 'menu';
  quitRequested = false;
  menuSelection = 0;
  pauseSelection = 0;

  difficulty: Difficulty;
  score = 0;
  failures = 0;
  spawnTimer = INITIAL_SPAWN_TIMER;

  conveyors: Conveyor[] = [];
  packages: Package[] = [];
  mario: Character;
  luigi: Character;
  truck: Truck;
  boss = new Boss();

  /** Events raised by the most recent update() */
  events: GameEvent[] = [];

  private pendingKeys: string[] = [];
  private readonly random: () => number;

  constructor(options: ConveyorGameOptions = {}) {
    this.random = options.random ?? Math.random;
    this.difficulty = DIFFICULTIES[0];
    // Placeholders until buildLevel() runs
    this.mario = new Character('Mario', 'right', 1);
    this.luigi = new Character('Luigi', 'left', 1);
    this.truck = new Truck(LAYOUT.TRUCK_ORIGIN_X, 0);

    const initial = options.difficulty ? getDifficulty(options.difficulty) : undefined;
    if (initial) {
      this.start(initial);
    } else {
      this.buildLevel();
    }
  }

  get topBelt(): number {
    return this.difficulty.belts - 1;
  }

  get maxPackages(): number {
    return maxPackages(this.difficulty, this.score);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(difficulty: Difficulty): void {
    this.difficulty = difficulty;
    this.buildLevel();
    this.phase = 'playing';
  }

  restart(): void {
    this.start(this.difficulty);
  }

  openMenu(): void {
    this.phase = 'menu';
    this.menuSelection = Math.max(0, DIFFICULTIES.indexOf(this.difficulty));
  }

  private buildLevel(): void {
    const { belts } = this.difficulty;

    this.conveyors = [];
    for (let floor = 0; floor < belts; floor++) {
      const length = floor === 0 ? LAYOUT.FEED_LENGTH : LAYOUT.BELT_LENGTH;
      const speed = beltSpeed(this.difficulty, floor, this.random);
      this.conveyors.push(new Conveyor(floor, LAYOUT.BELT_X, length, speed));
    }

    this.truck = new Truck(LAYOUT.TRUCK_ORIGIN_X, beltY(belts - 1) - LAYOUT.BELT_SPACING);
    this.mario = new Character('Mario', 'right', marioFloorCount(belts));
    this.luigi = new Character('Luigi', 'left', luigiFloorCount(belts));
    this.boss = new Boss();

    this.packages = [new Package(LAYOUT.SPAWN_X, 0)];
    this.score = 0;
    this.failures = 0;
    this.spawnTimer = INITIAL_SPAWN_TIMER;
    this.pauseSelection = 0;
    this.syncConveyors();
  }

  // --------------------------------------------------------------------------
  // Input
  // --------------------------------------------------------------------------

  pressKey(key: string): void {
    this.pendingKeys.push(normalizeKey(key));
  }

  private handleMenuKey(key: string): boolean {
    if (key === 'q') {
      this.quitRequested = true;
      return true;
    }

    const picked = getDifficultyByKey(key);
    if (picked) {
      this.start(picked);
      return true;
    }

    const { newSelection, confirmed } = navigateMenu(this.menuSelection, MENU_ITEMS.length, key);
    this.menuSelection = newSelection;
    if (!confirmed) return false;

    const difficulty = DIFFICULTIES[this.menuSelection];
    if (difficulty) {
      this.start(difficulty);
    } else {
      this.quitRequested = true;
    }
    return true;
  }

  private handleGameOverKey(key: string): boolean {
    switch (key) {
      case 'r': this.restart(); return true;
      case 'm': this.openMenu(); return true;
      case 'q': this.quitRequested = true; return true;
    }
    return false;
  }

  private handlePauseKey(key: string): boolean {
    let choice = key === 'Escape' ? 0 : checkShortcut(PAUSE_ITEMS, key);
    if (choice === -1) {
      const { newSelection, confirmed } = navigateMenu(this.pauseSelection, PAUSE_ITEMS.length, key);
      this.pauseSelection = newSelection;
      if (!confirmed) return false;
      choice = this.pauseSelection;
    }

    switch (choice) {
      case 0: this.phase = 'playing'; break;
      case 1: this.restart(); break;
      case 2: this.openMenu(); break;
      case 3: this.quitRequested = true; break;
    }
    return true;
  }

  private handlePlayKey(key: string): boolean {
    switch (key) {
      case 'q':
        this.quitRequested = true;
        return true;
      case 'Escape':
        this.phase = 'paused';
        this.pauseSelection = 0;
        return true;
      case 'ArrowUp': this.moveWorker(this.mario, 'up'); break;
      case 'ArrowDown': this.moveWorker(this.mario, 'down'); break;
      case 'w': this.moveWorker(this.luigi, 'up'); break;
      case 's': this.moveWorker(this.luigi, 'down'); break;
    }
    return false;
  }

  private moveWorker(worker: Character, direction: MoveDirection): void {
    if (this.difficulty.invertControls) {
      worker.move(direction === 'up' ? 'down' : 'up');
    } else {
      worker.move(direction);
    }
  }

  // --------------------------------------------------------------------------
  // Frame update
  // --------------------------------------------------------------------------

  update(): void {
    this.events = [];
    const keys = this.pendingKeys;
    this.pendingKeys = [];

    if (this.phase === 'menu') {
      keys.some(key => this.handleMenuKey(key));
      return;
    }
    if (this.phase === 'gameOver') {
      keys.some(key => this.handleGameOverKey(key));
      return;
    }
    if (this.phase === 'paused') {
      keys.some(key => this.handlePauseKey(key));
      return;
    }

    // Quit or pause ends the frame before the belts move
    if (keys.some(key => this.handlePlayKey(key))) return;

    this.step();
  }

  private step(): void {
    const ctx: BeltContext = { conveyors: this.conveyors, topBelt: this.topBelt };
    // Belts stand still while the truck is out
    const resting = this.truck.state !== 'waiting';

    this.boss.update();
    this.mario.state = 'normal';
    this.luigi.state = 'normal';

    if (!resting) {
      this.spawn();
      this.advancePackages(ctx);
    }

    for (const pkg of this.packages) {
      pkg.caught = false;
      pkg.checkProximity(this.mario);
      pkg.checkProximity(this.luigi);
    }

    this.syncConveyors();
    this.mario.update();
    this.luigi.update();

    if (this.truck.update() === 'waiting') {
      this.boss.appear('left', BOSS_RETURN_FRAMES);
      this.clearEndZones();
    }

    if (this.failures >= MAX_FAILURES) {
      this.phase = 'gameOver';
      this.events.push({ type: 'gameOver' });
    }
  }

  private advancePackages(ctx: BeltContext): void {
    const remaining: Package[] = [];
    for (const pkg of this.packages) {
      const event = pkg.advance(ctx);

      if (event === 'handoff') {
        pkg.carrier?.catch();
      }
      if (event === 'delivered') {
        pkg.carrier?.catch();
        this.deliver(pkg);
        continue;
      }
      if (isPastEdge(pkg.x)) {
        this.fail(pkg);
        continue;
      }
      remaining.push(pkg);
    }
    this.packages = remaining;
  }

  /**
   * Packages left waiting at a belt end while the truck was out are taken
   * away when it comes back. They count as neither delivery nor failure.
   */
  private clearEndZones(): void {
    this.packages = this.packages.filter(
      p => p.state !== 'normal' || !isInEndZone(p.x, p.direction)
    );
    this.syncConveyors();
  }

  private spawn(): void {
    if (this.spawnTimer > 0) this.spawnTimer--;

    const zoneClear = !this.conveyors[0].packages.some(p => p.x > LAYOUT.SPAWN_ZONE_X);
    if (this.packages.length < this.maxPackages && zoneClear && this.spawnTimer === 0) {
      this.packages.push(new Package(LAYOUT.SPAWN_X, 0));
      const spread = SPAWN_TIMER_MAX - SPAWN_TIMER_MIN + 1;
      this.spawnTimer = SPAWN_TIMER_MIN + Math.floor(this.random() * spread);
    }
  }

  private deliver(pkg: Package): void {
    this.score++;
    this.events.push({ type: 'delivered', x: pkg.x, y: pkg.y });

    if (!this.truck.loadPackage()) return;
    this.score += FULL_TRUCK_BONUS;
    this.events.push({ type: 'truckFull' });

    const every = this.difficulty.truckRemoveEvery;
    if (every !== null && this.truck.deliveries % every === 0 && this.failures > 0) {
      this.failures--;
      this.events.push({ type: 'failureForgiven' });
    }
  }

  private fail(pkg: Package): void {
    const side: Direction = pkg.x < LAYOUT.LEFT_EDGE_X ? 'left' : 'right';
    this.failures++;
    this.boss.appear(side, BOSS_MISS_FRAMES);
    this.events.push({ type: 'failure', side, x: pkg.x, y: pkg.y });
  }

  private syncConveyors(): void {
    for (const conveyor of this.conveyors) {
      conveyor.setPackages(
        this.packages.filter(p => p.belt === conveyor.floor && p.state === 'normal')
      );
    }
  }
}
