/**
 * Conveyor Bros
 *
 * Keep the factory moving! Packages ride up a stack of conveyor belts.
 * - Luigi (W/S) lifts packages off the left end of the belts
 * - Mario (↑/↓) lifts them off the right end
 * - The top belt feeds the truck; 8 packages and it drives off
 * - Three dropped packages and you're fired
 *
 * Difficulties: easy (5 belts), medium (7), extreme (9), crazy (random
 * belt speeds, reversed controls).
 */

import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
} from '../utils';
import { dispatchGameQuit, playExitTransition } from '../gameTransitions';
import {
  PARTICLE_CHARS,
  addScorePopup,
  createFlashState,
  spawnParticles,
  triggerFlash,
  updateFlash,
  updateParticles,
  updatePopups,
} from '../shared/effects';
import { ConveyorGame, FULL_TRUCK_BONUS, type ConveyorGameOptions, type GameEvent } from './engine';
import { PX_PER_COL, PX_PER_ROW, renderFrame, type EffectsState } from './render';

export interface ConveyorController {
  stop: () => void;
  isRunning: boolean;
  readonly game: ConveyorGame;
}

/** 30 frames per second, the handheld's pace */
export const FRAME_MS = Math.round(1000 / 30);
const START_DELAY_MS = 25;
const FAILURE_FLASH_FRAMES = 12;
const BUFFER_REASON = 'conveyor-bros';

/**
 * Logical pixels to field-relative cells, the unit effects are kept in.
 */
function toFieldCell(x: number, y: number): { x: number; y: number } {
  return { x: x / PX_PER_COL, y: y / PX_PER_ROW - 1 };
}

function applyEvents(events: GameEvent[], effects: EffectsState, game: ConveyorGame): void {
  for (const event of events) {
    switch (event.type) {
      case 'delivered': {
        const at = toFieldCell(event.x, event.y);
        addScorePopup(effects.popups, at.x, at.y - 1, '+1');
        spawnParticles(effects.particles, at.x, at.y, 6, '\x1b[93m', PARTICLE_CHARS.success);
        break;
      }
      case 'failure': {
        const at = toFieldCell(event.x, event.y);
        spawnParticles(effects.particles, at.x, at.y, 8, '\x1b[91m', PARTICLE_CHARS.crash);
        triggerFlash(effects.flash, FAILURE_FLASH_FRAMES);
        break;
      }
      case 'truckFull': {
        const at = toFieldCell(game.truck.x, game.truck.y);
        addScorePopup(effects.popups, Math.max(0, at.x), at.y - 1, `FULL! +${FULL_TRUCK_BONUS}`, '\x1b[1;92m');
        break;
      }
      case 'failureForgiven':
        addScorePopup(effects.popups, 28, 1, 'MISS -1', '\x1b[1;96m');
        break;
      case 'gameOver':
        break;
    }
  }
}

export function runConveyorGame(
  terminal: GameTerminal,
  options: ConveyorGameOptions = {}
): ConveyorController {
  const game = new ConveyorGame(options);
  const effects: EffectsState = {
    particles: [],
    popups: [],
    flash: createFlashState(),
  };

  let running = true;
  let frameInterval: ReturnType<typeof setInterval> | null = null;
  let keyListener: { dispose: () => void } | null = null;

  function halt() {
    running = false;
    if (frameInterval) clearInterval(frameInterval);
    keyListener?.dispose();
  }

  function leaveBuffer() {
    // Stopped before the first frame: never entered
    if (isInAlternateBuffer(terminal)) {
      exitAlternateBuffer(terminal, BUFFER_REASON);
    }
  }

  async function quit(): Promise<void> {
    halt();
    try {
      await playExitTransition(terminal);
    } catch (err) {
      console.error('[ConveyorBros] Exit transition failed:', err);
    }
    leaveBuffer();
    dispatchGameQuit(terminal);
  }

  const controller: ConveyorController = {
    stop: () => {
      if (!running) return;
      halt();
      leaveBuffer();
    },
    get isRunning() { return running; },
    game,
  };

  function frame() {
    if (!running) return;
    try {
      game.update();
      applyEvents(game.events, effects, game);
      updateParticles(effects.particles);
      updatePopups(effects.popups);
      updateFlash(effects.flash);

      if (game.quitRequested) {
        quit().catch(err => console.error('[ConveyorBros] Quit failed:', err));
        return;
      }

      terminal.write(renderFrame(game, terminal.cols, terminal.rows, effects));
    } catch (err) {
      console.error('[ConveyorBros] Frame failed, stopping game:', err);
      controller.stop();
      dispatchGameQuit(terminal);
    }
  }

  setTimeout(() => {
    if (!running) return;

    enterAlternateBuffer(terminal, BUFFER_REASON);
    frameInterval = setInterval(frame, FRAME_MS);

    keyListener = terminal.onKey(({ domEvent }) => {
      if (!running) return;
      domEvent.preventDefault();
      domEvent.stopPropagation();
      game.pressKey(domEvent.key);
    });
  }, START_DELAY_MS);

  return controller;
}

export { ConveyorGame } from './engine';
