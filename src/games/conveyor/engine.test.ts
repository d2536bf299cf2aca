import { describe, it, expect } from 'vitest';
import { ConveyorGame, FULL_TRUCK_BONUS, normalizeKey } from './engine';
import { Package } from './entities';

function createGame(difficulty: 'easy' | 'medium' | 'extreme' | 'crazy' = 'easy') {
  return new ConveyorGame({ difficulty, random: () => 0 });
}

function runFrames(game: ConveyorGame, frames: number) {
  for (let i = 0; i < frames; i++) game.update();
}

/** A package at the end of the top belt with Luigi standing there. */
function queueTopDelivery(game: ConveyorGame) {
  game.luigi.floor = game.luigi.floors - 1;
  game.packages = [new Package(44, game.topBelt)];
}

describe('normalizeKey', () => {
  it('lowercases single characters only', () => {
    expect(normalizeKey('W')).toBe('w');
    expect(normalizeKey('ArrowUp')).toBe('ArrowUp');
  });
});

describe('level setup', () => {
  it('builds the belts, workers and truck for the difficulty', () => {
    const game = createGame('easy');
    expect(game.phase).toBe('playing');
    expect(game.conveyors).toHaveLength(5);
    expect(game.conveyors[0].length).toBe(196);
    expect(game.conveyors[1].length).toBe(160);
    expect(game.luigi.floors).toBe(3);
    expect(game.mario.floors).toBe(2);
    expect(game.truck.x).toBe(4);
    expect(game.truck.y).toBe(72);
    expect(game.packages.map(p => p.x)).toEqual([230]);
    expect(game.spawnTimer).toBe(100);
  });

  it('starts in the menu without a difficulty', () => {
    const game = new ConveyorGame();
    expect(game.phase).toBe('menu');
  });
});

describe('package flow', () => {
  it('hands the first package up when Luigi waits on the bottom floor', () => {
    const game = createGame();
    runFrames(game, 135);
    expect(game.packages[0].x).toBe(44);
    expect(game.packages[0].caught).toBe(true);
    expect(game.luigi.state).toBe('prepared');

    runFrames(game, 1);
    const pkg = game.packages[0];
    expect(pkg.belt).toBe(1);
    expect(pkg.x).toBe(54);
    expect(pkg.direction).toBe('right');
    expect(game.luigi.state).toBe('carrying');
    expect(game.score).toBe(0);
  });

  it('counts a failure when nobody is at the end', () => {
    const game = createGame();
    game.pressKey('w');
    runFrames(game, 144);
    expect(game.packages[0].state).toBe('falling');

    runFrames(game, 26);
    expect(game.failures).toBe(0);

    runFrames(game, 1);
    expect(game.failures).toBe(1);
    expect(game.events).toEqual([{ type: 'failure', side: 'left', x: 14, y: 176 }]);
    expect(game.boss.isVisible).toBe(true);
    expect(game.boss.side).toBe('left');
    expect(game.boss.frames).toBe(60);
  });

  it('reports failures off the right edge on the right', () => {
    const game = createGame();
    const pkg = new Package(236, 1);
    pkg.state = 'falling';
    pkg.aux = 8;
    game.packages = [pkg];
    runFrames(game, 1);
    expect(game.events).toEqual([{ type: 'failure', side: 'right', x: 246, y: 141 }]);
  });

  it('scores a delivery off the top belt and loads the truck', () => {
    const game = createGame();
    queueTopDelivery(game);
    runFrames(game, 1);
    expect(game.score).toBe(0);

    runFrames(game, 1);
    expect(game.score).toBe(1);
    expect(game.truck.load).toBe(1);
    expect(game.packages).toHaveLength(0);
    expect(game.events).toEqual([{ type: 'delivered', x: 44, y: 88 }]);
  });

  it('hands a package up at the right end when Mario is there', () => {
    const game = createGame();
    game.packages = [new Package(200, 1)];
    runFrames(game, 1);
    expect(game.packages[0].caught).toBe(true);
    expect(game.mario.state).toBe('prepared');

    runFrames(game, 1);
    const pkg = game.packages[0];
    expect(pkg.belt).toBe(2);
    expect(pkg.x).toBe(190);
    expect(pkg.y).toBe(120);
    expect(pkg.direction).toBe('left');
    expect(game.mario.state).toBe('carrying');
  });
});

describe('truck', () => {
  it('leaves full, returns empty and brings the boss out', () => {
    const game = createGame();
    game.truck.load = 7;
    queueTopDelivery(game);
    runFrames(game, 2);
    expect(game.events).toEqual([
      { type: 'delivered', x: 44, y: 88 },
      { type: 'truckFull' },
    ]);
    expect(game.truck.state).toBe('delivering');
    expect(game.truck.deliveries).toBe(1);
    expect(game.score).toBe(1 + FULL_TRUCK_BONUS);

    runFrames(game, 18);
    expect(game.truck.state).toBe('returning');
    expect(game.truck.load).toBe(0);

    runFrames(game, 19);
    expect(game.truck.state).toBe('waiting');
    expect(game.truck.x).toBe(4);
    expect(game.boss.side).toBe('left');
    expect(game.boss.frames).toBe(30);
  });

  it('stops the belts and spawning while it is away', () => {
    const game = createGame();
    game.truck.state = 'delivering';
    queueTopDelivery(game);
    runFrames(game, 2);
    expect(game.packages).toHaveLength(1);
    expect(game.packages[0].x).toBe(44);
    expect(game.packages[0].aux).toBe(0);
    expect(game.packages[0].caught).toBe(true);
    expect(game.luigi.state).toBe('prepared');
    expect(game.spawnTimer).toBe(100);
    expect(game.score).toBe(0);
    expect(game.events).toEqual([]);
    expect(game.truck.x).toBe(0);
  });

  it('clears the belt ends when it gets back', () => {
    const game = createGame();
    game.truck.state = 'returning';
    game.truck.x = 2;
    game.packages = [new Package(200, 1), new Package(100, 1)];
    runFrames(game, 1);
    expect(game.truck.state).toBe('waiting');
    expect(game.packages.map(p => p.x)).toEqual([100]);
    expect(game.conveyors[1].packages).toHaveLength(1);
    expect(game.failures).toBe(0);
    expect(game.events).toEqual([]);

    runFrames(game, 1);
    expect(game.packages[0].aux).toBe(1);
  });

  it('forgives a failure on every third trip on easy', () => {
    const game = createGame();
    game.failures = 2;
    game.truck.deliveries = 2;
    game.truck.load = 7;
    queueTopDelivery(game);
    runFrames(game, 2);
    expect(game.failures).toBe(1);
    expect(game.events.map(e => e.type)).toEqual(['delivered', 'truckFull', 'failureForgiven']);
  });

  it('does not forgive between trips', () => {
    const game = createGame();
    game.failures = 2;
    game.truck.load = 7;
    queueTopDelivery(game);
    runFrames(game, 2);
    expect(game.failures).toBe(2);
  });

  it('never forgives on crazy', () => {
    const game = createGame('crazy');
    game.failures = 2;
    game.truck.deliveries = 4;
    game.truck.load = 7;
    queueTopDelivery(game);
    runFrames(game, 2);
    expect(game.truck.deliveries).toBe(5);
    expect(game.failures).toBe(2);
  });
});

describe('spawning', () => {
  it('keeps a single package in play at low scores', () => {
    const game = createGame();
    runFrames(game, 120);
    expect(game.packages).toHaveLength(1);
  });

  it('adds a package once the timer runs out and the score allows it', () => {
    const game = createGame();
    game.score = 50;
    runFrames(game, 99);
    expect(game.packages).toHaveLength(1);

    runFrames(game, 1);
    expect(game.packages).toHaveLength(2);
    expect(game.packages[1].x).toBe(230);
    expect(game.spawnTimer).toBe(35);
  });

  it('waits for the spawn zone to clear', () => {
    const game = createGame();
    game.score = 100;
    game.spawnTimer = 1;
    runFrames(game, 18);
    expect(game.packages).toHaveLength(1);
    expect(game.packages[0].x).toBe(210);

    runFrames(game, 1);
    expect(game.packages).toHaveLength(2);
  });
});

describe('game over', () => {
  function loseLastLife(game: ConveyorGame) {
    game.failures = 2;
    const pkg = new Package(20, 0);
    pkg.state = 'falling';
    pkg.aux = 8;
    game.packages = [pkg];
    runFrames(game, 1);
  }

  it('ends the game on the third failure', () => {
    const game = createGame();
    loseLastLife(game);
    expect(game.phase).toBe('gameOver');
    expect(game.events).toEqual([
      { type: 'failure', side: 'left', x: 10, y: 157 },
      { type: 'gameOver' },
    ]);
  });

  it('freezes the field until a choice is made', () => {
    const game = createGame();
    loseLastLife(game);
    game.pressKey('ArrowUp');
    runFrames(game, 5);
    expect(game.mario.floor).toBe(0);
    expect(game.events).toEqual([]);
  });

  it('restarts with R', () => {
    const game = createGame();
    game.score = 12;
    loseLastLife(game);
    game.pressKey('r');
    runFrames(game, 1);
    expect(game.phase).toBe('playing');
    expect(game.score).toBe(0);
    expect(game.failures).toBe(0);
    expect(game.spawnTimer).toBe(100);
    expect(game.packages.map(p => p.x)).toEqual([230]);
  });

  it('returns to the menu with M', () => {
    const game = createGame('medium');
    loseLastLife(game);
    game.pressKey('m');
    runFrames(game, 1);
    expect(game.phase).toBe('menu');
    expect(game.menuSelection).toBe(1);
  });
});

describe('controls', () => {
  it('moves Mario with the arrows and Luigi with W/S', () => {
    const game = createGame();
    game.pressKey('ArrowUp');
    game.pressKey('W');
    runFrames(game, 1);
    expect(game.mario.floor).toBe(1);
    expect(game.luigi.floor).toBe(1);

    game.pressKey('s');
    runFrames(game, 1);
    expect(game.luigi.floor).toBe(0);
  });

  it('reverses the controls on crazy', () => {
    const game = createGame('crazy');
    game.pressKey('ArrowDown');
    game.pressKey('w');
    runFrames(game, 1);
    expect(game.mario.floor).toBe(1);
    expect(game.luigi.floor).toBe(0);
  });

  it('quits with Q before the belts move', () => {
    const game = createGame();
    game.pressKey('q');
    runFrames(game, 1);
    expect(game.quitRequested).toBe(true);
    expect(game.packages[0].aux).toBe(0);
  });
});

describe('pause', () => {
  it('stops the belts while paused', () => {
    const game = createGame();
    game.pressKey('Escape');
    runFrames(game, 10);
    expect(game.phase).toBe('paused');
    expect(game.packages[0].aux).toBe(0);

    game.pressKey('Escape');
    runFrames(game, 1);
    expect(game.phase).toBe('playing');
    runFrames(game, 1);
    expect(game.packages[0].aux).toBe(1);
  });

  it('restarts from the pause menu', () => {
    const game = createGame();
    game.score = 7;
    game.pressKey('Escape');
    runFrames(game, 1);
    game.pressKey('ArrowDown');
    game.pressKey('Enter');
    runFrames(game, 1);
    expect(game.phase).toBe('playing');
    expect(game.score).toBe(0);
  });

  it('opens the menu with M', () => {
    const game = createGame('extreme');
    game.pressKey('Escape');
    runFrames(game, 1);
    game.pressKey('m');
    runFrames(game, 1);
    expect(game.phase).toBe('menu');
    expect(game.menuSelection).toBe(2);
  });
});

describe('menu', () => {
  it('starts a difficulty from its number key', () => {
    const game = new ConveyorGame({ random: () => 0 });
    game.pressKey('2');
    runFrames(game, 1);
    expect(game.phase).toBe('playing');
    expect(game.difficulty.name).toBe('medium');
    expect(game.conveyors).toHaveLength(7);
    expect(game.conveyors[1].ticksPerStep).toBe(6);
  });

  it('starts the highlighted difficulty with Enter', () => {
    const game = new ConveyorGame({ random: () => 0 });
    game.pressKey('ArrowDown');
    game.pressKey('ArrowDown');
    game.pressKey('Enter');
    runFrames(game, 1);
    expect(game.difficulty.name).toBe('extreme');
    expect(game.conveyors).toHaveLength(9);
  });

  it('wraps to QUIT and quits on Enter', () => {
    const game = new ConveyorGame();
    game.pressKey('ArrowUp');
    runFrames(game, 1);
    expect(game.menuSelection).toBe(4);

    game.pressKey('Enter');
    runFrames(game, 1);
    expect(game.quitRequested).toBe(true);
    expect(game.phase).toBe('menu');
  });
});
