import { describe, it, expect } from 'vitest';
import {
  beltDirection,
  beltY,
  isInEndZone,
  isInReachZone,
  isPastEdge,
  luigiFloorCount,
  marioFloorCount,
  servedBelt,
  snapToGrid,
  stepX,
  ticksPerStep,
} from './geometry';

describe('belt layout', () => {
  it('stacks belts 16px apart from the bottom', () => {
    expect(beltY(0)).toBe(152);
    expect(beltY(1)).toBe(136);
    expect(beltY(4)).toBe(88);
  });

  it('alternates direction by parity', () => {
    expect(beltDirection(0)).toBe('left');
    expect(beltDirection(1)).toBe('right');
    expect(beltDirection(8)).toBe('left');
  });

  it('snaps y onto the 8 + 16n grid', () => {
    expect(snapToGrid(136)).toBe(136);
    expect(snapToGrid(137)).toBe(136);
    expect(snapToGrid(127)).toBe(120);
  });
});

describe('ticksPerStep', () => {
  it('steps every 9 frames at speed 1 and faster at higher speeds', () => {
    expect(ticksPerStep(1)).toBe(9);
    expect(ticksPerStep(1.5)).toBe(6);
    expect(ticksPerStep(2)).toBe(5);
  });

  it('never drops below one frame', () => {
    expect(ticksPerStep(100)).toBe(1);
  });
});

describe('stepX', () => {
  it('moves 10px in the belt direction', () => {
    expect(stepX(230, 'left')).toBe(220);
    expect(stepX(50, 'right')).toBe(60);
  });

  it('jumps across the stair column', () => {
    expect(stepX(150, 'left')).toBe(104);
    expect(stepX(104, 'right')).toBe(150);
  });

  it('lands on the column edges without jumping', () => {
    expect(stepX(160, 'left')).toBe(150);
    expect(stepX(94, 'right')).toBe(104);
  });
});

describe('zones', () => {
  it('detects belt ends strictly past the thresholds', () => {
    expect(isInEndZone(44, 'left')).toBe(true);
    expect(isInEndZone(45, 'left')).toBe(false);
    expect(isInEndZone(196, 'right')).toBe(true);
    expect(isInEndZone(195, 'right')).toBe(false);
  });

  it('reach zones are wider than end zones', () => {
    expect(isInReachZone(64, 'left')).toBe(true);
    expect(isInReachZone(65, 'left')).toBe(false);
    expect(isInReachZone(176, 'right')).toBe(true);
  });

  it('flags packages past either screen edge', () => {
    expect(isPastEdge(14)).toBe(true);
    expect(isPastEdge(15)).toBe(false);
    expect(isPastEdge(240)).toBe(false);
    expect(isPastEdge(241)).toBe(true);
  });
});

describe('worker floors', () => {
  it('gives Luigi the extra floor on odd belt counts', () => {
    expect(luigiFloorCount(5)).toBe(3);
    expect(marioFloorCount(5)).toBe(2);
    expect(luigiFloorCount(9)).toBe(5);
    expect(marioFloorCount(9)).toBe(4);
  });

  it('maps floors to the belts each side serves', () => {
    expect(servedBelt('left', 0)).toBe(0);
    expect(servedBelt('left', 2)).toBe(4);
    expect(servedBelt('right', 0)).toBe(1);
    expect(servedBelt('right', 1)).toBe(3);
  });
});
