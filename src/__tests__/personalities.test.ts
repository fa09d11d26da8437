import { describe, it, expect, beforeEach } from 'vitest';
import { GhostNickname } from '../game/config';
import { Direction } from '../game/entities/common/direction';
import { CellIndex } from '../game/entities/common/grid';
import {
  BlinkyGhost, ClydeGhost, InkyGhost, PinkyGhost, PersonalityOptions, createGhosts,
} from '../game/entities/ghost/Ghosts';
import { GhostMovementMode } from '../game/entities/ghost/GhostTypes';
import { DEFAULT_MAZE } from '../game/maze/mazeData';
import { TestWorld, enterChase, ghostOptions, makeWorld } from './fixtures';

function personality(world: TestWorld, overrides: Partial<PersonalityOptions> = {}): PersonalityOptions {
  const { nickname: _nickname, ...rest } = ghostOptions(world, overrides);
  return rest;
}

describe('ghost personalities', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = makeWorld();
    world.player.moveTo(new CellIndex(10, 20));
  });

  it('Blinky chases the player cell', () => {
    const blinky = new BlinkyGhost(personality(world));
    expect(blinky.nickname).toBe(GhostNickname.Blinky);
    expect(blinky.getChaseTarget()).toEqual(new CellIndex(10, 20));
  });

  it('Pinky aims four cells ahead, with the facing-up offset', () => {
    const pinky = new PinkyGhost(personality(world));
    const aimFor = (dir: Direction) => {
      world.player.face(dir);
      return pinky.getChaseTarget();
    };

    expect(aimFor(Direction.Left)).toEqual(new CellIndex(6, 20));
    expect(aimFor(Direction.Up)).toEqual(new CellIndex(6, 16));
    expect(aimFor(Direction.Right)).toEqual(new CellIndex(14, 20));
    expect(aimFor(Direction.Down)).toEqual(new CellIndex(10, 24));
  });

  it('Inky doubles the vector from Blinky to two cells ahead of the player', () => {
    const blinky = new BlinkyGhost(personality(world));
    const inky = new InkyGhost({ ...personality(world), blinky });
    world.player.face(Direction.Right);

    // ahead = (12,20); Blinky at (6,5); (6,5) + 2 * (6,15)
    expect(inky.getChaseTarget()).toEqual(new CellIndex(18, 35));
  });

  it('Clyde chases from afar and retreats to his corner up close', () => {
    const clyde = new ClydeGhost(personality(world, { scatterTarget: new CellIndex(0, 31) }));
    expect(clyde.getChaseTarget()).toEqual(new CellIndex(10, 20));

    world.player.moveTo(new CellIndex(8, 7));
    expect(clyde.getChaseTarget()).toEqual(new CellIndex(0, 31));
  });

  it('Blinky speeds up as the dots run out', () => {
    const blinky = new BlinkyGhost(personality(world));
    blinky.reset();
    enterChase(world, blinky);
    expect(blinky.currentSpeed()).toBeCloseTo(0.9375);

    // 244 dots on the board; 20 left is Elroy 1
    for (let i = 0; i < 224; i += 1) world.stats.pelletEaten('pellet');
    expect(blinky.currentSpeed()).toBeCloseTo(1.0);

    for (let i = 0; i < 10; i += 1) world.stats.pelletEaten('pellet');
    expect(blinky.currentSpeed()).toBeCloseTo(1.0625);
  });

  it('only Blinky gets the Elroy boost', () => {
    const pinky = new PinkyGhost(personality(world));
    pinky.reset();
    enterChase(world, pinky);
    for (let i = 0; i < 234; i += 1) world.stats.pelletEaten('pellet');

    expect(pinky.currentSpeed()).toBeCloseTo(0.9375);
  });
});

describe('createGhosts', () => {
  it('builds the four ghosts in update order from the maze definition', () => {
    const world = makeWorld();
    const ghosts = createGhosts(DEFAULT_MAZE, {
      maze: world.maze,
      stats: { currentPlayerStats: world.stats },
      events: world.events,
      player: world.player,
    });
    ghosts.forEach((g) => g.reset());

    expect(ghosts.map((g) => g.nickname)).toEqual([
      GhostNickname.Blinky, GhostNickname.Pinky, GhostNickname.Inky, GhostNickname.Clyde,
    ]);
    expect(ghosts.map((g) => g.position)).toEqual([
      { x: 112, y: 92 },
      { x: 112, y: 116 },
      { x: 96, y: 116 },
      { x: 128, y: 116 },
    ]);
    expect(ghosts.map((g) => g.getScatterTarget())).toEqual([
      new CellIndex(25, -3), new CellIndex(2, -3), new CellIndex(27, 31), new CellIndex(0, 31),
    ]);
    expect(ghosts.every((g) => g.movementMode === GhostMovementMode.InHouse)).toBe(true);
  });
});
