import { describe, it, expect, beforeEach } from 'vitest';
import { GhostNickname } from '../game/config';
import { Direction, DirectionInfo } from '../game/entities/common/direction';
import { CellIndex } from '../game/entities/common/grid';
import { GhostMovementMode, GhostState } from '../game/entities/ghost/GhostTypes';
import { GhostChaseMover } from '../game/entities/ghost/movement/GhostChaseMover';
import { GhostEyesBackToHouseMover } from '../game/entities/ghost/movement/GhostEyesBackToHouseMover';
import { GhostFrightenedMover } from '../game/entities/ghost/movement/GhostFrightenedMover';
import { GhostInsideHouseMover, approach } from '../game/entities/ghost/movement/GhostInsideHouseMover';
import { GhostScatterMover } from '../game/entities/ghost/movement/GhostScatterMover';
import { TestWorld, enterChase, makeGhost, makeWorld, ms, tick } from './fixtures';

describe('approach', () => {
  it('steps toward the goal without passing it', () => {
    expect(approach(10, 20, 3)).toBe(13);
    expect(approach(19, 20, 3)).toBe(20);
    expect(approach(20, 10, 4)).toBe(16);
    expect(approach(11, 10, 4)).toBe(10);
    expect(approach(5, 5, 1)).toBe(5);
  });
});

describe('targeting movers', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = makeWorld();
  });

  it('chase turns toward the chase target at a junction', () => {
    const ghost = makeGhost(world);
    enterChase(world, ghost);

    tick(ghost);

    const mover = ghost.activeMover;
    expect(mover).toBeInstanceOf(GhostChaseMover);
    expect(mover?.targetCell).toEqual(new CellIndex(1, 1));
    expect(ghost.direction.current).toBe(Direction.Up);
    expect(ghost.position).toEqual({ x: 52, y: 43.0625 });
  });

  it('scatter heads for the home corner', () => {
    const ghost = makeGhost(world);
    ghost.setMovementMode(GhostMovementMode.Scatter);

    tick(ghost);

    expect(ghost.activeMover).toBeInstanceOf(GhostScatterMover);
    expect(ghost.activeMover?.targetCell).toEqual(new CellIndex(25, -3));
    expect(ghost.direction.current).toBe(Direction.Right);
    expect(ghost.position).toEqual({ x: 52.9375, y: 44 });
  });

  it('decides again at a decided centre when the way ahead is walled off', () => {
    const ghost = makeGhost(world, { startingPoint: { x: 3, y: 5 }, startingDirection: Direction.Left });
    enterChase(world, ghost);

    tick(ghost);
    expect(ghost.position).toEqual({ x: 27.0625, y: 44 });
    expect(ghost.direction.current).toBe(Direction.Left);

    // still within the centre window of (3,5), now facing the wall above
    ghost.setDirection(new DirectionInfo(Direction.Up));
    tick(ghost);

    expect(ghost.direction.current).toBe(Direction.Left);
    expect(ghost.position).toEqual({ x: 27.0625, y: 44 });
  });
});

describe('GhostInsideHouseMover', () => {
  let world: TestWorld;

  beforeEach(() => {
    world = makeWorld();
  });

  it('lines up under the door, rises through it and hands back facing left', () => {
    const ghost = makeGhost(world, {
      nickname: GhostNickname.Pinky,
      startingPoint: { x: 11.5, y: 14 },
      startingDirection: Direction.Up,
    });
    const mover = ghost.activeMover;
    if (!(mover instanceof GhostInsideHouseMover)) throw new Error('expected the house mover');

    tick(ghost);
    expect(mover.currentPhase).toBe('aligning');
    expect(ghost.position).toEqual({ x: 96, y: 116 });

    tick(ghost, 64);
    expect(ghost.position).toEqual({ x: 112, y: 116 });
    expect(ghost.direction.current).toBe(Direction.Right);

    tick(ghost);
    expect(mover.currentPhase).toBe('exiting');

    tick(ghost, 95);
    expect(ghost.position).toEqual({ x: 112, y: 92.25 });
    expect(ghost.movementMode).toBe(GhostMovementMode.InHouse);

    tick(ghost);
    expect(ghost.position).toEqual({ x: 112, y: 92 });
    expect(ghost.direction.current).toBe(Direction.Left);
    expect(ghost.movementMode).toBe(GhostMovementMode.Scatter);
    expect(ghost.activeMover).toBeInstanceOf(GhostScatterMover);
  });

  it('bobs while the door keeps it in', () => {
    const ghost = makeGhost(world, {
      nickname: GhostNickname.Inky,
      startingPoint: { x: 11.5, y: 14 },
      startingDirection: Direction.Up,
    });

    tick(ghost, 15);
    expect(ghost.position).toEqual({ x: 96, y: 112.25 });
    expect(ghost.direction.current).toBe(Direction.Up);

    tick(ghost);
    expect(ghost.position).toEqual({ x: 96, y: 112 });
    expect(ghost.direction.current).toBe(Direction.Down);

    tick(ghost, 32);
    expect(ghost.position).toEqual({ x: 96, y: 120 });
    expect(ghost.direction.current).toBe(Direction.Up);
    expect(ghost.movementMode).toBe(GhostMovementMode.InHouse);
  });

  it('hands back at once when spawned outside the door', () => {
    const ghost = makeGhost(world, {
      startingPoint: { x: 13.5, y: 11 },
      startingDirection: Direction.Left,
    });

    tick(ghost);

    expect(ghost.movementMode).toBe(GhostMovementMode.Scatter);
    expect(ghost.position).toEqual({ x: 112, y: 92 });
  });

  it('leaves into the frightened mover when frightened', () => {
    const ghost = makeGhost(world, {
      startingPoint: { x: 13.5, y: 11 },
      startingDirection: Direction.Left,
    });
    world.stats.pelletEaten('power');
    ghost.powerPillEaten();

    tick(ghost);

    expect(ghost.state).toBe(GhostState.Frightened);
    expect(ghost.movementMode).toBe(GhostMovementMode.Frightened);
    expect(ghost.activeMover).toBeInstanceOf(GhostFrightenedMover);
  });
});

describe('GhostEyesBackToHouseMover', () => {
  it('returns through the door and announces the arrival', () => {
    const world = makeWorld();
    const ghost = makeGhost(world);
    enterChase(world, ghost);
    world.stats.pelletEaten('power');
    ghost.powerPillEaten();
    ghost.setPosition({ x: 116, y: 92 });
    world.player.moveTo(new CellIndex(14, 11));

    tick(ghost);
    const mover = ghost.activeMover;
    if (!(mover instanceof GhostEyesBackToHouseMover)) throw new Error('expected the eyes mover');
    expect(mover.currentPhase).toBe('aligning');
    expect(mover.targetCell).toEqual(new CellIndex(14, 11));
    expect(ghost.position).toEqual({ x: 114, y: 92 });
    expect(ghost.direction.current).toBe(Direction.Left);

    tick(ghost, 12);
    expect(mover.currentPhase).toBe('descending');
    expect(ghost.position).toEqual({ x: 112, y: 114 });
    expect(ghost.movementMode).toBe(GhostMovementMode.GoingToHouse);

    tick(ghost);
    expect(world.events.published).toEqual([
      { kind: 'ghost-eaten', ghost },
      { kind: 'ghost-inside-house', ghost },
    ]);
    expect(ghost.position).toEqual({ x: 112, y: 116 });
    expect(ghost.direction.current).toBe(Direction.Down);
    expect(ghost.state).toBe(GhostState.Normal);
    expect(ghost.movementMode).toBe(GhostMovementMode.InHouse);
    expect(ghost.activeMover).toBeInstanceOf(GhostInsideHouseMover);
  });
});

describe('GhostFrightenedMover', () => {
  function frightenedAt(random: () => number) {
    const world = makeWorld();
    const ghost = makeGhost(world, { random });
    world.stats.pelletEaten('power');
    ghost.powerPillEaten();
    ghost.setPosition({ x: 48, y: 44 });
    ghost.setDirection(new DirectionInfo(Direction.Right));
    ghost.setMovementMode(GhostMovementMode.Frightened);
    return ghost;
  }

  it('takes the first open clockwise direction from the random start', () => {
    const ghost = frightenedAt(() => 0);
    expect(ghost.activeMover).toBeInstanceOf(GhostFrightenedMover);

    tick(ghost, 6);
    expect(ghost.position).toEqual({ x: 51.75, y: 44 });

    tick(ghost);
    expect(ghost.direction.current).toBe(Direction.Up);
    expect(ghost.position).toEqual({ x: 52, y: 43.375 });
    expect(ghost.activeMover?.targetCell).toEqual(new CellIndex(6, 4));
  });

  it('skips the reversal and keeps clockwise order', () => {
    const ghost = frightenedAt(() => 0.8);

    tick(ghost, 7);

    expect(ghost.direction.current).toBe(Direction.Up);
  });

  it('hands back right after a turn without deciding that centre again', () => {
    const world = makeWorld();
    const ghost = makeGhost(world);
    world.stats.pelletEaten('power');
    ghost.powerPillEaten();
    ghost.setPosition({ x: 51, y: 44 });
    ghost.setDirection(new DirectionInfo(Direction.Right));
    ghost.setMovementMode(GhostMovementMode.Frightened);

    tick(ghost);
    expect(ghost.position).toEqual({ x: 51.625, y: 44 });

    world.stats.update(ms(6000));
    tick(ghost); // turns up at (6,5); the fright ends at the close of this tick
    expect(ghost.position).toEqual({ x: 52, y: 43.375 });
    expect(ghost.direction).toEqual(new DirectionInfo(Direction.Up));
    expect(ghost.state).toBe(GhostState.Normal);

    tick(ghost); // still inside the centre window of (6,5)
    expect(ghost.movementMode).toBe(GhostMovementMode.Scatter);
    expect(ghost.activeMover).toBeInstanceOf(GhostScatterMover);
    expect(ghost.direction.current).toBe(Direction.Up);
    expect(ghost.position).toEqual({ x: 52, y: 42.4375 });
  });

  it('keeps going without snapping when the pick is straight on', () => {
    const ghost = frightenedAt(() => 0.3);

    tick(ghost, 7);

    expect(ghost.direction.current).toBe(Direction.Right);
    expect(ghost.position).toEqual({ x: 52, y: 44 });
  });
});
