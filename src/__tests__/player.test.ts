import { describe, it, expect, beforeEach } from 'vitest';
import { Direction, DirectionInfo } from '../game/entities/common/direction';
import { CellIndex } from '../game/entities/common/grid';
import { Player } from '../game/entities/Player';
import { PlayerStats } from '../game/logic/PlayerStats';
import { GridMaze } from '../game/maze/Maze';
import { DEFAULT_MAZE } from '../game/maze/mazeData';
import { tick } from './fixtures';

describe('Player', () => {
  let stats: PlayerStats;
  let player: Player;

  beforeEach(() => {
    const maze = new GridMaze(DEFAULT_MAZE.layout);
    stats = new PlayerStats(1, maze.totalPellets);
    player = new Player(maze, { currentPlayerStats: stats }, DEFAULT_MAZE.playerSpawn);
    player.reset();
  });

  it('starts between two cells, already heading left', () => {
    expect(player.tile.spritePos).toEqual({ x: 112, y: 188 });
    expect(player.tile.index).toEqual(new CellIndex(14, 23));
    expect(player.direction).toEqual(new DirectionInfo(Direction.Left));
    expect(player.isMoving).toBe(true);

    tick(player);

    expect(player.tile.spritePos).toEqual({ x: 111, y: 188 });
  });

  it('stays put while frozen', () => {
    player.setFrozen(true);
    tick(player, 10);
    expect(player.tile.spritePos).toEqual({ x: 112, y: 188 });

    player.setFrozen(false);
    tick(player);
    expect(player.tile.spritePos).toEqual({ x: 111, y: 188 });
  });

  it('runs faster while a fright session is on', () => {
    expect(player.currentSpeed()).toBeCloseTo(1.0);
    stats.pelletEaten('power');
    expect(player.currentSpeed()).toBeCloseTo(1.125);
  });

  it('reverses as soon as asked', () => {
    player.queueDirection(Direction.Right);
    expect(player.direction.next).toBe(Direction.Right);

    tick(player);

    expect(player.direction).toEqual(new DirectionInfo(Direction.Right));
    expect(player.tile.spritePos).toEqual({ x: 113, y: 188 });
  });

  it('stops at the first wall', () => {
    tick(player, 70);

    expect(player.tile.spritePos).toEqual({ x: 52, y: 188 });
    expect(player.isMoving).toBe(false);
    expect(player.direction.current).toBe(Direction.Left);
  });

  it('puts everything back on reset', () => {
    tick(player, 5);
    player.setFrozen(true);
    player.visible = false;

    player.reset();

    expect(player.tile.spritePos).toEqual({ x: 112, y: 188 });
    expect(player.visible).toBe(true);
    expect(player.animationFrame).toBe(0);
    tick(player);
    expect(player.tile.spritePos).toEqual({ x: 111, y: 188 });
  });
});
