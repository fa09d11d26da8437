import { GhostNickname, MAZE_WIDTH_IN_CELLS } from '../game/config';
import { Direction, DirectionInfo } from '../game/entities/common/direction';
import { CellIndex, WorldPoint } from '../game/entities/common/grid';
import { Tile } from '../game/entities/common/Tile';
import { Ghost, GhostOptions } from '../game/entities/ghost/GhostBase';
import { GhostMovementMode } from '../game/entities/ghost/GhostTypes';
import type { PlayerView } from '../game/entities/ghost/GhostTypes';
import type { EventPublisher, GameEvent } from '../game/events/GameEvents';
import { PlayerStats } from '../game/logic/PlayerStats';
import { GridMaze } from '../game/maze/Maze';
import { DEFAULT_MAZE } from '../game/maze/mazeData';
import type { TickTiming } from '../game/timing';

export const TICK: TickTiming = { dtMs: 1000 / 60, totalMs: 0 };

export function ms(dtMs: number): TickTiming {
  return { dtMs, totalMs: 0 };
}

export class RecordingPublisher implements EventPublisher {
  readonly published: GameEvent[] = [];

  publish(event: GameEvent): void {
    this.published.push(event);
  }
}

/** A player that stands where the test puts it. */
export class FakePlayer implements PlayerView {
  readonly tile: Tile;
  direction = new DirectionInfo(Direction.Left);

  constructor(cell: CellIndex) {
    this.tile = new Tile(MAZE_WIDTH_IN_CELLS, Tile.toCenterCanvas(cell));
  }

  moveTo(cell: CellIndex): void {
    this.tile.updatePosition(Tile.toCenterCanvas(cell));
  }

  face(dir: Direction): void {
    this.direction = new DirectionInfo(dir);
  }
}

export interface TestWorld {
  maze: GridMaze;
  stats: PlayerStats;
  events: RecordingPublisher;
  player: FakePlayer;
}

/** Default maze, level 1, player parked in the bottom-left corner. */
export function makeWorld(level = 1): TestWorld {
  const maze = new GridMaze(DEFAULT_MAZE.layout);
  return {
    maze,
    stats: new PlayerStats(level, maze.totalPellets),
    events: new RecordingPublisher(),
    player: new FakePlayer(new CellIndex(1, 29)),
  };
}

/** Everything a ghost needs from a world; spawn defaults to cell (6,5) facing right. */
export function ghostOptions(world: TestWorld, overrides: Partial<GhostOptions> = {}): GhostOptions {
  return {
    nickname: GhostNickname.Blinky,
    maze: world.maze,
    stats: { currentPlayerStats: world.stats },
    events: world.events,
    player: world.player,
    startingPoint: { x: 6, y: 5 },
    startingDirection: Direction.Right,
    scatterTarget: new CellIndex(25, -3),
    house: DEFAULT_MAZE.house,
    random: () => 0,
    ...overrides,
  };
}

export class TestGhost extends Ghost {
  chaseTarget = new CellIndex(1, 1);

  constructor(opts: GhostOptions) {
    super(opts);
  }

  getChaseTarget(): CellIndex {
    return this.chaseTarget;
  }
}

export function makeGhost(world: TestWorld, overrides: Partial<GhostOptions> = {}): TestGhost {
  const ghost = new TestGhost(ghostOptions(world, overrides));
  ghost.reset();
  return ghost;
}

/** Runs the level-1 timer into its first chase phase and puts the ghost in it. */
export function enterChase(world: TestWorld, ghost: Ghost): void {
  world.stats.ghostMoveConductor.update(ms(7000));
  ghost.setMovementMode(GhostMovementMode.Chase);
}

export function centerOf(x: number, y: number): WorldPoint {
  return Tile.toCenterCanvas({ x, y });
}

export function tick(actor: { update(t: TickTiming): void }, times = 1): void {
  for (let i = 0; i < times; i += 1) actor.update(TICK);
}
