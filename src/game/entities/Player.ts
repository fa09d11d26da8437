import { PLAYER_BASE_SPEED } from '../config';
import type { GameStatsView } from '../logic/PlayerStats';
import type { Maze } from '../maze/Maze';
import type { SpawnPoint } from '../maze/mazeData';
import type { TickTiming } from '../timing';
import { Actor } from './Actor';
import { Direction, DirectionInfo } from './common/direction';
import { Tile } from './common/Tile';
import type { PlayerView } from './ghost/GhostTypes';
import { GridMover } from './movement/GridMover';

/** The player's actor: steered by queued directions, stops at walls. */
export class Player extends Actor implements PlayerView {
  readonly tile: Tile;
  private readonly mover: GridMover;
  private frozen = false;

  constructor(
    private readonly maze: Maze,
    private readonly stats: GameStatsView,
    private readonly spawn: SpawnPoint,
  ) {
    super(spawn.direction);
    this.tile = new Tile(maze.widthInCells, Tile.toCenterCanvas(spawn.cell));
    this.mover = new GridMover(this.tile, (cell) => this.maze.canEnter(cell));
  }

  reset(): void {
    this.tile.updatePosition(Tile.toCenterCanvas(this.spawn.cell));
    // the spawn sits between two cells, so start already moving
    this.mover.force(this.spawn.direction);
    this.setDirection(new DirectionInfo(this.spawn.direction));
    this.frozen = false;
    this.visible = true;
    this.resetAnimation();
  }

  setFrozen(frozen: boolean): void {
    this.frozen = frozen;
  }

  queueDirection(direction: Direction): void {
    this.mover.queue(direction);
    this.setDirection(this.direction.withNext(direction));
  }

  /** Pixels per tick from the level's percentages. */
  currentSpeed(): number {
    const player = this.stats.currentPlayerStats;
    const props = player.levelStats.getLevelProps();
    const frightActive = player.frightSession !== undefined && !player.frightSession.isFinished;
    const pc = frightActive ? props.frightPlayerSpeedPc : props.playerSpeedPc;
    return PLAYER_BASE_SPEED * (pc / 100);
  }

  get isMoving(): boolean {
    return this.mover.direction() !== Direction.None;
  }

  override update(timing: TickTiming): void {
    if (this.frozen) return;

    this.mover.step(this.currentSpeed());

    const moving = this.mover.direction();
    if (moving !== Direction.None && moving !== this.direction.current) {
      this.setDirection(new DirectionInfo(moving, this.mover.queuedDirection() ?? moving));
    }
    if (moving !== Direction.None) super.update(timing);
  }
}
