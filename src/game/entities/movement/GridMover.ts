import { Direction, DIRECTION_VECTORS, OPPOSITES, isHorizontal, isVertical } from '../common/direction';
import type { CellIndex } from '../common/grid';
import type { Tile } from '../common/Tile';

/** True if this cell may be entered by the moving actor. */
export type CanEnter = (cell: CellIndex) => boolean;

export function alignToTileCenter(tile: Tile): void {
  const c = tile.centerPos;
  tile.updatePosition({ x: c.x, y: c.y });
}

/** Snap the axis across the direction of travel onto the lane centre. */
export function snapPerpendicularAxis(tile: Tile, dir: Direction): void {
  const pos = tile.spritePos;
  const c = tile.centerPos;
  if (isHorizontal(dir)) tile.updatePosition({ x: pos.x, y: c.y });
  else if (isVertical(dir)) tile.updatePosition({ x: c.x, y: pos.y });
}

/**
 * Moves `tile` up to `speed` px along `dir`. A step never passes a cell
 * centre (it stops on it, so a decision can be taken there) and never leaves
 * the centre toward a cell that cannot be entered.
 *
 * Returns false when the move was refused by a blocked cell.
 */
export function advance(tile: Tile, dir: Direction, speed: number, canEnter: CanEnter): boolean {
  if (dir === Direction.None || speed <= 0) return true;

  const v = DIRECTION_VECTORS[dir];
  const pos = tile.spritePos;
  const c = tile.centerPos;
  const ahead = (c.x - pos.x) * v.x + (c.y - pos.y) * v.y;

  if (ahead <= 0 && !canEnter(tile.adjacent(dir).index)) {
    if (isHorizontal(dir)) tile.updatePosition({ x: c.x, y: pos.y });
    else tile.updatePosition({ x: pos.x, y: c.y });
    return false;
  }

  const step = ahead > 0 && ahead < speed ? ahead : speed;
  tile.updatePosition({ x: pos.x + v.x * step, y: pos.y + v.y * step });
  return true;
}

/**
 * Player-style steering: a queued direction is taken at the next centre where
 * it is open, reversing is taken at once.
 */
export class GridMover {
  private dir: Direction = Direction.None;
  private queued: Direction | null = null;

  constructor(private readonly tile: Tile, private readonly canEnter: CanEnter) {}

  direction(): Direction { return this.dir; }
  queuedDirection(): Direction | null { return this.queued; }
  queue(d: Direction): void { this.queued = d; }
  force(d: Direction): void {
    this.dir = d;
    if (d !== Direction.None) this.queued = null;
  }

  private canMoveInDirection(direction: Direction): boolean {
    return this.canEnter(this.tile.adjacent(direction).index);
  }

  step(speed: number): void {
    this.tryApplyQueuedDirection();

    if (this.dir === Direction.None) return;
    if (!advance(this.tile, this.dir, speed, this.canEnter)) {
      this.dir = Direction.None;
      return;
    }
    snapPerpendicularAxis(this.tile, this.dir);
  }

  private tryApplyQueuedDirection(): void {
    const queued = this.queued;
    if (queued === null || queued === Direction.None) return;

    if (this.dir === Direction.None) {
      if (this.tile.isInCenter && this.canMoveInDirection(queued)) {
        this.dir = queued;
        this.queued = null;
        alignToTileCenter(this.tile); // starting from rest: ok to align
      }
      return;
    }

    if (OPPOSITES[this.dir] === queued) {
      this.dir = queued;               // reverse mid-corridor: don't align
      this.queued = null;
      return;
    }

    if (this.tile.isInCenter && this.canMoveInDirection(queued)) {
      if (queued !== this.dir) {
        this.dir = queued;
        alignToTileCenter(this.tile);  // align only when actually turning
      }
      this.queued = null;
    }
  }
}
