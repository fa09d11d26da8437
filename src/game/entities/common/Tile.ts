import { MAZE_WIDTH_IN_CELLS, TILE_SIZE } from '../../config';
import { Direction, DIRECTION_VECTORS } from './direction';
import { CENTER_TOLERANCE_PX, CellIndex, WorldPoint, areNear, positionOf } from './grid';

/**
 * Sub-pixel position of one actor plus everything derived from it: the owning
 * cell, that cell's top-left and centre pixels. Only `updatePosition` mutates a
 * tile; every derived value always reflects the last position set.
 *
 * Columns outside the maze wrap around horizontally (the tunnel).
 */
export class Tile {
  private pos: WorldPoint = { x: 0, y: 0 };
  private cell = new CellIndex(0, 0);
  private topLeftPos: WorldPoint = { x: 0, y: 0 };
  private center: WorldPoint = { x: TILE_SIZE / 2, y: TILE_SIZE / 2 };

  // One reusable tile per direction; handed back by adjacent().
  private readonly nextTiles = new Map<Direction, Tile>();

  constructor(
    public readonly mazeWidthInCells: number = MAZE_WIDTH_IN_CELLS,
    spritePos: WorldPoint = { x: 0, y: 0 },
  ) {
    this.updatePosition(spritePos);
  }

  /** Centre pixel of a cell given in cell units (fractions allowed). */
  static toCenterCanvas(cellPos: WorldPoint): WorldPoint {
    return {
      x: cellPos.x * TILE_SIZE + TILE_SIZE / 2,
      y: cellPos.y * TILE_SIZE + TILE_SIZE / 2,
    };
  }

  static fromIndex(index: CellIndex, mazeWidthInCells: number = MAZE_WIDTH_IN_CELLS): Tile {
    return new Tile(mazeWidthInCells, positionOf(index));
  }

  get spritePos(): Readonly<WorldPoint> { return this.pos; }
  get index(): CellIndex { return this.cell; }
  get topLeft(): Readonly<WorldPoint> { return this.topLeftPos; }
  get centerPos(): Readonly<WorldPoint> { return this.center; }

  get isInCenter(): boolean {
    return areNear(this.pos, this.center, CENTER_TOLERANCE_PX);
  }

  isNearCenter(precision: number): boolean {
    return areNear(this.pos, this.center, precision);
  }

  updatePosition(spritePos: WorldPoint): void {
    this.pos = { x: spritePos.x, y: spritePos.y };
    this.cell = CellIndex.fromSpritePos(this.pos);
    this.topLeftPos = positionOf(this.cell);
    this.center = {
      x: this.topLeftPos.x + TILE_SIZE / 2,
      y: this.topLeftPos.y + TILE_SIZE / 2,
    };

    this.handleWrapping();
  }

  /**
   * The tile one cell away, measured from this tile's centre and wrapped.
   * The returned instance is cached per direction and refreshed on each call.
   */
  adjacent(direction: Direction): Tile {
    const v = DIRECTION_VECTORS[direction];

    let tile = this.nextTiles.get(direction);
    if (!tile) {
      tile = new Tile(this.mazeWidthInCells);
      this.nextTiles.set(direction, tile);
    }

    tile.updatePosition({
      x: this.center.x + v.x * TILE_SIZE,
      y: this.center.y + v.y * TILE_SIZE,
    });
    return tile;
  }

  private handleWrapping(): void {
    const mazeWidthPx = this.mazeWidthInCells * TILE_SIZE;

    if (this.cell.x < 0) {
      this.updatePosition({ x: this.pos.x + mazeWidthPx, y: this.pos.y });
    } else if (this.cell.x >= this.mazeWidthInCells) {
      this.updatePosition({ x: this.pos.x - mazeWidthPx, y: this.pos.y });
    }
  }
}
