import { TILE_SIZE } from '../../config';

/** Shared "at centre" tolerance so centre detection stays consistent project-wide. */
export const CENTER_TOLERANCE_PX = 0.75;

export type WorldPoint = { x: number; y: number };

/** Integer (column,row) address of one maze cell. */
export class CellIndex {
  constructor(public readonly x: number, public readonly y: number) {}

  static fromSpritePos(pos: WorldPoint): CellIndex {
    return new CellIndex(Math.floor(pos.x / TILE_SIZE), Math.floor(pos.y / TILE_SIZE));
  }

  equals(other: CellIndex): boolean {
    return this.x === other.x && this.y === other.y;
  }

  offset(dx: number, dy: number): CellIndex {
    return new CellIndex(this.x + dx, this.y + dy);
  }

  toString(): string {
    return `${this.x},${this.y}`;
  }
}

/** Top-left pixel of a cell. */
export function positionOf(cell: CellIndex): WorldPoint {
  return { x: cell.x * TILE_SIZE, y: cell.y * TILE_SIZE };
}

export function distance2(a: CellIndex, b: CellIndex): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export function areNear(a: WorldPoint, b: WorldPoint, precision: number): boolean {
  return Math.abs(a.x - b.x) <= precision && Math.abs(a.y - b.y) <= precision;
}
