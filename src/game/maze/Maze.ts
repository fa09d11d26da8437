import { CellIndex } from '../entities/common/grid';
import type { PelletKind } from '../logic/PlayerStats';

/** Characters of a maze layout row. */
export enum CellKind {
  Wall = '#',
  Pellet = '.',
  PowerPellet = 'o',
  Empty = ' ',
  Tunnel = 'T',
  GhostDoor = '-',
}

export interface PassOptions {
  /** Eyes and exiting ghosts may cross the ghost door. */
  throughDoor?: boolean;
}

/** Static geometry queries the actors depend on. */
export interface Maze {
  readonly widthInCells: number;
  readonly heightInCells: number;
  isTunnelCell(cell: CellIndex): boolean;
  canEnter(cell: CellIndex, opts?: PassOptions): boolean;
}

function parseCellKind(ch: string, row: number, col: number): CellKind {
  switch (ch) {
    case CellKind.Wall: return CellKind.Wall;
    case CellKind.Pellet: return CellKind.Pellet;
    case CellKind.PowerPellet: return CellKind.PowerPellet;
    case CellKind.Empty: return CellKind.Empty;
    case CellKind.Tunnel: return CellKind.Tunnel;
    case CellKind.GhostDoor: return CellKind.GhostDoor;
    default:
      throw new Error(`Unknown maze character '${ch}' at row ${row}, column ${col}`);
  }
}

export interface Pellet {
  cell: CellIndex;
  kind: PelletKind;
}

/** Maze backed by a character layout; also keeps the pellets still uneaten. */
export class GridMaze implements Maze {
  readonly widthInCells: number;
  readonly heightInCells: number;
  private readonly cells: CellKind[][];
  private readonly pellets = new Map<string, Pellet>();
  private readonly pelletTotal: number;

  constructor(layout: readonly string[]) {
    const first = layout[0];
    if (first === undefined) throw new Error('Maze layout is empty');

    this.widthInCells = first.length;
    this.heightInCells = layout.length;
    this.cells = layout.map((line, row) => {
      if (line.length !== this.widthInCells) {
        throw new Error(`Maze row ${row} has ${line.length} cells, expected ${this.widthInCells}`);
      }
      return Array.from(line, (ch, col) => parseCellKind(ch, row, col));
    });

    this.restorePellets();
    this.pelletTotal = this.pellets.size;
  }

  /** Rows outside the grid read as walls; columns wrap. */
  kindAt(cell: CellIndex): CellKind {
    const row = this.cells[cell.y];
    if (cell.y < 0 || row === undefined) return CellKind.Wall;
    const col = ((cell.x % this.widthInCells) + this.widthInCells) % this.widthInCells;
    return row[col] ?? CellKind.Wall;
  }

  isWall(cell: CellIndex): boolean {
    return this.kindAt(cell) === CellKind.Wall;
  }

  isGhostDoor(cell: CellIndex): boolean {
    return this.kindAt(cell) === CellKind.GhostDoor;
  }

  isTunnelCell(cell: CellIndex): boolean {
    return this.kindAt(cell) === CellKind.Tunnel;
  }

  canEnter(cell: CellIndex, opts: PassOptions = {}): boolean {
    const kind = this.kindAt(cell);
    if (kind === CellKind.Wall) return false;
    if (kind === CellKind.GhostDoor) return opts.throughDoor === true;
    return true;
  }

  pelletAt(cell: CellIndex): PelletKind | undefined {
    return this.pellets.get(cell.toString())?.kind;
  }

  /** Removes and returns the pellet in this cell, if any. */
  eatPellet(cell: CellIndex): PelletKind | undefined {
    const key = cell.toString();
    const pellet = this.pellets.get(key);
    if (pellet) this.pellets.delete(key);
    return pellet?.kind;
  }

  get pelletsLeft(): number {
    return this.pellets.size;
  }

  get totalPellets(): number {
    return this.pelletTotal;
  }

  /** Cells that still hold a pellet, for rendering. */
  remainingPellets(): Pellet[] {
    return Array.from(this.pellets.values());
  }

  restorePellets(): void {
    this.pellets.clear();
    this.cells.forEach((row, y) => {
      row.forEach((kind, x) => {
        const cell = new CellIndex(x, y);
        if (kind === CellKind.Pellet) this.pellets.set(cell.toString(), { cell, kind: 'pellet' });
        if (kind === CellKind.PowerPellet) this.pellets.set(cell.toString(), { cell, kind: 'power' });
      });
    });
  }
}
