import mazeJson from '../data/maze.json';
import { GhostNickname } from '../config';
import { Direction } from '../entities/common/direction';
import { CellIndex, WorldPoint } from '../entities/common/grid';
import { Tile } from '../entities/common/Tile';
import type { HouseGeometry } from '../entities/ghost/GhostTypes';

export interface SpawnPoint {
  /** Cell units; .5 lands between two cells. */
  cell: WorldPoint;
  direction: Direction;
}

export interface MazeDefinition {
  layout: readonly string[];
  house: HouseGeometry;
  playerSpawn: SpawnPoint;
  ghostSpawns: Record<GhostNickname, SpawnPoint>;
  scatterTargets: Record<GhostNickname, CellIndex>;
}

type RawSpawn = { x: number; y: number; direction: string };
type RawPoint = { x: number; y: number };

export function parseDirection(name: string): Direction {
  switch (name) {
    case Direction.Up: return Direction.Up;
    case Direction.Down: return Direction.Down;
    case Direction.Left: return Direction.Left;
    case Direction.Right: return Direction.Right;
    case Direction.None: return Direction.None;
    default:
      throw new Error(`Unknown direction '${name}'`);
  }
}

function spawn(raw: RawSpawn): SpawnPoint {
  return { cell: { x: raw.x, y: raw.y }, direction: parseDirection(raw.direction) };
}

function cell(raw: RawPoint): CellIndex {
  return new CellIndex(raw.x, raw.y);
}

export const DEFAULT_MAZE: MazeDefinition = {
  layout: mazeJson.layout,
  house: {
    entrance: Tile.toCenterCanvas(mazeJson.houseEntrance),
    center: Tile.toCenterCanvas(mazeJson.houseCenter),
  },
  playerSpawn: spawn(mazeJson.spawns.player),
  ghostSpawns: {
    [GhostNickname.Blinky]: spawn(mazeJson.spawns.blinky),
    [GhostNickname.Pinky]: spawn(mazeJson.spawns.pinky),
    [GhostNickname.Inky]: spawn(mazeJson.spawns.inky),
    [GhostNickname.Clyde]: spawn(mazeJson.spawns.clyde),
  },
  scatterTargets: {
    [GhostNickname.Blinky]: cell(mazeJson.scatterTargets.blinky),
    [GhostNickname.Pinky]: cell(mazeJson.scatterTargets.pinky),
    [GhostNickname.Inky]: cell(mazeJson.scatterTargets.inky),
    [GhostNickname.Clyde]: cell(mazeJson.scatterTargets.clyde),
  },
};
