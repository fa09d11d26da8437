// src/game/entities/ghost/GhostUtils.ts
import type { Maze } from '../../maze/Maze';
import { Direction, DIRS, reverse } from '../common/direction';
import { CellIndex, distance2 } from '../common/grid';
import type { Tile } from '../common/Tile';
import { GhostMovementMode, ScatterOrChase, UnreachableStateError } from './GhostTypes';

export function isScatterOrChase(mode: GhostMovementMode): boolean {
  return (
    mode === GhostMovementMode.Undecided ||
    mode === GhostMovementMode.Scatter ||
    mode === GhostMovementMode.Chase
  );
}

/**
 * The mode → mover table. Returns the mode whose mover must be active when the
 * ghost's own mode is `mode` and the scatter/chase timer says `timerMode`.
 */
export function moverModeFor(mode: GhostMovementMode, timerMode: ScatterOrChase): GhostMovementMode {
  switch (mode) {
    case GhostMovementMode.Undecided:
    case GhostMovementMode.Scatter:
    case GhostMovementMode.Chase:
      return timerMode;
    case GhostMovementMode.InHouse:
    case GhostMovementMode.GoingToHouse:
    case GhostMovementMode.Frightened:
      return mode;
    default:
      throw new UnreachableStateError(`Don't know what mover to create for mode '${String(mode)}'`);
  }
}

/** Open neighbours of a tile, in Up, Left, Down, Right order. */
export function allowedDirections(maze: Maze, tile: Tile, throughDoor = false): Direction[] {
  return DIRS.filter((d) => maze.canEnter(tile.adjacent(d).index, { throughDoor }));
}

/**
 * Arcade target chase: never reverse, take the open neighbour closest
 * (squared cell distance) to `target`, ties going Up, Left, Down, Right.
 * A dead end reverses.
 */
export function chooseDirection(
  maze: Maze,
  tile: Tile,
  current: Direction,
  target: CellIndex,
  throughDoor = false,
): Direction {
  const back = reverse(current);
  const candidates = allowedDirections(maze, tile, throughDoor).filter((d) => d !== back);

  if (candidates.length === 0) return back;

  let best = candidates[0] ?? back;
  let bestDist = Number.POSITIVE_INFINITY;
  for (const d of candidates) {
    const dist = distance2(tile.adjacent(d).index, target);
    if (dist < bestDist) {
      bestDist = dist;
      best = d;
    }
  }
  return best;
}
