import type { WorldPoint } from './grid';

export enum Direction {
  Up = 'up',
  Down = 'down',
  Left = 'left',
  Right = 'right',
  None = 'none',
}

export const DIRECTION_VECTORS: Record<Direction, Readonly<WorldPoint>> = {
  [Direction.Up]: { x: 0, y: -1 },
  [Direction.Down]: { x: 0, y: 1 },
  [Direction.Left]: { x: -1, y: 0 },
  [Direction.Right]: { x: 1, y: 0 },
  [Direction.None]: { x: 0, y: 0 },
};

export const OPPOSITES: Record<Direction, Direction> = {
  [Direction.Up]: Direction.Down,
  [Direction.Down]: Direction.Up,
  [Direction.Left]: Direction.Right,
  [Direction.Right]: Direction.Left,
  [Direction.None]: Direction.None,
};

/** Arcade tie-break order for ghost decisions. */
export const DIRS: readonly Direction[] = [
  Direction.Up,
  Direction.Left,
  Direction.Down,
  Direction.Right,
];

export function reverse(dir: Direction): Direction {
  return OPPOSITES[dir];
}

export function isVertical(dir: Direction): boolean {
  return dir === Direction.Up || dir === Direction.Down;
}

export function isHorizontal(dir: Direction): boolean {
  return dir === Direction.Left || dir === Direction.Right;
}

/**
 * Facing of an actor: `current` is what it moves in, `next` is what it will
 * take at the following tile centre.
 *
 * Only the player queues a `next`. Ghosts pick their exit at the centre itself
 * (see `Ghost.claimDecisionPoint`), so for them `next` always equals `current`.
 */
export class DirectionInfo {
  constructor(
    public readonly current: Direction,
    public readonly next: Direction = current,
  ) {}

  withNext(next: Direction): DirectionInfo {
    return new DirectionInfo(this.current, next);
  }
}

export function dirName(dir: Direction | null): string {
  switch (dir) {
    case Direction.Up: return 'Up';
    case Direction.Down: return 'Down';
    case Direction.Left: return 'Left';
    case Direction.Right: return 'Right';
    default: return '—';
  }
}
