// src/game/entities/ghost/movement/GhostFrightenedMover.ts
import type { TickTiming } from '../../../timing';
import { Direction, reverse } from '../../common/direction';
import type { CellIndex } from '../../common/grid';
import type { Ghost } from '../GhostBase';
import { GhostMovementMode, GhostState } from '../GhostTypes';
import { GhostMover } from './GhostMover';

const CLOCKWISE: readonly Direction[] = [
  Direction.Up,
  Direction.Right,
  Direction.Down,
  Direction.Left,
];

/**
 * Wanders at random: a random starting direction, then clockwise until one is
 * open and is not a reversal. Hands control back once the fright is over.
 */
export class GhostFrightenedMover extends GhostMover {
  private heading: CellIndex;

  constructor(ghost: Ghost) {
    super(ghost, GhostMovementMode.Frightened);
    this.heading = ghost.tile.adjacent(ghost.direction.current).index;
  }

  get targetCell(): CellIndex {
    return this.heading;
  }

  update(timing: TickTiming): void {
    const ghost = this.ghost;
    if (ghost.state !== GhostState.Frightened) {
      ghost.setMovementMode(GhostMovementMode.Undecided, 'fright over');
      // the scatter/chase mover takes this tick's step
      ghost.activeMover?.update(timing);
      return;
    }

    if (this.atNewDecisionPoint()) {
      const dir = this.pickDirection();
      ghost.turn(dir);
      this.heading = ghost.tile.adjacent(dir).index;
    }
    ghost.moveForwards();
  }

  private pickDirection(): Direction {
    const { tile, maze } = this.ghost;
    const current = this.ghost.direction.current;
    const back = reverse(current);
    const start = Math.floor(this.ghost.random() * CLOCKWISE.length) % CLOCKWISE.length;

    for (let i = 0; i < CLOCKWISE.length; i += 1) {
      const d = CLOCKWISE[(start + i) % CLOCKWISE.length];
      if (d === undefined || d === back) continue;
      if (maze.canEnter(tile.adjacent(d).index)) return d;
    }
    return back;
  }
}
