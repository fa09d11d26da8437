import type { CellIndex } from '../../common/grid';
import type { Ghost } from '../GhostBase';
import { GhostMovementMode } from '../GhostTypes';
import { TargetingMover } from './GhostMover';

/** Follows the ghost's personal chase target, re-read at every centre. */
export class GhostChaseMover extends TargetingMover {
  constructor(ghost: Ghost) {
    super(ghost, GhostMovementMode.Chase);
  }

  protected selectTarget(): CellIndex {
    return this.ghost.getChaseTarget();
  }
}
