import type { CellIndex } from '../../common/grid';
import type { Ghost } from '../GhostBase';
import { GhostMovementMode } from '../GhostTypes';
import { TargetingMover } from './GhostMover';

/** Heads for the ghost's home corner. */
export class GhostScatterMover extends TargetingMover {
  constructor(ghost: Ghost) {
    super(ghost, GhostMovementMode.Scatter);
  }

  protected selectTarget(): CellIndex {
    return this.ghost.getScatterTarget();
  }
}
