// src/game/entities/ghost/movement/GhostMover.ts
import type { TickTiming } from '../../../timing';
import type { CellIndex } from '../../common/grid';
import type { Ghost } from '../GhostBase';
import { GhostMovementMode } from '../GhostTypes';
import { chooseDirection } from '../GhostUtils';

/**
 * One movement strategy per mode. The ghost owns exactly one mover at a time
 * and replaces it wholesale when its mode changes.
 */
export abstract class GhostMover {
  protected constructor(
    protected readonly ghost: Ghost,
    readonly movementMode: GhostMovementMode,
  ) {}

  /** Cell the mover is currently heading for; drawn by the debug overlay. */
  abstract get targetCell(): CellIndex;

  abstract update(timing: TickTiming): void;

  /** Once per cell centre, across mover swaps. */
  protected atNewDecisionPoint(throughDoor = false): boolean {
    return this.ghost.claimDecisionPoint(throughDoor);
  }
}

/** Greedy pursuit of a target cell chosen by the subclass at every centre. */
export abstract class TargetingMover extends GhostMover {
  private target: CellIndex;

  protected constructor(ghost: Ghost, mode: GhostMovementMode) {
    super(ghost, mode);
    this.target = ghost.tile.index;
  }

  get targetCell(): CellIndex {
    return this.target;
  }

  protected abstract selectTarget(): CellIndex;

  update(_timing: TickTiming): void {
    const ghost = this.ghost;
    if (this.atNewDecisionPoint()) {
      this.target = this.selectTarget();
      ghost.turn(chooseDirection(ghost.maze, ghost.tile, ghost.direction.current, this.target));
    }
    ghost.moveForwards();
  }
}
