import type { TickTiming } from '../../../timing';
import { Direction, DirectionInfo } from '../../common/direction';
import { CellIndex } from '../../common/grid';
import type { Ghost } from '../GhostBase';
import { GhostMovementMode } from '../GhostTypes';
import { chooseDirection } from '../GhostUtils';
import { GhostMover } from './GhostMover';
import { approach } from './GhostInsideHouseMover';

type EyesPhase = 'navigating' | 'aligning' | 'descending';

/**
 * Takes a pair of eyes back to the entrance cell, through the door and down
 * to the middle of the house, then announces the arrival.
 */
export class GhostEyesBackToHouseMover extends GhostMover {
  private phase: EyesPhase = 'navigating';
  private readonly entranceCell: CellIndex;

  constructor(ghost: Ghost) {
    super(ghost, GhostMovementMode.GoingToHouse);
    this.entranceCell = CellIndex.fromSpritePos(ghost.house.entrance);
  }

  get targetCell(): CellIndex {
    return this.entranceCell;
  }

  get currentPhase(): EyesPhase {
    return this.phase;
  }

  update(_timing: TickTiming): void {
    const ghost = this.ghost;
    const { entrance, center } = ghost.house;

    if (this.phase === 'navigating') {
      if (ghost.tile.isInCenter && ghost.tile.index.equals(this.entranceCell)) {
        this.phase = 'aligning';
      } else if (this.atNewDecisionPoint(true)) {
        ghost.turn(chooseDirection(ghost.maze, ghost.tile, ghost.direction.current, this.entranceCell, true));
      }
      if (this.phase === 'navigating') {
        ghost.moveForwards(true);
        return;
      }
    }

    const speed = ghost.currentSpeed();
    const pos = ghost.position;

    if (this.phase === 'aligning') {
      if (pos.x !== entrance.x || pos.y !== entrance.y) {
        this.face(pos.x <= entrance.x ? Direction.Right : Direction.Left);
        ghost.setPosition({ x: approach(pos.x, entrance.x, speed), y: approach(pos.y, entrance.y, speed) });
        return;
      }
      this.phase = 'descending';
    }

    this.face(Direction.Down);
    ghost.setPosition({ x: pos.x, y: approach(pos.y, center.y, speed) });

    if (ghost.position.y === center.y) {
      ghost.events.publish({ kind: 'ghost-inside-house', ghost });
      ghost.setMovementMode(GhostMovementMode.InHouse, 'eyes home');
    }
  }

  private face(dir: Direction): void {
    if (this.ghost.direction.current !== dir) this.ghost.setDirection(new DirectionInfo(dir));
  }
}
