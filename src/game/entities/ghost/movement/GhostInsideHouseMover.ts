// src/game/entities/ghost/movement/GhostInsideHouseMover.ts
import type { GhostHouseDoor } from '../../../logic/GhostHouseDoor';
import type { TickTiming } from '../../../timing';
import { Direction, DirectionInfo } from '../../common/direction';
import { CellIndex } from '../../common/grid';
import type { Ghost } from '../GhostBase';
import { GhostMovementMode, GhostState } from '../GhostTypes';
import { GhostMover } from './GhostMover';

/** How far a waiting ghost bobs above and below its resting row, in px. */
export const HOUSE_BOB_PX = 4;

type HousePhase = 'waiting' | 'aligning' | 'exiting';

/** Moves `from` toward `to` by at most `step`, never past it. */
export function approach(from: number, to: number, step: number): number {
  if (from < to) return Math.min(to, from + step);
  if (from > to) return Math.max(to, from - step);
  return from;
}

/**
 * Bobs in the house until the door lets this ghost out, then lines up under
 * the entrance, rises through the door and hands control back facing left.
 */
export class GhostInsideHouseMover extends GhostMover {
  private phase: HousePhase = 'waiting';
  private readonly entranceCell: CellIndex;

  constructor(ghost: Ghost, private readonly door: GhostHouseDoor) {
    super(ghost, GhostMovementMode.InHouse);
    this.entranceCell = CellIndex.fromSpritePos(ghost.house.entrance);
  }

  get targetCell(): CellIndex {
    return this.entranceCell;
  }

  get currentPhase(): HousePhase {
    return this.phase;
  }

  update(_timing: TickTiming): void {
    const ghost = this.ghost;
    const { entrance, center } = ghost.house;
    const speed = ghost.currentSpeed();
    const pos = ghost.position;

    if (pos.y <= entrance.y) {
      this.handBack();
      return;
    }

    switch (this.phase) {
      case 'waiting':
        if (this.door.canGhostLeave(ghost.nickname)) {
          this.phase = 'aligning';
          return;
        }
        this.bob(speed);
        return;

      case 'aligning':
        if (pos.y !== center.y) {
          this.face(pos.y < center.y ? Direction.Down : Direction.Up);
          ghost.setPosition({ x: pos.x, y: approach(pos.y, center.y, speed) });
        } else if (pos.x !== entrance.x) {
          this.face(pos.x < entrance.x ? Direction.Right : Direction.Left);
          ghost.setPosition({ x: approach(pos.x, entrance.x, speed), y: pos.y });
        } else {
          this.phase = 'exiting';
        }
        return;

      case 'exiting':
        this.face(Direction.Up);
        ghost.setPosition({ x: pos.x, y: approach(pos.y, entrance.y, speed) });
        if (ghost.position.y <= entrance.y) this.handBack();
        return;
    }
  }

  private bob(speed: number): void {
    const ghost = this.ghost;
    const restY = ghost.house.center.y;
    let dir = ghost.direction.current;
    if (dir !== Direction.Up && dir !== Direction.Down) dir = Direction.Up;

    const pos = ghost.position;
    const limit = dir === Direction.Up ? restY - HOUSE_BOB_PX : restY + HOUSE_BOB_PX;
    const y = approach(pos.y, limit, speed);
    ghost.setPosition({ x: pos.x, y });

    if (y === limit) dir = dir === Direction.Up ? Direction.Down : Direction.Up;
    this.face(dir);
  }

  private face(dir: Direction): void {
    if (this.ghost.direction.current !== dir) this.ghost.setDirection(new DirectionInfo(dir));
  }

  private handBack(): void {
    this.face(Direction.Left);
    const next = this.ghost.state === GhostState.Frightened
      ? GhostMovementMode.Frightened
      : GhostMovementMode.Undecided;
    this.ghost.setMovementMode(next, 'left house');
  }
}
