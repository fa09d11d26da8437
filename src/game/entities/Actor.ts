import type { TickTiming } from '../timing';
import { Direction, DirectionInfo } from './common/direction';

/** How long each of the two walk frames shows. */
export const ANIMATION_FRAME_MS = 133;

/** Bookkeeping shared by the player and the ghosts: facing, visibility, walk frame. */
export abstract class Actor {
  public visible = true;
  private facing: DirectionInfo;
  private animationMs = 0;
  private frame = 0;

  protected constructor(startingDirection: Direction) {
    this.facing = new DirectionInfo(startingDirection);
  }

  get direction(): DirectionInfo { return this.facing; }
  setDirection(info: DirectionInfo): void { this.facing = info; }

  get animationFrame(): number { return this.frame; }

  update(timing: TickTiming): void {
    this.animationMs += timing.dtMs;
    while (this.animationMs >= ANIMATION_FRAME_MS) {
      this.animationMs -= ANIMATION_FRAME_MS;
      this.frame = (this.frame + 1) % 2;
    }
  }

  protected resetAnimation(): void {
    this.animationMs = 0;
    this.frame = 0;
  }
}
