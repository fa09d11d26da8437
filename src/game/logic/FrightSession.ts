import { SCORES } from '../config';
import type { TickTiming } from '../timing';
import type { LevelProps } from './levelData';

/** One white/blue flash lasts this long; flashing fills the tail of the session. */
export const FLASH_CYCLE_MS = 400;

/**
 * Time-boxed window after a power pill during which ghosts are vulnerable.
 * Polled by ghosts each tick, never awaited.
 */
export class FrightSession {
  readonly durationMs: number;
  readonly flashes: number;
  private elapsedMs = 0;
  private eaten = 0;

  constructor(props: Pick<LevelProps, 'frightSeconds' | 'frightFlashes'>) {
    this.durationMs = props.frightSeconds * 1000;
    this.flashes = props.frightFlashes;
  }

  update(timing: TickTiming): void {
    if (this.isFinished) return;
    this.elapsedMs = Math.min(this.durationMs, this.elapsedMs + timing.dtMs);
  }

  get isFinished(): boolean {
    return this.elapsedMs >= this.durationMs;
  }

  get remainingMs(): number {
    return this.durationMs - this.elapsedMs;
  }

  /** True during the closing flashes. */
  get isFlashing(): boolean {
    if (this.isFinished || this.flashes <= 0) return false;
    return this.remainingMs <= this.flashes * FLASH_CYCLE_MS;
  }

  /** Which half of the current flash cycle we are in (white first). */
  get isFlashWhite(): boolean {
    if (!this.isFlashing) return false;
    const intoCycle = (this.flashes * FLASH_CYCLE_MS - this.remainingMs) % FLASH_CYCLE_MS;
    return intoCycle < FLASH_CYCLE_MS / 2;
  }

  get ghostsEaten(): number {
    return this.eaten;
  }

  /** Counts an eaten ghost and returns its points: 200, 400, 800, 1600. */
  ghostEaten(): number {
    this.eaten += 1;
    return SCORES.firstGhost * 2 ** (this.eaten - 1);
  }
}
