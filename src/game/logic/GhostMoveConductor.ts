import { GhostMovementMode, ScatterOrChase } from '../entities/ghost/GhostTypes';
import type { TickTiming } from '../timing';
import { modeTimingsFor } from './levelData';

interface ModePhase {
  mode: ScatterOrChase;
  durationMs: number; // -1 for infinite
}

/**
 * Level-wide scatter/chase timer. Ghosts adopt `currentMode` only while they
 * are themselves undecided, scattering or chasing.
 */
export class GhostMoveConductor {
  private phases: ModePhase[] = [];
  private index = 0;
  private elapsedMs = 0;
  private paused = false;

  constructor(private level: number) {
    this.phases = this.buildPhases(level);
  }

  get currentMode(): ScatterOrChase {
    return this.phases[this.index]?.mode ?? GhostMovementMode.Chase;
  }

  get levelNumber(): number {
    return this.level;
  }

  update(timing: TickTiming): void {
    if (this.paused) {
      return;
    }

    const phase = this.phases[this.index];
    if (!phase || phase.durationMs < 0) {
      return;
    }

    this.elapsedMs += timing.dtMs;
    if (this.elapsedMs >= phase.durationMs) {
      this.index = Math.min(this.index + 1, this.phases.length - 1);
      this.elapsedMs = 0;
    }
  }

  /** Frozen while a fright session runs. */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  reset(level: number): void {
    this.level = level;
    this.index = 0;
    this.elapsedMs = 0;
    this.paused = false;
    this.phases = this.buildPhases(level);
  }

  private buildPhases(level: number): ModePhase[] {
    const config = modeTimingsFor(level);
    const phases: ModePhase[] = [];

    for (let i = 0; i < config.scatter.length && i < config.chase.length; i += 1) {
      phases.push({ mode: GhostMovementMode.Scatter, durationMs: config.scatter[i] * 1000 });
      const chaseDuration = config.chase[i] < 0 ? -1 : config.chase[i] * 1000;
      phases.push({ mode: GhostMovementMode.Chase, durationMs: chaseDuration });
    }

    const last = phases[phases.length - 1];
    if (!last || last.mode !== GhostMovementMode.Chase) {
      phases.push({ mode: GhostMovementMode.Chase, durationMs: -1 });
    } else {
      last.durationMs = -1;
    }

    return phases;
  }
}
