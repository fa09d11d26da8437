import { GhostNickname } from '../config';
import type { TickTiming } from '../timing';
import { houseDoorRulesFor, HouseDoorRules } from './levelData';

/** Ghosts queue for the door in this order; Blinky never waits. */
const RELEASE_ORDER: readonly GhostNickname[] = [
  GhostNickname.Pinky,
  GhostNickname.Inky,
  GhostNickname.Clyde,
];

/** After a lost life one shared counter replaces the personal ones. */
export const GLOBAL_DOT_LIMITS: Readonly<Record<GhostNickname, number>> = {
  [GhostNickname.Blinky]: 0,
  [GhostNickname.Pinky]: 7,
  [GhostNickname.Inky]: 17,
  [GhostNickname.Clyde]: 32,
};

function zeroCounters(): Record<GhostNickname, number> {
  return {
    [GhostNickname.Blinky]: 0,
    [GhostNickname.Pinky]: 0,
    [GhostNickname.Inky]: 0,
    [GhostNickname.Clyde]: 0,
  };
}

/**
 * Decides when each ghost may leave the house: personal dot counters for the
 * ghost at the head of the queue, plus a timer that forces the next release
 * when the player stops eating dots.
 */
export class GhostHouseDoor {
  private rules: HouseDoorRules;
  private counters = zeroCounters();
  private globalCounter: number | null = null;
  private readonly released = new Set<GhostNickname>();
  private sinceLastDotMs = 0;

  constructor(level: number) {
    this.rules = houseDoorRulesFor(level);
    this.releaseDueGhosts();
  }

  canGhostLeave(nickname: GhostNickname): boolean {
    return nickname === GhostNickname.Blinky || this.released.has(nickname);
  }

  /** First ghost still waiting, if any. */
  get preferredGhost(): GhostNickname | undefined {
    return RELEASE_ORDER.find((n) => !this.released.has(n));
  }

  dotEaten(): void {
    this.sinceLastDotMs = 0;

    if (this.globalCounter !== null) {
      this.globalCounter += 1;
    } else {
      const preferred = this.preferredGhost;
      if (preferred) this.counters[preferred] += 1;
    }

    this.releaseDueGhosts();
  }

  update(timing: TickTiming): void {
    const preferred = this.preferredGhost;
    if (!preferred) return;

    this.sinceLastDotMs += timing.dtMs;
    if (this.sinceLastDotMs >= this.rules.noDotTimeoutSeconds * 1000) {
      this.sinceLastDotMs = 0;
      this.released.add(preferred);
    }
  }

  /** Everyone back in the house; the shared counter takes over. */
  lifeLost(): void {
    this.released.clear();
    this.globalCounter = 0;
    this.sinceLastDotMs = 0;
  }

  /** New level: fresh personal counters. */
  reset(level: number): void {
    this.rules = houseDoorRulesFor(level);
    this.counters = zeroCounters();
    this.globalCounter = null;
    this.released.clear();
    this.sinceLastDotMs = 0;
    this.releaseDueGhosts();
  }

  private releaseDueGhosts(): void {
    let preferred = this.preferredGhost;
    while (preferred && this.isDue(preferred)) {
      this.released.add(preferred);
      preferred = this.preferredGhost;
    }
  }

  private isDue(nickname: GhostNickname): boolean {
    if (this.globalCounter !== null) {
      return this.globalCounter >= GLOBAL_DOT_LIMITS[nickname];
    }
    return this.counters[nickname] >= this.rules.dotLimits[nickname];
  }
}
