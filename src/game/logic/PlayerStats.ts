import { SCORES, STARTING_LIVES } from '../config';
import type { TickTiming } from '../timing';
import { FrightSession } from './FrightSession';
import { GhostHouseDoor } from './GhostHouseDoor';
import { GhostMoveConductor } from './GhostMoveConductor';
import { LevelStats } from './LevelStats';

export type PelletKind = 'pellet' | 'power';

/** The read-only slice of player statistics ghosts consult each tick. */
export interface PlayerStatsView {
  readonly levelStats: LevelStats;
  readonly ghostMoveConductor: GhostMoveConductor;
  readonly ghostHouseDoor: GhostHouseDoor;
  readonly frightSession: FrightSession | undefined;
}

export interface GameStatsView {
  readonly currentPlayerStats: PlayerStatsView;
}

export class PlayerStats implements PlayerStatsView {
  readonly ghostMoveConductor: GhostMoveConductor;
  readonly ghostHouseDoor: GhostHouseDoor;
  private level: LevelStats;
  private session: FrightSession | undefined;
  private points = 0;
  private livesLeft: number;

  constructor(level: number, private readonly dotsPerLevel: number, lives: number = STARTING_LIVES) {
    this.level = new LevelStats(level, dotsPerLevel);
    this.ghostMoveConductor = new GhostMoveConductor(level);
    this.ghostHouseDoor = new GhostHouseDoor(level);
    this.livesLeft = lives;
  }

  get levelStats(): LevelStats { return this.level; }
  get frightSession(): FrightSession | undefined { return this.session; }
  get score(): number { return this.points; }
  get lives(): number { return this.livesLeft; }
  get isGameOver(): boolean { return this.livesLeft <= 0; }

  /** A fright session exists and has time left. */
  get isFrightActive(): boolean {
    return this.session !== undefined && !this.session.isFinished;
  }

  update(timing: TickTiming): void {
    if (this.session) {
      this.session.update(timing);
      if (this.session.isFinished) this.ghostMoveConductor.resume();
    }
    this.ghostMoveConductor.update(timing);
    this.ghostHouseDoor.update(timing);
  }

  /** Scores a dot; a power pill also opens a new fright session and returns it. */
  pelletEaten(kind: PelletKind): FrightSession | undefined {
    this.level.dotEaten();
    this.ghostHouseDoor.dotEaten();

    if (kind === 'pellet') {
      this.points += SCORES.pellet;
      return undefined;
    }

    this.points += SCORES.powerPellet;
    this.session = new FrightSession(this.level.getLevelProps());
    if (!this.session.isFinished) this.ghostMoveConductor.pause();
    return this.session;
  }

  /** Scores an eaten ghost from the running fright session. */
  ghostEaten(): number {
    if (!this.session) throw new Error('Ghost eaten without a fright session');
    const points = this.session.ghostEaten();
    this.points += points;
    return points;
  }

  lifeLost(): void {
    this.livesLeft = Math.max(0, this.livesLeft - 1);
    this.session = undefined;
    this.ghostMoveConductor.reset(this.level.levelNumber);
    this.ghostHouseDoor.lifeLost();
  }

  levelCompleted(): void {
    const next = this.level.levelNumber + 1;
    this.level = new LevelStats(next, this.dotsPerLevel);
    this.session = undefined;
    this.ghostMoveConductor.reset(next);
    this.ghostHouseDoor.reset(next);
  }
}

export class GameStats implements GameStatsView {
  private player: PlayerStats;

  constructor(private readonly dotsPerLevel: number, private readonly startLevel = 1) {
    this.player = new PlayerStats(startLevel, dotsPerLevel);
  }

  get currentPlayerStats(): PlayerStats {
    return this.player;
  }

  newGame(): void {
    this.player = new PlayerStats(this.startLevel, this.dotsPerLevel);
  }
}
