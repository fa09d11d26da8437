import { LOG_GHOSTS, PHASE_TIMINGS } from '../config';
import { Player } from '../entities/Player';
import type { Ghost } from '../entities/ghost/GhostBase';
import { CheatInput, NO_CHEATS } from '../entities/ghost/GhostTypes';
import { createGhosts } from '../entities/ghost/Ghosts';
import { GameEventBus } from '../events/GameEvents';
import { GridMaze } from '../maze/Maze';
import { DEFAULT_MAZE, MazeDefinition } from '../maze/mazeData';
import type { TickTiming } from '../timing';
import { GameStats, PlayerStats } from './PlayerStats';

export enum GamePhase {
  Ready = 'ready',
  Playing = 'playing',
  LifeLost = 'life-lost',
  LevelComplete = 'level-complete',
  GameOver = 'game-over',
}

export interface GameSessionOptions {
  maze?: MazeDefinition;
  startLevel?: number;
  cheats?: CheatInput;
  random?: () => number;
  logGhosts?: boolean;
}

/**
 * One game: maze, player, four ghosts and their statistics, stepped by a
 * fixed-rate tick. Collisions arrive as events from the ghosts.
 */
export class GameSession {
  readonly maze: GridMaze;
  readonly events = new GameEventBus();
  readonly stats: GameStats;
  readonly player: Player;
  readonly ghosts: readonly Ghost[];

  private phase = GamePhase.Ready;
  private phaseMs = 0;

  constructor(opts: GameSessionOptions = {}) {
    const def = opts.maze ?? DEFAULT_MAZE;
    this.maze = new GridMaze(def.layout);
    this.stats = new GameStats(this.maze.totalPellets, opts.startLevel ?? 1);
    this.player = new Player(this.maze, this.stats, def.playerSpawn);
    this.ghosts = createGhosts(def, {
      maze: this.maze,
      stats: this.stats,
      events: this.events,
      player: this.player,
      cheats: opts.cheats ?? NO_CHEATS,
      random: opts.random,
      log: opts.logGhosts ?? LOG_GHOSTS,
    });

    this.events.on('player-eaten', () => this.playerEaten());
    this.events.on('ghost-eaten', () => {
      this.playerStats.ghostEaten();
    });

    this.resetActors();
  }

  get currentPhase(): GamePhase { return this.phase; }
  get playerStats(): PlayerStats { return this.stats.currentPlayerStats; }
  get score(): number { return this.playerStats.score; }
  get lives(): number { return this.playerStats.lives; }
  get level(): number { return this.playerStats.levelStats.levelNumber; }

  update(timing: TickTiming): void {
    this.phaseMs += timing.dtMs;

    switch (this.phase) {
      case GamePhase.Ready:
        if (this.phaseMs >= PHASE_TIMINGS.ready) this.enterPhase(GamePhase.Playing);
        return;

      case GamePhase.Playing:
        this.tick(timing);
        return;

      case GamePhase.LifeLost:
        if (this.phaseMs < PHASE_TIMINGS.lifeLost) return;
        if (this.playerStats.isGameOver) {
          this.enterPhase(GamePhase.GameOver);
        } else {
          this.resetActors();
          this.enterPhase(GamePhase.Ready);
        }
        return;

      case GamePhase.LevelComplete:
        if (this.phaseMs < PHASE_TIMINGS.levelComplete) return;
        this.playerStats.levelCompleted();
        this.maze.restorePellets();
        this.resetActors();
        this.enterPhase(GamePhase.Ready);
        return;

      case GamePhase.GameOver:
        return;
    }
  }

  newGame(): void {
    this.stats.newGame();
    this.maze.restorePellets();
    this.resetActors();
    this.enterPhase(GamePhase.Ready);
  }

  private tick(timing: TickTiming): void {
    this.playerStats.update(timing);
    this.player.update(timing);
    this.handlePelletCollision();

    for (const ghost of this.ghosts) {
      // a ghost may have just caught the player
      if (this.phase !== GamePhase.Playing) return;
      ghost.update(timing);
    }

    if (this.playerStats.levelStats.isCleared) this.enterPhase(GamePhase.LevelComplete);
  }

  private handlePelletCollision(): void {
    const kind = this.maze.eatPellet(this.player.tile.index);
    if (!kind) return;

    this.playerStats.pelletEaten(kind);
    if (kind === 'power') this.ghosts.forEach((g) => g.powerPillEaten());
  }

  private playerEaten(): void {
    if (this.phase !== GamePhase.Playing) return;
    this.playerStats.lifeLost();
    this.enterPhase(GamePhase.LifeLost);
  }

  private resetActors(): void {
    this.player.reset();
    this.ghosts.forEach((g) => g.reset());
  }

  private enterPhase(next: GamePhase): void {
    this.phase = next;
    this.phaseMs = 0;
    this.player.setFrozen(next !== GamePhase.Playing);
  }
}
