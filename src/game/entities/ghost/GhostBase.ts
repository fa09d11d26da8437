// src/game/entities/ghost/GhostBase.ts
import {
  DEBUG_GHOSTS, GHOST_BASE_SPEED, GHOST_COLORS, GHOST_EYES_SPEED,
  GHOST_IN_HOUSE_SPEED, GhostNickname, LOG_GHOSTS,
} from '../../config';
import type { EventPublisher } from '../../events/GameEvents';
import type { LevelProps } from '../../logic/levelData';
import type { GameStatsView, PlayerStatsView } from '../../logic/PlayerStats';
import type { Maze } from '../../maze/Maze';
import type { TickTiming } from '../../timing';
import { Actor } from '../Actor';
import { Direction, DirectionInfo, dirName, isHorizontal, isVertical, reverse } from '../common/direction';
import type { CellIndex, WorldPoint } from '../common/grid';
import { Tile } from '../common/Tile';
import { advance, alignToTileCenter } from '../movement/GridMover';
import {
  CenterAction, CheatInput, GhostMovementMode, GhostState, HouseGeometry,
  NO_ACTION, NO_CHEATS, PlayerView, UnreachableStateError,
} from './GhostTypes';
import { isScatterOrChase, moverModeFor } from './GhostUtils';
import { GhostChaseMover } from './movement/GhostChaseMover';
import { GhostEyesBackToHouseMover } from './movement/GhostEyesBackToHouseMover';
import { GhostFrightenedMover } from './movement/GhostFrightenedMover';
import { GhostInsideHouseMover } from './movement/GhostInsideHouseMover';
import type { GhostMover } from './movement/GhostMover';
import { GhostScatterMover } from './movement/GhostScatterMover';

export interface GhostOptions {
  nickname: GhostNickname;
  maze: Maze;
  stats: GameStatsView;
  events: EventPublisher;
  player: PlayerView;
  /** Spawn point in cell units; fractions put the ghost between two cells. */
  startingPoint: WorldPoint;
  startingDirection: Direction;
  scatterTarget: CellIndex;
  house: HouseGeometry;
  cheats?: CheatInput;
  /** Source of randomness for the frightened wander, in [0, 1). */
  random?: () => number;
  log?: boolean;
}

/**
 * A ghost: vulnerability state × movement mode, one active mover for the mode,
 * speed, collision with the player. Call `reset()` before the first `update`.
 */
export abstract class Ghost extends Actor {
  readonly nickname: GhostNickname;
  readonly maze: Maze;
  readonly events: EventPublisher;
  readonly house: HouseGeometry;
  readonly tile: Tile;
  readonly random: () => number;

  protected readonly player: PlayerView;
  private readonly stats: GameStatsView;
  private readonly cheats: CheatInput;
  private readonly startingPoint: WorldPoint;
  private readonly startingDirection: Direction;
  private readonly scatterTarget: CellIndex;

  private ghostState = GhostState.Normal;
  private mode = GhostMovementMode.InHouse;
  private mover: GhostMover | undefined;
  private whenInCenterOfNextTile: CenterAction | undefined;
  private moving = false;
  // kept on the ghost so a replacement mover does not decide the same centre again
  private lastDecisionCell: CellIndex | undefined;

  // debug
  private debug = DEBUG_GHOSTS;
  private readonly logEnabled: boolean;

  protected constructor(opts: GhostOptions) {
    super(opts.startingDirection);
    this.nickname = opts.nickname;
    this.maze = opts.maze;
    this.stats = opts.stats;
    this.events = opts.events;
    this.player = opts.player;
    this.house = opts.house;
    this.cheats = opts.cheats ?? NO_CHEATS;
    this.random = opts.random ?? Math.random;
    this.startingPoint = opts.startingPoint;
    this.startingDirection = opts.startingDirection;
    this.scatterTarget = opts.scatterTarget;
    this.logEnabled = opts.log ?? LOG_GHOSTS;
    this.tile = new Tile(opts.maze.widthInCells, Tile.toCenterCanvas(opts.startingPoint));
  }

  // --- personality hooks
  getScatterTarget(): CellIndex {
    return this.scatterTarget;
  }

  abstract getChaseTarget(): CellIndex;

  /** Normal-speed percentage; Blinky speeds up as the dots run out. */
  protected getNormalGhostSpeedPercent(): number {
    return this.levelProps.ghostSpeedPc;
  }

  get color(): number {
    return GHOST_COLORS[this.nickname];
  }

  // --- read-only view
  get state(): GhostState { return this.ghostState; }
  get movementMode(): GhostMovementMode { return this.mode; }
  get activeMover(): GhostMover | undefined { return this.mover; }
  get isMoving(): boolean { return this.moving; }
  get position(): Readonly<WorldPoint> { return this.tile.spritePos; }
  get isDebugEnabled(): boolean { return this.debug; }

  protected get currentPlayerStats(): PlayerStatsView {
    return this.stats.currentPlayerStats;
  }

  private get levelProps(): LevelProps {
    return this.currentPlayerStats.levelStats.getLevelProps();
  }

  setDebug(on: boolean): void { this.debug = on; }
  setPosition(pos: WorldPoint): void { this.tile.updatePosition(pos); }
  stopMoving(): void { this.moving = false; }
  startMoving(): void { this.moving = true; }

  // --- movement primitives used by movers

  /** Pixels to move this tick, evaluated fresh every call. */
  currentSpeed(): number {
    if (this.mode === GhostMovementMode.InHouse) return GHOST_IN_HOUSE_SPEED;
    if (this.ghostState === GhostState.Eyes) return GHOST_EYES_SPEED;

    const props = this.levelProps;
    if (this.ghostState === GhostState.Frightened) {
      return GHOST_BASE_SPEED * (props.frightGhostSpeedPc / 100);
    }
    if (this.maze.isTunnelCell(this.tile.index)) {
      return GHOST_BASE_SPEED * (props.ghostTunnelSpeedPc / 100);
    }
    return GHOST_BASE_SPEED * (this.getNormalGhostSpeedPercent() / 100);
  }

  /** One step along the current direction; false if a wall refused it. */
  moveForwards(throughDoor = false): boolean {
    return advance(
      this.tile,
      this.direction.current,
      this.currentSpeed(),
      (cell) => this.maze.canEnter(cell, { throughDoor }),
    );
  }

  /**
   * True the first tick the ghost sits on a cell centre it has not decided at
   * yet. A decided centre is reopened only when the way ahead is blocked.
   */
  claimDecisionPoint(throughDoor = false): boolean {
    const tile = this.tile;
    if (!tile.isInCenter) return false;
    if (this.lastDecisionCell?.equals(tile.index)) {
      const ahead = tile.adjacent(this.direction.current).index;
      if (this.maze.canEnter(ahead, { throughDoor })) return false;
    }
    this.lastDecisionCell = tile.index;
    return true;
  }

  /** Takes a new direction; a real turn snaps onto the cell centre first. */
  turn(dir: Direction): void {
    if (dir === this.direction.current) return;
    alignToTileCenter(this.tile);
    this.setDirection(new DirectionInfo(dir));
  }

  // --- transitions

  powerPillEaten(): void {
    if (this.ghostState === GhostState.Eyes) return;

    this.changeState(GhostState.Frightened, 'power pill');

    if (this.mode === GhostMovementMode.Chase || this.mode === GhostMovementMode.Scatter) {
      this.whenInCenterOfNextTile = Ghost.reverseIntoFright;
    }
  }

  private static readonly reverseIntoFright: CenterAction = (ghost) => {
    // eaten or sent home since the pill: nothing to reverse out of
    if (!isScatterOrChase(ghost.mode)) return;

    const back = reverse(ghost.direction.current);
    if (back !== Direction.None) ghost.setDirection(new DirectionInfo(back));
    // the reversal is this centre's decision
    ghost.lastDecisionCell = ghost.tile.index;
    ghost.setMovementMode(GhostMovementMode.Frightened, 'reverse at centre');
  };

  /** Records a new mode and brings the mover in line with it at once. */
  setMovementMode(mode: GhostMovementMode, why = 'mover'): void {
    this.changeMode(mode, why);
    this.setMoverAndMode();
  }

  reset(): void {
    this.visible = true;
    this.moving = true;
    this.ghostState = GhostState.Normal;
    this.mode = GhostMovementMode.InHouse;
    this.whenInCenterOfNextTile = NO_ACTION;
    this.lastDecisionCell = undefined;
    this.tile.updatePosition(Tile.toCenterCanvas(this.startingPoint));
    this.setDirection(new DirectionInfo(this.startingDirection));
    this.resetAnimation();
    this.mover = this.createMover(GhostMovementMode.InHouse);
    this.log('reset');
  }

  override update(timing: TickTiming): void {
    super.update(timing);

    if (!this.moving) return;

    this.recenterInLane();
    this.collisionDetection();

    if (this.tile.isInCenter) {
      const action = this.whenInCenterOfNextTile;
      if (!action) {
        throw new UnreachableStateError(`[${this.nickname}] centred with no on-center action (update before reset?)`);
      }
      action(this);
      this.whenInCenterOfNextTile = NO_ACTION;
    }

    this.setMoverAndMode();

    const mover = this.mover;
    if (!mover) throw new UnreachableStateError(`[${this.nickname}] no active mover`);
    mover.update(timing);

    if (this.ghostState === GhostState.Frightened) {
      const session = this.currentPlayerStats.frightSession;
      if (!session) throw new UnreachableStateError(`[${this.nickname}] frightened without a fright session`);
      if (session.isFinished) this.changeState(GhostState.Normal, 'fright session finished');
    }
  }

  /** Nudges the cross axis back onto the lane, at most one tick of speed. */
  private recenterInLane(): void {
    if (this.mode !== GhostMovementMode.Chase && this.mode !== GhostMovementMode.Scatter) return;

    const pos = this.tile.spritePos;
    const c = this.tile.centerPos;
    const speed = this.currentSpeed();
    const dir = this.direction.current;

    if (isVertical(dir) && pos.x !== c.x) {
      const x = pos.x > c.x ? Math.max(pos.x - speed, c.x) : Math.min(pos.x + speed, c.x);
      this.tile.updatePosition({ x, y: pos.y });
    } else if (isHorizontal(dir) && pos.y !== c.y) {
      const y = pos.y > c.y ? Math.max(pos.y - speed, c.y) : Math.min(pos.y + speed, c.y);
      this.tile.updatePosition({ x: pos.x, y });
    }
  }

  private collisionDetection(): void {
    if (!this.tile.index.equals(this.player.tile.index)) return;

    if (this.ghostState === GhostState.Normal) {
      if (!(this.cheats.allowDebugKeys && this.cheats.isInvincibilityHeld())) {
        this.events.publish({ kind: 'player-eaten' });
      }
      return;
    }

    if (this.ghostState === GhostState.Frightened) {
      this.events.publish({ kind: 'ghost-eaten', ghost: this });
      this.changeState(GhostState.Eyes, 'eaten');
      this.changeMode(GhostMovementMode.GoingToHouse, 'eaten');
    }
  }

  private setMoverAndMode(): void {
    const resolved = moverModeFor(this.mode, this.currentPlayerStats.ghostMoveConductor.currentMode);
    if (resolved !== this.mode) this.changeMode(resolved, 'conductor');

    if (this.mover?.movementMode === resolved) return;

    if (resolved === GhostMovementMode.InHouse) {
      this.changeState(GhostState.Normal, 'back in house');
    }
    this.mover = this.createMover(resolved);
  }

  private createMover(mode: GhostMovementMode): GhostMover {
    switch (mode) {
      case GhostMovementMode.Scatter:
        return new GhostScatterMover(this);
      case GhostMovementMode.Chase:
        return new GhostChaseMover(this);
      case GhostMovementMode.Frightened:
        return new GhostFrightenedMover(this);
      case GhostMovementMode.GoingToHouse:
        return new GhostEyesBackToHouseMover(this);
      case GhostMovementMode.InHouse:
        return new GhostInsideHouseMover(this, this.currentPlayerStats.ghostHouseDoor);
      default:
        throw new UnreachableStateError(`[${this.nickname}] Don't know what mover to create for mode '${mode}'`);
    }
  }

  // tiny logging helpers
  private changeMode(next: GhostMovementMode, why: string): void {
    if (this.mode === next) return;
    this.log(`MODE ${this.mode} -> ${next} (${why})`);
    this.mode = next;
  }

  private changeState(next: GhostState, why: string): void {
    if (this.ghostState === next) return;
    this.log(`STATE ${this.ghostState} -> ${next} (${why})`);
    this.ghostState = next;
  }

  private log(msg: string): void {
    if (!this.logEnabled) return;
    const p = this.tile.spritePos;
    // eslint-disable-next-line no-console
    console.log(
      `[${this.nickname}] ${msg} | pos=(${p.x.toFixed(1)},${p.y.toFixed(1)}) tile=${this.tile.index.toString()} dir=${dirName(this.direction.current)}`,
    );
  }
}
