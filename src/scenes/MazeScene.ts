import Phaser from 'phaser';
import {
  CHEATS, DEBUG_GHOSTS, EYES_COLOR, FIXED_STEP_HZ, FLASH_COLOR,
  FRIGHTENED_COLOR, MAX_CATCH_UP, TILE_SIZE,
} from '../game/config';
import { GhostDebugHUD } from '../game/debug/GhostDebugHUD';
import { Direction } from '../game/entities/common/direction';
import { CellIndex, positionOf } from '../game/entities/common/grid';
import { GhostState, drawGhostDebug } from '../game/entities/ghost';
import type { Ghost } from '../game/entities/ghost';
import { GamePhase, GameSession } from '../game/logic/GameSession';
import { CellKind } from '../game/maze/Maze';

/** Screen pixels per maze pixel. */
const SCALE = 2;
/** Room above the maze for the score line. */
const TOP_BAR_PX = 32;

const WALL_COLOR = 0x2121de;
const DOOR_COLOR = 0xffb8de;
const PELLET_COLOR = 0xffb897;
const PLAYER_COLOR = 0xffff00;

const KEYBOARD_DIRECTIONS: Record<string, Direction | undefined> = {
  ArrowUp: Direction.Up,
  ArrowDown: Direction.Down,
  ArrowLeft: Direction.Left,
  ArrowRight: Direction.Right,
  KeyW: Direction.Up,
  KeyS: Direction.Down,
  KeyA: Direction.Left,
  KeyD: Direction.Right,
};

const PHASE_LABELS: Record<GamePhase, string> = {
  [GamePhase.Ready]: 'READY!',
  [GamePhase.Playing]: '',
  [GamePhase.LifeLost]: 'OUCH!',
  [GamePhase.LevelComplete]: 'LEVEL COMPLETE!',
  [GamePhase.GameOver]: 'GAME OVER - press ENTER',
};

/** Browser shell: fixed-step simulation, Graphics rendering, keyboard input. */
export class MazeScene extends Phaser.Scene {
  private session!: GameSession;
  private mazeGfx!: Phaser.GameObjects.Graphics;
  private actorGfx!: Phaser.GameObjects.Graphics;
  private debugGfx!: Phaser.GameObjects.Graphics;
  private hud!: GhostDebugHUD;
  private scoreText!: Phaser.GameObjects.Text;
  private stateText!: Phaser.GameObjects.Text;
  private cheatKey?: Phaser.Input.Keyboard.Key;

  private accumulatorMs = 0;
  private totalMs = 0;
  private debug = DEBUG_GHOSTS;

  constructor() {
    super('Maze');
  }

  create(): void {
    this.session = new GameSession({
      cheats: {
        allowDebugKeys: CHEATS.allowDebugKeys,
        isInvincibilityHeld: () => this.cheatKey?.isDown ?? false,
      },
    });

    const layers = [0, 10, 20].map((depth) =>
      this.add.graphics().setPosition(0, TOP_BAR_PX).setScale(SCALE).setDepth(depth));
    const [mazeGfx, actorGfx, debugGfx] = layers;
    if (!mazeGfx || !actorGfx || !debugGfx) throw new Error('Failed to create maze graphics');
    this.mazeGfx = mazeGfx;
    this.actorGfx = actorGfx;
    this.debugGfx = debugGfx;

    this.scoreText = this.add
      .text(8, 8, '', { fontFamily: 'monospace', fontSize: '16px', color: '#ffffff' })
      .setDepth(30);
    this.stateText = this.add
      .text(this.scale.width / 2, TOP_BAR_PX + 17.5 * TILE_SIZE * SCALE, '', {
        fontFamily: 'monospace',
        fontSize: '16px',
        color: '#ffff00',
      })
      .setOrigin(0.5)
      .setDepth(40);

    this.hud = new GhostDebugHUD(this);
    this.hud.setVisible(this.debug);
    this.session.ghosts.forEach((g) => g.setDebug(this.debug));

    this.configureInput();
  }

  update(_time: number, delta: number): void {
    const stepMs = 1000 / FIXED_STEP_HZ;
    this.accumulatorMs += delta;

    let steps = 0;
    while (this.accumulatorMs >= stepMs && steps < MAX_CATCH_UP) {
      this.totalMs += stepMs;
      this.session.update({ dtMs: stepMs, totalMs: this.totalMs });
      this.accumulatorMs -= stepMs;
      steps += 1;
    }
    // too far behind: drop the backlog instead of spiralling
    if (steps === MAX_CATCH_UP) this.accumulatorMs = 0;

    this.render();
  }

  private configureInput(): void {
    const keyboard = this.input.keyboard;
    if (!keyboard) return;

    this.cheatKey = keyboard.addKey(Phaser.Input.Keyboard.KeyCodes.FIVE);

    keyboard.on('keydown', (event: KeyboardEvent) => {
      const direction = KEYBOARD_DIRECTIONS[event.code];
      if (direction) {
        this.session.player.queueDirection(direction);
        return;
      }
      if (event.code === 'KeyG') this.toggleDebug();
      if (event.code === 'Enter' && this.session.currentPhase === GamePhase.GameOver) this.session.newGame();
    });
  }

  private toggleDebug(): void {
    this.debug = !this.debug;
    this.session.ghosts.forEach((g) => g.setDebug(this.debug));
    this.hud.setVisible(this.debug);
    if (!this.debug) this.debugGfx.clear();
  }

  private render(): void {
    this.drawMaze();
    this.drawActors();

    const { session } = this;
    this.scoreText.setText(`SCORE ${session.score.toString().padStart(6, '0')}  LIVES ${session.lives}  LEVEL ${session.level}`);
    this.stateText.setText(PHASE_LABELS[session.currentPhase]);

    if (this.debug) {
      this.debugGfx.clear();
      session.ghosts.forEach((g) => { if (g.isDebugEnabled) drawGhostDebug(this.debugGfx, g); });
      this.hud.update(session.ghosts, session.playerStats.ghostMoveConductor.currentMode);
    }
  }

  private drawMaze(): void {
    const gfx = this.mazeGfx;
    const maze = this.session.maze;
    gfx.clear();

    for (let y = 0; y < maze.heightInCells; y += 1) {
      for (let x = 0; x < maze.widthInCells; x += 1) {
        const cell = new CellIndex(x, y);
        const kind = maze.kindAt(cell);
        const p = positionOf(cell);
        if (kind === CellKind.Wall) {
          gfx.fillStyle(WALL_COLOR, 1).fillRect(p.x, p.y, TILE_SIZE, TILE_SIZE);
        } else if (kind === CellKind.GhostDoor) {
          gfx.fillStyle(DOOR_COLOR, 1).fillRect(p.x, p.y + 3, TILE_SIZE, 2);
        }
      }
    }

    for (const pellet of maze.remainingPellets()) {
      const p = positionOf(pellet.cell);
      const r = pellet.kind === 'power' ? 3 : 1;
      gfx.fillStyle(PELLET_COLOR, 1).fillCircle(p.x + TILE_SIZE / 2, p.y + TILE_SIZE / 2, r);
    }
  }

  private drawActors(): void {
    const gfx = this.actorGfx;
    gfx.clear();

    const player = this.session.player;
    if (player.visible) {
      const p = player.tile.spritePos;
      gfx.fillStyle(PLAYER_COLOR, 1).fillCircle(p.x, p.y, 6);
    }

    for (const ghost of this.session.ghosts) {
      if (!ghost.visible) continue;
      const p = ghost.position;
      if (ghost.state === GhostState.Eyes) {
        gfx.fillStyle(EYES_COLOR, 1).fillCircle(p.x - 2, p.y - 1, 1.5).fillCircle(p.x + 2, p.y - 1, 1.5);
      } else {
        gfx.fillStyle(this.ghostColor(ghost), 1).fillCircle(p.x, p.y, 6);
      }
    }
  }

  private ghostColor(ghost: Ghost): number {
    if (ghost.state !== GhostState.Frightened) return ghost.color;
    const session = this.session.playerStats.frightSession;
    return session?.isFlashWhite ? FLASH_COLOR : FRIGHTENED_COLOR;
  }
}
