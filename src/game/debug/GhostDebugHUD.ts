// src/game/debug/GhostDebugHUD.ts
import type Phaser from 'phaser';
import type { Ghost } from '../entities/ghost/GhostBase';
import { GhostMovementMode, GhostState } from '../entities/ghost/GhostTypes';

type Options = {
  width?: number;       // panel width
  margin?: number;      // margin from screen edges
  lineHeight?: number;  // text line height
  header?: string;      // header label
};

export function modeColor(mode: GhostMovementMode, state: GhostState): string {
  if (state === GhostState.Eyes) return '#bbbbbb';
  if (state === GhostState.Frightened) return '#00ccff';
  switch (mode) {
    case GhostMovementMode.Chase: return '#ff5555';
    case GhostMovementMode.Scatter: return '#55aaff';
    case GhostMovementMode.InHouse: return '#aaaa00';
    default: return '#ffffff';
  }
}

/** One line per ghost: nickname, state, mode. The header shows the scatter/chase timer. */
export function describeGhost(ghost: Ghost): string {
  return `${ghost.nickname.padEnd(7)} ${ghost.state.padEnd(10)} ${ghost.movementMode}`;
}

export class GhostDebugHUD {
  private container: Phaser.GameObjects.Container;
  private bg: Phaser.GameObjects.Rectangle;
  private headerText: Phaser.GameObjects.Text;
  private lines: Phaser.GameObjects.Text[] = [];

  private readonly w: number;
  private readonly margin: number;
  private readonly lineH: number;
  private readonly headerLabel: string;

  constructor(private readonly scene: Phaser.Scene, opts: Options = {}) {
    this.w = opts.width ?? 260;
    this.margin = opts.margin ?? 8;
    this.lineH = opts.lineHeight ?? 18;
    this.headerLabel = opts.header ?? 'Ghosts';

    this.container = scene.add.container(0, 0).setScrollFactor(0).setDepth(50);
    this.bg = scene.add.rectangle(0, 0, this.w, this.lineH, 0x000000, 0.55).setOrigin(0, 0);
    this.headerText = scene.add
      .text(0, 0, this.headerLabel, { fontFamily: 'monospace', fontSize: '14px', color: '#ffffff' })
      .setOrigin(0, 0);

    this.container.add([this.bg, this.headerText]);

    this.layout(scene.scale.width);
  }

  layout(screenW: number): void {
    // Top-right anchor
    const x = Math.max(0, screenW - this.w - this.margin);
    this.container.setPosition(x, this.margin);
  }

  setVisible(v: boolean): void { this.container.setVisible(v); }

  /** One text line per ghost, created and destroyed as needed. */
  private ensureLineCount(n: number): void {
    while (this.lines.length < n) {
      const t = this.scene.add.text(0, 0, '', {
        fontFamily: 'monospace',
        fontSize: '13px',
        color: '#ffff00',
      }).setOrigin(0, 0);
      this.container.add(t);
      this.lines.push(t);
    }
    while (this.lines.length > n) {
      this.lines.pop()?.destroy();
    }
  }

  update(ghosts: readonly Ghost[], conductorMode: GhostMovementMode): void {
    this.headerText.setText(`${this.headerLabel} (timer: ${conductorMode})`);
    this.ensureLineCount(ghosts.length);

    ghosts.forEach((g, i) => {
      const line = this.lines[i];
      if (!line) return;
      // header takes the first line
      line.setPosition(0, this.lineH * (i + 1) + 4);
      line.setColor(modeColor(g.movementMode, g.state));
      line.setText(describeGhost(g));
    });

    this.bg.setSize(this.w, this.lineH * (1 + ghosts.length) + 8);
  }

  destroy(): void {
    this.container.destroy(true);
    this.lines = [];
  }
}
