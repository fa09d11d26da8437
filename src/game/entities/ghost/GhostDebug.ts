import { TILE_SIZE } from '../../config';
import { positionOf } from '../common/grid';
import type { Ghost } from './GhostBase';

export const DEBUG_ALPHA = 0.25;

/**
 * The drawing calls the overlay needs; Phaser.GameObjects.Graphics has them
 * all, which keeps this module free of a runtime Phaser import.
 */
export interface DebugCanvas {
  lineStyle(lineWidth: number, color: number, alpha?: number): unknown;
  lineBetween(x1: number, y1: number, x2: number, y2: number): unknown;
  fillStyle(color: number, alpha?: number): unknown;
  fillRect(x: number, y: number, width: number, height: number): unknown;
}

/** Line from the ghost to its mover's target cell plus a marker on that cell. */
export function drawGhostDebug(gfx: DebugCanvas, ghost: Ghost): void {
  const mover = ghost.activeMover;
  if (!mover) return;

  const target = positionOf(mover.targetCell);
  const pos = ghost.position;

  gfx.lineStyle(1, ghost.color, DEBUG_ALPHA);
  gfx.lineBetween(pos.x, pos.y, target.x, target.y);
  gfx.fillStyle(ghost.color, DEBUG_ALPHA);
  gfx.fillRect(target.x, target.y, TILE_SIZE, TILE_SIZE);
}
