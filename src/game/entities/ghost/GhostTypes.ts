import type { DirectionInfo } from '../common/direction';
import type { Tile } from '../common/Tile';
import type { WorldPoint } from '../common/grid';
import type { Ghost } from './GhostBase';

/** Whether a ghost is dangerous, vulnerable, or retreating as eyes. */
export enum GhostState {
  Normal = 'normal',
  Frightened = 'frightened',
  Eyes = 'eyes',
}

/** Which movement strategy governs a ghost. */
export enum GhostMovementMode {
  InHouse = 'in-house',
  Undecided = 'undecided',
  Scatter = 'scatter',
  Chase = 'chase',
  Frightened = 'frightened',
  GoingToHouse = 'going-to-house',
}

/** The two modes the scatter/chase timer hands out. */
export type ScatterOrChase = GhostMovementMode.Scatter | GhostMovementMode.Chase;

/** Deferred single-shot action run the next time the ghost's tile is centred. */
export type CenterAction = (ghost: Ghost) => void;

export const NO_ACTION: CenterAction = () => {};

/** What a ghost may read about the player. */
export interface PlayerView {
  readonly tile: Tile;
  readonly direction: DirectionInfo;
}

/** Debug-key override for the player-eaten event. */
export interface CheatInput {
  readonly allowDebugKeys: boolean;
  isInvincibilityHeld(): boolean;
}

export const NO_CHEATS: CheatInput = {
  allowDebugKeys: false,
  isInvincibilityHeld: () => false,
};

/** Ghost house geometry in pixels. */
export interface HouseGeometry {
  /** Centre of the lane just outside the door. */
  entrance: WorldPoint;
  /** Centre of the house interior. */
  center: WorldPoint;
}

/** Thrown when the controller reaches a combination its invariants rule out. */
export class UnreachableStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnreachableStateError';
  }
}
