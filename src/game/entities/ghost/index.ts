// src/game/entities/ghost/index.ts
export { GhostMovementMode, GhostState, UnreachableStateError } from './GhostTypes';
export type { CheatInput, HouseGeometry, PlayerView } from './GhostTypes';

export { Ghost } from './GhostBase';
export type { GhostOptions } from './GhostBase';
export { BlinkyGhost, PinkyGhost, InkyGhost, ClydeGhost, createGhosts } from './Ghosts';
export { drawGhostDebug } from './GhostDebug';
export type { DebugCanvas } from './GhostDebug';
