// src/game/entities/ghost/Ghosts.ts
import { GhostNickname } from '../../config';
import type { MazeDefinition } from '../../maze/mazeData';
import { Direction, DIRECTION_VECTORS } from '../common/direction';
import { CellIndex, distance2 } from '../common/grid';
import { Ghost, GhostOptions } from './GhostBase';

/** Everything a ghost needs except what its personality fixes. */
export type PersonalityOptions = Omit<GhostOptions, 'nickname'>;

/** Clyde gives up the chase inside this many cells (squared: 8 × 8). */
const CLYDE_SHY_DISTANCE2 = 8 * 8;

export class BlinkyGhost extends Ghost {
  constructor(opts: PersonalityOptions) {
    super({ ...opts, nickname: GhostNickname.Blinky });
  }

  getChaseTarget(): CellIndex {
    return this.player.tile.index;
  }

  /** "Cruise Elroy": faster as the dots run out. */
  protected override getNormalGhostSpeedPercent(): number {
    const level = this.currentPlayerStats.levelStats;
    const props = level.getLevelProps();
    if (level.dotsLeft <= props.elroy2DotsLeft) return props.elroy2SpeedPc;
    if (level.dotsLeft <= props.elroy1DotsLeft) return props.elroy1SpeedPc;
    return super.getNormalGhostSpeedPercent();
  }
}

export class PinkyGhost extends Ghost {
  constructor(opts: PersonalityOptions) {
    super({ ...opts, nickname: GhostNickname.Pinky });
  }

  getChaseTarget(): CellIndex {
    const facing = this.player.direction.current;
    const v = DIRECTION_VECTORS[facing];
    // facing up also shifts the aim four cells left
    const extraX = facing === Direction.Up ? -4 : 0;
    return this.player.tile.index.offset(v.x * 4 + extraX, v.y * 4);
  }
}

export interface InkyOptions extends PersonalityOptions {
  blinky: Ghost;
}

export class InkyGhost extends Ghost {
  private readonly blinky: Ghost;

  constructor(opts: InkyOptions) {
    super({ ...opts, nickname: GhostNickname.Inky });
    this.blinky = opts.blinky;
  }

  getChaseTarget(): CellIndex {
    const v = DIRECTION_VECTORS[this.player.direction.current];
    const ahead = this.player.tile.index.offset(v.x * 2, v.y * 2);
    const from = this.blinky.tile.index;
    return new CellIndex(from.x + (ahead.x - from.x) * 2, from.y + (ahead.y - from.y) * 2);
  }
}

export class ClydeGhost extends Ghost {
  constructor(opts: PersonalityOptions) {
    super({ ...opts, nickname: GhostNickname.Clyde });
  }

  getChaseTarget(): CellIndex {
    const pac = this.player.tile.index;
    return distance2(this.tile.index, pac) >= CLYDE_SHY_DISTANCE2 ? pac : this.getScatterTarget();
  }
}

/** Shared wiring for the four ghosts; spawn, direction and corner come from the maze. */
export type GhostWiring = Omit<PersonalityOptions, 'startingPoint' | 'startingDirection' | 'scatterTarget' | 'house'>;

/** Builds the four ghosts in update order: Blinky, Pinky, Inky, Clyde. */
export function createGhosts(def: MazeDefinition, wiring: GhostWiring): Ghost[] {
  const optsFor = (n: GhostNickname): PersonalityOptions => ({
    ...wiring,
    startingPoint: def.ghostSpawns[n].cell,
    startingDirection: def.ghostSpawns[n].direction,
    scatterTarget: def.scatterTargets[n],
    house: def.house,
  });

  const blinky = new BlinkyGhost(optsFor(GhostNickname.Blinky));
  return [
    blinky,
    new PinkyGhost(optsFor(GhostNickname.Pinky)),
    new InkyGhost({ ...optsFor(GhostNickname.Inky), blinky }),
    new ClydeGhost(optsFor(GhostNickname.Clyde)),
  ];
}
