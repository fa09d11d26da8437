import levelsJson from '../data/levels.json';
import { GhostNickname } from '../config';

export interface LevelProps {
  level: number;
  playerSpeedPc: number;
  frightPlayerSpeedPc: number;
  ghostSpeedPc: number;
  ghostTunnelSpeedPc: number;
  elroy1DotsLeft: number;
  elroy1SpeedPc: number;
  elroy2DotsLeft: number;
  elroy2SpeedPc: number;
  frightGhostSpeedPc: number;
  frightSeconds: number;
  frightFlashes: number;
}

/** Scatter/chase durations in seconds; a negative chase lasts forever. */
export interface LevelTimingConfig {
  scatter: number[];
  chase: number[];
}

export interface HouseDoorRules {
  dotLimits: Record<GhostNickname, number>;
  noDotTimeoutSeconds: number;
}

const LEVEL_PROPS: readonly LevelProps[] = levelsJson.levels;

/** Picks the last band whose `fromLevel` is at or below `level`. */
function bandFor<T extends { fromLevel: number }>(bands: readonly T[], level: number): T {
  let picked = bands[0];
  for (const band of bands) {
    if (band.fromLevel <= level) picked = band;
  }
  if (!picked) throw new Error(`No level band covers level ${level}`);
  return picked;
}

export function levelPropsFor(level: number): LevelProps {
  const idx = Math.max(0, Math.min(LEVEL_PROPS.length - 1, level - 1));
  const props = LEVEL_PROPS[idx];
  if (!props) throw new Error(`No level props for level ${level}`);
  return props;
}

export function modeTimingsFor(level: number): LevelTimingConfig {
  const band = bandFor(levelsJson.modeTimings, level);
  return { scatter: band.scatter, chase: band.chase };
}

export function houseDoorRulesFor(level: number): HouseDoorRules {
  const band = bandFor(levelsJson.houseDoor, level);
  return {
    dotLimits: {
      [GhostNickname.Blinky]: band.dotLimits.blinky,
      [GhostNickname.Pinky]: band.dotLimits.pinky,
      [GhostNickname.Inky]: band.dotLimits.inky,
      [GhostNickname.Clyde]: band.dotLimits.clyde,
    },
    noDotTimeoutSeconds: band.noDotTimeoutSeconds,
  };
}
