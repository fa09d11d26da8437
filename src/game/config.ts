export const TILE_SIZE = 8;
export const MAZE_WIDTH_IN_CELLS = 28;

/** Fixed simulation rate; the scene catches up at most MAX_CATCH_UP steps per frame. */
export const FIXED_STEP_HZ = 60;
export const MAX_CATCH_UP = 5;

/** Pixels per tick at 100% speed. */
export const GHOST_BASE_SPEED = 1.25;
export const PLAYER_BASE_SPEED = 1.25;
export const GHOST_IN_HOUSE_SPEED = 0.25;
export const GHOST_EYES_SPEED = 2;

export enum GhostNickname {
  Blinky = 'blinky',
  Pinky = 'pinky',
  Inky = 'inky',
  Clyde = 'clyde',
}

export const GHOST_COLORS: Record<GhostNickname, number> = {
  [GhostNickname.Blinky]: 0xff0000,
  [GhostNickname.Pinky]: 0xffb8ff,
  [GhostNickname.Inky]: 0x00ffff,
  [GhostNickname.Clyde]: 0xffb852,
};

export const FRIGHTENED_COLOR = 0x2121ff;
export const FLASH_COLOR = 0xdedeff;
export const EYES_COLOR = 0xffffff;

export const SCORES = {
  pellet: 10,
  powerPellet: 50,
  firstGhost: 200,
} as const;

export const STARTING_LIVES = 3;

/** Phase lengths of the session state machine, in ms. */
export const PHASE_TIMINGS = {
  ready: 1500,
  lifeLost: 1500,
  levelComplete: 2000,
} as const;

// ---- DEBUG / LOGGING toggles (central place) -------------------------------
export const DEBUG_GHOSTS = false;  // target line + marker overlay
export const LOG_GHOSTS = false;    // console tracing

export const CHEATS = {
  /** Lets the invincibility key suppress the player-eaten event. */
  allowDebugKeys: false,
};
