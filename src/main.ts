import Phaser from 'phaser';
import { MAZE_WIDTH_IN_CELLS, TILE_SIZE } from './game/config';
import { MazeScene } from './scenes/MazeScene';

// 36 rows: the 31-row maze plus room for the score line
const game = new Phaser.Game({
  type: Phaser.AUTO,
  parent: 'app',
  width: MAZE_WIDTH_IN_CELLS * TILE_SIZE * 2,
  height: 36 * TILE_SIZE * 2,
  backgroundColor: '#000000',
  pixelArt: true,
  scene: [MazeScene],
});

export default game;
