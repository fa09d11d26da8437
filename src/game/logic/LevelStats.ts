import { levelPropsFor, LevelProps } from './levelData';

export class LevelStats {
  private eaten = 0;

  constructor(readonly levelNumber: number, readonly totalDots: number) {}

  getLevelProps(): LevelProps {
    return levelPropsFor(this.levelNumber);
  }

  get dotsEaten(): number {
    return this.eaten;
  }

  get dotsLeft(): number {
    return this.totalDots - this.eaten;
  }

  get isCleared(): boolean {
    return this.dotsLeft <= 0;
  }

  /** Pellets and power pills both count as dots. */
  dotEaten(): void {
    if (this.eaten < this.totalDots) this.eaten += 1;
  }
}
