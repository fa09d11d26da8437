import EventEmitter from 'eventemitter3';
import type { Ghost } from '../entities/ghost/GhostBase';

export type PlayerEatenEvent = { kind: 'player-eaten' };
export type GhostEatenEvent = { kind: 'ghost-eaten'; ghost: Ghost };
export type GhostInsideHouseEvent = { kind: 'ghost-inside-house'; ghost: Ghost };

export type GameEvent = PlayerEatenEvent | GhostEatenEvent | GhostInsideHouseEvent;
export type GameEventKind = GameEvent['kind'];
export type GameEventOf<K extends GameEventKind> = Extract<GameEvent, { kind: K }>;

/** Write-only channel ghosts publish to; fire-and-forget. */
export interface EventPublisher {
  publish(event: GameEvent): void;
}

/**
 * Synchronous event bus. Listeners run in publish order before `publish`
 * returns.
 */
export class GameEventBus implements EventPublisher {
  private readonly emitter = new EventEmitter();

  publish(event: GameEvent): void {
    this.emitter.emit(event.kind, event);
  }

  /** Subscribe to one kind; returns the unsubscribe function. */
  on<K extends GameEventKind>(kind: K, listener: (event: GameEventOf<K>) => void): () => void {
    this.emitter.on(kind, listener);
    return () => {
      this.emitter.off(kind, listener);
    };
  }

  clear(): void {
    this.emitter.removeAllListeners();
  }
}
