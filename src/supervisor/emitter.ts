/**
 * Typed Event Emitter
 *
 * Thin typed wrapper over Node's EventEmitter used by the collaborators
 * (process runner, watchers). `on` returns an unsubscribe function.
 */

import { EventEmitter } from 'events';

export type EventMap<Events> = { [K in keyof Events]: unknown[] };

export type Unsubscribe = () => void;

export class TypedEmitter<Events extends EventMap<Events>> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): Unsubscribe {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    this.emitter.emit(event, ...args);
  }

  listenerCount(event: keyof Events & string): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
