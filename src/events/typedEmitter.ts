import { EventEmitter } from 'events';

/**
 * EventEmitter with a typed event map: `{ eventName: [arg1, arg2] }`.
 */
export class TypedEmitter<Events extends { [K in keyof Events]: unknown[] }> extends EventEmitter {
  /**
   * Type-safe emit wrapper.
   */
  emitEvent<K extends keyof Events & string>(eventName: K, ...args: Events[K]): boolean {
    return this.emit(eventName, ...args);
  }

  /**
   * Type-safe listener wrapper. Returns an unsubscribe function.
   */
  onEvent<K extends keyof Events & string>(
    eventName: K,
    listener: (...args: Events[K]) => void
  ): () => void {
    const untyped = listener as (...args: unknown[]) => void;
    this.on(eventName, untyped);
    return () => {
      this.off(eventName, untyped);
    };
  }
}
