import { EventEmitter } from 'events';

export interface Disposable {
  dispose(): void;
}

export type Event<T> = (listener: (value: T) => void) => Disposable;

/**
 * Single-event emitter with the `event` / `fire` / `dispose` shape the
 * core components expose to their callers.
 */
export class Emitter<T> implements Disposable {
  private readonly emitter = new EventEmitter();

  public readonly event: Event<T> = (listener) => {
    this.emitter.on('event', listener);
    return { dispose: () => this.emitter.off('event', listener) };
  };

  public fire(value: T): void {
    this.emitter.emit('event', value);
  }

  public dispose(): void {
    this.emitter.removeAllListeners();
  }
}
