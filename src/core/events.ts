import { EventEmitter } from 'eventemitter3';
import type { EngineEvents } from './types.js';

/**
 * Typed event channel between the engine and whatever consumes it
 * (CLI, tests, a future UI).
 */
export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof EngineEvents>(event: K, listener: (data: EngineEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof EngineEvents>(event: K, listener: (data: EngineEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof EngineEvents>(event: K, listener: (data: EngineEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof EngineEvents>(event: K, data: EngineEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount<K extends keyof EngineEvents>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
