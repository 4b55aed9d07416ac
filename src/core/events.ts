import { EventEmitter } from 'eventemitter3';
import type { FleetEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof FleetEvents>(event: K, listener: (data: FleetEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof FleetEvents>(event: K, listener: (data: FleetEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof FleetEvents>(event: K, listener: (data: FleetEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof FleetEvents>(event: K, data: FleetEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof FleetEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
