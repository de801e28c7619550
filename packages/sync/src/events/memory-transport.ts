import { EventEmitter } from 'eventemitter3';
import type { MessageListener, PubSubTransport, Unsubscribe } from './transport';

/**
 * Single-process transport. Delivery is synchronous with `publish`.
 */
export class MemoryPubSubTransport implements PubSubTransport {
  private emitter = new EventEmitter();

  async publish(channel: string, message: string): Promise<void> {
    this.emitter.emit(channel, message);
  }

  async subscribe(channel: string, listener: MessageListener): Promise<Unsubscribe> {
    this.emitter.on(channel, listener);
    return async () => {
      this.emitter.off(channel, listener);
    };
  }

  listenerCount(channel: string): number {
    return this.emitter.listenerCount(channel);
  }
}
