/**
 * Redis pub/sub transport.
 *
 * Publishes on the shared client and listens on a subscriber connection
 * duplicated from it. Removing the last listener of a channel unsubscribes
 * that channel; neither connection is closed by `subscribe`/`unsubscribe`.
 */

import { Redis } from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { Logger } from '../utils/logger';
import type { MessageListener, PubSubTransport, Unsubscribe } from './transport';

// Subset of the ioredis client used here
export interface RedisSubscriberClient {
  subscribe(channel: string): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
  quit(): Promise<unknown>;
}

export interface RedisPublisherClient {
  publish(channel: string, message: string): Promise<number>;
  duplicate(): RedisSubscriberClient;
}

export function createRedisClient(options: RedisOptions | string): Redis {
  return typeof options === 'string' ? new Redis(options) : new Redis(options);
}

export class RedisPubSubTransport implements PubSubTransport {
  private subscriber: RedisSubscriberClient | null = null;
  private listeners: Map<string, Set<MessageListener>> = new Map();
  private pendingSubscriptions: Map<string, Promise<unknown>> = new Map();

  constructor(
    private readonly client: RedisPublisherClient,
    private readonly logger: Logger,
  ) {}

  async publish(channel: string, message: string): Promise<void> {
    const receivers = await this.client.publish(channel, message);
    this.logger.debug(`Published message on ${channel}`, { receivers });
  }

  async subscribe(channel: string, listener: MessageListener): Promise<Unsubscribe> {
    const subscriber = this.getSubscriber();
    let channelListeners = this.listeners.get(channel);
    if (!channelListeners) {
      channelListeners = new Set();
      this.listeners.set(channel, channelListeners);
      const subscribing = subscriber.subscribe(channel);
      this.pendingSubscriptions.set(channel, subscribing);
      try {
        await subscribing;
      } catch (error) {
        // A failed SUBSCRIBE must not leave the channel looking subscribed
        if (this.listeners.get(channel) === channelListeners) {
          this.listeners.delete(channel);
        }
        throw error;
      } finally {
        this.pendingSubscriptions.delete(channel);
      }
      this.logger.info(`Subscribed to Redis channel ${channel}`);
    } else {
      await this.pendingSubscriptions.get(channel);
    }
    channelListeners.add(listener);

    return async () => {
      const current = this.listeners.get(channel);
      if (!current?.delete(listener) || current.size > 0) {
        return;
      }
      this.listeners.delete(channel);
      await subscriber.unsubscribe(channel);
      this.logger.info(`Unsubscribed from Redis channel ${channel}`);
    };
  }

  /** Close the duplicated subscriber connection. The shared client stays open. */
  async close(): Promise<void> {
    if (!this.subscriber) return;
    const subscriber = this.subscriber;
    this.subscriber = null;
    this.listeners.clear();
    await subscriber.quit();
  }

  private getSubscriber(): RedisSubscriberClient {
    if (!this.subscriber) {
      const subscriber = this.client.duplicate();
      subscriber.on('message', (channel, message) => this.dispatch(channel, message));
      this.subscriber = subscriber;
    }
    return this.subscriber;
  }

  private dispatch(channel: string, message: string): void {
    const channelListeners = this.listeners.get(channel);
    if (!channelListeners) return;
    for (const listener of channelListeners) {
      try {
        listener(message);
      } catch (error) {
        this.logger.error(`Listener on ${channel} threw`, error);
      }
    }
  }
}
