/**
 * Policy Event Bus
 *
 * Listens on one channel for invalidation messages and hands recognized
 * events to a handler. Also publishes reload requests for other instances.
 */

import { SourceUnavailableError } from '@policy-sync/core';
import type { Logger } from '../utils/logger';
import type { PubSubTransport, Unsubscribe } from './transport';
import { formatReloadMessage, parsePolicyEvent } from './messages';
import type { PolicyEvent } from './messages';

export type PolicyEventHandler = (event: PolicyEvent) => void | Promise<void>;

export class PolicyEventBus {
  private unsubscribe: Unsubscribe | null = null;

  constructor(
    private readonly transport: PubSubTransport,
    private readonly channel: string,
    private readonly logger: Logger,
  ) {}

  async start(handler: PolicyEventHandler): Promise<void> {
    if (this.unsubscribe) {
      this.logger.warn(`Already listening on ${this.channel}`);
      return;
    }
    this.unsubscribe = await this.transport.subscribe(this.channel, (message) => {
      this.onMessage(message, handler);
    });
    this.logger.info(`Listening for policy events on ${this.channel}`);
  }

  async stop(): Promise<void> {
    const unsubscribe = this.unsubscribe;
    if (!unsubscribe) return;
    this.unsubscribe = null;
    await unsubscribe();
    this.logger.info(`Stopped listening on ${this.channel}`);
  }

  async publishReload(reason?: string): Promise<void> {
    const message = formatReloadMessage(reason);
    try {
      await this.transport.publish(this.channel, message);
    } catch (error) {
      throw new SourceUnavailableError(`Failed to publish reload on ${this.channel}`, 'pubsub', error);
    }
    this.logger.info(`Published reload request on ${this.channel}`, { message });
  }

  isListening(): boolean {
    return this.unsubscribe !== null;
  }

  getChannel(): string {
    return this.channel;
  }

  private onMessage(message: string, handler: PolicyEventHandler): void {
    const event = parsePolicyEvent(message);
    if (!event) {
      this.logger.debug(`Ignoring unrecognized message on ${this.channel}`, { message });
      return;
    }
    this.logger.info(`Received policy event: ${event.type}`, { reason: event.reason });
    void this.dispatch(event, handler);
  }

  private async dispatch(event: PolicyEvent, handler: PolicyEventHandler): Promise<void> {
    try {
      await handler(event);
    } catch (error) {
      this.logger.error(`Policy event handler failed for ${event.type}`, error);
    }
  }
}
