export type { MessageListener, PubSubTransport, Unsubscribe } from './transport';
export { MemoryPubSubTransport } from './memory-transport';
export { RedisPubSubTransport, createRedisClient } from './redis-transport';
export type { RedisPublisherClient, RedisSubscriberClient } from './redis-transport';
export { RELOAD_MESSAGE, formatReloadMessage, parsePolicyEvent } from './messages';
export type { PolicyEvent, PolicyEventType } from './messages';
export { PolicyEventBus } from './policy-event-bus';
export type { PolicyEventHandler } from './policy-event-bus';
