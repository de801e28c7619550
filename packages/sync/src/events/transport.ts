/**
 * Pub/sub transport used by the policy event bus.
 */

export type MessageListener = (message: string) => void;

/** Removes the listener it was returned for */
export type Unsubscribe = () => Promise<void>;

export interface PubSubTransport {
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, listener: MessageListener): Promise<Unsubscribe>;
}
