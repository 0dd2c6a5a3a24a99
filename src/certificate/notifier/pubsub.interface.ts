import type { ChangeEvent } from '../interfaces';

export type ChangeHandler = (event: ChangeEvent, topic: string) => void | Promise<void>;

/**
 * Best-effort, at-least-once notification channel. No ordering or durability
 * guarantees; subscribers re-read the store before acting.
 */
export interface PubSub {
  publish(topic: string, event: ChangeEvent): void;
  /** Returns a function that removes the subscription. */
  subscribe(pattern: string, handler: ChangeHandler): () => void;
}
