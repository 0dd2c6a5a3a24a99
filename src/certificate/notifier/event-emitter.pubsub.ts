import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { ChangeEvent } from '../interfaces';
import type { ChangeHandler, PubSub } from './pubsub.interface';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * In-process channel over the application's EventEmitter2. Topics are
 * `/`-delimited so domain names (which contain dots) stay one segment and
 * `certificates/<domain>/*` matches every type for a domain.
 *
 * Requires `EventEmitterModule.forRoot({ wildcard: true, delimiter: '/' })`.
 */
@Injectable()
export class EventEmitterPubSub implements PubSub {
  private readonly logger = new Logger(EventEmitterPubSub.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  publish(topic: string, event: ChangeEvent): void {
    this.eventEmitter.emit(topic, event, topic);
  }

  subscribe(pattern: string, handler: ChangeHandler): () => void {
    const listener = (event: ChangeEvent, topic: string): void => {
      try {
        const result = handler(event, topic);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            this.logger.error(`Subscriber for ${pattern} failed: ${getErrorMessage(error)}`);
          });
        }
      } catch (error) {
        this.logger.error(`Subscriber for ${pattern} failed: ${getErrorMessage(error)}`);
      }
    };

    this.eventEmitter.on(pattern, listener);
    return () => {
      this.eventEmitter.off(pattern, listener);
    };
  }
}
