import { Inject, Injectable, Logger } from '@nestjs/common';
import { certificateTopic } from '../certificate.constants';
import type { CertificateType } from '../certificate.constants';
import type { ChangeEvent } from '../interfaces';
import { PUBSUB } from '../certificate.tokens';
import type { ChangeHandler, PubSub } from './pubsub.interface';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Publishes certificate change events on `certificates/<domain>/<type>`.
 *
 * Fire-and-forget from the writer's side: a failing subscriber is logged and
 * never propagates into the store write that triggered the event.
 */
@Injectable()
export class ChangeNotifierService {
  private readonly logger = new Logger(ChangeNotifierService.name);

  constructor(@Inject(PUBSUB) private readonly pubsub: PubSub) {}

  publish(event: ChangeEvent): void {
    const topic = certificateTopic(event.domain, event.certificateType);

    try {
      this.pubsub.publish(topic, event);
      this.logger.debug(`Published ${event.operation} on ${topic}`);
    } catch (error) {
      this.logger.error(`Change notification on ${topic} failed: ${getErrorMessage(error)}`, {
        certificateId: event.certificateId,
        operation: event.operation,
      });
    }
  }

  /**
   * Subscribes to every change for a domain, or to one certificate type.
   */
  subscribe(domain: string, handler: ChangeHandler, certificateType?: CertificateType): () => void {
    return this.pubsub.subscribe(certificateTopic(domain, certificateType ?? '*'), handler);
  }
}
