import { Injectable, Logger } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Console Event Publisher Adapter
 * Implements EventPublisherPort by writing events to the structured log,
 * where log-based metrics and alarms pick them up
 */
@Injectable()
export class ConsoleEventPublisherAdapter implements EventPublisherPort {
  private readonly logger = new Logger(ConsoleEventPublisherAdapter.name);

  async publish(event: DomainEvent): Promise<void> {
    this.logger.log(`[EVENT] ${event.eventName} ${JSON.stringify(event.toJSON())}`);
  }
}
