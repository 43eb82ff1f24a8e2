import { Injectable, Logger } from '@nestjs/common';
import { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import { DomainEvent } from '../../../domain/events/base.event';

/**
 * Logging Event Publisher Adapter
 * Implements EventPublisherPort by writing each event to the application log
 */
@Injectable()
export class LoggingEventPublisherAdapter implements EventPublisherPort {
  private readonly logger = new Logger(LoggingEventPublisherAdapter.name);

  async publish(event: DomainEvent): Promise<void> {
    this.logger.log({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }

  publishAsync(event: DomainEvent): void {
    // Fire and forget
    this.publish(event).catch((error: unknown) => {
      this.logger.error(
        `Failed to publish event ${event.eventName}: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }
}
