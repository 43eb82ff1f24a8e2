import { Module } from '@nestjs/common';
import { LoggingModule } from '../shared/logging/logging.module';
import { EVENT_PUBLISHER_PORT, FILE_PROCESSOR_PORT } from '../application/ports/tokens';

// Adapters (implementations)
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';
import { LocalFileProcessorAdapter } from './adapters/processing/local-file-processor.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the output ports
 */
@Module({
  imports: [LoggingModule],
  providers: [
    // Event publisher adapter
    LoggingEventPublisherAdapter,
    {
      provide: EVENT_PUBLISHER_PORT,
      useExisting: LoggingEventPublisherAdapter,
    },

    // File processing adapter
    LocalFileProcessorAdapter,
    {
      provide: FILE_PROCESSOR_PORT,
      useExisting: LocalFileProcessorAdapter,
    },
  ],
  exports: [EVENT_PUBLISHER_PORT, FILE_PROCESSOR_PORT],
})
export class InfrastructureModule {}
