/**
 * Reporters
 *
 * Sinks for the diagnostic events emitted while a corpus is processed
 */

import type { Logger } from 'pino';
import type {
  DiagnosticEvent,
  DiagnosticType,
  ExtractionReporter,
} from '../types/index.js';

/**
 * Discards every event
 */
export const silentReporter: ExtractionReporter = {
  report(): void {},
};

/**
 * Forward events to a pino logger
 */
export function createLoggerReporter(logger: Logger): ExtractionReporter {
  return {
    report(event: DiagnosticEvent): void {
      switch (event.type) {
        case 'segmentation-shortfall':
          logger.warn(
            { corpusLength: event.corpusLength },
            'No document boundary found, nothing to extract'
          );
          break;
        case 'schema-discovered':
          logger.info(
            { attributes: event.attributes, discoveredTags: event.discoveredTags },
            'Meta tags considered for this corpus'
          );
          break;
        case 'date-unparsed':
          logger.warn({ raw: event.raw }, 'Date could not be parsed');
          break;
        case 'document-anomaly':
          logger.warn(
            {
              index: event.index,
              idDoc: event.idDoc,
              title: event.title,
              date: event.date,
              textLength: event.textLength,
              error: event.error,
            },
            'Extracted information shows an anomaly, please check this document'
          );
          break;
      }
    },
  };
}

/**
 * In-memory reporter
 */
export interface CollectingReporter extends ExtractionReporter {
  readonly events: DiagnosticEvent[];
  ofType<T extends DiagnosticType>(type: T): Extract<DiagnosticEvent, { type: T }>[];
}

export function createCollectingReporter(): CollectingReporter {
  const events: DiagnosticEvent[] = [];

  return {
    events,
    report(event: DiagnosticEvent): void {
      events.push(event);
    },
    ofType<T extends DiagnosticType>(type: T): Extract<DiagnosticEvent, { type: T }>[] {
      return events.filter(
        (event): event is Extract<DiagnosticEvent, { type: T }> => event.type === type
      );
    },
  };
}
