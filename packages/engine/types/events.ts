// Domain events across ingestion and question answering
// Used for observability hooks (onEvent) without coupling components

import { randomUUID } from 'node:crypto';

export type DomainEventType =
  // Ingestion
  | 'DocumentIngested'
  | 'IngestionFailed'
  | 'ExtractionGapDetected'
  // Question answering
  | 'QuestionReceived'
  | 'SubQueriesRouted'
  | 'RetrievalIssued'
  | 'PartialAnswerProduced'
  | 'RetryScheduled'
  | 'AnswerComposed'
  | 'AnswerDegraded';

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'DocumentIngested',
  'IngestionFailed',
  'ExtractionGapDetected',
  'QuestionReceived',
  'SubQueriesRouted',
  'RetrievalIssued',
  'PartialAnswerProduced',
  'RetryScheduled',
  'AnswerComposed',
  'AnswerDegraded',
];

export interface DomainEvent<T = unknown> {
  eventId: string;
  type: DomainEventType;
  timestamp: Date;
  sourceContext: string;   // 'Ingestion' | 'QuestionAnswering'
  payload: T;
}

export type EventHandler = (event: DomainEvent) => void;

export function createEvent<T>(type: DomainEventType, sourceContext: string, payload: T): DomainEvent<T> {
  return { eventId: randomUUID(), type, timestamp: new Date(), sourceContext, payload };
}

export interface EventBus {
  emit(event: DomainEvent): void;
  on(type: DomainEventType, handler: EventHandler): void;
  off(type: DomainEventType, handler: EventHandler): void;
}

// Simple in-process event bus implementation
export class SimpleEventBus implements EventBus {
  private handlers = new Map<DomainEventType, Set<EventHandler>>();

  emit(event: DomainEvent): void {
    const typeHandlers = this.handlers.get(event.type);
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        handler(event);
      }
    }
  }

  on(type: DomainEventType, handler: EventHandler): void {
    let typeHandlers = this.handlers.get(type);
    if (!typeHandlers) {
      typeHandlers = new Set();
      this.handlers.set(type, typeHandlers);
    }
    typeHandlers.add(handler);
  }

  off(type: DomainEventType, handler: EventHandler): void {
    this.handlers.get(type)?.delete(handler);
  }
}

/** Subscribe one callback to every event type, as the orchestrator's onEvent hook does */
export function forwardAll(bus: EventBus, handler: (event: { type: DomainEventType; payload: unknown }) => void): void {
  for (const type of DOMAIN_EVENT_TYPES) {
    bus.on(type, (e) => handler({ type: e.type, payload: e.payload }));
  }
}
