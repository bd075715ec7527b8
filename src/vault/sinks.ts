/**
 * Notification sinks.
 *
 * The engine hands every committed notification to one EventSink. These are
 * the sinks the service and the tests wire in.
 */

import { toJson } from '../utils/json';
import logger from '../utils/logger';
import type { EventSink, StakingEvent, StakingEventType } from '../types';

export class LoggingEventSink implements EventSink {
  emit(event: StakingEvent): void {
    logger.info(`[EVENT] ${event.type} ${JSON.stringify(toJson(event))}`);
  }
}

export class MemoryEventSink implements EventSink {
  readonly events: StakingEvent[] = [];

  emit(event: StakingEvent): void {
    this.events.push(event);
  }

  ofType<T extends StakingEventType>(type: T): Extract<StakingEvent, { type: T }>[] {
    return this.events.filter(
      (e): e is Extract<StakingEvent, { type: T }> => e.type === type,
    );
  }
}

export class FanoutEventSink implements EventSink {
  constructor(private readonly sinks: EventSink[]) {}

  emit(event: StakingEvent): void {
    for (const sink of this.sinks) sink.emit(event);
  }
}
