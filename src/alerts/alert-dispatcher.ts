import logger from '../shared/logger';
import { AlertEvent } from '../shared/types';

/**
 * Channel-agnostic delivery boundary. Transports (chat, webhooks, email) live
 * outside this package and implement this interface.
 */
export interface AlertSink {
  readonly name: string;
  deliver(events: readonly AlertEvent[]): Promise<void>;
}

export function formatAlertLine(event: AlertEvent): string {
  const cs = event.scores ? event.scores.confluence.toFixed(1) : '-';
  const flag = event.persisted ? '' : ' [unpersisted]';
  return `[ALERT] ${event.symbol} ${event.timeframe} | ${event.type.toUpperCase()} | CS: ${cs} | ${event.message}${flag}`;
}

export class LoggingAlertSink implements AlertSink {
  readonly name = 'log';

  async deliver(events: readonly AlertEvent[]): Promise<void> {
    if (events.length === 0) return;
    logger.info(`[LoggingAlertSink] Delivering ${events.length} alert(s)`);
    for (const event of events) {
      logger.info(formatAlertLine(event));
    }
  }
}

/**
 * Fans events out to every sink. A failing sink is logged and does not stop the others.
 */
export class AlertDispatcher {
  private readonly sinks: AlertSink[];

  constructor(sinks: AlertSink[]) {
    this.sinks = sinks;
  }

  async dispatch(events: readonly AlertEvent[]): Promise<string[]> {
    const failures: string[] = [];
    if (events.length === 0) return failures;

    const results = await Promise.allSettled(this.sinks.map((sink) => sink.deliver(events)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const sinkName = this.sinks[index].name;
        logger.error(`[AlertDispatcher] Sink ${sinkName} failed:`, result.reason);
        failures.push(sinkName);
      }
    });
    return failures;
  }
}
