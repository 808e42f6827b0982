import { Logger } from '@nestjs/common';
import { DiagnosticEvent } from '../entities/match-diagnostic.entity';
import { DiagnosticsLevel } from '../../config/app.config';
import { utcDateKey } from '../../common/utils/date.util';

export const DIAGNOSTIC_SINK = Symbol('DIAGNOSTIC_SINK');

// Receives non-fatal matching anomalies. Emitting never interrupts a run.
export interface DiagnosticSink {
  emit(event: DiagnosticEvent): void;
}

export function describeDiagnostic(event: DiagnosticEvent): string {
  const day = utcDateKey(event.date);
  switch (event.kind) {
    case 'unmatched':
      return `${day} unmatched trade for ${event.symbol}: ${event.side} ${event.quantity.toString()} shares at $${event.fillPrice.toString()}`;
    case 'overselling':
      return `${day} ${event.symbol} - selling ${event.excessQuantity.toString()} more shares than owned (had ${event.closedQuantity.toString()} shares)`;
    case 'unclosed':
      return `${day} ${event.symbol} - unclosed ${event.direction} position of ${event.quantity.toString()} shares`;
  }
}

/** Writes diagnostics to the Nest logger at the configured level. */
export class LoggerDiagnosticSink implements DiagnosticSink {
  private readonly logger = new Logger('PositionDiagnostics');

  constructor(private readonly level: DiagnosticsLevel) {}

  emit(event: DiagnosticEvent): void {
    if (this.level === 'off') {
      return;
    }
    const message = describeDiagnostic(event);
    if (this.level === 'debug') {
      this.logger.debug(message);
    } else {
      this.logger.warn(message);
    }
  }
}

/** Keeps every event; lets tests and callers inspect a run's diagnostics. */
export class InMemoryDiagnosticSink implements DiagnosticSink {
  readonly events: DiagnosticEvent[] = [];

  emit(event: DiagnosticEvent): void {
    this.events.push(event);
  }

  ofKind<K extends DiagnosticEvent['kind']>(kind: K): Extract<DiagnosticEvent, { kind: K }>[] {
    return this.events.filter((event): event is Extract<DiagnosticEvent, { kind: K }> => event.kind === kind);
  }

  clear(): void {
    this.events.length = 0;
  }
}
