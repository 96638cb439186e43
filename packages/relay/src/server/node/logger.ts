import pino from 'pino'

import type { DiagnosticsSink } from '../../diagnostics'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export function createRootLogger(
  level: LogLevel = 'info',
  destination?: pino.DestinationStream,
): pino.Logger {
  return destination ? pino({ level }, destination) : pino({ level })
}

export function createChildLogger(parent: pino.Logger, name: string): pino.Logger {
  return parent.child({ name })
}

/** Adapts engine diagnostics onto a pino logger. */
export function createLoggerSink(logger: pino.Logger): DiagnosticsSink {
  return {
    onRecord(record) {
      logger[record.level](
        { component: record.component, code: record.code, detail: record.detail },
        record.message,
      )
    },
  }
}
