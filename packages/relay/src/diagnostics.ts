export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error'

export interface DiagnosticRecord {
  readonly timestamp: number
  readonly level: DiagnosticLevel
  readonly component: string
  readonly code: string
  readonly message: string
  readonly detail?: unknown
}

export interface DiagnosticsSink {
  onRecord(record: DiagnosticRecord): void
}

/**
 * Component-scoped front for a sink. A throwing sink never reaches the
 * forwarding path.
 */
export class Diagnostics {
  readonly component: string
  #sink: DiagnosticsSink | undefined
  #clock: () => number

  constructor(
    sink: DiagnosticsSink | undefined,
    component: string,
    clock: () => number = Date.now,
  ) {
    this.#sink = sink
    this.component = component
    this.#clock = clock
  }

  child(component: string): Diagnostics {
    return new Diagnostics(this.#sink, component, this.#clock)
  }

  record(
    level: DiagnosticLevel,
    code: string,
    message: string,
    detail?: unknown,
  ): void {
    const sink = this.#sink
    if (!sink) return
    const record: DiagnosticRecord = {
      timestamp: this.#clock(),
      level,
      component: this.component,
      code,
      message,
      detail,
    }
    queueMicrotask(() => {
      try {
        sink.onRecord(record)
      } catch (error) {
        reportSinkFailure(error)
      }
    })
  }

  debug(code: string, message: string, detail?: unknown): void {
    this.record('debug', code, message, detail)
  }

  info(code: string, message: string, detail?: unknown): void {
    this.record('info', code, message, detail)
  }

  warn(code: string, message: string, detail?: unknown): void {
    this.record('warn', code, message, detail)
  }

  error(code: string, message: string, detail?: unknown): void {
    this.record('error', code, message, detail)
  }
}

function reportSinkFailure(error: unknown): void {
  process.emitWarning(
    `Diagnostics sink failed: ${error instanceof Error ? error.message : String(error)}`,
  )
}

export class CollectingDiagnostics implements DiagnosticsSink {
  readonly records: DiagnosticRecord[] = []

  onRecord(record: DiagnosticRecord): void {
    this.records.push(record)
  }
}
