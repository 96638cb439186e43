import { describe, expect, it } from 'vitest'

import { createChildLogger, createLoggerSink, createRootLogger } from '../src/server/node/logger'

function collectingDestination() {
  const lines: string[] = []
  return {
    lines,
    stream: {
      write(message: string) {
        lines.push(message)
      },
    },
  }
}

describe('createLoggerSink', () => {
  it('writes diagnostics records at their level', () => {
    const { lines, stream } = collectingDestination()
    const logger = createChildLogger(createRootLogger('info', stream), 'relay')
    const sink = createLoggerSink(logger)

    sink.onRecord({
      timestamp: 1,
      level: 'warn',
      component: 'session',
      code: 'channel-decode-error',
      message: 'Clipboard message declares 4 bytes but carries 0',
      detail: { channel: 'cliprdr' },
    })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 40,
      name: 'relay',
      component: 'session',
      code: 'channel-decode-error',
      detail: { channel: 'cliprdr' },
      msg: 'Clipboard message declares 4 bytes but carries 0',
    })
  })

  it('drops records below the configured level', () => {
    const { lines, stream } = collectingDestination()
    const sink = createLoggerSink(createRootLogger('warn', stream))

    sink.onRecord({ timestamp: 1, level: 'info', component: 'session', code: 'active', message: 'active' })

    expect(lines).toEqual([])
  })
})
