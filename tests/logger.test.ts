import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { createCodefindLogger, resolveFileLoggingConfig } from '../src/logging/logger.js'
import { collectStream } from './helpers.js'

describe('resolveFileLoggingConfig', () => {
  it('is off unless enabled in config', () => {
    expect(resolveFileLoggingConfig({ env: { HOME: '/home/u' }, config: null })).toBeNull()
    expect(
      resolveFileLoggingConfig({ env: { HOME: '/home/u' }, config: { logging: { level: 'warn' } } })
    ).toBeNull()
  })

  it('defaults to a jsonl file under the home directory', () => {
    expect(
      resolveFileLoggingConfig({ env: { HOME: '/home/u' }, config: { logging: { enabled: true } } })
    ).toEqual({
      enabled: true,
      level: 'info',
      format: 'json',
      file: '/home/u/.codefind/logs/codefind.jsonl',
      maxBytes: 10 * 1024 * 1024,
      maxFiles: 3,
    })
  })
})

describe('createCodefindLogger', () => {
  it('prints pretty lines to stderr when verbose', () => {
    const stderr = collectStream()
    const { logger } = createCodefindLogger({
      env: {},
      config: null,
      stderr: stderr.stream,
      verbose: true,
    })

    logger.info({ event: 'phase.thumbnail', frames: 2 })

    expect(stderr.text()).toBe('[codefind] INFO {"event":"phase.thumbnail","frames":2}\n')
  })

  it('stays silent on stderr otherwise', () => {
    const stderr = collectStream()
    const { logger, fileConfig } = createCodefindLogger({
      env: {},
      config: null,
      stderr: stderr.stream,
      verbose: false,
    })

    logger.warn({ event: 'frame.failed' })

    expect(stderr.text()).toBe('')
    expect(fileConfig).toBeNull()
  })

  it('appends json records to the log file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'codefind-log-'))
    const file = join(dir, 'codefind.jsonl')
    const stderr = collectStream()
    const logging = createCodefindLogger({
      env: {},
      config: { logging: { enabled: true, file } },
      stderr: stderr.stream,
      verbose: false,
    })

    logging.logger.debug('below the file level')
    logging.logger.info('hello')
    logging.getSubLogger('scan').warn({ event: 'frame.failed', timestamp: '1:00' })
    await logging.flush()

    const lines = readFileSync(file, 'utf8').trim().split('\n')
    expect(lines).toHaveLength(2)
    const first = JSON.parse(lines[0] ?? '{}')
    const second = JSON.parse(lines[1] ?? '{}')
    expect(first['0']).toBe('hello')
    expect(first._meta.logLevelName).toBe('INFO')
    expect(second.event).toBe('frame.failed')
    expect(second.timestamp).toBe('1:00')
    expect(second._meta.logLevelName).toBe('WARN')
    expect(stderr.text()).toBe('')
  })

  it('writes level, time, name and field names in pretty file lines', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'codefind-log-'))
    const file = join(dir, 'codefind.log')
    const logging = createCodefindLogger({
      env: {},
      config: { logging: { enabled: true, file, format: 'pretty' } },
      stderr: collectStream().stream,
      verbose: false,
    })

    logging.logger.warn({ event: 'frame.failed', timestamp: '5:00', error: 'boom' })
    logging.logger.info('hello', { frames: 2 })
    await logging.flush()

    const lines = readFileSync(file, 'utf8').trim().split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\S+Z WARN \[codefind\] event=frame\.failed timestamp=5:00 error=boom$/
    )
    expect(lines[1]).toMatch(/^\S+Z INFO \[codefind\] hello \{"frames":2\}$/)
  })
})
