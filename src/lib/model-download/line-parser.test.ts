import { describe, it, expect } from 'vitest'
import { formatBytes, parseDownloadLine, rescalePercent, stripAnsi } from './line-parser'

describe('rescalePercent', () => {
  it('maps layer percent into the 5-90 band', () => {
    expect(rescalePercent(0)).toBe(5)
    expect(rescalePercent(50)).toBe(47)
    expect(rescalePercent(100)).toBe(90)
  })

  it('clamps out of range input', () => {
    expect(rescalePercent(-10)).toBe(5)
    expect(rescalePercent(250)).toBe(90)
  })
})

describe('formatBytes', () => {
  it('uses decimal units', () => {
    expect(formatBytes(512)).toBe('512 B')
    expect(formatBytes(1_500)).toBe('1.5 KB')
    expect(formatBytes(4_100_000_000)).toBe('4.1 GB')
  })
})

describe('stripAnsi', () => {
  it('removes cursor and color sequences', () => {
    expect(stripAnsi('\x1b[?25l\x1b[2Kpulling manifest\x1b[0m')).toBe('pulling manifest')
  })
})

describe('parseDownloadLine', () => {
  describe('milestones', () => {
    it('recognizes the manifest fetch', () => {
      const update = parseDownloadLine('pulling manifest')
      expect(update).toEqual({
        kind: 'milestone',
        message: 'pulling manifest',
        phrase: 'pulling manifest',
        status: 'Initializing download...',
        progress: 2,
        terminal: false,
      })
    })

    it('recognizes verification and install phases', () => {
      const verifying = parseDownloadLine('verifying sha256 digest')
      const writing = parseDownloadLine('writing manifest')

      expect(verifying.kind).toBe('milestone')
      expect(verifying.kind === 'milestone' && verifying.progress).toBe(95)
      expect(writing.kind === 'milestone' && writing.status).toBe('Installing model...')
    })

    it('prefers success over a stray percent', () => {
      const update = parseDownloadLine('success 45%', { progress: 30 })

      expect(update.kind).toBe('milestone')
      if (update.kind !== 'milestone') return
      expect(update.status).toBe('Download complete!')
      expect(update.progress).toBe(100)
      expect(update.terminal).toBe(true)
    })
  })

  describe('layer progress', () => {
    it('parses a full progress bar line', () => {
      const update = parseDownloadLine(
        'pulling 8eeb52dfb3bb... 42% ▕████      ▏ 1.7 GB/4.1 GB  125 MB/s  19s',
        { progress: 10 }
      )

      expect(update).toEqual({
        kind: 'progress',
        message: 'pulling 8eeb52dfb3bb... 42% ▕████      ▏ 1.7 GB/4.1 GB  125 MB/s  19s',
        layer: '8eeb52dfb3bb',
        status: 'Downloading file: 8eeb52df... (40%)',
        progress: 40,
        rawPercent: 42,
        layerCompleted: false,
        completed: '1.7 GB',
        total: '4.1 GB',
        speed: '125 MB/s',
      })
    })

    it('accepts the colon separated layer format', () => {
      const update = parseDownloadLine('pulling 8eeb52dfb3bb: 10%')
      expect(update.layer).toBe('8eeb52dfb3bb')
    })

    it('does not move progress backwards', () => {
      const update = parseDownloadLine('pulling 8eeb52dfb3bb... 10%', { progress: 60 })

      expect(update.kind).toBe('progress')
      if (update.kind !== 'progress') return
      expect(update.progress).toBeUndefined()
      expect(update.rawPercent).toBe(10)
      expect(update.status).toBe('Downloading file: 8eeb52df... (60%)')
    })

    it('marks the layer completed at 99% or more', () => {
      const update = parseDownloadLine('pulling 8eeb52dfb3bb... 99%')
      expect(update.kind === 'progress' && update.layerCompleted).toBe(true)
    })

    it('carries the current layer from context', () => {
      const update = parseDownloadLine('pulling 55%', { currentLayer: 'abc123def456', progress: 5 })

      expect(update.kind).toBe('progress')
      if (update.kind !== 'progress') return
      expect(update.layer).toBe('abc123def456')
      expect(update.progress).toBe(51)
      expect(update.status).toBe('Downloading file: abc123de... (51%)')
    })

    it('falls back to a model-wide status without a layer', () => {
      const update = parseDownloadLine('pulling 20%')
      expect(update.kind === 'progress' && update.status).toBe('Downloading model... (22%)')
    })

    it('strips terminal escapes before matching', () => {
      const update = parseDownloadLine('\x1b[2K\x1b[1Gpulling 8eeb52dfb3bb... 100%')
      expect(update.kind === 'progress' && update.rawPercent).toBe(100)
      expect(update.message).toBe('pulling 8eeb52dfb3bb... 100%')
    })
  })

  describe('fallback classification', () => {
    it('classifies lines without percentages', () => {
      expect(parseDownloadLine('pulling 8eeb52dfb3bb')).toEqual({
        kind: 'info',
        phase: 'pulling',
        message: 'pulling 8eeb52dfb3bb',
        layer: '8eeb52dfb3bb',
      })
      expect(parseDownloadLine('Verifying layers')).toEqual({
        kind: 'info',
        phase: 'verifying',
        progress: 90,
        message: 'Verifying layers',
        layer: undefined,
      })
      expect(parseDownloadLine('Pull Complete')).toMatchObject({ kind: 'info', phase: 'success', progress: 100 })
    })

    it('keeps error lines verbatim', () => {
      const update = parseDownloadLine('  Error: pull model manifest: file does not exist  ')
      expect(update).toEqual({
        kind: 'error',
        message: 'Error: pull model manifest: file does not exist',
        layer: undefined,
      })
    })

    it('treats anything else as unknown', () => {
      expect(parseDownloadLine('hello there')).toEqual({
        kind: 'info',
        phase: 'unknown',
        message: 'hello there',
        layer: undefined,
      })
    })
  })

  describe('daemon JSON stream', () => {
    it('parses measured layer progress', () => {
      const line = JSON.stringify({
        status: 'pulling 8eeb52dfb3bb',
        digest: 'sha256:8eeb52dfb3bb9aefdf9d1ef24b3bdbcfbe82238798c4b918278320b6fcef18fe',
        total: 4_000_000_000,
        completed: 1_000_000_000,
      })

      const update = parseDownloadLine(line, { progress: 2 })

      expect(update).toEqual({
        kind: 'progress',
        message: 'pulling 8eeb52dfb3bb',
        layer: '8eeb52dfb3bb',
        status: 'Downloading file: 8eeb52df... (26%)',
        progress: 26,
        rawPercent: 25,
        layerCompleted: false,
        completed: '1.0 GB',
        total: '4.0 GB',
        speed: undefined,
      })
    })

    it('routes status text through the milestone table', () => {
      const update = parseDownloadLine('{"status":"verifying sha256 digest"}')
      expect(update.kind === 'milestone' && update.progress).toBe(95)
    })

    it('reports daemon errors', () => {
      const update = parseDownloadLine('{"error":"pull model manifest: file does not exist"}')
      expect(update).toEqual({ kind: 'error', message: 'pull model manifest: file does not exist' })
    })

    it('treats malformed JSON as text', () => {
      const update = parseDownloadLine('{not json')
      expect(update).toMatchObject({ kind: 'info', phase: 'unknown', message: '{not json' })
    })
  })
})
