import { EventEmitter } from 'events'
import { PassThrough } from 'stream'
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { CliPullRunner, HttpPullRunner, LineQueue } from './pull-runner'

const spawn = vi.hoisted(() => vi.fn())
vi.mock('child_process', () => ({ spawn }))

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const seen: string[] = []
  for await (const line of lines) seen.push(line)
  return seen
}

class FakeChild extends EventEmitter {
  stdout = new PassThrough()
  stderr = new PassThrough()
  exitCode: number | null = null
  killed = false
  kill = vi.fn(() => {
    this.killed = true
    return true
  })
}

describe('LineQueue', () => {
  it('splits on newlines and carriage returns', async () => {
    const queue = new LineQueue()
    queue.write('pulling manifest\npulling abc... 10%\rpulling abc... 20%\r\n')
    queue.write('\n  \nsuccess')
    queue.end()

    expect(await collect(queue)).toEqual([
      'pulling manifest',
      'pulling abc... 10%',
      'pulling abc... 20%',
      'success',
    ])
  })

  it('joins lines split across chunks', async () => {
    const queue = new LineQueue()
    queue.write('verifying sha')
    queue.write('256 digest\n')
    queue.end()

    expect(await collect(queue)).toEqual(['verifying sha256 digest'])
  })

  it('delivers lines written after a reader is waiting', async () => {
    const queue = new LineQueue()
    const reading = collect(queue)

    queue.write('writing manifest\n')
    queue.end()

    expect(await reading).toEqual(['writing manifest'])
  })

  it('ignores writes after end', async () => {
    const queue = new LineQueue()
    queue.end()
    queue.write('late\n')

    expect(await collect(queue)).toEqual([])
  })
})

describe('CliPullRunner', () => {
  let child: FakeChild

  beforeEach(() => {
    child = new FakeChild()
    spawn.mockReset()
    spawn.mockReturnValue(child)
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  it('spawns the pull command and merges both streams', async () => {
    const handle = new CliPullRunner('/usr/local/bin/ollama').start('llama3')

    expect(spawn).toHaveBeenCalledWith(
      '/usr/local/bin/ollama',
      ['pull', 'llama3'],
      expect.objectContaining({ stdio: ['ignore', 'pipe', 'pipe'] })
    )

    const lines = collect(handle.lines)
    child.stdout.write('pulling manifest\n')
    await new Promise((resolve) => setImmediate(resolve))
    child.stderr.write('pulling abc123... 50%\r')
    await new Promise((resolve) => setImmediate(resolve))
    child.emit('close', 0, null)

    expect(await lines).toEqual(['pulling manifest', 'pulling abc123... 50%'])
    expect(await handle.exit).toEqual({ code: 0, signal: null })
  })

  it('reports a spawn failure', async () => {
    const handle = new CliPullRunner().start('llama3')

    child.emit('error', new Error('spawn ollama ENOENT'))

    expect(await handle.exit).toEqual({ code: null, error: 'Failed to start ollama: spawn ollama ENOENT' })
    expect(await collect(handle.lines)).toEqual([])
  })

  it('terminates a running process', () => {
    const handle = new CliPullRunner().start('llama3')

    handle.kill()
    handle.kill()

    expect(child.kill).toHaveBeenCalledTimes(1)
    expect(child.kill).toHaveBeenCalledWith('SIGTERM')
  })
})

describe('HttpPullRunner', () => {
  function streamOf(...chunks: string[]) {
    const encoder = new TextEncoder()
    return new ReadableStream<Uint8Array>({
      start(controller) {
        for (const chunk of chunks) controller.enqueue(encoder.encode(chunk))
        controller.close()
      },
    })
  }

  it('yields the daemon progress lines', async () => {
    const pull = vi.fn(async () => new Response(streamOf(
      '{"status":"pulling manifest"}\n{"status":"pulling abc","dig',
      'est":"sha256:abc","total":10,"completed":5}\n{"status":"success"}\n'
    )))

    const handle = new HttpPullRunner({ pull }).start('llama3')

    expect(await collect(handle.lines)).toEqual([
      '{"status":"pulling manifest"}',
      '{"status":"pulling abc","digest":"sha256:abc","total":10,"completed":5}',
      '{"status":"success"}',
    ])
    expect(await handle.exit).toEqual({ code: 0 })
    expect(pull).toHaveBeenCalledWith('llama3', expect.any(AbortSignal))
  })

  it('reports a failed request', async () => {
    const pull = vi.fn(async (): Promise<Response> => {
      throw new Error('HTTP 404: model not found')
    })

    const handle = new HttpPullRunner({ pull }).start('nope')

    expect(await handle.exit).toEqual({ code: 1, error: 'HTTP 404: model not found' })
    expect(await collect(handle.lines)).toEqual([])
  })

  it('reports an aborted stream after kill', async () => {
    const pull = vi.fn((_modelId: string, signal: AbortSignal) => new Promise<Response>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')))
    }))

    const handle = new HttpPullRunner({ pull }).start('llama3')
    handle.kill()

    expect(await handle.exit).toEqual({ code: null, error: 'Pull stream aborted' })
  })
})
