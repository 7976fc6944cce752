import { describe, it, expect } from 'vitest'
import { downloadResponse } from './download-response'

describe('downloadResponse', () => {
  it('answers 200 for a started download', async () => {
    const response = downloadResponse({ status: 'started', model: 'llama3' })

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      success: true,
      status: 'started',
      model: 'llama3',
      message: 'Download of llama3 started',
    })
  })

  it('answers 200 when the model is already there', async () => {
    const response = downloadResponse({ status: 'already_available', model: 'llama3' })

    expect(response.status).toBe(200)
    expect(await response.json()).toMatchObject({ message: 'Model llama3 is already available' })
  })

  it('answers 202 while a download is running', () => {
    expect(downloadResponse({ status: 'already_running', model: 'llama3' }).status).toBe(202)
  })

  it('answers 429 with a retry hint when rate limited', async () => {
    const response = downloadResponse({ status: 'rate_limited', model: 'llama3', retryAfterSeconds: 4 })

    expect(response.status).toBe(429)
    expect(response.headers.get('Retry-After')).toBe('4')
    expect(await response.json()).toEqual({
      success: false,
      status: 'rate_limited',
      error: 'Too many download requests. Try again in 4 seconds',
      retry_after_seconds: 4,
    })
  })

  it('answers 503 when the daemon is down', () => {
    expect(downloadResponse({ status: 'daemon_unavailable', model: 'llama3' }).status).toBe(503)
  })

  it('answers 403 when downloads are disabled', async () => {
    const response = downloadResponse({ status: 'disabled', model: 'llama3' })

    expect(response.status).toBe(403)
    expect(await response.json()).toMatchObject({ error: 'Model downloads are disabled' })
  })
})
