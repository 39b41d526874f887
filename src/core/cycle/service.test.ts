import { describe, expect, it, vi } from 'vitest'
import { InvalidTargetError, TransportError } from '../watcher/errors.js'
import type { ChangeResult } from '../watcher/types.js'
import type { NotificationPayload } from '../notifications/types.js'
import { discordAnnouncements } from '../../integrations/discord/format.js'
import { plainTextAnnouncements } from './announcements.js'
import { CheckCycleService } from './service.js'
import type { AnnouncementBuilder } from './types.js'

const WATCH_URL = 'https://example.test/support'
const FIXED_NOW = new Date('2026-03-01T12:00:00Z')

function fakeWatcher(results: Array<ChangeResult | Error>) {
  const queue = [...results]
  return {
    url: WATCH_URL,
    getState: () => ({ lastArtifactLink: 'http://x/fw1.bin' }),
    checkOnce: vi.fn(async (): Promise<ChangeResult> => {
      const next = queue.shift()
      if (!next) throw new Error('no result queued')
      if (next instanceof Error) throw next
      return next
    }),
  }
}

function fakeNotifier() {
  return { name: 'fake', send: vi.fn(async (_payload: NotificationPayload): Promise<void> => undefined) }
}

const failed = (message: string): ChangeResult => ({ kind: 'fetchFailed', error: new TransportError(message) })
const unchanged: ChangeResult = { kind: 'unchanged', fingerprint: 'abc' }

function createCycle(results: Array<ChangeResult | Error>, threshold = 3, announcements?: AnnouncementBuilder) {
  const watcher = fakeWatcher(results)
  const notifier = fakeNotifier()
  const cycle = new CheckCycleService({
    watcher,
    notifier,
    announcements,
    failureAlertThreshold: threshold,
    now: () => FIXED_NOW,
  })
  return { cycle, watcher, notifier }
}

describe('CheckCycleService', () => {
  it('announces a new artifact', async () => {
    const { cycle, notifier } = createCycle([{
      kind: 'artifactChanged',
      fingerprint: 'def',
      content: '<a href="http://x/fw2.bin">',
      link: 'http://x/fw2.bin',
      previousLink: 'http://x/fw1.bin',
    }])

    const outcome = await cycle.run('scheduled')

    expect(outcome.status).toBe('completed')
    expect(notifier.send).toHaveBeenCalledTimes(1)
    expect(notifier.send).toHaveBeenCalledWith('New artifact available: http://x/fw2.bin')
  })

  it('announces new artifacts found by manual checks too', async () => {
    const { cycle, notifier } = createCycle([{
      kind: 'artifactChanged',
      fingerprint: 'def',
      content: '',
      link: 'http://x/fw3.bin',
    }])

    await cycle.run('manual')

    expect(notifier.send).toHaveBeenCalledWith('New artifact available: http://x/fw3.bin')
  })

  it('announces through the Discord builder a link that is not a full URL', async () => {
    const { cycle, notifier } = createCycle([{
      kind: 'artifactChanged',
      fingerprint: 'def',
      content: '<a href="http_mirror/fw2.bin">',
      link: 'http_mirror/fw2.bin',
    }], 3, discordAnnouncements)

    const outcome = await cycle.run('scheduled')

    expect(outcome.status).toBe('completed')
    expect(notifier.send).toHaveBeenCalledTimes(1)
    const payload = notifier.send.mock.calls[0]?.[0]
    expect(payload).toMatchObject({
      content: 'New artifact available: http_mirror/fw2.bin',
      embeds: [{ title: 'New artifact available' }],
    })
    expect(payload).not.toHaveProperty('embeds.0.url')
  })

  it('falls back to plain text when a message cannot be built', async () => {
    const failingBuilder: AnnouncementBuilder = {
      ...plainTextAnnouncements,
      artifactChanged: () => {
        throw new Error('embed rejected')
      },
    }
    const { cycle, notifier } = createCycle([{
      kind: 'artifactChanged',
      fingerprint: 'def',
      content: '',
      link: 'http://x/fw2.bin',
    }], 3, failingBuilder)

    const outcome = await cycle.run('scheduled')

    expect(outcome.status).toBe('completed')
    expect(notifier.send).toHaveBeenCalledWith('New artifact available: http://x/fw2.bin')
    expect(cycle.getStatus().lastOutcome).toBe(outcome)
  })

  it.each<ChangeResult>([
    { kind: 'noBaseline', fingerprint: 'abc', artifactLink: 'http://x/fw1.bin' },
    unchanged,
    { kind: 'pageChangedOnly', fingerprint: 'abd', content: '', artifactLink: 'http://x/fw1.bin' },
  ])('does not announce $kind', async (result) => {
    const { cycle, notifier } = createCycle([result])

    await cycle.run('scheduled')

    expect(notifier.send).not.toHaveBeenCalled()
  })

  it('announces a failure streak once when it reaches the threshold', async () => {
    const { cycle, notifier } = createCycle([
      failed('timeout'),
      failed('timeout'),
      failed('HTTP 502'),
      failed('HTTP 502'),
      failed('HTTP 502'),
    ])

    for (let i = 0; i < 5; i += 1) {
      await cycle.run('scheduled')
    }

    expect(notifier.send).toHaveBeenCalledTimes(1)
    expect(notifier.send).toHaveBeenCalledWith(
      `Fetching ${WATCH_URL} failed 3 times in a row: HTTP 502`,
    )
    expect(cycle.getStatus().consecutiveFailures).toBe(5)
  })

  it('stays silent about short failure streaks', async () => {
    const { cycle, notifier } = createCycle([failed('timeout'), failed('timeout'), unchanged])

    await cycle.run('scheduled')
    await cycle.run('scheduled')
    await cycle.run('scheduled')

    expect(notifier.send).not.toHaveBeenCalled()
    expect(cycle.getStatus().consecutiveFailures).toBe(0)
  })

  it('announces recovery after an announced streak and re-arms the alert', async () => {
    const { cycle, notifier } = createCycle([
      failed('timeout'),
      failed('timeout'),
      unchanged,
      failed('timeout'),
      failed('timeout'),
    ], 2)

    for (let i = 0; i < 5; i += 1) {
      await cycle.run('scheduled')
    }

    expect(notifier.send.mock.calls.map(call => call[0])).toEqual([
      `Fetching ${WATCH_URL} failed 2 times in a row: timeout`,
      `Fetching ${WATCH_URL} works again after 2 failed attempts`,
      `Fetching ${WATCH_URL} failed 2 times in a row: timeout`,
    ])
  })

  it('reports unexpected errors as recoverable failures and announces them', async () => {
    const { cycle, notifier } = createCycle([new Error('decoder exploded'), unchanged])

    const outcome = await cycle.run('scheduled')

    expect(outcome).toMatchObject({ status: 'failed', fatal: false, reason: 'scheduled' })
    expect(notifier.send).toHaveBeenCalledWith(
      `Unhandled error while checking ${WATCH_URL}: decoder exploded`,
    )
    expect((await cycle.run('scheduled')).status).toBe('completed')
  })

  it('marks fatal errors', async () => {
    const { cycle, notifier } = createCycle([new InvalidTargetError('::nope::')])

    const outcome = await cycle.run('startup')

    expect(outcome).toMatchObject({ status: 'failed', fatal: true })
    expect(notifier.send).toHaveBeenCalledWith(
      `Fatal error while checking ${WATCH_URL}: Invalid watch target: ::nope::`,
    )
  })

  it('does not post errors from manual checks to the channel', async () => {
    const { cycle, notifier } = createCycle([new Error('oops')])

    const outcome = await cycle.run('manual')

    expect(outcome.status).toBe('failed')
    expect(notifier.send).not.toHaveBeenCalled()
  })

  it('survives a notifier that rejects', async () => {
    const { cycle, notifier } = createCycle([{
      kind: 'artifactChanged',
      fingerprint: 'def',
      content: '',
      link: 'http://x/fw2.bin',
    }])
    notifier.send.mockRejectedValueOnce(new Error('discord down'))

    const outcome = await cycle.run('scheduled')

    expect(outcome.status).toBe('completed')
  })

  it('exposes the last outcome and watcher state in its status', async () => {
    const { cycle } = createCycle([unchanged])

    await cycle.run('scheduled')
    const status = cycle.getStatus()

    expect(status.url).toBe(WATCH_URL)
    expect(status.state.lastArtifactLink).toBe('http://x/fw1.bin')
    expect(status.lastOutcome).toEqual({
      status: 'completed',
      reason: 'scheduled',
      result: unchanged,
      startedAt: FIXED_NOW,
      finishedAt: FIXED_NOW,
    })
  })
})
