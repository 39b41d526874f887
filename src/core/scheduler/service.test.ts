import { describe, expect, it, vi } from 'vitest'
import { setLogLevel } from '../../utils/logger.js'
import type { CheckReason, CycleOutcome } from '../cycle/types.js'
import { SchedulerService, type ScheduleFn } from './service.js'

setLogLevel('error')

const AT = new Date('2026-05-01T08:00:00Z')

function completed(reason: CheckReason): CycleOutcome {
  return {
    status: 'completed',
    reason,
    result: { kind: 'unchanged', fingerprint: 'abc' },
    startedAt: AT,
    finishedAt: AT,
  }
}

function failed(reason: CheckReason, fatal: boolean): CycleOutcome {
  return {
    status: 'failed',
    reason,
    error: new Error('bad target'),
    fatal,
    startedAt: AT,
    finishedAt: AT,
  }
}

function manualSchedule() {
  const tasks: Array<() => Promise<void>> = []
  const stop = vi.fn()
  const schedule = vi.fn<ScheduleFn>((_expression, task) => {
    tasks.push(task)
    return { stop }
  })
  return { schedule, stop, fire: () => tasks[0]?.() }
}

describe('SchedulerService', () => {
  it('runs a startup check and then registers the cron job', async () => {
    const { schedule } = manualSchedule()
    const runCheck = vi.fn(async (reason: CheckReason) => completed(reason))
    const scheduler = new SchedulerService({
      cronSchedule: '*/3 * * * *',
      timezone: 'Europe/Berlin',
      runCheck,
      schedule,
    })

    await scheduler.start()

    expect(runCheck).toHaveBeenCalledWith('startup')
    expect(schedule).toHaveBeenCalledWith('*/3 * * * *', expect.any(Function), { timezone: 'Europe/Berlin' })
    expect(scheduler.isRunning()).toBe(true)
  })

  it('can skip the startup check', async () => {
    const { schedule, fire } = manualSchedule()
    const runCheck = vi.fn(async (reason: CheckReason) => completed(reason))
    const scheduler = new SchedulerService({
      cronSchedule: '* * * * *',
      timezone: 'UTC',
      startupCheck: false,
      runCheck,
      schedule,
    })

    await scheduler.start()
    expect(runCheck).not.toHaveBeenCalled()

    await fire()
    expect(runCheck).toHaveBeenCalledWith('scheduled')
  })

  it('skips a tick while a check is in flight', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => { release = resolve })
    const runCheck = vi.fn(async (reason: CheckReason) => {
      await gate
      return completed(reason)
    })
    const scheduler = new SchedulerService({
      cronSchedule: '* * * * *',
      timezone: 'UTC',
      startupCheck: false,
      runCheck,
      schedule: manualSchedule().schedule,
    })

    const first = scheduler.tick('scheduled')
    const skipped = await scheduler.tick('manual')
    release()

    expect(skipped).toBeNull()
    expect(await first).toEqual(completed('scheduled'))
    expect(runCheck).toHaveBeenCalledTimes(1)
  })

  it('waits for the running check on stop and ignores later ticks', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => { release = resolve })
    let finished = false
    const { schedule, stop } = manualSchedule()
    const scheduler = new SchedulerService({
      cronSchedule: '* * * * *',
      timezone: 'UTC',
      startupCheck: false,
      runCheck: async (reason) => {
        await gate
        finished = true
        return completed(reason)
      },
      schedule,
    })
    await scheduler.start()

    const running = scheduler.tick('scheduled')
    const stopping = scheduler.stop()
    expect(stop).toHaveBeenCalledTimes(1)
    expect(finished).toBe(false)

    release()
    await stopping
    expect(finished).toBe(true)
    expect((await running)?.status).toBe('completed')
    expect(await scheduler.tick('scheduled')).toBeNull()
    expect(scheduler.isRunning()).toBe(false)
    expect(scheduler.isStopped()).toBe(true)
  })

  it('stops and reports a fatal outcome', async () => {
    const { schedule } = manualSchedule()
    const onFatal = vi.fn()
    const scheduler = new SchedulerService({
      cronSchedule: '* * * * *',
      timezone: 'UTC',
      runCheck: async reason => failed(reason, true),
      onFatal,
      schedule,
    })

    await scheduler.start()

    expect(onFatal).toHaveBeenCalledTimes(1)
    expect(onFatal.mock.calls[0]?.[0]).toMatchObject({ status: 'failed', fatal: true, reason: 'startup' })
    expect(schedule).not.toHaveBeenCalled()
    expect(scheduler.isRunning()).toBe(false)
  })

  it('keeps running after a recoverable failure', async () => {
    const onFatal = vi.fn()
    const scheduler = new SchedulerService({
      cronSchedule: '* * * * *',
      timezone: 'UTC',
      startupCheck: false,
      runCheck: async reason => failed(reason, false),
      onFatal,
      schedule: manualSchedule().schedule,
    })
    await scheduler.start()

    const outcome = await scheduler.tick('scheduled')

    expect(outcome?.status).toBe('failed')
    expect(onFatal).not.toHaveBeenCalled()
    expect(scheduler.isRunning()).toBe(true)
  })
})
