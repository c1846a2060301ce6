/**
 * Background supervisor
 *
 * Long-lived owner of detached work: background stage fan-outs and
 * consolidation cycles. Jobs go through a bounded FIFO queue; a full queue
 * rejects instead of growing. A job that throws is logged and counted, and
 * the next job runs as usual.
 */

import { AppError } from '../shared/error.js'
import { ok, err, type Result } from '../shared/result.js'
import { createLogger, logError } from '../shared/logger.js'

const logger = createLogger('supervisor')

export interface BackgroundJob {
  label: string
  run: () => Promise<void>
}

export interface SupervisorOptions {
  capacity: number
  /** Jobs running at once, default 1 */
  concurrency?: number
}

export interface SupervisorInfo {
  queued: number
  running: number
  completed: number
  failed: number
  rejected: number
  capacity: number
  stopped: boolean
}

export class BackgroundSupervisor {
  private readonly queue: BackgroundJob[] = []
  private readonly idleWaiters: Array<() => void> = []
  private readonly capacity: number
  private readonly concurrency: number
  private running = 0
  private completed = 0
  private failed = 0
  private rejected = 0
  private stopped = false

  constructor(options: SupervisorOptions) {
    this.capacity = Math.max(1, Math.floor(options.capacity))
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1))
  }

  submit(label: string, run: () => Promise<void>): Result<void, AppError> {
    if (this.stopped) {
      this.rejected++
      return err(AppError.supervisorStopped(label))
    }
    if (this.queue.length >= this.capacity) {
      this.rejected++
      logger.warn(`Queue full (${this.capacity}), dropping ${label}`)
      return err(AppError.queueFull(this.capacity))
    }

    this.queue.push({ label, run })
    this.pump()
    return ok(undefined)
  }

  private pump(): void {
    while (this.running < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift()
      if (!job) break
      this.running++
      this.execute(job).catch((error: unknown) => {
        logError(logger, 'Supervisor bookkeeping failed', error)
      })
    }
  }

  private async execute(job: BackgroundJob): Promise<void> {
    try {
      await job.run()
      this.completed++
    } catch (error) {
      this.failed++
      logError(logger, `Background job ${job.label} crashed`, error)
    } finally {
      this.running--
      this.pump()
      this.notifyIfIdle()
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return
    for (const resolve of this.idleWaiters.splice(0)) resolve()
  }

  /** Resolves once the queue is empty and nothing is running */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise(resolve => {
      this.idleWaiters.push(resolve)
    })
  }

  /** Stop accepting jobs and wait for the queued ones to finish */
  async stop(): Promise<void> {
    this.stopped = true
    await this.drain()
    logger.debug('Supervisor stopped')
  }

  info(): SupervisorInfo {
    return {
      queued: this.queue.length,
      running: this.running,
      completed: this.completed,
      failed: this.failed,
      rejected: this.rejected,
      capacity: this.capacity,
      stopped: this.stopped,
    }
  }
}
