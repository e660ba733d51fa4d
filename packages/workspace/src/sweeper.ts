import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'

import type {SweepResult, WorkspaceManager} from './manager'

export type WorkspaceSweeperOptions = {
  manager: WorkspaceManager
  maxAgeMs: number
  intervalMs: number
  diskWarnBytes?: number
  logger?: StructuredLogger
}

export type WorkspaceSweeper = {
  start: () => void
  stop: () => void
  /** Resolves to null when a run is already in progress. */
  runOnce: () => Promise<SweepResult | null>
}

export const createWorkspaceSweeper = ({
  manager,
  maxAgeMs,
  intervalMs,
  diskWarnBytes,
  logger = createNoopLogger()
}: WorkspaceSweeperOptions): WorkspaceSweeper => {
  let timer: ReturnType<typeof setInterval> | null = null
  let running = false

  const runOnce = async () => {
    if (running) {
      return null
    }

    running = true
    const startedAt = Date.now()
    try {
      const result = await manager.sweep(maxAgeMs)
      logger.info({
        event: 'workspace.sweep.completed',
        component: 'workspace_sweeper',
        duration_ms: Date.now() - startedAt,
        metadata: {removed: result.removed.length, skipped: result.skipped, failed: result.failed}
      })

      if (diskWarnBytes !== undefined) {
        const usedBytes = await manager.diskUsage()
        if (usedBytes > diskWarnBytes) {
          logger.warn({
            event: 'workspace.disk.threshold_exceeded',
            component: 'workspace_sweeper',
            message: 'Workspace root exceeds its disk usage threshold',
            metadata: {used_bytes: usedBytes, threshold_bytes: diskWarnBytes}
          })
        }
      }

      return result
    } finally {
      running = false
    }
  }

  const tick = () => {
    void runOnce().catch((error: unknown) => {
      logger.error({
        event: 'workspace.sweep.failed',
        component: 'workspace_sweeper',
        message: 'Workspace sweep failed',
        metadata: {error}
      })
    })
  }

  return {
    start: () => {
      if (timer) {
        return
      }
      timer = setInterval(tick, intervalMs)
      timer.unref()
    },
    stop: () => {
      if (timer) {
        clearInterval(timer)
        timer = null
      }
    },
    runOnce
  }
}
