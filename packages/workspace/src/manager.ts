import {lstat, mkdir, readdir, rm, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'

import {createNoopLogger, type StructuredLogger} from '@prefab-gateway/logging'

import {WorkspaceError} from './errors'

export type Workspace = {
  requestId: string
  path: string
  openedAt: Date
}

export type SweepResult = {
  removed: string[]
  skipped: number
  failed: number
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/u

const errorCode = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string' ? error.code : ''

/**
 * Owns the per-request directories under one shared root. Each request id maps
 * to exactly one directory; `close` is the fast path and `sweep` reclaims what a
 * crashed or hung request left behind.
 */
export class WorkspaceManager {
  private readonly root: string
  private readonly logger: StructuredLogger
  private readonly now: () => Date
  private readonly openWorkspaces = new Map<string, Workspace>()

  public constructor({root, logger, now}: {root: string; logger?: StructuredLogger; now?: () => Date}) {
    this.root = resolve(root)
    this.logger = logger ?? createNoopLogger()
    this.now = now ?? (() => new Date())
  }

  public isOpen(requestId: string) {
    return this.openWorkspaces.has(requestId)
  }

  public async open(requestId: string): Promise<Workspace> {
    if (!REQUEST_ID_PATTERN.test(requestId)) {
      throw new WorkspaceError({code: 'workspace_id_invalid', message: 'Request id is not usable as a workspace name'})
    }

    const existing = this.openWorkspaces.get(requestId)
    if (existing) {
      return existing
    }

    const path = join(this.root, requestId)
    try {
      await mkdir(this.root, {recursive: true})
      await mkdir(path)
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new WorkspaceError({
          code: 'workspace_exists',
          message: `Workspace for request ${requestId} already exists`,
          cause: error
        })
      }
      throw new WorkspaceError({code: 'workspace_create_failed', message: 'Workspace could not be created', cause: error})
    }

    const workspace: Workspace = {requestId, path, openedAt: this.now()}
    this.openWorkspaces.set(requestId, workspace)
    this.logger.debug({
      event: 'workspace.opened',
      component: 'workspace',
      metadata: {request_id: requestId, path}
    })
    return workspace
  }

  /** Creates the shared root if needed and confirms it is a directory. */
  public async ensureRoot(): Promise<boolean> {
    await mkdir(this.root, {recursive: true})
    return (await stat(this.root)).isDirectory()
  }

  /**
   * Removes the workspace directory. Safe to call more than once. A removal
   * failure is logged and the directory is left to the sweep.
   */
  public async close(workspace: Workspace): Promise<boolean> {
    this.openWorkspaces.delete(workspace.requestId)
    try {
      await rm(workspace.path, {recursive: true, force: true})
    } catch (error) {
      this.logger.error({
        event: 'workspace.close.failed',
        component: 'workspace',
        message: 'Workspace removal failed; the sweep will reclaim it',
        reason_code: errorCode(error) || 'rm_failed',
        metadata: {request_id: workspace.requestId, error}
      })
      return false
    }

    this.logger.debug({
      event: 'workspace.closed',
      component: 'workspace',
      duration_ms: Math.max(0, this.now().getTime() - workspace.openedAt.getTime()),
      metadata: {request_id: workspace.requestId}
    })
    return true
  }

  /**
   * Removes every workspace directory older than `maxAgeMs`. Directories this
   * process still has open are aged by when they were opened rather than by
   * mtime, so a request that hung past the limit is reclaimed as well.
   */
  public async sweep(maxAgeMs: number): Promise<SweepResult> {
    const result: SweepResult = {removed: [], skipped: 0, failed: 0}
    const entries = await this.listRoot()
    const cutoff = this.now().getTime() - maxAgeMs

    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue
      }

      const open = this.openWorkspaces.get(entry.name)
      if (open && open.openedAt.getTime() >= cutoff) {
        result.skipped += 1
        continue
      }

      const path = join(this.root, entry.name)
      try {
        if (!open) {
          const {mtimeMs} = await stat(path)
          if (mtimeMs >= cutoff) {
            result.skipped += 1
            continue
          }
        }

        await rm(path, {recursive: true, force: true})
        result.removed.push(entry.name)
        if (open) {
          this.openWorkspaces.delete(entry.name)
          this.logger.warn({
            event: 'workspace.sweep.reclaimed_open',
            component: 'workspace',
            message: 'Removed a workspace still open past the maximum age',
            duration_ms: this.now().getTime() - open.openedAt.getTime(),
            metadata: {request_id: entry.name}
          })
        }
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          continue
        }
        result.failed += 1
        this.logger.warn({
          event: 'workspace.sweep.remove_failed',
          component: 'workspace',
          reason_code: errorCode(error) || 'rm_failed',
          metadata: {request_id: entry.name, error}
        })
      }
    }

    return result
  }

  /** Total size in bytes of everything under the workspace root. */
  public async diskUsage(): Promise<number> {
    const sizeOf = async (path: string): Promise<number> => {
      const info = await lstat(path)
      if (!info.isDirectory()) {
        return info.size
      }

      const children = await readdir(path)
      const sizes = await Promise.all(children.map(child => sizeOf(join(path, child))))
      return sizes.reduce((total, size) => total + size, 0)
    }

    try {
      return await sizeOf(this.root)
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return 0
      }
      throw error
    }
  }

  private async listRoot() {
    try {
      return await readdir(this.root, {withFileTypes: true})
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return []
      }
      throw error
    }
  }
}
