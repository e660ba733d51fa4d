export const workspaceErrorCodes = ['workspace_id_invalid', 'workspace_exists', 'workspace_create_failed'] as const

export type WorkspaceErrorCode = (typeof workspaceErrorCodes)[number]

export class WorkspaceError extends Error {
  public readonly code: WorkspaceErrorCode

  public constructor({code, message, cause}: {code: WorkspaceErrorCode; message: string; cause?: unknown}) {
    super(message, cause === undefined ? undefined : {cause})
    this.name = 'WorkspaceError'
    this.code = code
  }
}

export const isWorkspaceError = (value: unknown): value is WorkspaceError => value instanceof WorkspaceError
