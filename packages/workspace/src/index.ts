export {isWorkspaceError, WorkspaceError, workspaceErrorCodes, type WorkspaceErrorCode} from './errors'
export {WorkspaceManager, type SweepResult, type Workspace} from './manager'
export {createWorkspaceSweeper, type WorkspaceSweeper, type WorkspaceSweeperOptions} from './sweeper'
