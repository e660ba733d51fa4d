export type AccessControl = {
  canRead: (input: {callerId: string; uri: string}) => Promise<boolean>
  /** Idempotent; grants only ever add access. */
  grantOwnership: (input: {callerId: string; uri: string}) => Promise<void>
  listOwned: (input: {callerId: string}) => Promise<string[]>
}

export type AclSetClient = {
  sAdd: (key: string, member: string) => Promise<number>
  sIsMember: (key: string, member: string) => Promise<boolean>
  sMembers: (key: string) => Promise<string[]>
}

export class AccessControlError extends Error {
  public readonly code: 'acl_uri_invalid'

  public constructor(message: string) {
    super(message)
    this.name = 'AccessControlError'
    this.code = 'acl_uri_invalid'
  }
}
