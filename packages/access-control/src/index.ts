export {createInMemoryAccessControl, createRedisAccessControl} from './access-control'
export {AccessControlError, type AccessControl, type AclSetClient} from './contracts'
