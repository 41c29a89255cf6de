export { RecordLockService, lockChain, parseLockInput, parseUnlockInput } from './recordLockService.js';
export type { LockAction, LockInput, LockResult, LockStatus, RecordLock, UnlockInput, UnlockResult } from './types.js';
