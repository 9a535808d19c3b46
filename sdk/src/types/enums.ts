export enum DepositKind {
  DEPOSIT_FOR = 0,
  CREATE_LOCK = 1,
  INCREASE_LOCK_AMOUNT = 2,
  INCREASE_UNLOCK_TIME = 3,
}

export enum LockState {
  NO_LOCK = 'no_lock',
  ACTIVE = 'active',
  EXPIRED = 'expired',
}
