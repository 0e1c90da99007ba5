export {
  AccrualEngine,
  earned,
  lastTimeRewardApplicable,
  rewardPerToken,
} from './accrualEngine';
export { Authorization } from './authorization';
export { BalanceLedger } from './balanceLedger';
export { Clock, ManualClock, SystemClock } from './clock';
export { RewardNotification, RewardScheduler, computeRewardRate } from './rewardScheduler';
export { StakeActions, TransferHook, TransferKind, TransferOutcome, classifyTransfer } from './transferHook';
export { ParticipantView, PoolView, TokenDistributor } from './tokenDistributor';
