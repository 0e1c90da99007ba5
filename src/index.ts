export * from './types';
export * from './errors';
export * from './fixedPoint';
export * from './distributor';
export * from './allocation';
export { RewardToken, RewardTokenConfig } from './token/rewardToken';
export * from './persistence';
export { AppConfig, StoreBackend, loadConfig } from './config';
