export { EvaluationExecutor } from "./evaluation-executor";
export type { EvaluationExecutorOptions } from "./evaluation-executor";
export { PopulationScheduler } from "./population-scheduler";
export type {
  CycleSummary,
  PopulationSchedulerOptions,
} from "./population-scheduler";
export { ProbeFactory, randomInt, randomPayload } from "./probe-factory";
export type { ProbeFactoryOptions } from "./probe-factory";
export * from "./probe.constants";
export { SettleWaiter } from "./settle-waiter";
export type { SettleResult, SettleWaiterOptions } from "./settle-waiter";
