export { SequenceStore, deepFreeze } from "./sequence-store.js";
export type { SequenceStoreOptions } from "./sequence-store.js";
export { StateSequenceGenerator, transition } from "./state-generator.js";
export type { StateGeneratorOptions } from "./state-generator.js";
export { TerminationDetector } from "./termination.js";
export type { PublishedTip, TerminalVerdict } from "./termination.js";
export {
  IdentityGuard,
  MemoizedResponder,
  identityKey,
  responseCacheKey,
  sameIdentity,
} from "./identity.js";
export type { ResponseCacheStats } from "./identity.js";
export {
  LiveResponseProvider,
  PolicyResponseProvider,
  ScriptedResponseProvider,
  latestFrame,
} from "./responders.js";
export type {
  LiveOutputConfig,
  LiveResponderConfig,
  ResponsePolicy,
  Script,
  ScriptedResponderOptions,
} from "./responders.js";
export { Scheduler, advance } from "./scheduler.js";
export type {
  AdvanceRequest,
  AdvanceResult,
  PublishedPrefix,
  SchedulerConfig,
  TickObserver,
  TickRecord,
} from "./scheduler.js";
export { Kernel, GameSession, outcomeOf, readSessionSeed } from "./kernel.js";
export type {
  CreateSessionOptions,
  KernelConfig,
  SessionHandle,
  SessionOutcome,
  SessionSeed,
} from "./kernel.js";
export { ConsoleLogger, isLogLevel } from "./logger.js";
