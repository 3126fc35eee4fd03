export {generator} from './factory';
export type {
  GeneratorBuilder, GeneratorDefinition, GeneratorFactory, ResumableOf
} from './factory';
export type {Resumable, GeneratorStatus} from './machine';
export {START, EXHAUSTED, isExhausted} from './positions';
export type {
  Arm, Arms, Exhausted, LocalsArgs, PositionName, ResumePosition, Resumption, Step
} from './positions';
export type {ExhaustionBehavior, GeneratorOptions} from './options';
export {Scope} from './scope';
export type {Disposable} from './scope';
export {iterate, collect} from './iterate';
export {CleanupRegistry} from './cleanup';
export type {CleanupReason} from './cleanup';
export {GeneratorStats, FactoryStats} from './stats';
export {
  CheckError, GeneratorDisposedError, GeneratorExhaustedError, GeneratorFailedError,
  GeneratorRunningError, InternalError
} from './errors';
