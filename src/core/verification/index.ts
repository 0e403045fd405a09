export {
  executeStrategy,
  DEFAULT_VERIFICATION_TIMEOUT_MS,
  type VerificationTarget,
  type VerificationStrategy,
  type VerificationOutcome,
  type FailedOutcome,
} from './strategy.js';

export {
  RunningStrategy,
  SystemServiceStrategy,
  HealthEndpointStrategy,
  ComponentRegisteredStrategy,
  ComponentInitializedStrategy,
  ComponentDisposedStrategy,
  ComponentMetadataStrategy,
  SYSTEM_HEALTH_PATH,
  COMPONENTS_PATH,
} from './strategies.js';

export { Verifier, assertPassed, type VerificationReport, type VerifierOptions } from './verifier.js';
export { SystemVerifier, type TargetVerifierOptions } from './system.js';
export { ComponentVerifier } from './component.js';
export {
  ShutdownOperation,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  type StoppableTarget,
  type ShutdownOperationOptions,
} from './operations.js';
export type { ComponentList, ComponentMetadata } from './schemas.js';
