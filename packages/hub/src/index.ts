export {
  VerdictCache,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_CACHE_MAX_SIZE,
  type CacheEntry,
  type CacheStats,
  type VerdictCacheOptions,
} from './verdict-cache.js';
export { VmRegistry, UnknownVmError } from './vm-registry.js';
export {
  AttestationService,
  type AttestationServiceDeps,
  type AttestOptions,
  type AttestationOutcome,
} from './attestation-service.js';
export {
  DualAttestationCoordinator,
  type DualCoordinatorOptions,
  type AttestRequest,
  type BatchAttestRequest,
} from './dual-coordinator.js';
export { PipelineError, toErrorSlot } from './pipeline-error.js';
export { summarizeHealth, type ServiceHealth, type HealthInput } from './service-health.js';
