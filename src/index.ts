/**
 * label-sweep Core Library
 *
 * Resumable, rate-limited batch engine for repeated LLM label checks.
 *
 * Design principle: the core reports through callbacks and returns values.
 * Logging, signal handling and exit codes live in the CLI.
 *
 * @license AGPL-3.0
 */

// HTTP helpers
export { BlockedHttpRequestError, type HttpResponse } from './http'
// Service invoker
export {
  classifyApiError,
  createInvoker,
  DEFAULT_MODEL_ID,
  getRequiredApiKeyEnvVar,
  getRpmTable,
  getValidModelIds,
  type InvocationFailure,
  type InvocationRequest,
  type InvocationResult,
  type InvokerConfig,
  type ModelInfo,
  parseVerdictResponse,
  resolveModel,
  type ServiceInvoker,
  type ServiceProvider,
  type VerdictParseResult
} from './invoker/index'
// Log statistics
export {
  formatLogSummary,
  type IncompleteSample,
  type LogSummary,
  summarizeLog
} from './log-stats/index'
// Work plan
export { buildWorkPlan, remainingUnits } from './plan/index'
// Progress scanning
export {
  parseResultRecord,
  type RecordParseResult,
  type ScanOptions,
  type ScanResult,
  type ScanWarning,
  scanProgress
} from './progress/index'
// Request formatting
export {
  createRequestBuilder,
  DEFAULT_TEMPLATE,
  formatRequest,
  loadTemplate,
  TemplateError
} from './prompt/index'
// Rate limiting
export {
  DEFAULT_RPM,
  DEFAULT_SAFETY_FACTOR,
  RateLimiter,
  type RateLimiterConfig,
  type SleepFn
} from './rate-limit/index'
// Orchestrator
export {
  FatalInvocationError,
  formatPassReport,
  type PassOutcome,
  type PassReport,
  type PassResult,
  type PassState,
  type RunPassOptions,
  runPass,
  type UnitCompleteInfo,
  type UnitStartInfo
} from './runner/index'
// Sample loading
export {
  datasetName,
  loadSamplesFromCsv,
  parseSamplesCsv,
  type SampleColumns,
  SampleLoadError
} from './samples/index'
// Types
export type {
  ApiError,
  ApiErrorType,
  FailureKind,
  FailureRecord,
  Result,
  ResultRecord,
  Sample,
  SuccessRecord,
  Verdict,
  WorkUnit
} from './types'
export { FAILURE_KINDS, formatUnit, isRetryEligible, unitKey } from './types'
// Result writer
export {
  JsonlResultWriter,
  PersistenceFailure,
  type ResultWriter,
  serializeRecord
} from './writer/index'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
