export { Orchestrator, DEFAULT_QUESTION_TIMEOUT_MS } from './coordinator.js';
export type { OrchestratorConfig, AnswerOptions } from './coordinator.js';
export {
  ConfidenceValidator,
  ValidationRun,
  RELAXATION_STEPS,
  relaxSubQuery,
  aggregateConfidence,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_MAX_RETRIES,
} from './confidence-validator.js';
export type {
  AnswerFn,
  CollaboratorOutage,
  ConfidenceValidatorOptions,
  RelaxationStep,
  SubQueryRecord,
  ValidationOutcome,
} from './confidence-validator.js';
export { createSpecialist, createSpecialists } from './specialist-factory.js';
