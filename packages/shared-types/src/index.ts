/**
 * @studyforge/shared-types — Public API surface
 */
export type * from "./schema.js";
export {
  RequestValidationError,
  DifficultySchema,
  QuizInputSchema,
  StudyPlanInputSchema,
  CodeInputSchema,
  GenericInputSchema,
  buildQuizRequest,
  buildStudyPlanRequest,
  buildCodeRequest,
  buildGenericRequest,
  buildGenerationRequest,
  MAX_SUBJECT_LENGTH,
  MAX_QUESTION_COUNT,
  MAX_OBJECTIVES,
} from "./requests.js";
export type { QuizRequestInput, StudyPlanRequestInput, CodeRequestInput, GenericRequestInput } from "./requests.js";
export { RETRYABLE_KINDS, REMEDY_BY_KIND, isRetryable, makeErrorInfo } from "./errors.js";
export * from "./fixtures.js";
