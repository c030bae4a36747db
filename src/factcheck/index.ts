// ═══════════════════════════════════════════════════════════════════════════════
// FACT-CHECK MODULE — Questions, Evidence, Verification, Parsing, Judgment
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types.js';

export { QuestionGenerator, parseQuestions, type QuestionGenerationError, type QuestionGeneratorOptions } from './questions.js';
export { EvidenceGatherer, type EvidenceGathererOptions } from './evidence.js';
export { ClaimVerifier, VERIFIER_FAILURE_MESSAGE, type ClaimVerifierOptions } from './verifier.js';
export { buildQuestionPrompt, buildVerificationPrompt, NOT_ENOUGH_CONTEXT, type VerificationPromptOptions } from './prompts.js';
export { parseVerificationResponse, EMPTY_RESPONSE_MESSAGE, type ParseOptions } from './parser/index.js';
export { assembleSources, assessSourceQuality, PLACEHOLDER_SOURCE, type SourceQuality } from './sources.js';
export { judge, averageConfidence, countBuckets, DEFAULT_THRESHOLDS, type JudgeThresholds } from './judge.js';
export {
  ProcessResultSchema,
  AnalysisRecordSchema,
  buildProcessResult,
  notEnoughContextResult,
  errorResult,
  NOT_ENOUGH_CONTEXT_JUDGMENT,
  type ProcessResult,
  type AnalysisRecord,
} from './record.js';
export { FactCheckPipeline, mapConcurrent, type FactCheckPipelineOptions, type FactCheckPipelineDependencies } from './pipeline.js';
