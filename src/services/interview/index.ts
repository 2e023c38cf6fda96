export { InterviewSession } from './InterviewSession';
export type { SessionDeps, SessionIdentity, SessionTimeouts } from './InterviewSession';
export { SessionRegistry } from './SessionRegistry';
export type { LaunchRequest, RegistryDeps, SessionView } from './SessionRegistry';
export { SessionArchive } from './SessionArchive';
export type { SessionSink } from './SessionArchive';
export { QuestionPlan, validatePlanInput } from './QuestionPlan';
export { BudgetAllocator, budgetAllocator } from './BudgetAllocator';
export { FollowUpDecisionEngine, NO_ANSWER, isNoAnswer } from './FollowUpDecisionEngine';
export { SpeechAdapter } from './SpeechAdapter';
export { QuestionGenerator } from './QuestionGenerator';
export { createCoverageScorer, KeywordCoverageScorer, LLMCoverageScorer } from './CoverageScorer';
export { createPlanSource, HttpPlanSource, StaticPlanSource, parsePlanPayload } from './PlanSource';
export { AsyncQueue } from './channel';
export type { AudioInput, CandidateChannel, OutboundEvent } from './channel';
export { ManualClock, SystemClock } from './Clock';
export type { Clock, Timer } from './Clock';
export * from './errors';
