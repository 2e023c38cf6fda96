import type { AbortReason } from '../../types';

export type OrchestratorErrorCode =
  | 'INVALID_PLAN'
  | 'SPEECH_TIMEOUT'
  | 'SCORING_FAILURE'
  | 'CALL_TIMEOUT'
  | 'DEADLINE_EXCEEDED'
  | 'SESSION_ABORTED'
  | 'SESSION_NOT_STARTED';

export class OrchestratorError extends Error {
  constructor(
    readonly code: OrchestratorErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Rejected at start: the plan cannot be run as given. */
export class InvalidPlanError extends OrchestratorError {
  constructor(readonly issues: string[]) {
    super('INVALID_PLAN', `Invalid question plan: ${issues.join('; ')}`);
  }
}

export class SpeechTimeoutError extends OrchestratorError {
  constructor(
    readonly operation: 'synthesize' | 'transcribe',
    readonly timeoutMs: number
  ) {
    super('SPEECH_TIMEOUT', `${operation} did not finish within ${timeoutMs}ms`);
  }
}

export class ScoringFailureError extends OrchestratorError {
  constructor(message: string) {
    super('SCORING_FAILURE', message);
  }
}

/** Abort reason handed to a call's signal when its own timeout fires. */
export class CallTimeoutError extends OrchestratorError {
  constructor(readonly timeoutMs: number) {
    super('CALL_TIMEOUT', `Call exceeded ${timeoutMs}ms`);
  }
}

/** Abort reason for calls cancelled because the global deadline fired. */
export class DeadlineExceededError extends OrchestratorError {
  constructor() {
    super('DEADLINE_EXCEEDED', 'Interview deadline reached');
  }
}

export class SessionAbortedError extends OrchestratorError {
  constructor(readonly reason: AbortReason) {
    super('SESSION_ABORTED', `Session aborted (${reason.code}): ${reason.message}`);
  }
}

export class SessionNotStartedError extends OrchestratorError {
  constructor(sessionId: string) {
    super('SESSION_NOT_STARTED', `Session ${sessionId} must be started before it can run`);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
