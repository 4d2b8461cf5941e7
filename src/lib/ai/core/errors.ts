export type AgentErrorCode =
  | 'MATCHING_UNAVAILABLE'
  | 'SECURITY_VIOLATION'
  | 'CONFIGURATION'
  | 'SESSION_NOT_FOUND'
  | 'TURN_CANCELLED'
  | 'TURN_FAILED'
  | 'TIMEOUT';

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    public readonly retryable: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// The oracle gates everything downstream, so the whole turn fails
export class MatchingUnavailableError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'MATCHING_UNAVAILABLE', true, options);
  }
}

// Thrown by tools; never retried
export class SecurityViolationError extends AgentError {
  constructor(message: string) {
    super(message, 'SECURITY_VIOLATION', false);
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super(message, 'CONFIGURATION', false);
  }
}

export class SessionNotFoundError extends AgentError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`, 'SESSION_NOT_FOUND', false);
  }
}

export class TurnCancelledError extends AgentError {
  constructor(turnId: string) {
    super(`Turn ${turnId} was cancelled`, 'TURN_CANCELLED', false);
  }
}

// Anything else that stops a turn, typically a store failure at commit
export class TurnFailedError extends AgentError {
  constructor(turnId: string, options?: { cause?: unknown }) {
    super(`Turn ${turnId} failed`, 'TURN_FAILED', false, options);
  }
}

export class TimeoutError extends AgentError {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`, 'TIMEOUT', true);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
