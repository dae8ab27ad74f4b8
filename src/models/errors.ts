import { AiFailureReason } from '../types/models';

/**
 * Raised at startup when required configuration is missing or invalid
 */
export class ConfigMissingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigMissingError';
  }
}

/**
 * Base class for failures of the AI step. Never escapes RiskScorer.analyze.
 */
export class AiAnalysisError extends Error {
  public readonly reason: AiFailureReason;

  constructor(reason: AiFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AiAnalysisError';
    this.reason = reason;
  }
}

export class TransportError extends AiAnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport_error', message, options);
    this.name = 'TransportError';
  }
}

export class MalformedResponseError extends AiAnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('malformed_response', message, options);
    this.name = 'MalformedResponseError';
  }
}

export class IncompleteResponseError extends AiAnalysisError {
  constructor(message: string) {
    super('incomplete_response', message);
    this.name = 'IncompleteResponseError';
  }
}
