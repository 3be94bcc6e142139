import type { ResultSource } from '../schemas/product.js';

/**
 * Startup-time configuration failure (missing credentials, malformed
 * allowlist, invalid numbers). Never raised while serving a query.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];
  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type SourceFailureReason = 'timeout' | 'error' | 'not_configured' | 'cancelled';

/**
 * One retrieval source could not contribute results. The retriever logs it and
 * carries on with the other source.
 */
export class SourceUnavailableError extends Error {
  readonly source: ResultSource;
  readonly reason: SourceFailureReason;
  readonly code: string;
  constructor(source: ResultSource, reason: SourceFailureReason, code: string, message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
    this.source = source;
    this.reason = reason;
    this.code = code;
  }
}

export type PipelineStage = 'router' | 'planner' | 'retriever' | 'answerer' | 'pipeline';

/**
 * Internal failure of a stage, caught at the pipeline boundary and turned into
 * an apologetic answer with `error` set.
 */
export class TerminalPipelineError extends Error {
  readonly stage: PipelineStage;
  constructor(stage: PipelineStage, cause: unknown) {
    super(`${stage} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'TerminalPipelineError';
    this.stage = stage;
  }
}
