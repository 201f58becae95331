import { CritiqueError, CritiqueErrorCode, isCritiqueError, getErrorMessage } from '@critique/core';
import type { ReviewState } from './types.js';

/**
 * Legal moves of one review. CONTEXT_BUILT → SCORED is the fallback taken
 * when the AI answer cannot be used.
 */
const TRANSITIONS: Record<ReviewState, readonly ReviewState[]> = {
  RECEIVED: ['PRE_ANALYZED', 'FAILED'],
  PRE_ANALYZED: ['SCORED', 'CONTEXT_BUILT', 'FAILED'],
  CONTEXT_BUILT: ['AI_REVIEWED', 'SCORED', 'FAILED'],
  AI_REVIEWED: ['MERGED', 'FAILED'],
  SCORED: ['MERGED', 'FAILED'],
  MERGED: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

/**
 * Thrown by the orchestrator when a review cannot complete.
 */
export class ReviewFailedError extends CritiqueError {
  constructor(
    message: string,
    code: CritiqueErrorCode,
    public readonly failedAt: ReviewState,
    public readonly elapsedMs: number,
    context?: Record<string, unknown>,
  ) {
    super(message, code, { ...context, failedAt, elapsedMs }, false);
    this.name = 'ReviewFailedError';
  }
}

/**
 * State of a single review request. Not shared between requests.
 */
export class ReviewRun {
  private current: ReviewState = 'RECEIVED';
  private readonly visited: ReviewState[] = ['RECEIVED'];
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  get state(): ReviewState {
    return this.current;
  }

  get stages(): readonly ReviewState[] {
    return [...this.visited];
  }

  elapsedMs(): number {
    return this.now() - this.startedAt;
  }

  /**
   * @throws CritiqueError when the move is not allowed from the current state
   */
  transition(to: ReviewState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new CritiqueError(
        `Illegal review transition ${this.current} → ${to}`,
        CritiqueErrorCode.INTERNAL_ERROR,
        { from: this.current, to },
      );
    }
    this.current = to;
    this.visited.push(to);
  }

  /**
   * Move to FAILED and build the error describing where and why.
   */
  fail(error: unknown): ReviewFailedError {
    const failedAt = this.current;
    if (failedAt !== 'FAILED' && failedAt !== 'DONE') this.transition('FAILED');

    const code = isCritiqueError(error) ? error.code : CritiqueErrorCode.INTERNAL_ERROR;
    const context = isCritiqueError(error) ? error.context : undefined;
    return new ReviewFailedError(getErrorMessage(error), code, failedAt, this.elapsedMs(), context);
  }
}
