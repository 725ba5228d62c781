import { errorMessage } from './logger.js';

/**
 * Why the controller declined to act. A refusal is a precondition, not a fault.
 */
export type RefusalReason =
  | 'unavailable' // placeholder browser, nothing to drive
  | 'out_of_range'
  | 'last_page'
  | 'in_progress'
  | 'invalid_url';

export type Outcome =
  | { status: 'succeeded' }
  | { status: 'refused'; reason: RefusalReason }
  | { status: 'failed'; error: string };

export const succeeded = (): Outcome => ({ status: 'succeeded' });

export const refused = (reason: RefusalReason): Outcome => ({ status: 'refused', reason });

export const failed = (err: unknown): Outcome => ({ status: 'failed', error: errorMessage(err) });

export function isSuccess(outcome: Outcome): boolean {
  return outcome.status === 'succeeded';
}
