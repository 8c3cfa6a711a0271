// Domain: Lending state machine
// AVAILABLE -> BORROWED -> RETURNED -> RETURN_APPROVED (-> AVAILABLE for the next cycle)

import type { Book } from '../book/types.js';
import type { BookTransactionHistory, LendingState } from './types.js';
import { OperationNotPermittedError } from '@/utils/errors.js';

export function lendingStateOf(transaction: BookTransactionHistory | null): LendingState {
  if (!transaction) return 'AVAILABLE';
  if (transaction.returnApproved) return 'RETURN_APPROVED';
  if (transaction.returned) return 'RETURNED';
  return 'BORROWED';
}

/**
 * A transaction blocks a new borrow until the owner approved the return
 */
export function isOpen(transaction: BookTransactionHistory): boolean {
  return !transaction.returnApproved;
}

// ==================== Guards ====================
// Each guard throws the error the caller sees; callers apply them in order.

export function assertLendable(book: Book): void {
  if (book.archived || !book.shareable) {
    throw new OperationNotPermittedError(
      'The requested book cannot be borrowed since it is archived or not shareable'
    );
  }
}

export function assertNotOwner(book: Book, userId: string, message: string): void {
  if (book.ownerId === userId) {
    throw new OperationNotPermittedError(message);
  }
}

export function assertOwner(book: Book, userId: string, message: string): void {
  if (book.ownerId !== userId) {
    throw new OperationNotPermittedError(message);
  }
}

/**
 * Apply a transition to a transaction row, rejecting moves the state machine forbids
 */
export function transition(
  transaction: BookTransactionHistory,
  to: 'RETURNED' | 'RETURN_APPROVED'
): Pick<BookTransactionHistory, 'returned' | 'returnApproved'> {
  const from = lendingStateOf(transaction);

  if (to === 'RETURNED' && from === 'BORROWED') {
    return { returned: true, returnApproved: false };
  }
  if (to === 'RETURN_APPROVED' && from === 'RETURNED') {
    return { returned: true, returnApproved: true };
  }

  throw new OperationNotPermittedError(`Cannot move a transaction from ${from} to ${to}`);
}
