// Domain: Lending types
// One transaction row per borrow cycle; the history is append-only

export interface BookTransactionHistory {
  id: string;
  bookId: string;
  userId: string;                // Borrower
  returned: boolean;
  returnApproved: boolean;
  createdAt: Date;
  createdBy: string;
  lastModifiedAt: Date | null;
  lastModifiedBy: string | null;
}

export type LendingState = 'AVAILABLE' | 'BORROWED' | 'RETURNED' | 'RETURN_APPROVED';
