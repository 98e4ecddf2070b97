/**
 * Member Directory Interface
 *
 * Borrowing eligibility, read inside the checkout transaction. Membership
 * records are owned elsewhere; the store keeps a synced copy.
 */

export interface Eligibility {
  active: boolean;
  underLoanLimit: boolean;
}

export interface IMemberDirectory {
  /**
   * Eligibility of a member to take one more loan. Holds the member for the
   * rest of the transaction, so concurrent checkouts by the same member are
   * counted one after the other. Returns null when the member is unknown.
   */
  lockEligibility(userId: string): Promise<Eligibility | null>;
}
