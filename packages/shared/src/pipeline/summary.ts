/**
 * Summary Aggregator
 *
 * Statement-level totals over the persisted transactions. Pure and
 * recomputed on every call. Only rows with processing_completed=true count;
 * placeholder rows for rejected items are left out.
 */

import type { CategoryTotal, StatementSummary, Transaction } from '../types';

function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function summarize(statementId: string, transactions: Transaction[]): StatementSummary {
  const completed = transactions.filter((t) => t.processing_completed);

  let creditCents = 0;
  let debitCents = 0;
  const categoryCents = new Map<string, { count: number; cents: number }>();
  let earliest: string | null = null;
  let latest: string | null = null;

  for (const t of completed) {
    const cents = toCents(t.amount);
    if (cents > 0) creditCents += cents;
    else if (cents < 0) debitCents -= cents;

    const bucket = categoryCents.get(t.category) ?? { count: 0, cents: 0 };
    bucket.count += 1;
    bucket.cents += cents;
    categoryCents.set(t.category, bucket);

    // ISO dates compare lexically
    if (t.transaction_date) {
      if (earliest === null || t.transaction_date < earliest) earliest = t.transaction_date;
      if (latest === null || t.transaction_date > latest) latest = t.transaction_date;
    }
  }

  const categories: Record<string, CategoryTotal> = {};
  for (const [category, bucket] of categoryCents) {
    categories[category] = { count: bucket.count, amount: bucket.cents / 100 };
  }

  const totalCredits = creditCents / 100;
  const totalDebits = debitCents / 100;

  return {
    statement_id: statementId,
    total_transactions: completed.length,
    total_credits: totalCredits,
    total_debits: totalDebits,
    net_amount: totalCredits - totalDebits,
    categories,
    date_range: earliest !== null && latest !== null ? { earliest, latest } : null,
  };
}
