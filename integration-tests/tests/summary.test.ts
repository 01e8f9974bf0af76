/**
 * Statement Summary Tests
 */

import { summarize, type Transaction } from '@ledgerline/shared';
import { ScriptedLanguageModel, PDF_BYTES, buildPipeline, modelReply } from './fakes';

let sequence = 0;

function row(overrides: Partial<Transaction>): Transaction {
  sequence += 1;
  return {
    id: `txn-${sequence}`,
    statement_id: 'stmt-1',
    document_id: 'doc-1',
    transaction_date: null,
    description: 'ROW',
    amount: 0,
    transaction_type: null,
    balance: null,
    reference_number: null,
    category: 'other',
    extraction_source: 'language_model',
    confidence_score: 0.9,
    llm_raw_response: null,
    processing_completed: true,
    processing_error: null,
    created_at: '2024-03-06T00:00:00.000Z',
    ...overrides,
  };
}

const FIXTURE: Transaction[] = [
  row({ transaction_date: '2024-03-01', amount: 2500, category: 'income' }),
  row({ transaction_date: '2024-03-05', amount: 0.3, category: 'interest' }),
  row({ transaction_date: '2024-02-28', amount: -54.2, category: 'groceries' }),
  row({ amount: -60, category: 'cash' }),
  row({ transaction_date: '2024-03-02', amount: -0.1, category: 'fees' }),
  row({
    transaction_date: '2023-12-31',
    description: 'Failed to process transaction 5: missing description',
    processing_completed: false,
    processing_error: 'missing description',
  }),
];

describe('summarize', () => {
  it('totals completed transactions in whole cents', () => {
    const summary = summarize('stmt-1', FIXTURE);

    expect(summary.statement_id).toBe('stmt-1');
    expect(summary.total_transactions).toBe(5);
    expect(summary.total_credits).toBe(2500.3);
    expect(summary.total_debits).toBe(114.3);
    expect(summary.net_amount).toBe(summary.total_credits - summary.total_debits);
    expect(summary.net_amount).toBeCloseTo(2386, 2);
  });

  it('groups by category with signed amounts', () => {
    const summary = summarize('stmt-1', FIXTURE);

    expect(summary.categories).toEqual({
      income: { count: 1, amount: 2500 },
      interest: { count: 1, amount: 0.3 },
      groceries: { count: 1, amount: -54.2 },
      cash: { count: 1, amount: -60 },
      fees: { count: 1, amount: -0.1 },
    });
  });

  it('reports the date range of dated, completed rows', () => {
    expect(summarize('stmt-1', FIXTURE).date_range).toEqual({
      earliest: '2024-02-28',
      latest: '2024-03-05',
    });
  });

  it('returns zeros for a statement without transactions', () => {
    expect(summarize('stmt-1', [])).toEqual({
      statement_id: 'stmt-1',
      total_transactions: 0,
      total_credits: 0,
      total_debits: 0,
      net_amount: 0,
      categories: {},
      date_range: null,
    });
  });

  it('gives the same result on every call', () => {
    expect(summarize('stmt-1', FIXTURE)).toEqual(summarize('stmt-1', FIXTURE));
  });

  it('reflects deleted transactions through the orchestrator', async () => {
    const { orchestrator } = buildPipeline({
      llm: new ScriptedLanguageModel(
        modelReply([{ transaction_date: '2024-03-01', description: 'PAYROLL ACME', amount: 2500 }])
      ),
    });
    await orchestrator.upload({ bytes: PDF_BYTES, originalFilename: 'march.pdf' }, 'stmt-1', 'user-1');

    expect((await orchestrator.getSummary('stmt-1')).total_credits).toBe(2500);

    await orchestrator.deleteTransactions('stmt-1');

    expect(await orchestrator.getSummary('stmt-1')).toMatchObject({
      total_transactions: 0,
      total_credits: 0,
      total_debits: 0,
      net_amount: 0,
      categories: {},
      date_range: null,
    });
  });
});
