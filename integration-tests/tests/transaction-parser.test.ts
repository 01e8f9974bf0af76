/**
 * Transaction Parser Tests
 *
 * Text selection, prompt construction, item normalisation, and the
 * replace-or-keep rule for the statement's transaction set.
 */

import {
  TransactionParser,
  DEBIT_LIKE_TYPES,
  CREDIT_LIKE_TYPES,
  type NewTransaction,
} from '@ledgerline/shared';
import { MemoryRecordStore, ScriptedLanguageModel, modelReply, never, seedDocument } from './fakes';

const STATEMENT_ITEMS = [
  {
    transaction_date: '2024-03-01',
    description: 'PAYROLL ACME CORP',
    amount: 2500,
    transaction_type: 'credit',
    category: 'income',
    confidence: 0.95,
  },
  {
    transaction_date: '03/02/2024',
    description: 'WHOLE FOODS MARKET',
    amount: '$54.20',
    transaction_type: 'debit',
    balance: '2,445.80',
  },
  {
    transaction_date: 'not a date',
    description: 'ATM WITHDRAWAL',
    amount: '(60.00)',
    transaction_type: 'withdrawal',
    reference_number: 4411,
  },
];

function parserFor(
  store: MemoryRecordStore,
  llm: ScriptedLanguageModel,
  overrides: { maxInputChars?: number; requestTimeoutMs?: number } = {}
): TransactionParser {
  return new TransactionParser(store, llm, {
    maxInputChars: overrides.maxInputChars ?? 30000,
    requestTimeoutMs: overrides.requestTimeoutMs ?? 1000,
    defaultConfidence: 0.7,
  });
}

function visionDoc(text: string) {
  return {
    vision_text: text,
    vision_extraction_success: true,
    text_processing_completed: true,
  };
}

describe('TransactionParser', () => {
  let store: MemoryRecordStore;

  beforeEach(() => {
    store = new MemoryRecordStore();
  });

  describe('text selection', () => {
    it('prefers vision text when present', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', {
        layout_text: 'LAYOUT TEXT',
        layout_extraction_success: true,
        ...visionDoc('VISION TEXT'),
      });
      const llm = new ScriptedLanguageModel(modelReply([]));

      await parserFor(store, llm).parseStatement('stmt-1');

      expect(llm.prompts).toHaveLength(1);
      expect(llm.prompts[0].user).toContain('VISION TEXT');
      expect(llm.prompts[0].user).not.toContain('LAYOUT TEXT');
    });

    it('falls back to layout text when vision failed', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', {
        layout_text: 'LAYOUT TEXT',
        layout_extraction_success: true,
        vision_extraction_success: false,
        vision_extraction_error: 'timed out',
        text_processing_completed: true,
      });
      const llm = new ScriptedLanguageModel(modelReply([]));

      await parserFor(store, llm).parseStatement('stmt-1');

      expect(llm.prompts[0].user).toContain('LAYOUT TEXT');
    });

    it('falls back to layout text when vision text is blank', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', {
        layout_text: 'LAYOUT TEXT',
        layout_extraction_success: true,
        ...visionDoc('   '),
      });
      const llm = new ScriptedLanguageModel(modelReply([]));

      await parserFor(store, llm).parseStatement('stmt-1');

      expect(llm.prompts[0].user).toContain('LAYOUT TEXT');
    });

    it('reports NoTextAvailable without calling the model', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', { text_processing_completed: true });
      const llm = new ScriptedLanguageModel(modelReply([]));

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');

      expect(llm.prompts).toHaveLength(0);
      expect(outcome.replaced).toBe(false);
      expect(outcome.documents).toEqual([
        { document_id: 'doc-1', parsed: false, transaction_count: 0, error: 'No extracted text available' },
      ]);
      expect(outcome.processing_error).toBe('doc-1: No extracted text available');
    });

    it('skips documents whose extraction is still running', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('FRESH TEXT'));
      await seedDocument(store, 'doc-2', 'stmt-1', {
        processing_status: 'EXTRACTING',
        vision_text: 'STALE TEXT',
        vision_extraction_success: true,
        text_processing_completed: false,
      });
      const llm = new ScriptedLanguageModel(modelReply([]));

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');

      expect(llm.prompts).toHaveLength(1);
      expect(llm.prompts[0].user).toContain('FRESH TEXT');
      expect(outcome.documents.map((d) => d.document_id)).toEqual(['doc-1']);
    });

    it('truncates long text with a marker', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('ABCDEFGHIJKLMNOP'));
      const llm = new ScriptedLanguageModel(modelReply([]));

      await parserFor(store, llm, { maxInputChars: 10 }).parseStatement('stmt-1');

      expect(llm.prompts[0].user).toContain('ABCDEFGHIJ\n\n[TEXT TRUNCATED]');
      expect(llm.prompts[0].user).not.toContain('ABCDEFGHIJK');
    });
  });

  describe('item normalisation', () => {
    it('normalises dates, amounts, signs, categories and confidence', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const raw = modelReply(STATEMENT_ITEMS, 0.9);
      const llm = new ScriptedLanguageModel(raw);

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');

      expect(outcome.processing_error).toBeNull();
      expect(outcome.transactions).toHaveLength(3);

      const [payroll, grocery, atm] = outcome.transactions;
      expect(payroll).toMatchObject({
        statement_id: 'stmt-1',
        document_id: 'doc-1',
        transaction_date: '2024-03-01',
        description: 'PAYROLL ACME CORP',
        amount: 2500,
        transaction_type: 'credit',
        balance: null,
        category: 'income',
        extraction_source: 'language_model',
        confidence_score: 0.95,
        llm_raw_response: raw,
        processing_completed: true,
        processing_error: null,
      });
      expect(grocery).toMatchObject({
        transaction_date: '2024-03-02',
        amount: -54.2,
        transaction_type: 'debit',
        balance: 2445.8,
        category: 'groceries',
        confidence_score: 0.9,
      });
      expect(atm).toMatchObject({
        transaction_date: null,
        amount: -60,
        transaction_type: 'withdrawal',
        reference_number: '4411',
        category: 'cash',
        processing_completed: true,
      });
    });

    it('uses the default confidence when the model reports none', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const llm = new ScriptedLanguageModel(
        modelReply([{ description: 'COFFEE', amount: -4.5, transaction_type: 'purchase' }])
      );

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');

      expect(outcome.transactions[0].confidence_score).toBe(0.7);
    });

    it('turns invalid items into placeholder rows', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const llm = new ScriptedLanguageModel(
        modelReply([
          { amount: 5 },
          'hello',
          { description: 'MYSTERY', amount: 'twelve' },
          { description: 'REFUND', amount: 12, transaction_type: 'refund' },
        ])
      );

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');
      const rows = outcome.transactions;

      expect(rows).toHaveLength(4);
      expect(rows[0]).toMatchObject({
        description:
          "Failed to process transaction 0: invalid transaction item: /: must have required property 'description'",
        amount: 0,
        category: 'other',
        processing_completed: false,
        processing_error: "invalid transaction item: /: must have required property 'description'",
      });
      expect(rows[1].processing_error).toBe('invalid transaction item: /: must be object');
      expect(rows[2].processing_error).toBe('unparseable amount: "twelve"');
      expect(rows[3]).toMatchObject({ amount: 12, processing_completed: true });
      expect(outcome.documents[0]).toEqual({
        document_id: 'doc-1',
        parsed: true,
        transaction_count: 4,
        error: null,
      });
    });

    it('bounds fields to what the transactions table stores', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const longType = 'x'.repeat(80);
      const llm = new ScriptedLanguageModel(
        modelReply([
          { description: 'WIRE IN', amount: 10, transaction_type: longType },
          { description: 'HUGE', amount: 2e12 },
          { description: 'BIG BALANCE', amount: -5, balance: '9,999,999,999,999.00' },
        ])
      );

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');
      const [wire, huge, bigBalance] = outcome.transactions;

      expect(wire).toMatchObject({ transaction_type: 'x'.repeat(50), processing_completed: true });
      expect(huge).toMatchObject({
        amount: 0,
        processing_completed: false,
        processing_error: 'amount out of range: 2000000000000',
      });
      expect(bigBalance).toMatchObject({ amount: -5, balance: null, processing_completed: true });
      expect(outcome.replaced).toBe(true);
      expect(await store.listTransactions('stmt-1')).toHaveLength(3);
    });

    it('keeps amount signs consistent with type labels', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const llm = new ScriptedLanguageModel(
        modelReply([
          { description: 'A', amount: 10, transaction_type: 'debit' },
          { description: 'B', amount: '-20', transaction_type: 'Deposit' },
          { description: 'C', amount: 30, transaction_type: 'WITHDRAWAL' },
          { description: 'D', amount: -40, transaction_type: 'credit' },
          { description: 'E', amount: 50, transaction_type: 'payment' },
        ])
      );

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');
      const labelled = (rows: NewTransaction[], labels: ReadonlySet<string>) =>
        rows.filter((t) => t.transaction_type !== null && labels.has(t.transaction_type));

      expect(labelled(outcome.transactions, DEBIT_LIKE_TYPES).map((t) => t.amount)).toEqual([
        -10, -30, -50,
      ]);
      expect(labelled(outcome.transactions, CREDIT_LIKE_TYPES).map((t) => t.amount)).toEqual([20, 40]);
    });
  });

  describe('response handling', () => {
    it('extracts the same rows from a fenced, prose-wrapped response', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const bare = modelReply(STATEMENT_ITEMS, 0.9);
      const wrapped = `Sure! Here are the transactions:\n\`\`\`json\n${bare}\n\`\`\`\nHope this helps.`;

      const fromBare = await parserFor(store, new ScriptedLanguageModel(bare)).parseStatement('stmt-1');
      const fromWrapped = await parserFor(store, new ScriptedLanguageModel(wrapped)).parseStatement(
        'stmt-1'
      );

      const strip = (rows: NewTransaction[]) =>
        rows.map(({ id: _id, llm_raw_response: _raw, ...rest }) => rest);
      expect(strip(fromWrapped.transactions)).toEqual(strip(fromBare.transactions));
    });

    it('records an unparseable response without throwing and keeps existing rows', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      await parserFor(store, new ScriptedLanguageModel(modelReply(STATEMENT_ITEMS))).parseStatement(
        'stmt-1'
      );

      const outcome = await parserFor(
        store,
        new ScriptedLanguageModel('Sorry, I cannot read this statement.')
      ).parseStatement('stmt-1');

      expect(outcome.transactions).toEqual([]);
      expect(outcome.replaced).toBe(false);
      expect(outcome.processing_error).toBe(
        'doc-1: Model response contained no transaction list: "Sorry, I cannot read this statement."'
      );
      expect(await store.listTransactions('stmt-1')).toHaveLength(3);
    });

    it('records a model error', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const llm = new ScriptedLanguageModel(new Error('429 rate limited'));

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');

      expect(outcome.documents[0].error).toBe('429 rate limited');
    });

    it('times out a model call that never answers', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const llm = new ScriptedLanguageModel(modelReply([]));
      jest.spyOn(llm, 'complete').mockImplementation(() => never());

      const outcome = await parserFor(store, llm, { requestTimeoutMs: 20 }).parseStatement('stmt-1');

      expect(outcome.documents[0].error).toBe(
        'transaction_extraction model call timed out after 20ms'
      );
    });
  });

  describe('statement replacement', () => {
    it('stores exactly the latest run', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('statement text'));
      const llm = new ScriptedLanguageModel(
        modelReply(STATEMENT_ITEMS),
        modelReply([{ description: 'ONLY ROW', amount: -1, transaction_type: 'fee' }])
      );
      const parser = parserFor(store, llm);

      await parser.parseStatement('stmt-1');
      expect(await store.listTransactions('stmt-1')).toHaveLength(3);

      await parser.parseStatement('stmt-1');
      const stored = await store.listTransactions('stmt-1');
      expect(stored.map((t) => t.description)).toEqual(['ONLY ROW']);
    });

    it('unions rows across documents and reports the ones that failed', async () => {
      await seedDocument(store, 'doc-1', 'stmt-1', visionDoc('FIRST PAGE'));
      await seedDocument(store, 'doc-2', 'stmt-1', visionDoc('SECOND PAGE'));
      await seedDocument(store, 'doc-3', 'stmt-1', { text_processing_completed: true });
      const llm = new ScriptedLanguageModel((prompt) =>
        prompt.user.includes('FIRST PAGE')
          ? modelReply([{ description: 'FIRST', amount: 1 }])
          : modelReply([{ description: 'SECOND', amount: 2 }])
      );

      const outcome = await parserFor(store, llm).parseStatement('stmt-1');

      expect(outcome.replaced).toBe(true);
      expect(outcome.transactions.map((t) => [t.document_id, t.description])).toEqual([
        ['doc-1', 'FIRST'],
        ['doc-2', 'SECOND'],
      ]);
      expect(outcome.processing_error).toBe('doc-3: No extracted text available');
      expect(await store.listTransactions('stmt-1')).toHaveLength(2);
    });

    it('rejects a statement without documents', async () => {
      const llm = new ScriptedLanguageModel(modelReply([]));

      await expect(parserFor(store, llm).parseStatement('nope')).rejects.toMatchObject({
        code: 'not_found',
      });
    });
  });
});
