/**
 * Model Response Parser Tests
 */

import { parseModelResponse } from '@ledgerline/shared';

const PAYLOAD = {
  transactions: [
    { transaction_date: '2024-03-01', description: 'PAYROLL ACME', amount: 2500 },
    { transaction_date: '2024-03-02', description: 'GROCERY [STORE #12] {north}', amount: -54.2 },
  ],
  confidence: 0.9,
};
const BARE = JSON.stringify(PAYLOAD);

describe('parseModelResponse', () => {
  it('reads a bare object with a transactions array', () => {
    expect(parseModelResponse(BARE)).toEqual({
      ok: true,
      items: PAYLOAD.transactions,
      confidence: 0.9,
    });
  });

  it('reads a bare array', () => {
    expect(parseModelResponse(JSON.stringify(PAYLOAD.transactions))).toEqual({
      ok: true,
      items: PAYLOAD.transactions,
      confidence: undefined,
    });
  });

  it('gives the same result for fenced and prose-wrapped payloads', () => {
    const fenced = `Here you go:\n\`\`\`json\n${JSON.stringify(PAYLOAD, null, 2)}\n\`\`\`\nAnything else?`;
    const prose = `I found 2 transactions. ${BARE} Let me know if you need more.`;

    expect(parseModelResponse(fenced)).toEqual(parseModelResponse(BARE));
    expect(parseModelResponse(prose)).toEqual(parseModelResponse(BARE));
  });

  it('skips a leading object that carries no transactions', () => {
    const raw = `{"note": "summary"} then [{"description": "FEE", "amount": -5}]`;

    expect(parseModelResponse(raw)).toEqual({
      ok: true,
      items: [{ description: 'FEE', amount: -5 }],
      confidence: undefined,
    });
  });

  it('skips a bracketed list in prose that holds no objects', () => {
    const raw = 'I found transactions on pages [1, 2]:\n[{"description":"COFFEE","amount":-4.5}]';

    expect(parseModelResponse(raw)).toEqual({
      ok: true,
      items: [{ description: 'COFFEE', amount: -4.5 }],
      confidence: undefined,
    });
  });

  it('skips an array that mixes objects with other values', () => {
    const raw = `Notes: [{"page": 1}, "see below"] ${BARE}`;

    expect(parseModelResponse(raw)).toEqual(parseModelResponse(BARE));
  });

  it('fails without throwing when no structure is present', () => {
    expect(parseModelResponse('I could not find any transactions.')).toEqual({
      ok: false,
      error: 'Model response contained no transaction list: "I could not find any transactions."',
    });
  });

  it('fails on an empty response', () => {
    expect(parseModelResponse('   ')).toEqual({ ok: false, error: 'Model response was empty' });
  });

  it('fails on truncated JSON', () => {
    const result = parseModelResponse('{"transactions": [{"description": "A", "amount": 1}');

    expect(result.ok).toBe(false);
  });

  it('fails when transactions is not an array', () => {
    const result = parseModelResponse('{"transactions": "none"}');

    expect(result.ok).toBe(false);
  });
});
