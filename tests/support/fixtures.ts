import type { ExtractionResult, Transaction } from '../../src/types/output.js';
import { aggregate } from '../../src/output/aggregator.js';

export const createTransaction = (overrides: Partial<Transaction> = {}): Transaction => ({
  date: '2024-03-05',
  description: 'UBER TRIP',
  value: 1500,
  matchedKeyword: 'uber',
  sourceLine: {
    text: '05/03 UBER TRIP 15,00',
    headText: '05/03 UBER TRIP 15,00',
    continuations: [],
    page: 1,
    lineIndex: 0,
  },
  ...overrides,
});

/** Two matched transactions: uber 15,00 and 99 12,50 */
export const createSampleResult = (): ExtractionResult =>
  aggregate(
    [
      createTransaction(),
      createTransaction({
        date: '2024-03-07',
        description: '99 CORRIDA',
        value: 1250,
        matchedKeyword: '99',
        sourceLine: {
          text: '07/03 99 CORRIDA 12,50',
          headText: '07/03 99 CORRIDA 12,50',
          continuations: [],
          page: 2,
          lineIndex: 4,
        },
      }),
    ],
    ['uber', '99']
  );
