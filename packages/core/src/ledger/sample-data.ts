import type { RawReceiptFields } from './ledger-types.js';

/**
 * Fixed demo receipts inserted by the seed operation.
 * Amounts are text on purpose so seeding exercises normalization.
 */
export const SAMPLE_RECEIPTS: readonly RawReceiptFields[] = [
  { date: '2023-01-15', category: '食費', description: 'スーパーマーケット', amount: '3500' },
  { date: '2023-01-20', category: '交通費', description: '電車', amount: '1200' },
  { date: '2023-01-25', category: '食費', description: 'レストラン', amount: '4800' },
  { date: '2023-02-05', category: '日用品', description: 'ドラッグストア', amount: '2600' },
  { date: '2023-02-10', category: '交際費', description: '飲み会', amount: '5000' },
  { date: '2023-02-15', category: '食費', description: 'コンビニ', amount: '800' },
  { date: '2023-03-01', category: '光熱費', description: '電気代', amount: '7200' },
  { date: '2023-03-10', category: '通信費', description: '携帯電話', amount: '8000' },
  { date: '2023-03-15', category: '食費', description: 'スーパーマーケット', amount: '4200' },
];
