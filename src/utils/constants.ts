export const PARSER_VERSION = '0.1.0';

export const DEFAULT_KEYWORDS = ['uber', '99'] as const;

export const DEFAULT_KEYWORDS_FILE = 'keywords.json';

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 30_000;

/**
 * Statement furniture that never carries a transaction. Compared against the folded
 * (lower-case, accent-free) line text, and only for lines without a date token.
 */
export const BOILERPLATE_MARKERS = [
  'total da fatura',
  'total desta fatura',
  'total de lancamentos',
  'resumo da fatura',
  'saldo anterior',
  'saldo em aberto',
  'pagamento minimo',
  'vencimento',
  'limite de credito',
  'limite disponivel',
  'subtotal',
  'pagina',
  'data descricao valor',
  'previous balance',
  'new balance',
  'minimum payment',
  'payment due',
  'credit limit',
] as const;
