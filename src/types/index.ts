export const TRANSACTION_TYPES = ['Income', 'Expense'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const isTransactionType = (value: unknown): value is TransactionType =>
  TRANSACTION_TYPES.some((type) => type === value);

export interface UserOut {
  id: number;
  email: string;
}

export interface TokenOut {
  access_token: string;
  token_type: 'bearer';
}

export interface TokenClaims {
  sub: string;
  iat: number;
  exp: number;
}

export interface CreateTransactionInput {
  type: TransactionType;
  category: string;
  amount: number;
  date: string;
}

export interface TransactionOut extends CreateTransactionInput {
  id: number;
}

export interface TransactionFilter {
  type?: TransactionType;
  category?: string;
  from?: string;
  to?: string;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface MonthlyTotal {
  month: string;
  total: number;
}

export interface TransactionSummary {
  income: number;
  expenses: number;
  savings: number;
  expensesByCategory: CategoryTotal[];
  monthlyExpenses: MonthlyTotal[];
}

export interface StockPriceOut {
  symbol: string;
  price: number;
}
