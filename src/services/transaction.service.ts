import { TransactionRepository } from '../repositories/TransactionRepository';
import { Transaction } from '../entities/Transaction';
import { NotFoundError } from '../errors/http.errors';
import {
  CreateTransactionInput,
  TransactionFilter,
  TransactionOut,
  TransactionSummary,
} from '../types';

export const toTransactionOut = (transaction: Transaction): TransactionOut => ({
  id: transaction.id,
  type: transaction.type,
  category: transaction.category,
  amount: transaction.amount,
  date: transaction.date,
});

// Float sums drift; totals are reported to the cent.
const roundCents = (value: number): number => Math.round(value * 100) / 100;

export class TransactionService {
  constructor(private readonly transactionRepository: TransactionRepository) {}

  async create(input: CreateTransactionInput): Promise<TransactionOut> {
    const transaction = await this.transactionRepository.create(input);
    return toTransactionOut(transaction);
  }

  async list(filter: TransactionFilter = {}): Promise<TransactionOut[]> {
    const transactions = await this.transactionRepository.findAll(filter);
    return transactions.map(toTransactionOut);
  }

  async delete(id: number): Promise<void> {
    const transaction = await this.transactionRepository.findById(id);
    if (!transaction) {
      throw new NotFoundError('Transaction not found');
    }
    await this.transactionRepository.remove(transaction);
  }

  async count(): Promise<number> {
    return await this.transactionRepository.count();
  }

  /**
   * Income and expense totals over the filtered set, expenses broken down by
   * category (largest first) and by month (oldest first).
   */
  async summary(filter: TransactionFilter = {}): Promise<TransactionSummary> {
    const transactions = await this.transactionRepository.findAll(filter);

    let income = 0;
    let expenses = 0;
    const byCategory = new Map<string, number>();
    const byMonth = new Map<string, number>();

    for (const transaction of transactions) {
      if (transaction.type === 'Income') {
        income += transaction.amount;
        continue;
      }
      expenses += transaction.amount;
      byCategory.set(transaction.category, (byCategory.get(transaction.category) ?? 0) + transaction.amount);
      const month = transaction.date.slice(0, 7);
      byMonth.set(month, (byMonth.get(month) ?? 0) + transaction.amount);
    }

    return {
      income: roundCents(income),
      expenses: roundCents(expenses),
      savings: roundCents(income - expenses),
      expensesByCategory: [...byCategory.entries()]
        .map(([category, total]) => ({ category, total: roundCents(total) }))
        .sort((a, b) => b.total - a.total || a.category.localeCompare(b.category)),
      monthlyExpenses: [...byMonth.entries()]
        .map(([month, total]) => ({ month, total: roundCents(total) }))
        .sort((a, b) => a.month.localeCompare(b.month)),
    };
  }
}
