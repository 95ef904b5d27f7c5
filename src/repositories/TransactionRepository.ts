import { EntityManager, Repository, SelectQueryBuilder } from "typeorm";
import { Transaction } from "../entities/Transaction";
import { CreateTransactionInput, TransactionFilter } from "../types";

export class TransactionRepository {
  private repository: Repository<Transaction>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(Transaction);
  }

  async create(data: CreateTransactionInput): Promise<Transaction> {
    const transaction = this.repository.create(data);
    return await this.repository.save(transaction);
  }

  async findById(id: number): Promise<Transaction | null> {
    return await this.repository.findOne({ where: { id } });
  }

  async findAll(filter: TransactionFilter = {}): Promise<Transaction[]> {
    return await this.filtered(filter)
      .orderBy("tx.date", "DESC")
      .addOrderBy("tx.id", "DESC")
      .getMany();
  }

  async remove(transaction: Transaction): Promise<void> {
    await this.repository.remove(transaction);
  }

  async count(): Promise<number> {
    return await this.repository.count();
  }

  private filtered(filter: TransactionFilter): SelectQueryBuilder<Transaction> {
    const query = this.repository.createQueryBuilder("tx");
    if (filter.type) query.andWhere("tx.type = :type", { type: filter.type });
    if (filter.category) query.andWhere("tx.category = :category", { category: filter.category });
    if (filter.from) query.andWhere("tx.date >= :from", { from: filter.from });
    if (filter.to) query.andWhere("tx.date <= :to", { to: filter.to });
    return query;
  }
}
