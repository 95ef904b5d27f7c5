import { Entity, PrimaryGeneratedColumn, Column, Index } from "typeorm";
import { TransactionType } from "../types";

@Entity({ name: "transactions" })
export class Transaction {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column("varchar")
  type!: TransactionType;

  @Index()
  @Column()
  category!: string;

  @Column("float")
  amount!: number;

  // Calendar date, stored and returned as YYYY-MM-DD.
  @Column("date")
  date!: string;
}
