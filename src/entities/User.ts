import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from "typeorm";

@Entity({ name: "users" })
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ unique: true })
  email!: string;

  @Column({ name: "hashed_password", select: false })
  hashedPassword!: string;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;
}
