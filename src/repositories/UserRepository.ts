import { EntityManager, Repository } from "typeorm";
import { User } from "../entities/User";

export class UserRepository {
  private repository: Repository<User>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(User);
  }

  async create(userData: Pick<User, "email" | "hashedPassword">): Promise<User> {
    const user = this.repository.create(userData);
    return await this.repository.save(user);
  }

  async findByEmail(email: string): Promise<User | null> {
    return await this.repository.findOne({ where: { email } });
  }

  async findByEmailWithPassword(email: string): Promise<User | null> {
    return await this.repository.findOne({
      where: { email },
      select: ["id", "email", "hashedPassword", "createdAt"],
    });
  }

  async count(): Promise<number> {
    return await this.repository.count();
  }
}
