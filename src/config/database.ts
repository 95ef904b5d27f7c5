import "reflect-metadata";
import { DataSource, EntityManager } from "typeorm";
import { User } from "../entities/User";
import { Transaction } from "../entities/Transaction";
import { AppConfig } from "./env.validation";

export interface Session {
  readonly manager: EntityManager;
  release(): Promise<void>;
}

export const IN_MEMORY = ":memory:";

/**
 * SQLite compiled to WebAssembly. A file path is loaded on initialize and
 * written back after every change; `:memory:` keeps the store in process.
 */
export const createDataSource = (config: Pick<AppConfig, "databasePath">): DataSource => {
  const location = config.databasePath === IN_MEMORY ? undefined : config.databasePath;
  return new DataSource({
    type: "sqljs",
    location,
    autoSave: location !== undefined,
    entities: [User, Transaction],
    synchronize: false,
    logging: false,
  });
};

/**
 * Opens the store and creates the users and transactions tables when they
 * are missing. Safe to run against an existing file.
 */
export async function initializeDatabase(dataSource: DataSource): Promise<DataSource> {
  if (!dataSource.isInitialized) {
    await dataSource.initialize();
  }
  await dataSource.synchronize();
  return dataSource;
}

export function openSession(dataSource: DataSource): Session {
  const queryRunner = dataSource.createQueryRunner();
  let released = false;

  return {
    manager: queryRunner.manager,
    async release() {
      if (released) return;
      released = true;
      await queryRunner.release();
    },
  };
}

export async function withSession<T>(
  dataSource: DataSource,
  work: (manager: EntityManager) => Promise<T>
): Promise<T> {
  const session = openSession(dataSource);
  try {
    return await work(session.manager);
  } finally {
    await session.release();
  }
}
