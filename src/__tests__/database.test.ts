import express, { NextFunction, Request, Response } from 'express';
import request from 'supertest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DataSource } from 'typeorm';
import { createDataSource, initializeDatabase, openSession, withSession } from '../config/database';
import { scopedSession, sessionManager } from '../middleware/session.middleware';
import { Transaction } from '../entities/Transaction';
import { createTestDataSource, waitFor } from './helpers/testApp';

describe('persistence layer', () => {
  let dataSource: DataSource;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  const spyOnNextSessionRelease = () => {
    const queryRunner = dataSource.createQueryRunner();
    const release = jest.spyOn(queryRunner, 'release');
    jest.spyOn(dataSource, 'createQueryRunner').mockReturnValueOnce(queryRunner);
    return release;
  };

  it('creates the users and transactions tables idempotently', async () => {
    await initializeDatabase(dataSource);

    const tables = await dataSource.query(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('users', 'transactions') ORDER BY name"
    );
    expect(tables).toEqual([{ name: 'transactions' }, { name: 'users' }]);
  });

  it('releases a session exactly once', async () => {
    const release = spyOnNextSessionRelease();
    const session = openSession(dataSource);

    await session.release();
    await session.release();

    expect(release).toHaveBeenCalledTimes(1);
  });

  it('releases the session when the work fails', async () => {
    const release = spyOnNextSessionRelease();

    await expect(
      withSession(dataSource, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('returns the result of the work', async () => {
    const count = await withSession(dataSource, (manager) => manager.query('SELECT 1 AS one'));
    expect(count).toEqual([{ one: 1 }]);
  });

  it('keeps a file-backed store across restarts', async () => {
    const directory = mkdtempSync(join(tmpdir(), 'ledger-db-'));
    const databasePath = join(directory, 'transactions.db');
    try {
      const first = await initializeDatabase(createDataSource({ databasePath }));
      await first.getRepository(Transaction).save({ type: 'Income', category: 'Salary', amount: 900, date: '2025-01-01' });
      await first.destroy();

      const second = await initializeDatabase(createDataSource({ databasePath }));
      const stored = await second.getRepository(Transaction).find();
      await second.destroy();

      expect(stored.map((tx) => tx.category)).toEqual(['Salary']);
    } finally {
      rmSync(directory, { recursive: true, force: true });
    }
  });

  describe('scopedSession middleware', () => {
    const buildApp = () => {
      const app = express();
      app.use(scopedSession(dataSource));
      app.get('/ok', (req: Request, res: Response) => {
        res.json({ hasManager: req.db !== undefined });
      });
      app.get('/fail', () => {
        throw new Error('handler failed');
      });
      app.use((_err: Error, _req: Request, res: Response, _next: NextFunction) => {
        res.status(500).json({ error: 'failed' });
      });
      return app;
    };

    it('attaches a manager and releases it after the response', async () => {
      const release = spyOnNextSessionRelease();

      const response = await request(buildApp()).get('/ok');

      expect(response.body).toEqual({ hasManager: true });
      await waitFor(() => release.mock.calls.length > 0);
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('refuses to hand out a manager outside a scoped session', async () => {
      const app = express();
      app.get('/unscoped', (req: Request, res: Response) => {
        try {
          sessionManager(req);
          res.json({ ok: true });
        } catch (error) {
          res.status(500).json({ error: error instanceof Error ? error.message : 'unknown' });
        }
      });

      const response = await request(app).get('/unscoped');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'No database session for GET /unscoped' });
    });

    it('releases the session when the handler throws', async () => {
      const release = spyOnNextSessionRelease();

      const response = await request(buildApp()).get('/fail');

      expect(response.status).toBe(500);
      await waitFor(() => release.mock.calls.length > 0);
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(release).toHaveBeenCalledTimes(1);
    });
  });
});
