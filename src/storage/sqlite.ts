import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';
import type {
  Account,
  AccountId,
  BillingCycle,
  NewAccount,
  NewBillingCycle,
} from '../types/account';
import type { AccountStore, CycleStore, GatewayStores } from './interfaces';
import { DuplicateIdentityError } from '../errors';

const MIGRATIONS = [new URL('../../migrations/0001_init.sql', import.meta.url)];

interface AccountRow {
  id: number;
  email: string;
  password_hash: string;
  created_at: string;
}

interface CycleRow {
  id: number;
  account_id: number;
  cycle_end: string;
  quota_ceiling: number;
  tokens_used: number;
}

function toAccount(row: AccountRow): Account {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: new Date(row.created_at),
  };
}

function toCycle(row: CycleRow): BillingCycle {
  return {
    id: row.id,
    accountId: row.account_id,
    cycleEnd: new Date(row.cycle_end),
    quotaCeiling: row.quota_ceiling,
    tokensUsed: row.tokens_used,
  };
}

/** Opens (or creates) the database file and applies the schema. */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  for (const migration of MIGRATIONS) {
    db.exec(readFileSync(migration, 'utf8'));
  }
  return db;
}

export function createSqliteStores(db: Database.Database): GatewayStores {
  const selectAccountById = db.prepare<[number], AccountRow>(
    'SELECT * FROM accounts WHERE id = ?'
  );
  const selectAccountByEmail = db.prepare<[string], AccountRow>(
    'SELECT * FROM accounts WHERE email = ?'
  );
  const insertAccount = db.prepare<[string, string, string], AccountRow>(
    'INSERT INTO accounts (email, password_hash, created_at) VALUES (?, ?, ?) RETURNING *'
  );
  const selectCycle = db.prepare<[number], CycleRow>(
    'SELECT * FROM billing_cycles WHERE account_id = ?'
  );
  const insertCycle = db.prepare<[number, string, number], CycleRow>(
    `INSERT INTO billing_cycles (account_id, cycle_end, quota_ceiling, tokens_used)
     VALUES (?, ?, ?, 0) RETURNING *`
  );
  const deleteCycle = db.prepare<[number]>('DELETE FROM billing_cycles WHERE account_id = ?');
  // Single statement: SQLite serializes writers, so no increment is lost.
  const incrementCycle = db.prepare<[number, number], CycleRow>(
    `UPDATE billing_cycles SET tokens_used = tokens_used + ?
     WHERE account_id = ? RETURNING *`
  );

  const insertCycleRow = (accountId: AccountId, cycle: NewBillingCycle): CycleRow => {
    const row = insertCycle.get(accountId, cycle.cycleEnd.toISOString(), cycle.quotaCeiling);
    if (!row) throw new Error(`Cycle insert for account ${accountId} returned no row`);
    return row;
  };

  const register = db.transaction((input: NewAccount, cycle: NewBillingCycle) => {
    const accountRow = insertAccount.get(
      input.email.trim().toLowerCase(),
      input.passwordHash,
      input.createdAt.toISOString()
    );
    if (!accountRow) throw new Error('Account insert returned no row');
    const cycleRow = insertCycleRow(accountRow.id, cycle);
    return { account: toAccount(accountRow), cycle: toCycle(cycleRow) };
  });

  const replace = db.transaction((accountId: AccountId, cycle: NewBillingCycle) => {
    deleteCycle.run(accountId);
    return toCycle(insertCycleRow(accountId, cycle));
  });

  const accountStore: AccountStore = {
    async createWithCycle(input, cycle) {
      try {
        return register(input, cycle);
      } catch (err) {
        if (err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE') {
          throw new DuplicateIdentityError();
        }
        throw err;
      }
    },

    async findById(id) {
      const row = selectAccountById.get(id);
      return row ? toAccount(row) : undefined;
    },

    async findByEmail(email) {
      const row = selectAccountByEmail.get(email.trim().toLowerCase());
      return row ? toAccount(row) : undefined;
    },
  };

  const cycleStore: CycleStore = {
    async getCycle(accountId) {
      const row = selectCycle.get(accountId);
      return row ? toCycle(row) : undefined;
    },

    async incrementUsage(accountId, cost) {
      const row = incrementCycle.get(cost, accountId);
      return row ? toCycle(row) : undefined;
    },

    async replaceCycle(accountId, cycle) {
      return replace(accountId, cycle);
    },
  };

  return { accountStore, cycleStore };
}
