/**
 * SQLite ledger store: globals as one JSON row, checkpoints and principals
 * as one row per account. uint128 amounts are stored as decimal TEXT.
 */

import type Database from 'better-sqlite3';
import { ILedgerStore, LedgerCommit, StoredLedger } from '../interfaces';
import { deserializeLedgerGlobals, serializeLedgerGlobals } from '../ledgerSerializer';
import { CheckpointRow } from '../../checkpointLedger';
import { PrincipalRow } from '../../services/principalBook';

interface GlobalsRecord {
  globals_json: string;
}

interface CheckpointRecord {
  account_id: string;
  accrued_reward: string;
  reward_per_token: string;
  opted_out: number;
}

interface PrincipalRecord {
  account_id: string;
  principal: string;
  distributor_tracked: number;
}

export class SqliteLedgerStore implements ILedgerStore {
  private stmtUpsertGlobals: Database.Statement<[string, string]>;
  private stmtUpsertCheckpoint: Database.Statement<[string, string, string, number, string]>;
  private stmtUpsertPrincipal: Database.Statement<[string, string, number]>;
  private stmtGlobals: Database.Statement<[], GlobalsRecord>;
  private stmtCheckpoints: Database.Statement<[], CheckpointRecord>;
  private stmtPrincipals: Database.Statement<[], PrincipalRecord>;
  private commitTxn: (commit: LedgerCommit, timestamp: string) => void;

  constructor(db: Database.Database) {
    this.stmtUpsertGlobals = db.prepare<[string, string]>(
      `INSERT INTO ledger_globals (id, globals_json, updated_at) VALUES (1, ?, ?)
       ON CONFLICT(id) DO UPDATE SET globals_json = excluded.globals_json, updated_at = excluded.updated_at`
    );

    this.stmtUpsertCheckpoint = db.prepare<[string, string, string, number, string]>(
      `INSERT INTO checkpoints (account_id, accrued_reward, reward_per_token, opted_out, updated_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(account_id) DO UPDATE SET
         accrued_reward = excluded.accrued_reward,
         reward_per_token = excluded.reward_per_token,
         opted_out = excluded.opted_out,
         updated_at = excluded.updated_at`
    );

    this.stmtUpsertPrincipal = db.prepare<[string, string, number]>(
      `INSERT INTO principals (account_id, principal, distributor_tracked) VALUES (?, ?, ?)
       ON CONFLICT(account_id) DO UPDATE SET
         principal = excluded.principal,
         distributor_tracked = excluded.distributor_tracked`
    );

    this.stmtGlobals = db.prepare<[], GlobalsRecord>(
      'SELECT globals_json FROM ledger_globals WHERE id = 1'
    );
    this.stmtCheckpoints = db.prepare<[], CheckpointRecord>(
      'SELECT account_id, accrued_reward, reward_per_token, opted_out FROM checkpoints ORDER BY account_id'
    );
    this.stmtPrincipals = db.prepare<[], PrincipalRecord>(
      'SELECT account_id, principal, distributor_tracked FROM principals ORDER BY account_id'
    );

    // Globals and touched rows land together or not at all
    this.commitTxn = db.transaction((commit: LedgerCommit, timestamp: string) => {
      this.stmtUpsertGlobals.run(serializeLedgerGlobals(commit.globals), timestamp);
      for (const row of commit.checkpoints) {
        this.stmtUpsertCheckpoint.run(
          row.accountId,
          row.accruedReward.toString(),
          row.rewardPerTokenAtCheckpoint.toString(),
          row.optedOut ? 1 : 0,
          timestamp
        );
      }
      for (const row of commit.principals) {
        this.stmtUpsertPrincipal.run(
          row.accountId,
          row.principal.toString(),
          row.distributorTracked ? 1 : 0
        );
      }
    });
  }

  async commit(commit: LedgerCommit): Promise<void> {
    this.commitTxn(commit, new Date().toISOString());
  }

  async load(): Promise<StoredLedger | undefined> {
    const globalsRecord = this.stmtGlobals.get();
    if (!globalsRecord) return undefined;

    const checkpoints: CheckpointRow[] = this.stmtCheckpoints.all().map(r => ({
      accountId: r.account_id,
      accruedReward: BigInt(r.accrued_reward),
      rewardPerTokenAtCheckpoint: BigInt(r.reward_per_token),
      optedOut: r.opted_out === 1,
    }));

    const principals: PrincipalRow[] = this.stmtPrincipals.all().map(r => ({
      accountId: r.account_id,
      principal: BigInt(r.principal),
      distributorTracked: r.distributor_tracked === 1,
    }));

    return {
      globals: deserializeLedgerGlobals(globalsRecord.globals_json),
      checkpoints,
      principals,
    };
  }
}
