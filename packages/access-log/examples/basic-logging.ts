// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic-logging.ts — Demonstrates core AccessLog usage.
 *
 * Shows how to:
 * - Back the log with in-process SQLite (sql.js) and install its table
 * - Record login attempts and gate them with a cooldown
 * - Search with filters and pages
 * - Anonymize a departed user and coarsen origins
 *
 * Run: npx tsx examples/basic-logging.ts
 */

import initSqlJs from 'sql.js';
import {
  AccessLog,
  AccessLogEventEmitter,
  EVENT_COOLDOWN,
  SQLiteStorage,
  SqlJsDatabase,
  generateId,
} from '../src/index.js';

async function main(): Promise<void> {
  const events = new AccessLogEventEmitter();
  events.on(EVENT_COOLDOWN, ({ scope, matchedOn, limited }) => {
    if (limited) console.log(`  cooldown hit on ${scope} (matched on ${matchedOn ?? 'nothing'})`);
  });

  const SQL = await initSqlJs.default();
  const log = new AccessLog({
    storage: new SQLiteStorage({ database: new SqlJsDatabase(new SQL.Database()) }),
    events,
  });
  await log.install();

  console.log('=== Access Log — Basic Logging Example ===\n');

  const alice = generateId().id;
  const attempts = ['203.0.113.7', '203.0.113.7', '203.0.113.7', '2001:db8:1:2::9'];

  console.log('Recording login attempts...');
  for (const remoteOrigin of attempts) {
    const limited = await log.cooldown({ scope: 'login', amount: 2, period: 300, remoteOrigin });
    if (limited) {
      console.log(`  [REFUSED] ${remoteOrigin}`);
      continue;
    }
    const record = await log.create({ scope: 'login', remoteOrigin, subjectId: alice });
    console.log(`  [LOGGED ] ${record.remoteOrigin.address} at ${record.creationDate.toISOString()}`);
  }

  console.log(`\nTotal logins for alice: ${await log.count({ subjectIds: alice })}`);

  console.log('\n--- Newest first, two per page ---');
  const firstPage = await log.search({ scopes: 'login' }, { order: 'desc', pageSize: 2 });
  for (const record of firstPage) {
    console.log(`  ${record.id} ${record.remoteOrigin.address}`);
  }

  console.log('\n--- Anonymizing alice ---');
  const pseudonym = await log.anonymizeId(alice);
  await log.anonymizeOrigins(await log.search({ subjectIds: pseudonym }));
  for (const record of await log.search({ subjectIds: pseudonym })) {
    console.log(`  ${record.subjectId ?? '-'} ${record.remoteOrigin.address}`);
  }

  console.log(`\nScopes in use: ${[...(await log.uniqueScopes())].join(', ')}`);
}

main().catch((error: unknown) => {
  console.error('Error:', error);
  process.exit(1);
});
