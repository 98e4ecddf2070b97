/**
 * Database Seed Script
 *
 * Upserts the copies and members from seed-data.json. Safe to re-run:
 * existing copies keep their circulation status.
 */

import { loadConfig } from '../src/config.js';
import { createPool, transaction } from '../src/db/index.js';
import { loadSeedData } from './seed-data.js';

async function seed(): Promise<void> {
  const pool = createPool(loadConfig().db);
  const data = loadSeedData();

  try {
    await transaction(pool, async client => {
      for (const copy of data.copies) {
        await client.query(`
          INSERT INTO copy (copy_id, book_id)
          VALUES ($1, $2)
          ON CONFLICT (copy_id) DO NOTHING
        `, [copy.copyId, copy.bookId]);
      }
      console.log(`Seeded ${data.copies.length} copies`);

      for (const member of data.members) {
        await client.query(`
          INSERT INTO member (user_id, is_active, loan_limit)
          VALUES ($1, $2, $3)
          ON CONFLICT (user_id) DO UPDATE
            SET is_active = EXCLUDED.is_active, loan_limit = EXCLUDED.loan_limit
        `, [member.userId, member.active, member.loanLimit]);
      }
      console.log(`Seeded ${data.members.length} members`);
    });
  } finally {
    await pool.end();
  }
}

seed().catch(err => {
  console.error('Seed failed:', err);
  process.exit(1);
});
