import { createPool } from '../src/db/client.js';
import { applyMigrations } from '../src/db/migrations.js';
import { resolveUser } from '../src/services/identityResolver.js';
import { PgSessionStore } from '../src/services/pgSessionStore.js';

type SeedSession = {
  title: string;
  hostDisplayName: string;
  code: string;
};

const seeds: SeedSession[] = [
  { title: 'Introduction to Statistics', hostDisplayName: 'Prof. Rivera', code: 'STAT01' },
  { title: 'Data Structures & Algorithms', hostDisplayName: 'Dr. Okafor', code: 'DSA101' },
  { title: 'Web Development Fundamentals', hostDisplayName: 'Ms. Lindqvist', code: 'WEB101' }
];

const pool = createPool();
const store = new PgSessionStore(pool);

async function main() {
  await applyMigrations(pool);
  const created: string[] = [];
  const skipped: string[] = [];

  for (const seed of seeds) {
    const inserted = await store.transaction(async (tx) => {
      const host = await resolveUser(tx, seed.hostDisplayName);
      const session = await tx.insertSession({ hostUserId: host.id, title: seed.title, code: seed.code });
      if (!session) {
        return false;
      }
      await tx.upsertParticipant({ sessionId: session.id, userId: host.id, role: 'host' });
      return true;
    });
    (inserted ? created : skipped).push(`${seed.code} (${seed.title})`);
  }

  if (created.length > 0) {
    console.log(`作成: ${created.join(', ')}`);
  }
  if (skipped.length > 0) {
    console.log(`既存のためスキップ: ${skipped.join(', ')}`);
  }
}

main()
  .catch((error) => {
    console.error('セッションのシード投入中にエラーが発生しました', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
