import { createPool } from '../db/client.js';
import { applyMigrations } from '../db/migrations.js';
import { buildServer } from './buildServer.js';
import { getServerConfig } from './config.js';
import { createDependencies } from './dependencies.js';

async function main() {
  const config = getServerConfig();
  const pool = createPool();
  try {
    await applyMigrations(pool);
  } catch (error) {
    console.error('データベースマイグレーションの適用に失敗しました', error);
    await pool.end();
    process.exit(1);
    return;
  }
  const dependencies = createDependencies(config, pool);
  const server = await buildServer({ config, dependencies });
  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (error) {
    server.log.error(error, 'サーバーの起動に失敗しました');
    await server.close();
    process.exit(1);
  }
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      server.log.info({ msg: 'shutting down', signal });
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          server.log.error(error, 'シャットダウン中にエラーが発生しました');
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error('サーバーの起動中にエラーが発生しました', error);
  process.exit(1);
});
