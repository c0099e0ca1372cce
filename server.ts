import { createApp } from './app';
import { config } from './config';
import { createMysqlStore, createPool } from './db/mysqlStore';
import { initializeDatabase } from './db/seed';

// --- SERVER START ---
async function startServer() {
  try {
    const pool = createPool(config.db);
    await initializeDatabase(pool, config.seedTeacherPassword);

    const app = createApp(createMysqlStore(pool), {
      secret: config.jwtSecret,
      ttlSeconds: config.jwtTtlSeconds,
      clientDir: config.clientDir,
      corsOrigin: config.corsOrigin,
    });
    app.listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`);
    });
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

void startServer();
