import 'dotenv/config';
import { existsSync, promises as fs } from 'fs';
import { join } from 'path';
import { pool } from './client';
import { logger } from '../utils/logger';

// Compiled output has no .sql files beside it, so fall back to the source tree.
export function resolveMigrationsDir(): string {
     if (process.env.MIGRATIONS_DIR) {
          return process.env.MIGRATIONS_DIR;
     }
     const local = join(__dirname, 'migrations');
     if (existsSync(local)) {
          return local;
     }
     return join(process.cwd(), 'services', 'shared', 'src', 'db', 'migrations');
}

async function runMigrations() {
     const migrationsDir = resolveMigrationsDir();

     try {
          const files = await fs.readdir(migrationsDir);
          const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

          logger.info({ count: sqlFiles.length, migrationsDir }, 'Running database migrations');

          for (const file of sqlFiles) {
               const filePath = join(migrationsDir, file);
               const sql = await fs.readFile(filePath, 'utf-8');

               logger.info({ file }, 'Executing migration');
               await pool.query(sql);
               logger.info({ file }, 'Migration completed');
          }

          logger.info('All migrations completed successfully');
     } catch (error) {
          logger.error({ error }, 'Migration failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     runMigrations().catch((err) => {
          logger.fatal({ err }, 'Migration error');
          process.exit(1);
     });
}

export { runMigrations };
