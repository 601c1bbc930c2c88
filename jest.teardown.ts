// Global teardown - close the database pool if any suite opened it
export default async function globalTeardown() {
     const { pool } = await import('./services/shared/src/db/client');
     await pool.end();
}
