import { bootstrap } from '../../src/server';
import { itemRoutes } from './items';

// Needs a reachable database, Redis and MinIO, and a .env
// with at least JWT_SECRET. See .env.example.
bootstrap(itemRoutes).catch((error: unknown) => {
  console.error('failed to start', error);
  process.exit(1);
});
