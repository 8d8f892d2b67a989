import { Router } from 'express';
import { DataSource } from 'typeorm';
import { HttpError } from '../errors';

export default function healthRouter(dataSource: DataSource) {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      if (!dataSource.isInitialized) throw new HttpError(503, 'Database not initialized', undefined, 'UNAVAILABLE');
      await dataSource.query('SELECT 1');
      res.json({ status: 'ok' });
    } catch (err) {
      next(err instanceof HttpError ? err : new HttpError(503, 'Database unreachable', err, 'UNAVAILABLE'));
    }
  });

  return router;
}
