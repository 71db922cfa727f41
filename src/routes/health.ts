import { Router } from 'express';
import { log } from '../log';
import type { StateStore } from '../store/types';

export function createHealthRouter(store: StateStore): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const uptimeSeconds = Math.round(process.uptime());
    store
      .ping()
      .then(() => {
        res.status(200).json({ status: 'ok', store: 'ok', uptimeSeconds });
      })
      .catch((error: unknown) => {
        log.warn({ err: error, event: 'health_store_unreachable' }, 'state store unreachable');
        res.status(503).json({ status: 'unavailable', store: 'unreachable', uptimeSeconds });
      });
  });

  return router;
}
