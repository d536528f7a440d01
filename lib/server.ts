import express, { type Request, type Response } from 'express';

import { ProbeError } from './errors';
import { componentLogger } from './logger';
import type { ProbeFamily } from './probes/types';
import { describeFamilies, runFamilies } from './runner';

const serverLogger = componentLogger('server');

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createApp(families: Readonly<Record<string, ProbeFamily>>) {
  const app = express();

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get('/api/families', (_req: Request, res: Response) => {
    res.json(describeFamilies(families));
  });

  app.get('/api/scan', (req: Request, res: Response) => {
    const host = queryString(req.query['host'])?.trim() ?? '';
    if (host.length === 0) {
      res.status(400).json({ error: 'host is required' });
      return;
    }

    const options = {
      family: queryString(req.query['family']),
      probe: queryString(req.query['probe']),
    };

    void runFamilies(families, host, options)
      .then((results) => {
        res.json({ host, results });
      })
      .catch((error: unknown) => {
        if (error instanceof ProbeError && error.code === 'INVALID_PATTERN') {
          res.status(400).json({ error: error.message });
          return;
        }
        serverLogger.error({ err: error, host }, 'Scan failed');
        res.status(500).json({ error: 'scan failed' });
      });
  });

  return app;
}
