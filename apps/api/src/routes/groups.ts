import { Router } from 'express';

import { DEFAULT_GROUPS } from '@comidas/shared';

export const groupsRouter = Router();

groupsRouter.get('/', (_req, res) => {
  res.json({ ok: true, data: DEFAULT_GROUPS });
});
