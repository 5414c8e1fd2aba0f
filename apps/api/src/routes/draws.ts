import { Router } from 'express';

import { drawInputSchema, textDrawSchema } from '@comidas/shared';

import { runDraw } from '../services/drawService.js';
import { parseSignupMessage } from '../services/messageParser.js';

export const drawsRouter = Router();

drawsRouter.post('/', (req, res, next) => {
  try {
    const payload = drawInputSchema.parse(req.body);
    const outcome = runDraw(payload);

    res.status(201).json({ ok: true, data: outcome });
  } catch (error) {
    next(error);
  }
});

drawsRouter.post('/text', (req, res, next) => {
  try {
    const payload = textDrawSchema.parse(req.body);
    const signup = parseSignupMessage(payload.message);
    const outcome = runDraw({ ...signup, seed: payload.seed });

    res.status(201).json({ ok: true, data: outcome });
  } catch (error) {
    next(error);
  }
});
