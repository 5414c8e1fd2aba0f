import cors from 'cors';
import express from 'express';

import { env } from './config/env.js';
import { errorHandler } from './middleware/errorHandler.js';
import { drawsRouter } from './routes/draws.js';
import { groupsRouter } from './routes/groups.js';

export const app = express();

app.use(
  cors({
    origin: env.WEB_ORIGIN,
    credentials: false,
  }),
);
app.use(express.json({ limit: env.JSON_BODY_LIMIT }));

app.get('/health', (_req, res) => {
  res.json({ ok: true });
});

app.use('/api/groups', groupsRouter);
app.use('/api/draws', drawsRouter);

app.use(errorHandler);
