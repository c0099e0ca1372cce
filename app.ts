import cors from 'cors';
import express from 'express';
import type { Express } from 'express';
import fs from 'fs';
import type { DataStore } from './db/store';
import { requireTeacher } from './middleware/auth';
import type { TokenOptions } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { activitiesRouter } from './routes/activities';
import { announcementsRouter } from './routes/announcements';
import { authRouter } from './routes/auth';

export interface AppOptions extends TokenOptions {
  /** Clock used for announcement activity windows and timestamps. */
  now?: () => Date;
  /** Directory of the built client page, served when it exists. */
  clientDir?: string;
  corsOrigin?: string;
}

export function createApp(store: DataStore, options: AppOptions): Express {
  const now = options.now ?? (() => new Date());
  const tokens: TokenOptions = { secret: options.secret, ttlSeconds: options.ttlSeconds };
  const teacherOnly = requireTeacher(store.teachers, tokens.secret);

  const app = express();
  app.use(cors(options.corsOrigin ? { origin: options.corsOrigin } : undefined));
  app.use(express.json());

  // --- API ROUTES ---
  app.use('/activities', activitiesRouter(store, teacherOnly));
  app.use('/announcements', announcementsRouter(store, teacherOnly, now));
  app.use('/auth', authRouter(store.teachers, teacherOnly, tokens));

  if (options.clientDir && fs.existsSync(options.clientDir)) {
    app.use(express.static(options.clientDir));
  }

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
