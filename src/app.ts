import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { AppConfig } from './config/env';
import { createIconsRouter } from './routes/icons.routes';
import { SessionService } from './services/session.service';
import { SvgService } from './services/svg.service';
import {
  BuiltinSymbolResolver,
  ChainSymbolResolver,
  DirectorySymbolResolver,
  SymbolResolver,
} from './services/symbol.service';

export interface AppContext {
  app: Express;
  sessions: SessionService;
}

function createSymbolResolver(config: AppConfig): SymbolResolver {
  const builtin = new BuiltinSymbolResolver();
  if (!config.symbolDir) return builtin;
  return new ChainSymbolResolver([new DirectorySymbolResolver(config.symbolDir), builtin]);
}

/**
 * Build the express app and its session store
 */
export function createApp(config: AppConfig): AppContext {
  const app: Express = express();
  const sessions = new SessionService(config.maxSessions, new SvgService(createSymbolResolver(config)));

  app.use(cors({ origin: config.corsOrigins, methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] }));
  app.use(express.json({ limit: `${config.maxUploadMb}mb` }));
  app.use(express.urlencoded({ extended: true, limit: `${config.maxUploadMb}mb` }));

  app.use('/api/icons', createIconsRouter({ sessions, maxUploadMb: config.maxUploadMb }));

  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', sessions: sessions.count });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    // Handle Multer errors specifically
    if (err instanceof multer.MulterError) {
      console.error(`Upload error on ${req.method} ${req.path}: ${err.code} (field ${err.field ?? 'n/a'})`);
      return res.status(400).json({
        error: 'File upload error',
        message: err.message,
        code: err.code,
        field: err.field,
      });
    }

    // Malformed JSON body
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body', message: err.message });
    }

    console.error('Error occurred:', err);
    res.status(500).json({
      error: 'Internal Server Error',
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return { app, sessions };
}
