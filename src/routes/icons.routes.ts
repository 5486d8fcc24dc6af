import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { createUpload } from '../config/multer';
import { IconSet } from '../models/icon-image';
import { LAYER_NAMES, LayerName } from '../services/customizer.service';
import { IconDecodeError, IconLoaderService } from '../services/icon-loader.service';
import { ProfileParseError, parseProfile, parseProfileObject } from '../services/profile.service';
import { SessionNotFoundError, SessionService } from '../services/session.service';

export interface IconsRouterOptions {
  sessions: SessionService;
  maxUploadMb: number;
  loader?: IconLoaderService;
}

const ScalesField = z.array(z.number().positive().finite());
const ToggleBody = z.object({ enabled: z.boolean() });
const SizeQuery = z.coerce.number().positive().finite();

function isLayerName(value: string): value is LayerName {
  return LAYER_NAMES.some(name => name === value);
}

/**
 * Answer a failed request. Known errors map to 4xx; everything else is a 500.
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof SessionNotFoundError) {
    res.status(404).json({ error: 'Session not found', sessionId: error.sessionId });
    return;
  }
  if (error instanceof IconDecodeError) {
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof ProfileParseError) {
    res.status(400).json({ error: error.message, issues: error.issues });
    return;
  }

  console.error(`Error ${context}:`, error);
  res.status(500).json({ error: error instanceof Error ? error.message : String(error) });
}

export function createIconsRouter({
  sessions,
  maxUploadMb,
  loader = new IconLoaderService(),
}: IconsRouterOptions): Router {
  const router = Router();
  const upload = createUpload(maxUploadMb);

  /**
   * Create a session from uploaded base icons.
   * Form fields: `icons` (files), optional `scales` (JSON array, one per
   * file), `trim` ("true" to detect content bounds), `profile` (JSON).
   */
  router.post('/sessions', upload.array('icons', 32), async (req: Request, res: Response) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      if (files.length === 0) {
        return res.status(400).json({ error: 'No icons uploaded' });
      }

      let scales: number[] = [];
      if (typeof req.body.scales === 'string' && req.body.scales.length > 0) {
        const parsed = ScalesField.safeParse(JSON.parse(req.body.scales));
        if (!parsed.success || parsed.data.length !== files.length) {
          return res.status(400).json({ error: '"scales" must list one positive number per icon' });
        }
        scales = parsed.data;
      }

      // Parse before decoding so a bad profile costs nothing
      const profile =
        typeof req.body.profile === 'string' && req.body.profile.length > 0
          ? parseProfile(req.body.profile)
          : undefined;

      const trim = req.body.trim === 'true';
      const images = await Promise.all(
        files.map((file, i) => loader.decode(file.buffer, { scale: scales[i], trim }))
      );

      const session = sessions.create(new IconSet(images));
      if (profile) {
        await sessions.run(session.id, customizer => customizer.applyProfile(profile));
      }

      res.status(201).json({
        id: session.id,
        images: images.map(image => ({
          width: image.width,
          height: image.height,
          scale: image.scale,
          logicalSize: image.logicalSize(),
          contentBounds: image.contentBounds,
        })),
      });
    } catch (error) {
      if (error instanceof SyntaxError) {
        return res.status(400).json({ error: `Malformed JSON field: ${error.message}` });
      }
      sendError(res, error, 'creating session');
    }
  });

  router.get('/sessions/:id/profile', async (req: Request, res: Response) => {
    try {
      const profile = await sessions.run(req.params.id, customizer => customizer.exportProfile());
      res.json(profile);
    } catch (error) {
      sendError(res, error, 'exporting profile');
    }
  });

  /**
   * Replace every layer's settings. The body is parsed in full before any
   * layer changes.
   */
  router.put('/sessions/:id/profile', async (req: Request, res: Response) => {
    try {
      const profile = parseProfileObject(req.body);
      const changed = await sessions.run(req.params.id, customizer => customizer.applyProfile(profile));
      res.json({ changed });
    } catch (error) {
      sendError(res, error, 'applying profile');
    }
  });

  router.patch('/sessions/:id/layers/:layer', async (req: Request, res: Response) => {
    try {
      const layerName = req.params.layer;
      if (!isLayerName(layerName)) {
        return res.status(404).json({ error: `Unknown layer "${layerName}"` });
      }

      const body = ToggleBody.safeParse(req.body);
      if (!body.success) {
        return res.status(400).json({ error: 'Body must be { "enabled": boolean }' });
      }

      const result = await sessions.run(req.params.id, customizer => {
        const layer = customizer.layer(layerName);
        const changed = layer.setEnabled(body.data.enabled);
        return { changed, version: layer.version(), active: layer.isActive() };
      });
      res.json(result);
    } catch (error) {
      sendError(res, error, 'toggling layer');
    }
  });

  router.get('/sessions/:id/render', async (req: Request, res: Response) => {
    try {
      const size = SizeQuery.safeParse(req.query.size);
      if (!size.success) {
        return res.status(400).json({ error: '"size" must be a positive finite number' });
      }

      const png = await sessions.run(req.params.id, async customizer => {
        const rendered = await customizer.render(size.data);
        return rendered ? loader.encodePng(rendered) : undefined;
      });
      if (!png) {
        return res.status(404).json({ error: 'Session has no base icons' });
      }

      res.setHeader('Content-Type', 'image/png');
      res.send(png);
    } catch (error) {
      sendError(res, error, 'rendering icon');
    }
  });

  router.get('/sessions/:id/render-all', async (req: Request, res: Response) => {
    try {
      const images = await sessions.run(req.params.id, async customizer => {
        const rendered = await customizer.renderAll();
        return Promise.all(
          rendered.toArray().map(async image => ({
            width: image.width,
            height: image.height,
            scale: image.scale,
            png: (await loader.encodePng(image)).toString('base64'),
          }))
        );
      });
      res.json({ images });
    } catch (error) {
      sendError(res, error, 'rendering icon set');
    }
  });

  router.post('/sessions/:id/cache/clear', async (req: Request, res: Response) => {
    try {
      await sessions.run(req.params.id, customizer => customizer.clearCache());
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'clearing cache');
    }
  });

  router.delete('/sessions/:id', (req: Request, res: Response) => {
    if (!sessions.delete(req.params.id)) {
      return res.status(404).json({ error: 'Session not found', sessionId: req.params.id });
    }
    res.status(204).end();
  });

  return router;
}
