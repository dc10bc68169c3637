import { Router, Request, Response } from 'express';
import { BackdropCategory, BackdropRegistry } from '../services/backdrop-registry.service';

const CATEGORIES: readonly BackdropCategory[] = ['studio', 'showroom', 'garage', 'outdoor', 'custom'];

function isCategory(value: unknown): value is BackdropCategory {
  return typeof value === 'string' && CATEGORIES.some(category => category === value);
}

export function createBackdropRouter(backdrops: BackdropRegistry): Router {
  const router = Router();

  /**
   * List registered backdrops, optionally filtered by ?category=
   */
  router.get('/', (req: Request, res: Response) => {
    const { category } = req.query;

    if (category !== undefined && !isCategory(category)) {
      return res.status(400).json({ error: `Unknown category: ${String(category)}` });
    }

    const list = backdrops.list(category);
    res.json({ backdrops: list, total: list.length });
  });

  router.get('/:id', (req: Request, res: Response) => {
    if (!backdrops.has(req.params.id)) {
      return res.status(404).json({ error: `Backdrop not found: ${req.params.id}` });
    }

    const { image, ...info } = backdrops.get(req.params.id);
    res.json({ ...info, width: image.width, height: image.height });
  });

  return router;
}
