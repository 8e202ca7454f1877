import express from 'express';
import type { Request, Response } from 'express';
import { healthCheckController } from '../controllers/health.controller';

const router = express.Router();

router.get('/', async (req: Request, res: Response) => {
  try {
    const requestId = req.get('X-Request-ID');
    const result = await healthCheckController(requestId);
    res.status(result.statusCode).json(result.body);
  } catch (error) {
    res
      .status(500)
      .json({ ok: false, error: 'internal_error', message: error instanceof Error ? error.message : String(error) });
  }
});

export default router;
