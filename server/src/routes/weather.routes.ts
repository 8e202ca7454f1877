import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import {
  annualTemperatureController,
  currentTemperatureController,
} from '../controllers/weather.controller';
import type { WeatherRequest } from '../controllers/weather.controller';

const router = express.Router();

function toWeatherRequest(req: Request, res: Response): WeatherRequest {
  const request: WeatherRequest = { body: req.body };
  const requestId = res.getHeader('X-Request-ID');
  if (typeof requestId === 'string') request.requestId = requestId;
  return request;
}

router.post('/current-temperature', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await currentTemperatureController(toWeatherRequest(req, res));
    res.status(result.statusCode).json(result.body);
  } catch (error) {
    next(error);
  }
});

router.post('/annual-temperature', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await annualTemperatureController(toWeatherRequest(req, res));
    res.status(result.statusCode).json(result.body);
  } catch (error) {
    next(error);
  }
});

export default router;
