import { Router } from 'express';
import { reportService } from '../services';
import { asyncHandler } from './middleware';

const router = Router();

/**
 * @swagger
 * /api/reports/long-trips:
 *   get:
 *     summary: Trips over one hour per driver per month
 *     description: >
 *       Trip length runs from the first "Driver arrived at pickup location"
 *       event to the first "Ride completed" event of each ride.
 *     tags: [Reports]
 *     responses:
 *       200:
 *         description: Rows of month (YYYY-MM), driver (first name and last initial) and count
 */
router.get('/long-trips', asyncHandler(async (_req, res) => {
  const rows = await reportService.longTrips();

  res.json({ success: true, data: rows });
}));

export default router;
