import { Router } from 'express';
import { z } from 'zod';
import { rideEventService } from '../services';
import { RideEventOrdering } from '../database/repositories';
import { asyncHandler } from './middleware';
import { paginate, parsePageParams } from './pagination';
import { queryString, resourceId, uuidFilter } from './queryParams';

const router = Router();

const createEventSchema = z.object({
  rideId: z.string().uuid(),
  description: z.string().max(1000)
});

const updateEventSchema = z.object({
  description: z.string().max(1000)
});

const EVENT_ORDERINGS: readonly RideEventOrdering[] = ['createdAt', '-createdAt', 'id', '-id'];

function parseOrdering(raw: string | undefined): RideEventOrdering {
  return EVENT_ORDERINGS.find(ordering => ordering === raw) ?? '-createdAt';
}

/**
 * @swagger
 * /api/ride-events:
 *   get:
 *     summary: List ride events
 *     tags: [RideEvents]
 *     parameters:
 *       - in: query
 *         name: rideId
 *         schema:
 *           type: string
 *           format: uuid
 *       - in: query
 *         name: search
 *         description: Case-insensitive substring of the description
 *         schema:
 *           type: string
 *       - in: query
 *         name: ordering
 *         schema:
 *           type: string
 *           enum: [createdAt, -createdAt, id, -id]
 *           default: -createdAt
 *     responses:
 *       200:
 *         description: Paginated event list
 */
router.get('/', asyncHandler(async (req, res) => {
  const pageParams = parsePageParams(req.query);
  const page = await rideEventService.listEvents({
    rideId: uuidFilter(req.query.rideId ?? req.query.ride_id, 'rideId'),
    search: queryString(req.query.search) || undefined,
    ordering: parseOrdering(queryString(req.query.ordering)),
    limit: pageParams.limit,
    offset: pageParams.offset
  });

  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/ride-events:
 *   post:
 *     summary: Record an event against a ride
 *     description: Subject to the same per-ride cap as POST /api/rides/{rideId}/events.
 *     tags: [RideEvents]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [rideId, description]
 *             properties:
 *               rideId:
 *                 type: string
 *                 format: uuid
 *               description:
 *                 type: string
 *                 maxLength: 255
 *     responses:
 *       201:
 *         description: Event created
 *       404:
 *         description: Ride not found
 *       409:
 *         description: Ride already holds the maximum number of events
 */
router.post('/', asyncHandler(async (req, res) => {
  const { rideId, description } = createEventSchema.parse(req.body);
  const event = await rideEventService.addEvent(rideId, description);

  res.status(201).json({ success: true, data: event });
}));

/**
 * @swagger
 * /api/ride-events/{eventId}:
 *   get:
 *     summary: Get a ride event
 *     tags: [RideEvents]
 *     parameters:
 *       - in: path
 *         name: eventId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Event details
 *       404:
 *         description: Event not found
 *   patch:
 *     summary: Change an event's description
 *     tags: [RideEvents]
 *     parameters:
 *       - in: path
 *         name: eventId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Event updated
 *       404:
 *         description: Event not found
 *   delete:
 *     summary: Delete a ride event
 *     tags: [RideEvents]
 *     parameters:
 *       - in: path
 *         name: eventId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Event deleted
 *       404:
 *         description: Event not found
 */
router.get('/:eventId', asyncHandler(async (req, res) => {
  const eventId = resourceId(req.params.eventId, 'Ride event');
  const event = await rideEventService.getEvent(eventId);

  res.json({ success: true, data: event });
}));

router.patch('/:eventId', asyncHandler(async (req, res) => {
  const eventId = resourceId(req.params.eventId, 'Ride event');
  const { description } = updateEventSchema.parse(req.body);
  const event = await rideEventService.updateEvent(eventId, description);

  res.json({ success: true, data: event });
}));

router.delete('/:eventId', asyncHandler(async (req, res) => {
  const eventId = resourceId(req.params.eventId, 'Ride event');
  await rideEventService.deleteEvent(eventId);

  res.json({ success: true, message: 'Ride event deleted successfully' });
}));

export default router;
