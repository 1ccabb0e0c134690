import { Request, Router } from 'express';
import { z } from 'zod';
import { rideEventService, rideService } from '../services';
import { RideListOptions } from '../algorithms/rideQuery';
import { asyncHandler } from './middleware';
import { paginate, parsePageParams } from './pagination';
import { firstQueryString, queryString, resourceId, uuidFilter } from './queryParams';
import { ValidationError } from '../utils/errors';

const router = Router();

// Validation schemas. Coordinate ranges and the other ride rules are
// checked by the service so their messages name the offending field.
const rideSchema = z.object({
  status: z.string().trim().min(1).max(50),
  riderId: z.string().uuid(),
  driverId: z.string().uuid(),
  pickupLatitude: z.number(),
  pickupLongitude: z.number(),
  dropoffLatitude: z.number(),
  dropoffLongitude: z.number(),
  pickupTime: z.coerce.date()
});

const partialRideSchema = rideSchema.partial();

const addEventSchema = z.object({
  description: z.string().max(1000)
});

function listOptions(req: Request, overrides: Partial<RideListOptions> = {}): RideListOptions {
  const pageParams = parsePageParams(req.query);
  return {
    status: queryString(req.query.status),
    riderEmail: firstQueryString(req.query.riderEmail, req.query.rider_email),
    riderId: uuidFilter(req.query.riderId ?? req.query.rider_id, 'riderId'),
    driverId: uuidFilter(req.query.driverId ?? req.query.driver_id, 'driverId'),
    search: queryString(req.query.search),
    latitude: queryString(req.query.latitude),
    longitude: queryString(req.query.longitude),
    ordering: queryString(req.query.ordering),
    limit: pageParams.limit,
    offset: pageParams.offset,
    ...overrides
  };
}

/**
 * @swagger
 * /api/rides:
 *   get:
 *     summary: List rides with rider/driver details and the last 24 hours of events
 *     tags: [Rides]
 *     parameters:
 *       - in: query
 *         name: status
 *         schema:
 *           type: string
 *       - in: query
 *         name: riderEmail
 *         schema:
 *           type: string
 *       - in: query
 *         name: search
 *         description: Case-insensitive substring of the status
 *         schema:
 *           type: string
 *       - in: query
 *         name: latitude
 *         schema:
 *           type: number
 *       - in: query
 *         name: longitude
 *         schema:
 *           type: number
 *       - in: query
 *         name: ordering
 *         schema:
 *           type: string
 *           enum: [pickupTime, -pickupTime, distance, -distance, id, -id, status, -status]
 *           default: -pickupTime
 *       - in: query
 *         name: page
 *         schema:
 *           type: integer
 *           default: 1
 *       - in: query
 *         name: pageSize
 *         schema:
 *           type: integer
 *           default: 10
 *           maximum: 100
 *     responses:
 *       200:
 *         description: Paginated ride list
 */
router.get('/', asyncHandler(async (req, res) => {
  const pageParams = parsePageParams(req.query);
  const page = await rideService.listRides(listOptions(req));

  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/rides/by-status:
 *   get:
 *     summary: List rides with a given status
 *     tags: [Rides]
 *     parameters:
 *       - in: query
 *         name: status
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Paginated ride list
 *       400:
 *         description: Status parameter missing
 */
router.get('/by-status', asyncHandler(async (req, res) => {
  const status = queryString(req.query.status);
  if (!status) {
    throw ValidationError.forField('status', 'Status parameter is required');
  }

  const pageParams = parsePageParams(req.query);
  const page = await rideService.listRides(listOptions(req, { status }));
  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/rides/rider-rides:
 *   get:
 *     summary: List rides for one rider
 *     tags: [Rides]
 *     parameters:
 *       - in: query
 *         name: riderId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Paginated ride list
 *       400:
 *         description: riderId parameter missing
 */
router.get('/rider-rides', asyncHandler(async (req, res) => {
  const riderId = uuidFilter(req.query.riderId ?? req.query.rider_id, 'riderId');
  if (!riderId) {
    throw ValidationError.forField('riderId', 'riderId parameter is required');
  }

  const pageParams = parsePageParams(req.query);
  const page = await rideService.listRides(listOptions(req, { riderId }));
  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/rides/driver-rides:
 *   get:
 *     summary: List rides for one driver
 *     tags: [Rides]
 *     parameters:
 *       - in: query
 *         name: driverId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Paginated ride list
 *       400:
 *         description: driverId parameter missing
 */
router.get('/driver-rides', asyncHandler(async (req, res) => {
  const driverId = uuidFilter(req.query.driverId ?? req.query.driver_id, 'driverId');
  if (!driverId) {
    throw ValidationError.forField('driverId', 'driverId parameter is required');
  }

  const pageParams = parsePageParams(req.query);
  const page = await rideService.listRides(listOptions(req, { driverId }));
  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/rides:
 *   post:
 *     summary: Create a ride
 *     tags: [Rides]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [status, riderId, driverId, pickupLatitude, pickupLongitude, dropoffLatitude, dropoffLongitude, pickupTime]
 *             properties:
 *               status:
 *                 type: string
 *                 example: requested
 *               riderId:
 *                 type: string
 *                 format: uuid
 *               driverId:
 *                 type: string
 *                 format: uuid
 *               pickupLatitude:
 *                 type: number
 *                 example: 37.7749
 *               pickupLongitude:
 *                 type: number
 *                 example: -122.4194
 *               dropoffLatitude:
 *                 type: number
 *                 example: 37.7849
 *               dropoffLongitude:
 *                 type: number
 *                 example: -122.4094
 *               pickupTime:
 *                 type: string
 *                 format: date-time
 *     responses:
 *       201:
 *         description: Ride created
 *       400:
 *         description: Invalid ride
 *       404:
 *         description: Rider or driver not found
 */
router.post('/', asyncHandler(async (req, res) => {
  const data = rideSchema.parse(req.body);
  const ride = await rideService.createRide(data);

  res.status(201).json({ success: true, data: ride });
}));

/**
 * @swagger
 * /api/rides/{rideId}:
 *   get:
 *     summary: Get a ride with its full event history
 *     tags: [Rides]
 *     parameters:
 *       - in: path
 *         name: rideId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Ride details
 *       404:
 *         description: Ride not found
 */
router.get('/:rideId', asyncHandler(async (req, res) => {
  const rideId = resourceId(req.params.rideId, 'Ride');
  const ride = await rideService.getRide(rideId);

  res.json({ success: true, data: ride });
}));

/**
 * @swagger
 * /api/rides/{rideId}:
 *   put:
 *     summary: Replace a ride
 *     tags: [Rides]
 *     parameters:
 *       - in: path
 *         name: rideId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Ride updated
 *       400:
 *         description: Invalid ride
 *       404:
 *         description: Ride not found
 *   patch:
 *     summary: Partially update a ride
 *     description: Fields not sent keep their stored values; the merged ride is validated.
 *     tags: [Rides]
 *     parameters:
 *       - in: path
 *         name: rideId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Ride updated
 *       400:
 *         description: Invalid ride
 *       404:
 *         description: Ride not found
 */
router.put('/:rideId', asyncHandler(async (req, res) => {
  const rideId = resourceId(req.params.rideId, 'Ride');
  const data = rideSchema.parse(req.body);
  const ride = await rideService.updateRide(rideId, data);

  res.json({ success: true, data: ride });
}));

router.patch('/:rideId', asyncHandler(async (req, res) => {
  const rideId = resourceId(req.params.rideId, 'Ride');
  const data = partialRideSchema.parse(req.body);
  const ride = await rideService.updateRide(rideId, data);

  res.json({ success: true, data: ride });
}));

/**
 * @swagger
 * /api/rides/{rideId}:
 *   delete:
 *     summary: Delete a ride and its events
 *     tags: [Rides]
 *     parameters:
 *       - in: path
 *         name: rideId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: Ride deleted
 *       404:
 *         description: Ride not found
 */
router.delete('/:rideId', asyncHandler(async (req, res) => {
  const rideId = resourceId(req.params.rideId, 'Ride');
  await rideService.deleteRide(rideId);

  res.json({ success: true, message: 'Ride deleted successfully' });
}));

/**
 * @swagger
 * /api/rides/{rideId}/events:
 *   post:
 *     summary: Append an event to a ride
 *     tags: [Rides]
 *     parameters:
 *       - in: path
 *         name: rideId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [description]
 *             properties:
 *               description:
 *                 type: string
 *                 maxLength: 255
 *                 example: Driver arrived at pickup location
 *     responses:
 *       201:
 *         description: Event added
 *       400:
 *         description: Blank or too long description
 *       404:
 *         description: Ride not found
 *       409:
 *         description: Ride already holds the maximum number of events
 */
router.post('/:rideId/events', asyncHandler(async (req, res) => {
  const rideId = resourceId(req.params.rideId, 'Ride');
  const { description } = addEventSchema.parse(req.body);
  const event = await rideEventService.addEvent(rideId, description);

  res.status(201).json({ success: true, data: event });
}));

export default router;
