import { Request, Router } from 'express';
import { z } from 'zod';
import { userService } from '../services';
import { UserOrdering, UserListQuery } from '../database/repositories';
import { UserRole } from '../types';
import { ValidationError } from '../utils/errors';
import { asyncHandler } from './middleware';
import { paginate, parsePageParams } from './pagination';
import { queryString, resourceId } from './queryParams';

const router = Router();

// Validation schema
const createUserSchema = z.object({
  role: z.nativeEnum(UserRole).default(UserRole.RIDER),
  username: z.string().trim().min(1).max(150),
  firstName: z.string().trim().max(100).default(''),
  lastName: z.string().trim().max(100).default(''),
  email: z.string().trim().email(),
  phoneNumber: z.string().trim().max(20).default('')
});

const updateUserSchema = z.object({
  role: z.nativeEnum(UserRole).optional(),
  username: z.string().trim().min(1).max(150).optional(),
  firstName: z.string().trim().max(100).optional(),
  lastName: z.string().trim().max(100).optional(),
  email: z.string().trim().email().optional(),
  phoneNumber: z.string().trim().max(20).optional()
});

const userOrderingSchema = z.enum([
  'id', '-id',
  'username', '-username',
  'firstName', '-firstName',
  'lastName', '-lastName',
  'email', '-email'
]);

function parseRole(raw: string | undefined): UserRole | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const parsed = z.nativeEnum(UserRole).safeParse(raw);
  if (!parsed.success) {
    throw ValidationError.forField('role', `"${raw}" is not a valid role.`);
  }
  return parsed.data;
}

function parseOrdering(raw: string | undefined): UserOrdering {
  const parsed = userOrderingSchema.safeParse(raw);
  return parsed.success ? parsed.data : 'id';
}

function listQuery(req: Request, role?: UserRole): UserListQuery {
  const { limit, offset } = parsePageParams(req.query);
  return {
    role: role ?? parseRole(queryString(req.query.role)),
    email: queryString(req.query.email) || undefined,
    username: queryString(req.query.username) || undefined,
    search: queryString(req.query.search) || undefined,
    ordering: parseOrdering(queryString(req.query.ordering)),
    limit,
    offset
  };
}

/**
 * @swagger
 * /api/users:
 *   get:
 *     summary: List users
 *     tags: [Users]
 *     parameters:
 *       - in: query
 *         name: role
 *         schema:
 *           type: string
 *           enum: [rider, driver, admin]
 *       - in: query
 *         name: email
 *         schema:
 *           type: string
 *       - in: query
 *         name: username
 *         schema:
 *           type: string
 *       - in: query
 *         name: search
 *         description: Matches username, first/last name, email or phone number
 *         schema:
 *           type: string
 *       - in: query
 *         name: ordering
 *         schema:
 *           type: string
 *           default: id
 *     responses:
 *       200:
 *         description: Paginated user list
 */
router.get('/', asyncHandler(async (req, res) => {
  const pageParams = parsePageParams(req.query);
  const page = await userService.listUsers(listQuery(req));

  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/users/riders:
 *   get:
 *     summary: List users with the rider role
 *     tags: [Users]
 *     responses:
 *       200:
 *         description: Paginated user list
 */
router.get('/riders', asyncHandler(async (req, res) => {
  const pageParams = parsePageParams(req.query);
  const page = await userService.listUsers(listQuery(req, UserRole.RIDER));

  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/users/drivers:
 *   get:
 *     summary: List users with the driver role
 *     tags: [Users]
 *     responses:
 *       200:
 *         description: Paginated user list
 */
router.get('/drivers', asyncHandler(async (req, res) => {
  const pageParams = parsePageParams(req.query);
  const page = await userService.listUsers(listQuery(req, UserRole.DRIVER));

  res.json({ success: true, ...paginate(req, pageParams, page.count, page.rows) });
}));

/**
 * @swagger
 * /api/users:
 *   post:
 *     summary: Create a new user
 *     tags: [Users]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required:
 *               - username
 *               - email
 *             properties:
 *               role:
 *                 type: string
 *                 enum: [rider, driver, admin]
 *                 default: rider
 *               username:
 *                 type: string
 *                 example: jdoe
 *               firstName:
 *                 type: string
 *                 example: Jane
 *               lastName:
 *                 type: string
 *                 example: Doe
 *               email:
 *                 type: string
 *                 format: email
 *                 example: jane.doe@example.com
 *               phoneNumber:
 *                 type: string
 *                 example: +15551234567
 *     responses:
 *       201:
 *         description: User created successfully
 *       400:
 *         description: Invalid input
 *       409:
 *         description: Username or email already exists
 */
router.post('/', asyncHandler(async (req, res) => {
  const data = createUserSchema.parse(req.body);
  const user = await userService.createUser(data);

  res.status(201).json({ success: true, data: user });
}));

/**
 * @swagger
 * /api/users/{userId}:
 *   get:
 *     summary: Get user by ID
 *     tags: [Users]
 *     parameters:
 *       - in: path
 *         name: userId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: User details
 *       404:
 *         description: User not found
 */
router.get('/:userId', asyncHandler(async (req, res) => {
  const userId = resourceId(req.params.userId, 'User');
  const user = await userService.getUser(userId);

  res.json({ success: true, data: user });
}));

/**
 * @swagger
 * /api/users/{userId}:
 *   put:
 *     summary: Replace a user
 *     tags: [Users]
 *     parameters:
 *       - in: path
 *         name: userId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: User updated
 *       404:
 *         description: User not found
 *       409:
 *         description: Username or email already exists
 *   patch:
 *     summary: Update some of a user's fields
 *     tags: [Users]
 *     parameters:
 *       - in: path
 *         name: userId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: User updated
 *       404:
 *         description: User not found
 *       409:
 *         description: Username or email already exists
 */
router.put('/:userId', asyncHandler(async (req, res) => {
  const userId = resourceId(req.params.userId, 'User');
  const data = createUserSchema.parse(req.body);
  const user = await userService.updateUser(userId, data);

  res.json({ success: true, data: user });
}));

router.patch('/:userId', asyncHandler(async (req, res) => {
  const userId = resourceId(req.params.userId, 'User');
  const data = updateUserSchema.parse(req.body);
  const user = await userService.updateUser(userId, data);

  res.json({ success: true, data: user });
}));

/**
 * @swagger
 * /api/users/{userId}:
 *   delete:
 *     summary: Delete a user along with their rides
 *     tags: [Users]
 *     parameters:
 *       - in: path
 *         name: userId
 *         required: true
 *         schema:
 *           type: string
 *           format: uuid
 *     responses:
 *       200:
 *         description: User deleted
 *       404:
 *         description: User not found
 */
router.delete('/:userId', asyncHandler(async (req, res) => {
  const userId = resourceId(req.params.userId, 'User');
  await userService.deleteUser(userId);

  res.json({ success: true, message: 'User deleted successfully' });
}));

export default router;
