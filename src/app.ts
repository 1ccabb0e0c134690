import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import { config } from './config/environment';
import rideRoutes from './api/routes';
import userRoutes from './api/userRoutes';
import rideEventRoutes from './api/rideEventRoutes';
import reportRoutes from './api/reportRoutes';
import { swaggerSpec } from './api/swagger';
import { errorHandler, notFoundHandler, requestLogger } from './api/middleware';

const app = express();

// Middleware
app.use(helmet());
app.use(cors());
app.use(express.json());
app.use(requestLogger);

// Rate limiting (disabled in development)
const limiter = rateLimit({
  windowMs: config.http.rateLimitWindowMs,
  max: config.http.rateLimitMaxRequests,
  message: 'Too many requests from this IP, please try again later',
  skip: () => config.isDevelopment
});

app.use('/api/', limiter);

// Request timeout
app.use((req, _res, next) => {
  req.setTimeout(config.http.requestTimeoutMs);
  next();
});

// API Documentation
app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

// Routes
app.use('/api/users', userRoutes);
app.use('/api/rides', rideRoutes);
app.use('/api/ride-events', rideEventRoutes);
app.use('/api/reports', reportRoutes);

// Health check
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
