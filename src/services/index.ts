import pool from '../config/database';
import { config } from '../config/environment';
import { PgRideEventRepository } from '../database/PgRideEventRepository';
import { PgRideRepository } from '../database/PgRideRepository';
import { PgUserRepository } from '../database/PgUserRepository';
import { ReportService } from './ReportService';
import { RideEventService } from './RideEventService';
import { RideService } from './RideService';
import { RedisUserCache } from './UserCache';
import { UserService } from './UserService';

// Production wiring: pg-backed repositories over the shared pool
const userRepository = new PgUserRepository(pool);
const rideRepository = new PgRideRepository(pool);
const rideEventRepository = new PgRideEventRepository(pool);

export const userService = new UserService(userRepository, new RedisUserCache());
export const rideService = new RideService(rideRepository, rideEventRepository, userService);
export const rideEventService = new RideEventService(rideEventRepository, config.rides.eventCap);
export const reportService = new ReportService(rideRepository);
