import { Ride, RideChanges, RideInput, User, UserRole } from '../types';
import { ValidationError, ValidationErrorDetail } from '../utils/errors';

export const COORDINATE_TOLERANCE_DEG = 0.00001;
export const PICKUP_GRACE_MS = 5 * 60 * 1000;

const LATITUDE_FIELDS = ['pickupLatitude', 'dropoffLatitude'] as const;
const LONGITUDE_FIELDS = ['pickupLongitude', 'dropoffLongitude'] as const;

/**
 * Fill every field missing from a change set with the stored value, so the
 * rules always see the ride as it would be after the write.
 */
export function mergeRideChanges(existing: Ride, changes: RideChanges): RideInput {
  return {
    status: changes.status ?? existing.status,
    riderId: changes.riderId ?? existing.riderId,
    driverId: changes.driverId ?? existing.driverId,
    pickupLatitude: changes.pickupLatitude ?? existing.pickupLatitude,
    pickupLongitude: changes.pickupLongitude ?? existing.pickupLongitude,
    dropoffLatitude: changes.dropoffLatitude ?? existing.dropoffLatitude,
    dropoffLongitude: changes.dropoffLongitude ?? existing.dropoffLongitude,
    pickupTime: changes.pickupTime ?? existing.pickupTime
  };
}

export function validateCoordinates(ride: RideInput): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];

  for (const field of LATITUDE_FIELDS) {
    const value = ride[field];
    if (!Number.isFinite(value) || value < -90 || value > 90) {
      errors.push({ field, message: `${field} must be between -90 and 90 degrees.` });
    }
  }
  for (const field of LONGITUDE_FIELDS) {
    const value = ride[field];
    if (!Number.isFinite(value) || value < -180 || value > 180) {
      errors.push({ field, message: `${field} must be between -180 and 180 degrees.` });
    }
  }

  return errors;
}

/** Endpoints within the tolerance on both axes, bound included, count as the same place */
export function validateDistinctEndpoints(ride: RideInput): ValidationErrorDetail[] {
  const sameLatitude = Math.abs(ride.pickupLatitude - ride.dropoffLatitude) <= COORDINATE_TOLERANCE_DEG;
  const sameLongitude = Math.abs(ride.pickupLongitude - ride.dropoffLongitude) <= COORDINATE_TOLERANCE_DEG;

  if (sameLatitude && sameLongitude) {
    return [{ field: 'dropoffLatitude', message: 'Pickup and dropoff locations must be different.' }];
  }
  return [];
}

export function validateParties(
  ride: Pick<RideInput, 'riderId' | 'driverId'>,
  rider: Pick<User, 'id' | 'role'>,
  driver: Pick<User, 'id' | 'role'>
): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];

  if (ride.riderId === ride.driverId) {
    errors.push({ field: 'driverId', message: 'Rider and driver must be different users.' });
  }
  if (rider.role !== UserRole.RIDER) {
    errors.push({ field: 'riderId', message: `User ${rider.id} has role "${rider.role}", expected "rider".` });
  }
  if (driver.role !== UserRole.DRIVER) {
    errors.push({ field: 'driverId', message: `User ${driver.id} has role "${driver.role}", expected "driver".` });
  }

  return errors;
}

export function validatePickupTime(pickupTime: Date, now: Date): ValidationErrorDetail[] {
  if (Number.isNaN(pickupTime.getTime())) {
    return [{ field: 'pickupTime', message: 'pickupTime must be a valid timestamp.' }];
  }
  if (pickupTime.getTime() < now.getTime() - PICKUP_GRACE_MS) {
    return [{ field: 'pickupTime', message: 'pickupTime cannot be more than 5 minutes in the past.' }];
  }
  return [];
}

export interface RideValidationContext {
  rider: Pick<User, 'id' | 'role'>;
  driver: Pick<User, 'id' | 'role'>;
  now: Date;
  /** Whether pickupTime is part of this write */
  checkPickupTime: boolean;
}

/**
 * Run every rule against a fully merged ride and throw one ValidationError
 * listing all violations.
 */
export function assertValidRide(ride: RideInput, context: RideValidationContext): void {
  const coordinateErrors = validateCoordinates(ride);
  const errors: ValidationErrorDetail[] = [
    ...coordinateErrors,
    // Distinctness is only meaningful once all four values are in range
    ...(coordinateErrors.length === 0 ? validateDistinctEndpoints(ride) : []),
    ...validateParties(ride, context.rider, context.driver),
    ...(context.checkPickupTime ? validatePickupTime(ride.pickupTime, context.now) : [])
  ];

  if (errors.length > 0) {
    throw new ValidationError(errors[0].message, errors);
  }
}

export const MAX_EVENT_DESCRIPTION_LENGTH = 255;

/**
 * Trim an event description and check it is non-blank and fits the column.
 * Length is counted in code points, as VARCHAR counts characters.
 */
export function normalizeEventDescription(raw: string): string {
  const description = raw.trim();

  if (description.length === 0) {
    throw ValidationError.forField('description', 'description may not be blank.');
  }
  if ([...description].length > MAX_EVENT_DESCRIPTION_LENGTH) {
    throw ValidationError.forField(
      'description',
      `description must be at most ${MAX_EVENT_DESCRIPTION_LENGTH} characters.`
    );
  }
  return description;
}
