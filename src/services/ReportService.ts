import { RideRepository } from '../database/repositories';
import { LongTripReportRow } from '../types';

export const LONG_TRIP_MIN_HOURS = 1;

/**
 * Reporting queries over ride events
 */
export class ReportService {
  constructor(private readonly rides: RideRepository) {}

  /**
   * Trips longer than `minimumHours` (pickup arrival to completion), counted
   * per driver per month.
   */
  async longTrips(minimumHours: number = LONG_TRIP_MIN_HOURS): Promise<LongTripReportRow[]> {
    return this.rides.longTripReport(minimumHours);
  }
}
