import { normalizeEventDescription } from '../algorithms/validation';
import { RideEventListQuery, RideEventRepository } from '../database/repositories';
import { Page, RideEvent } from '../types';
import { CapacityExceededError, NotFoundError } from '../utils/errors';
import { logWarn } from '../utils/logger';

export class RideEventService {
  constructor(
    private readonly events: RideEventRepository,
    private readonly eventCap: number
  ) {}

  /**
   * Append an event to a ride. The description is checked before touching
   * storage; the existence check, cap check and insert happen atomically.
   */
  async addEvent(rideId: string, rawDescription: string): Promise<RideEvent> {
    const description = normalizeEventDescription(rawDescription);

    const result = await this.events.appendWithinCap(rideId, description, this.eventCap);
    switch (result.status) {
      case 'created':
        return result.event;
      case 'ride-not-found':
        throw new NotFoundError('Ride not found', { rideId });
      case 'cap-reached':
        logWarn('Ride event cap reached', { rideId, count: result.count, cap: this.eventCap });
        throw new CapacityExceededError(this.eventCap);
    }
  }

  async getEvent(eventId: string): Promise<RideEvent> {
    const event = await this.events.findById(eventId);
    if (!event) {
      throw new NotFoundError('Ride event not found', { eventId });
    }
    return event;
  }

  async listEvents(query: RideEventListQuery): Promise<Page<RideEvent>> {
    return this.events.list(query);
  }

  async updateEvent(eventId: string, rawDescription: string): Promise<RideEvent> {
    const description = normalizeEventDescription(rawDescription);

    const event = await this.events.updateDescription(eventId, description);
    if (!event) {
      throw new NotFoundError('Ride event not found', { eventId });
    }
    return event;
  }

  async deleteEvent(eventId: string): Promise<void> {
    const deleted = await this.events.delete(eventId);
    if (!deleted) {
      throw new NotFoundError('Ride event not found', { eventId });
    }
  }
}
