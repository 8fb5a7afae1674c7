import { TripRepo } from "../storage/index.js";
import { NotFoundError, RequestValidationError } from "../errors.js";
import { makeId } from "./ids.js";
import type { Trip, TripMember } from "../types/index.js";

export class TripService {
  private tripRepo: TripRepo;

  constructor(tripRepo: TripRepo) {
    this.tripRepo = tripRepo;
  }

  async createTrip(params: {
    id?: string;
    name: string;
    baseCurrency: string;
    members: TripMember[];
  }): Promise<Trip> {
    const userIds = params.members.map((m) => m.userId);
    const duplicates = userIds.filter((userId, index) => userIds.indexOf(userId) !== index);
    if (duplicates.length > 0) {
      throw new RequestValidationError(duplicates.map((userId) => `Member ${userId} is listed twice`));
    }

    const trip = await this.tripRepo.create({
      id: params.id ?? makeId("trp"),
      name: params.name,
      baseCurrency: params.baseCurrency.toUpperCase(),
      members: params.members,
    });

    console.log(`🧳 Trip created: ${trip.name} (${trip.id}) with ${trip.members.length} members`);
    return trip;
  }

  /** @throws NotFoundError */
  async getTrip(tripId: string): Promise<Trip> {
    const trip = await this.tripRepo.findById(tripId);
    if (!trip) {
      throw new NotFoundError(`Trip ${tripId} not found`);
    }
    return trip;
  }

  async addMember(tripId: string, member: TripMember): Promise<Trip> {
    const trip = await this.getTrip(tripId);
    if (trip.members.some((m) => m.userId === member.userId)) {
      throw new RequestValidationError([`Member ${member.userId} is already on this trip`]);
    }

    await this.tripRepo.addMember(tripId, member);
    return this.getTrip(tripId);
  }
}
