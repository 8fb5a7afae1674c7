import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db.js";
import { tripMembers, trips } from "../schema.js";
import type { Trip, TripMember } from "../../types/index.js";

export class TripRepo {
  private db: AppDatabase;

  constructor(db: AppDatabase) {
    this.db = db;
  }

  async create(trip: Omit<Trip, "createdAt">): Promise<Trip> {
    const now = new Date();

    this.db.transaction((tx) => {
      tx.insert(trips)
        .values({
          id: trip.id,
          name: trip.name,
          baseCurrency: trip.baseCurrency,
          createdAt: now,
        })
        .run();

      if (trip.members.length > 0) {
        tx.insert(tripMembers)
          .values(
            trip.members.map((member, position) => ({
              id: `${trip.id}_${member.userId}`,
              tripId: trip.id,
              userId: member.userId,
              displayName: member.displayName,
              position,
              joinedAt: now,
            }))
          )
          .run();
      }
    });

    return {
      ...trip,
      members: [...trip.members],
      createdAt: now,
    };
  }

  async findById(id: string): Promise<Trip | null> {
    const trip = await this.db.select().from(trips).where(eq(trips.id, id)).get();

    if (!trip) return null;

    return {
      id: trip.id,
      name: trip.name,
      baseCurrency: trip.baseCurrency,
      members: await this.findMembers(id),
      createdAt: trip.createdAt,
    };
  }

  async findMembers(tripId: string): Promise<TripMember[]> {
    const members = await this.db
      .select({ userId: tripMembers.userId, displayName: tripMembers.displayName })
      .from(tripMembers)
      .where(eq(tripMembers.tripId, tripId))
      .orderBy(asc(tripMembers.position));

    return members;
  }

  // Appended after existing members
  async addMember(tripId: string, member: TripMember): Promise<void> {
    const existing = await this.findMembers(tripId);

    await this.db.insert(tripMembers).values({
      id: `${tripId}_${member.userId}`,
      tripId,
      userId: member.userId,
      displayName: member.displayName,
      position: existing.length,
      joinedAt: new Date(),
    });
  }
}
