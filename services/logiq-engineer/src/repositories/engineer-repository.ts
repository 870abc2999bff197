import { eq, sql } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import { engineers } from '../db/schema.js';
import type { Engineer, EngineerProfileUpdate } from '../types/index.js';

export interface EngineerRepository {
  findById(engineerId: string): Promise<Engineer | null>;
  findByEmail(email: string): Promise<Engineer | null>;
  listAvailable(): Promise<Engineer[]>;
  update(engineerId: string, changes: EngineerProfileUpdate): Promise<Engineer | null>;
  adjustActiveTickets(engineerId: string, delta: number): Promise<void>;
}

export class DrizzleEngineerRepository implements EngineerRepository {
  constructor(private readonly db: Database) {}

  async findById(engineerId: string): Promise<Engineer | null> {
    const rows = await this.db.select().from(engineers).where(eq(engineers.engineerId, engineerId)).limit(1);
    return rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<Engineer | null> {
    const rows = await this.db
      .select()
      .from(engineers)
      .where(eq(engineers.email, email.trim().toLowerCase()))
      .limit(1);
    return rows[0] ?? null;
  }

  async listAvailable(): Promise<Engineer[]> {
    return this.db.select().from(engineers).where(eq(engineers.availability, true));
  }

  async update(engineerId: string, changes: EngineerProfileUpdate): Promise<Engineer | null> {
    if (Object.keys(changes).length === 0) {
      return this.findById(engineerId);
    }

    const rows = await this.db
      .update(engineers)
      .set(changes)
      .where(eq(engineers.engineerId, engineerId))
      .returning();
    return rows[0] ?? null;
  }

  /** Applied in one statement so concurrent adjustments all count. */
  async adjustActiveTickets(engineerId: string, delta: number): Promise<void> {
    await this.db
      .update(engineers)
      .set({ activeTickets: sql`greatest(${engineers.activeTickets} + ${delta}, 0)` })
      .where(eq(engineers.engineerId, engineerId));
  }
}
