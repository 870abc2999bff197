import { eq } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import { customers } from '../db/schema.js';
import type { Customer } from '../types/index.js';

export interface CustomerRepository {
  findById(customerId: string): Promise<Customer | null>;
}

export class DrizzleCustomerRepository implements CustomerRepository {
  constructor(private readonly db: Database) {}

  async findById(customerId: string): Promise<Customer | null> {
    const rows = await this.db.select().from(customers).where(eq(customers.customerId, customerId)).limit(1);
    return rows[0] ?? null;
  }
}
