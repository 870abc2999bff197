import { and, eq, isNotNull, isNull, ne, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import { serviceRequests } from '../db/schema.js';
import type { AssignmentStatus, ServiceRequest, ServiceRequestPatch, TicketActivity } from '../types/index.js';

/**
 * Conditions the stored request must still meet when an update is applied.
 * An update whose guard fails changes nothing and yields null.
 */
export interface RequestGuard {
  assignedTo?: string;
  assignmentStatus?: AssignmentStatus;
  unresolved?: boolean;
  resolutionStarted?: boolean;
  unsafeConditionUnreported?: boolean;
}

export interface UpdateOptions {
  guard?: RequestGuard;
  /** Appended to ticketActivity in the same write. */
  activity?: TicketActivity[];
}

export interface ServiceRequestRepository {
  create(request: ServiceRequest): Promise<ServiceRequest>;
  find(customerId: string, requestId: string): Promise<ServiceRequest | null>;
  listByEngineer(engineerId: string): Promise<ServiceRequest[]>;
  listByAppliance(customerId: string, serialNumber: string): Promise<ServiceRequest[]>;
  update(
    customerId: string,
    requestId: string,
    patch: ServiceRequestPatch,
    options?: UpdateOptions
  ): Promise<ServiceRequest | null>;
}

function guardConditions(guard: RequestGuard = {}): SQL[] {
  const conditions: SQL[] = [];
  if (guard.assignedTo !== undefined) {
    conditions.push(eq(serviceRequests.assignedTo, guard.assignedTo));
  }
  if (guard.assignmentStatus !== undefined) {
    conditions.push(eq(serviceRequests.assignmentStatus, guard.assignmentStatus));
  }
  if (guard.unresolved) {
    conditions.push(ne(serviceRequests.ticketStatus, 'resolved'));
  }
  if (guard.resolutionStarted !== undefined) {
    const startDate = sql`${serviceRequests.resolution} ->> 'startDate'`;
    conditions.push(guard.resolutionStarted ? isNotNull(startDate) : isNull(startDate));
  }
  if (guard.unsafeConditionUnreported) {
    conditions.push(isNull(serviceRequests.unsafeWorkingConditionReported));
  }
  return conditions;
}

function toServiceRequest(row: typeof serviceRequests.$inferSelect): ServiceRequest {
  return {
    ...row,
    verificationOtp: row.verificationOtp ?? null,
    resolutionOtp: row.resolutionOtp ?? null,
  };
}

export class DrizzleServiceRequestRepository implements ServiceRequestRepository {
  constructor(private readonly db: Database) {}

  async create(request: ServiceRequest): Promise<ServiceRequest> {
    const rows = await this.db.insert(serviceRequests).values(request).returning();
    return toServiceRequest(rows[0] ?? request);
  }

  async find(customerId: string, requestId: string): Promise<ServiceRequest | null> {
    const rows = await this.db
      .select()
      .from(serviceRequests)
      .where(and(eq(serviceRequests.customerId, customerId), eq(serviceRequests.requestId, requestId)))
      .limit(1);
    return rows[0] ? toServiceRequest(rows[0]) : null;
  }

  async listByEngineer(engineerId: string): Promise<ServiceRequest[]> {
    const rows = await this.db.select().from(serviceRequests).where(eq(serviceRequests.assignedTo, engineerId));
    return rows.map(toServiceRequest);
  }

  async listByAppliance(customerId: string, serialNumber: string): Promise<ServiceRequest[]> {
    const rows = await this.db.select().from(serviceRequests).where(eq(serviceRequests.customerId, customerId));
    return rows.map(toServiceRequest).filter((row) => row.applianceDetails.serialNumber === serialNumber);
  }

  /**
   * One conditional UPDATE: the guard goes into the WHERE clause and activity
   * is appended with jsonb concatenation, so concurrent writers cannot both
   * pass a check or drop each other's entries.
   */
  async update(
    customerId: string,
    requestId: string,
    patch: ServiceRequestPatch,
    options: UpdateOptions = {}
  ): Promise<ServiceRequest | null> {
    const activity = options.activity ?? [];
    const changes =
      activity.length > 0
        ? { ...patch, ticketActivity: sql`${serviceRequests.ticketActivity} || ${JSON.stringify(activity)}::jsonb` }
        : patch;

    const rows = await this.db
      .update(serviceRequests)
      .set(changes)
      .where(
        and(
          eq(serviceRequests.customerId, customerId),
          eq(serviceRequests.requestId, requestId),
          ...guardConditions(options.guard)
        )
      )
      .returning();
    return rows[0] ? toServiceRequest(rows[0]) : null;
  }
}
