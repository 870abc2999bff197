import { randomInt } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { EngineerRepository } from '../repositories/engineer-repository.js';
import type { RequestGuard, ServiceRequestRepository } from '../repositories/service-request-repository.js';
import type { CustomerNotifier } from '../notifications/customer-notifier.js';
import { engineerAssigned, requestResolved, resolutionStarted, type RenderedNotice } from '../notifications/templates.js';
import type { EngineerAssignment } from './engineer-assignment.js';
import type {
  ActivityAuthor,
  Engineer,
  NewServiceRequest,
  OtpPurpose,
  OtpRecord,
  ServiceRequest,
  ServiceRequestPatch,
  TicketActivity,
  TicketCounts,
  TicketView,
} from '../types/index.js';
import { ConflictError, ForbiddenError, NotFoundError, OtpError, ValidationError, errorMessage } from '../utils/errors.js';
import { formatTimestamp, systemClock, type Clock } from '../utils/time.js';

export const ADMIN_ASSIGNEE = 'admin';
export const FALLBACK_CUSTOMER_NAME = 'LogIQ User';

export interface WorkflowOptions {
  requests: ServiceRequestRepository;
  engineers: EngineerRepository;
  customers: CustomerRepository;
  notifier: CustomerNotifier;
  assignment?: EngineerAssignment;
  clock?: Clock;
  timezoneOffsetMinutes: number;
  otpTtlMinutes: number;
  generateId?: () => string;
  generateOtp?: () => string;
}

export interface ResolutionInput {
  otp: string;
  actionPerformed: string;
  additionalNotes?: string;
}

export interface UnsafeConditionReport {
  alreadyReported: boolean;
  description: string;
}

/** Six random digits, zero padded. */
export function generateOtpCode(): string {
  return randomInt(0, 1000000).toString().padStart(6, '0');
}

export function matchesView(request: ServiceRequest, view: TicketView): boolean {
  switch (view) {
    case 'assigned':
      return request.assignmentStatus === 'confirmed' && request.ticketStatus !== 'resolved';
    case 'pending':
      return request.assignmentStatus === 'pending';
    case 'resolved':
      return request.assignmentStatus === 'confirmed' && request.ticketStatus === 'resolved';
  }
}

function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new ValidationError(`${field} is required`);
  }
  return trimmed;
}

/**
 * State transitions of an onsite service request, from intake through
 * engineer acceptance, OTP-verified start and OTP-verified resolution.
 */
export class ServiceRequestWorkflow {
  private readonly requests: ServiceRequestRepository;
  private readonly engineers: EngineerRepository;
  private readonly customers: CustomerRepository;
  private readonly notifier: CustomerNotifier;
  private readonly assignment?: EngineerAssignment;
  private readonly clock: Clock;
  private readonly timezoneOffsetMinutes: number;
  private readonly otpTtlMinutes: number;
  private readonly generateId: () => string;
  private readonly generateOtp: () => string;

  constructor(options: WorkflowOptions) {
    this.requests = options.requests;
    this.engineers = options.engineers;
    this.customers = options.customers;
    this.notifier = options.notifier;
    this.assignment = options.assignment;
    this.clock = options.clock ?? systemClock;
    this.timezoneOffsetMinutes = options.timezoneOffsetMinutes;
    this.otpTtlMinutes = options.otpTtlMinutes;
    this.generateId = options.generateId ?? uuidv4;
    this.generateOtp = options.generateOtp ?? generateOtpCode;
  }

  private timestamp(): string {
    return formatTimestamp(this.clock.now(), this.timezoneOffsetMinutes);
  }

  private activity(addedBy: ActivityAuthor, notes: string): TicketActivity {
    return { timestamp: this.timestamp(), addedBy, notes };
  }

  async listForEngineer(engineerId: string, view: TicketView): Promise<ServiceRequest[]> {
    const requests = await this.requests.listByEngineer(engineerId);
    return requests.filter((request) => matchesView(request, view));
  }

  async countsForEngineer(engineerId: string): Promise<TicketCounts> {
    const requests = await this.requests.listByEngineer(engineerId);
    return {
      assigned: requests.filter((request) => matchesView(request, 'assigned')).length,
      pending: requests.filter((request) => matchesView(request, 'pending')).length,
      resolved: requests.filter((request) => matchesView(request, 'resolved')).length,
    };
  }

  private async load(customerId: string, requestId: string): Promise<ServiceRequest> {
    const request = await this.requests.find(customerId, requestId);
    if (!request) {
      throw new NotFoundError(`Service request ${requestId} not found`);
    }
    return request;
  }

  /** A request the engineer is assigned to; anything else is forbidden. */
  async getForEngineer(engineerId: string, customerId: string, requestId: string): Promise<ServiceRequest> {
    const request = await this.load(customerId, requestId);
    if (request.assignedTo !== engineerId) {
      throw new ForbiddenError(`Service request ${requestId} is not assigned to engineer ${engineerId}`);
    }
    return request;
  }

  private async save(request: ServiceRequest, patch: ServiceRequestPatch): Promise<ServiceRequest> {
    const updated = await this.requests.update(request.customerId, request.requestId, patch);
    if (!updated) {
      throw new NotFoundError(`Service request ${request.requestId} not found`);
    }
    return updated;
  }

  /**
   * Write that only applies while the stored request still meets `guard`;
   * otherwise a concurrent call got there first.
   */
  private async transition(
    request: ServiceRequest,
    guard: RequestGuard,
    patch: ServiceRequestPatch,
    activity: TicketActivity,
    conflict: string
  ): Promise<ServiceRequest> {
    const updated = await this.requests.update(request.customerId, request.requestId, patch, {
      guard,
      activity: [activity],
    });
    if (!updated) {
      throw new ConflictError(conflict);
    }
    return updated;
  }

  private async loadEngineer(engineerId: string): Promise<Engineer> {
    const engineer = await this.engineers.findById(engineerId);
    if (!engineer) {
      throw new NotFoundError(`Engineer ${engineerId} not found`);
    }
    return engineer;
  }

  async accept(engineerId: string, customerId: string, requestId: string): Promise<ServiceRequest> {
    const request = await this.getForEngineer(engineerId, customerId, requestId);
    if (request.assignmentStatus !== 'pending') {
      throw new ConflictError(`Service request ${requestId} is already ${request.assignmentStatus}`);
    }

    const engineer = await this.loadEngineer(engineerId);
    const name = `${engineer.firstName} ${engineer.lastName}`;

    const updated = await this.transition(
      request,
      { assignedTo: engineerId, assignmentStatus: 'pending' },
      { assignmentStatus: 'confirmed', engineerAssignedOn: this.timestamp() },
      this.activity('system', `Service request assigned to ${name} (Engineer Id: ${engineer.engineerId})`),
      `Service request ${requestId} is no longer pending`
    );
    await this.engineers.adjustActiveTickets(engineerId, 1);

    const customerName = await this.customerName(customerId);
    await this.notify(
      updated,
      customerName,
      engineerAssigned({
        customerName,
        serviceRequestId: requestId,
        engineerId,
        engineerName: name,
        engineerPhone: engineer.phoneNumber,
        engineerEmail: engineer.email,
      })
    );
    return updated;
  }

  async reject(engineerId: string, customerId: string, requestId: string): Promise<ServiceRequest> {
    const request = await this.getForEngineer(engineerId, customerId, requestId);
    if (request.assignmentStatus !== 'pending') {
      throw new ConflictError(`Service request ${requestId} is already ${request.assignmentStatus}`);
    }

    return this.transition(
      request,
      { assignedTo: engineerId, assignmentStatus: 'pending' },
      { assignmentStatus: 'rejected', assignedTo: ADMIN_ASSIGNEE },
      this.activity('system', `REJECTED_BY_ENGINEER_${engineerId}`),
      `Service request ${requestId} is no longer pending`
    );
  }

  /**
   * 402 when there is no code or it has expired, 401 when it does not match.
   */
  private checkOtp(record: OtpRecord | null, input: string): void {
    if (!record || new Date(record.expiresOn).getTime() <= this.clock.now().getTime()) {
      throw new OtpError('not_found');
    }
    if (record.code !== input.trim()) {
      throw new OtpError('invalid');
    }
  }

  async verify(engineerId: string, customerId: string, requestId: string, otp: string): Promise<ServiceRequest> {
    const request = await this.getForEngineer(engineerId, customerId, requestId);
    if (request.assignmentStatus !== 'confirmed') {
      throw new ConflictError(`Service request ${requestId} must be accepted before verification`);
    }
    if (request.resolution.startDate) {
      throw new ConflictError(`Resolution of service request ${requestId} has already started`);
    }
    this.checkOtp(request.verificationOtp, otp);

    const engineer = await this.loadEngineer(engineerId);
    const name = `${engineer.firstName} ${engineer.lastName}`;

    const updated = await this.transition(
      request,
      { assignedTo: engineerId, assignmentStatus: 'confirmed', resolutionStarted: false },
      {
        ticketStatus: 'in_progress',
        verificationOtp: null,
        resolution: { ...request.resolution, startDate: this.timestamp() },
      },
      this.activity('system', `Engineer ${name} verified onsite and started the resolution`),
      `Resolution of service request ${requestId} has already started`
    );

    const customerName = await this.customerName(customerId);
    await this.notify(
      updated,
      customerName,
      resolutionStarted({
        customerName,
        serviceRequestId: requestId,
        engineerId,
        engineerName: name,
      })
    );
    return updated;
  }

  async resolve(
    engineerId: string,
    customerId: string,
    requestId: string,
    input: ResolutionInput
  ): Promise<ServiceRequest> {
    const request = await this.getForEngineer(engineerId, customerId, requestId);
    if (request.ticketStatus === 'resolved') {
      throw new ConflictError(`Service request ${requestId} is already resolved`);
    }
    if (!request.resolution.startDate) {
      throw new ConflictError(`Resolution of service request ${requestId} has not started`);
    }
    const actionPerformed = requireText(input.actionPerformed, 'actionPerformed');
    const additionalNotes = input.additionalNotes?.trim() ?? '';
    this.checkOtp(request.resolutionOtp, input.otp);

    const engineer = await this.loadEngineer(engineerId);
    const name = `${engineer.firstName} ${engineer.lastName}`;

    const updated = await this.transition(
      request,
      { assignedTo: engineerId, unresolved: true, resolutionStarted: true },
      {
        ticketStatus: 'resolved',
        resolutionOtp: null,
        resolution: {
          ...request.resolution,
          endDate: this.timestamp(),
          actionPerformed,
          additionalNotes: additionalNotes || null,
        },
      },
      this.activity('system', `Service request resolved by ${name}`),
      `Service request ${requestId} is already resolved`
    );
    await this.engineers.adjustActiveTickets(engineerId, -1);

    const customerName = await this.customerName(customerId);
    await this.notify(
      updated,
      customerName,
      requestResolved({
        customerName,
        serviceRequestId: requestId,
        engineerId,
        engineerName: name,
        actionPerformed,
        additionalNotes,
      })
    );
    return updated;
  }

  async addActivity(
    engineerId: string,
    customerId: string,
    requestId: string,
    notes: string,
    addedBy: ActivityAuthor = 'Engineer'
  ): Promise<ServiceRequest> {
    const request = await this.getForEngineer(engineerId, customerId, requestId);
    if (request.ticketStatus === 'resolved') {
      throw new ConflictError(`Cannot add activity to resolved service request ${requestId}`);
    }
    return this.transition(
      request,
      { assignedTo: engineerId, unresolved: true },
      {},
      this.activity(addedBy, requireText(notes, 'notes')),
      `Cannot add activity to resolved service request ${requestId}`
    );
  }

  /** The first report stands; later reports are not stored. */
  async reportUnsafeCondition(
    engineerId: string,
    customerId: string,
    requestId: string,
    description: string
  ): Promise<UnsafeConditionReport> {
    const request = await this.getForEngineer(engineerId, customerId, requestId);
    if (request.unsafeWorkingConditionReported) {
      return { alreadyReported: true, description: request.unsafeWorkingConditionReported };
    }

    const text = requireText(description, 'description');
    const updated = await this.requests.update(
      customerId,
      requestId,
      { unsafeWorkingConditionReported: text },
      {
        guard: { assignedTo: engineerId, unsafeConditionUnreported: true },
        activity: [this.activity('Engineer', `Unsafe working condition reported: ${text}`)],
      }
    );
    if (!updated) {
      const current = await this.getForEngineer(engineerId, customerId, requestId);
      return { alreadyReported: true, description: current.unsafeWorkingConditionReported ?? text };
    }
    return { alreadyReported: false, description: text };
  }

  /** Resolved requests for one appliance of a customer, oldest first. */
  async resolvedForAppliance(customerId: string, serialNumber: string): Promise<ServiceRequest[]> {
    const requests = await this.requests.listByAppliance(customerId, serialNumber);
    return requests
      .filter((request) => request.ticketStatus === 'resolved')
      .sort((a, b) => a.createdOn.localeCompare(b.createdOn));
  }

  // Intake

  async create(input: NewServiceRequest): Promise<ServiceRequest> {
    requireText(input.customerId, 'customerId');
    requireText(input.requestTitle, 'requestTitle');
    requireText(input.applianceDetails.serialNumber, 'applianceDetails.serialNumber');
    requireText(input.applianceDetails.subCategory, 'applianceDetails.subCategory');

    let engineer: Engineer | null = null;
    if (this.assignment) {
      engineer = await this.assignment.findEngineer(input);
    }

    const now = this.timestamp();
    const request: ServiceRequest = {
      ...input,
      requestId: this.generateId(),
      ticketStatus: 'open',
      assignmentStatus: 'pending',
      assignedTo: engineer?.engineerId ?? ADMIN_ASSIGNEE,
      engineerAssignedOn: engineer ? now : null,
      resolution: { startDate: null, endDate: null, actionPerformed: null, additionalNotes: null, feedback: null },
      verificationOtp: null,
      resolutionOtp: null,
      ticketActivity: [this.activity('Customer', 'Service request raised')],
      unsafeWorkingConditionReported: null,
      createdOn: now,
    };

    const created = await this.requests.create(request);
    console.log(`Service request ${created.requestId} created and assigned to ${created.assignedTo}`);
    return created;
  }

  /**
   * Issue a fresh OTP for the customer to hand to the engineer. Replaces any
   * earlier code of the same purpose.
   */
  async issueOtp(customerId: string, requestId: string, purpose: OtpPurpose): Promise<OtpRecord> {
    const request = await this.load(customerId, requestId);
    if (request.ticketStatus === 'resolved') {
      throw new ConflictError(`Service request ${requestId} is already resolved`);
    }
    if (purpose === 'verification' && request.assignmentStatus !== 'confirmed') {
      throw new ConflictError(`Service request ${requestId} has no confirmed engineer yet`);
    }
    if (purpose === 'verification' && request.resolution.startDate) {
      throw new ConflictError(`Resolution of service request ${requestId} has already started`);
    }
    if (purpose === 'resolution' && !request.resolution.startDate) {
      throw new ConflictError(`Resolution of service request ${requestId} has not started`);
    }

    const record: OtpRecord = {
      code: this.generateOtp(),
      expiresOn: new Date(this.clock.now().getTime() + this.otpTtlMinutes * 60000).toISOString(),
    };
    await this.save(request, purpose === 'verification' ? { verificationOtp: record } : { resolutionOtp: record });
    return record;
  }

  // Notifications

  private async customerName(customerId: string): Promise<string> {
    try {
      const customer = await this.customers.findById(customerId);
      if (customer) {
        return `${customer.firstName} ${customer.lastName}`.trim() || FALLBACK_CUSTOMER_NAME;
      }
    } catch (error) {
      console.warn(`Customer lookup failed for ${customerId}:`, errorMessage(error));
    }
    return FALLBACK_CUSTOMER_NAME;
  }

  private async notify(request: ServiceRequest, customerName: string, notice: RenderedNotice): Promise<void> {
    const report = await this.notifier.notify(
      {
        name: customerName,
        email: request.customerContact.email,
        phoneNumber: request.customerContact.phoneNumber,
      },
      notice
    );
    if (report.email === 'failed' || report.sms === 'failed') {
      console.warn(`Notification for service request ${request.requestId} partially failed`, report);
    }
  }
}
