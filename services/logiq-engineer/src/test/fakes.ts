import type { Content } from '@google/genai';
import type { DocumentSearchRequest, ModelClient, ModelReply, ModelRequest } from '../clients/genai-client.js';
import type { EmailMessage, EmailSender } from '../notifications/email-client.js';
import type { SmsSender } from '../notifications/sms-client.js';
import type { ApplianceRepository } from '../repositories/appliance-repository.js';
import type { CustomerRepository } from '../repositories/customer-repository.js';
import type { EngineerRepository } from '../repositories/engineer-repository.js';
import type { RequestGuard, ServiceRequestRepository, UpdateOptions } from '../repositories/service-request-repository.js';
import type {
  ApplianceCatalogEntry,
  Customer,
  Engineer,
  EngineerProfileUpdate,
  ServiceRequest,
  ServiceRequestPatch,
} from '../types/index.js';
import type { Clock } from '../utils/time.js';

export class FakeClock implements Clock {
  constructor(private current: Date = new Date('2025-11-06T04:30:00.000Z')) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function makeEngineer(overrides: Partial<Engineer> = {}): Engineer {
  return {
    engineerId: 'eng-1',
    firstName: 'Asha',
    lastName: 'Rao',
    email: 'asha@example.com',
    phoneNumber: '+910000000001',
    availability: true,
    activeTickets: 0,
    street: '12 MG Road',
    city: 'Bengaluru',
    district: 'Bangalore Urban',
    state: 'Karnataka',
    zipCode: '560001',
    country: 'India',
    specializations: ['Refrigerator'],
    skills: ['Installation'],
    rating: 4.5,
    rewardPoints: 10,
    profilePicture: null,
    languageProficiency: ['English'],
    createdOn: new Date('2025-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function makeCustomer(overrides: Partial<Customer> = {}): Customer {
  return {
    customerId: 'cust-1',
    firstName: 'Ravi',
    lastName: 'Kumar',
    email: 'ravi@example.com',
    phoneNumber: '+910000000002',
    street: '4 Lake View',
    city: 'Bengaluru',
    district: 'Bangalore Urban',
    state: 'Karnataka',
    zipCode: '560002',
    country: 'India',
    createdOn: new Date('2025-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function makeRequest(overrides: Partial<ServiceRequest> = {}): ServiceRequest {
  return {
    requestId: 'req-1',
    customerId: 'cust-1',
    requestTitle: 'Fridge not cooling',
    description: 'Compressor runs but no cooling',
    requestType: 'Repair',
    ticketStatus: 'open',
    assignmentStatus: 'pending',
    assignedTo: 'eng-1',
    engineerAssignedOn: '2025-11-06 09:00:00',
    applianceDetails: {
      serialNumber: 'SN-100',
      category: 'Kitchen',
      subCategory: 'Refrigerator',
      brand: 'Coolio',
      modelNumber: 'C-200',
    },
    address: {
      street: '4 Lake View',
      city: 'Bengaluru',
      district: 'Bangalore Urban',
      state: 'Karnataka',
      zipcode: '560002',
    },
    customerContact: { email: 'ravi@example.com', phoneNumber: '+910000000002' },
    resolution: { startDate: null, endDate: null, actionPerformed: null, additionalNotes: null, feedback: null },
    verificationOtp: null,
    resolutionOtp: null,
    ticketActivity: [],
    unsafeWorkingConditionReported: null,
    createdOn: '2025-11-06 08:00:00',
    ...overrides,
  };
}

export class InMemoryEngineerRepository implements EngineerRepository {
  readonly engineers = new Map<string, Engineer>();
  readonly ticketAdjustments: Array<{ engineerId: string; delta: number }> = [];

  constructor(engineers: Engineer[] = []) {
    for (const engineer of engineers) {
      this.engineers.set(engineer.engineerId, engineer);
    }
  }

  async findById(engineerId: string) {
    return this.engineers.get(engineerId) ?? null;
  }

  async findByEmail(email: string) {
    return Array.from(this.engineers.values()).find((engineer) => engineer.email === email) ?? null;
  }

  async listAvailable() {
    return Array.from(this.engineers.values()).filter((engineer) => engineer.availability);
  }

  async update(engineerId: string, changes: EngineerProfileUpdate) {
    const engineer = this.engineers.get(engineerId);
    if (!engineer) return null;
    const updated = { ...engineer, ...changes };
    this.engineers.set(engineerId, updated);
    return updated;
  }

  async adjustActiveTickets(engineerId: string, delta: number) {
    this.ticketAdjustments.push({ engineerId, delta });
    const engineer = this.engineers.get(engineerId);
    if (engineer) {
      this.engineers.set(engineerId, { ...engineer, activeTickets: Math.max(0, engineer.activeTickets + delta) });
    }
  }
}

export class InMemoryCustomerRepository implements CustomerRepository {
  constructor(private readonly customers: Customer[] = []) {}

  async findById(customerId: string) {
    return this.customers.find((customer) => customer.customerId === customerId) ?? null;
  }
}

export class InMemoryApplianceRepository implements ApplianceRepository {
  constructor(private readonly entries: ApplianceCatalogEntry[] = []) {}

  async listCatalog() {
    return [...this.entries];
  }
}

function guardHolds(request: ServiceRequest, guard: RequestGuard = {}): boolean {
  if (guard.assignedTo !== undefined && request.assignedTo !== guard.assignedTo) return false;
  if (guard.assignmentStatus !== undefined && request.assignmentStatus !== guard.assignmentStatus) return false;
  if (guard.unresolved && request.ticketStatus === 'resolved') return false;
  if (guard.resolutionStarted !== undefined && Boolean(request.resolution.startDate) !== guard.resolutionStarted) {
    return false;
  }
  if (guard.unsafeConditionUnreported && request.unsafeWorkingConditionReported) return false;
  return true;
}

export class InMemoryServiceRequestRepository implements ServiceRequestRepository {
  readonly requests = new Map<string, ServiceRequest>();

  constructor(requests: ServiceRequest[] = []) {
    for (const request of requests) {
      this.requests.set(this.key(request.customerId, request.requestId), request);
    }
  }

  private key(customerId: string, requestId: string): string {
    return `${customerId}/${requestId}`;
  }

  async create(request: ServiceRequest) {
    this.requests.set(this.key(request.customerId, request.requestId), request);
    return request;
  }

  async find(customerId: string, requestId: string) {
    return this.requests.get(this.key(customerId, requestId)) ?? null;
  }

  async listByEngineer(engineerId: string) {
    return Array.from(this.requests.values()).filter((request) => request.assignedTo === engineerId);
  }

  async listByAppliance(customerId: string, serialNumber: string) {
    return Array.from(this.requests.values()).filter(
      (request) => request.customerId === customerId && request.applianceDetails.serialNumber === serialNumber
    );
  }

  // No await between the guard check and the write, like a single UPDATE
  async update(customerId: string, requestId: string, patch: ServiceRequestPatch, options: UpdateOptions = {}) {
    const key = this.key(customerId, requestId);
    const existing = this.requests.get(key);
    if (!existing || !guardHolds(existing, options.guard)) return null;
    const updated = {
      ...existing,
      ...patch,
      ticketActivity: [...(patch.ticketActivity ?? existing.ticketActivity), ...(options.activity ?? [])],
    };
    this.requests.set(key, updated);
    return updated;
  }
}

export class RecordingEmailSender implements EmailSender {
  readonly sent: EmailMessage[] = [];
  failWith: Error | null = null;

  async send(message: EmailMessage) {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
  }
}

export class RecordingSmsSender implements SmsSender {
  readonly sent: Array<{ to: string; body: string }> = [];

  async send(to: string, body: string) {
    this.sent.push({ to, body });
  }
}

export type ScriptedStep =
  | { text: string }
  | { calls: Array<{ name: string; args?: Record<string, unknown> }> }
  | { error: Error };

/**
 * Model stand-in that replays a fixed script of replies and records every
 * request it receives.
 */
export class ScriptedModelClient implements ModelClient {
  readonly requests: ModelRequest[] = [];
  readonly searches: DocumentSearchRequest[] = [];
  searchAnswer = 'Check the thermostat wiring.';

  constructor(private readonly script: ScriptedStep[]) {}

  async generate(request: ModelRequest): Promise<ModelReply> {
    // contents is mutated by the runtime after the call; keep a snapshot
    this.requests.push({ ...request, contents: [...request.contents] });
    const step = this.script.shift();
    if (!step) {
      throw new Error('Model script exhausted');
    }
    if ('error' in step) {
      throw step.error;
    }
    if ('text' in step) {
      const content: Content = { role: 'model', parts: [{ text: step.text }] };
      return { text: step.text, functionCalls: [], content };
    }
    const functionCalls = step.calls.map((call, index) => ({
      id: `call-${index}`,
      name: call.name,
      args: call.args ?? {},
    }));
    const content: Content = {
      role: 'model',
      parts: functionCalls.map((call) => ({ functionCall: call })),
    };
    return { text: '', functionCalls, content };
  }

  async searchDocuments(request: DocumentSearchRequest): Promise<string> {
    this.searches.push(request);
    return this.searchAnswer;
  }
}

/** The error `promise` rejects with; fails when it resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

export function toolNamed<T extends { declaration: { name?: string } }>(tools: T[], name: string): T {
  const tool = tools.find((candidate) => candidate.declaration.name === name);
  if (!tool) {
    throw new Error(`No tool named ${name}`);
  }
  return tool;
}
