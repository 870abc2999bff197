import { Request } from 'express';

// Core records
export interface Address {
  street: string;
  city: string;
  district: string;
  state: string;
  zipCode: string;
  country: string;
}

export interface Engineer extends Address {
  engineerId: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  availability: boolean;
  activeTickets: number;
  specializations: string[];
  skills: string[];
  rating: number;
  rewardPoints: number;
  profilePicture: string | null;
  languageProficiency: string[];
  createdOn: Date;
}

export type EngineerProfileUpdate = Partial<
  Pick<
    Engineer,
    | 'firstName'
    | 'lastName'
    | 'email'
    | 'phoneNumber'
    | 'availability'
    | 'street'
    | 'city'
    | 'district'
    | 'state'
    | 'zipCode'
    | 'country'
    | 'specializations'
    | 'skills'
    | 'languageProficiency'
  >
>;

export interface Customer extends Address {
  customerId: string;
  firstName: string;
  lastName: string;
  email: string;
  phoneNumber: string;
  createdOn: Date;
}

export interface ApplianceCatalogEntry {
  category: string;
  subCategory: string;
  brand: string;
  modelNumber: string;
}

/** subCategory → brand → model numbers */
export type ApplianceCatalog = Record<string, Record<string, string[]>>;

// Service requests
export type TicketStatus = 'open' | 'in_progress' | 'resolved';
export type AssignmentStatus = 'pending' | 'confirmed' | 'rejected';
export type ActivityAuthor = 'Engineer' | 'system' | 'Customer';
export type OtpPurpose = 'verification' | 'resolution';

export interface ApplianceDetails {
  serialNumber: string;
  category: string;
  subCategory: string;
  brand: string;
  modelNumber: string;
}

export interface ServiceAddress {
  street: string;
  city: string;
  district: string;
  state: string;
  zipcode: string;
}

export interface CustomerContact {
  email: string;
  phoneNumber: string;
}

export interface OtpRecord {
  code: string;
  expiresOn: string; // ISO-8601
}

export interface Resolution {
  startDate: string | null;
  endDate: string | null;
  actionPerformed: string | null;
  additionalNotes: string | null;
  feedback: string | null;
}

export interface TicketActivity {
  timestamp: string;
  addedBy: ActivityAuthor;
  notes: string;
}

export interface ServiceRequest {
  requestId: string;
  customerId: string;
  requestTitle: string;
  description: string;
  requestType: string;
  ticketStatus: TicketStatus;
  assignmentStatus: AssignmentStatus;
  assignedTo: string | null;
  engineerAssignedOn: string | null;
  applianceDetails: ApplianceDetails;
  address: ServiceAddress;
  customerContact: CustomerContact;
  resolution: Resolution;
  verificationOtp: OtpRecord | null;
  resolutionOtp: OtpRecord | null;
  ticketActivity: TicketActivity[];
  unsafeWorkingConditionReported: string | null;
  createdOn: string;
}

export type ServiceRequestPatch = Partial<Omit<ServiceRequest, 'requestId' | 'customerId' | 'createdOn'>>;

export interface NewServiceRequest {
  customerId: string;
  requestTitle: string;
  description: string;
  requestType: string;
  applianceDetails: ApplianceDetails;
  address: ServiceAddress;
  customerContact: CustomerContact;
}

export interface TicketCounts {
  assigned: number;
  pending: number;
  resolved: number;
}

export type TicketView = 'assigned' | 'pending' | 'resolved';

// API types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

export interface ChatRequest {
  message: string;
  session_id?: string;
}

export interface ChatResponse {
  session_id: string;
  reply: string;
  agent: string;
  mode: 'agent' | 'fallback';
  tool_calls: string[];
  processing_time?: number;
}

/** Request with the engineer resolved by the auth middleware. */
export interface AuthenticatedRequest extends Request {
  engineer?: Engineer;
}
