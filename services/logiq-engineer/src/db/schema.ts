import { pgTable, varchar, text, jsonb, timestamp, integer, real, boolean, serial } from 'drizzle-orm/pg-core';
import type {
  ApplianceDetails,
  CustomerContact,
  OtpRecord,
  Resolution,
  ServiceAddress,
  TicketActivity,
} from '../types/index.js';

export const engineers = pgTable('engineers', {
  engineerId: varchar('engineer_id', { length: 32 }).primaryKey(),
  firstName: varchar('first_name', { length: 100 }).notNull(),
  lastName: varchar('last_name', { length: 100 }).notNull(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  phoneNumber: varchar('phone_number', { length: 32 }).notNull(),
  availability: boolean('availability').notNull().default(true),
  activeTickets: integer('active_tickets').notNull().default(0),
  street: text('street').notNull().default(''),
  city: varchar('city', { length: 100 }).notNull().default(''),
  district: varchar('district', { length: 100 }).notNull().default(''),
  state: varchar('state', { length: 100 }).notNull().default(''),
  country: varchar('country', { length: 100 }).notNull().default(''),
  zipCode: varchar('zip_code', { length: 16 }).notNull().default(''),
  specializations: jsonb('specializations').$type<string[]>().notNull().default([]),
  skills: jsonb('skills').$type<string[]>().notNull().default([]),
  rating: real('rating').notNull().default(0),
  rewardPoints: integer('reward_points').notNull().default(0),
  profilePicture: text('profile_picture'),
  languageProficiency: jsonb('language_proficiency').$type<string[]>().notNull().default([]),
  createdOn: timestamp('created_on', { withTimezone: true }).notNull().defaultNow(),
});

export const customers = pgTable('customers', {
  customerId: varchar('customer_id', { length: 64 }).primaryKey(),
  firstName: varchar('first_name', { length: 100 }).notNull(),
  lastName: varchar('last_name', { length: 100 }).notNull(),
  email: varchar('email', { length: 255 }).notNull(),
  phoneNumber: varchar('phone_number', { length: 32 }).notNull(),
  street: text('street').notNull().default(''),
  city: varchar('city', { length: 100 }).notNull().default(''),
  district: varchar('district', { length: 100 }).notNull().default(''),
  state: varchar('state', { length: 100 }).notNull().default(''),
  country: varchar('country', { length: 100 }).notNull().default(''),
  zipCode: varchar('zip_code', { length: 16 }).notNull().default(''),
  createdOn: timestamp('created_on', { withTimezone: true }).notNull().defaultNow(),
});

export const applianceCatalog = pgTable('appliance_catalog', {
  id: serial('id').primaryKey(),
  category: varchar('category', { length: 100 }).notNull(),
  subCategory: varchar('sub_category', { length: 100 }).notNull(),
  brand: varchar('brand', { length: 100 }).notNull(),
  modelNumber: varchar('model_number', { length: 100 }).notNull(),
});

export const serviceRequests = pgTable('service_requests', {
  requestId: varchar('request_id', { length: 64 }).primaryKey(),
  customerId: varchar('customer_id', { length: 64 }).notNull(),
  requestTitle: text('request_title').notNull(),
  description: text('description').notNull(),
  requestType: varchar('request_type', { length: 100 }).notNull(),
  ticketStatus: varchar('ticket_status', { length: 16 }).$type<'open' | 'in_progress' | 'resolved'>().notNull(),
  assignmentStatus: varchar('assignment_status', { length: 16 }).$type<'pending' | 'confirmed' | 'rejected'>().notNull(),
  assignedTo: varchar('assigned_to', { length: 64 }),
  engineerAssignedOn: varchar('engineer_assigned_on', { length: 32 }),
  applianceDetails: jsonb('appliance_details').$type<ApplianceDetails>().notNull(),
  address: jsonb('address').$type<ServiceAddress>().notNull(),
  customerContact: jsonb('customer_contact').$type<CustomerContact>().notNull(),
  resolution: jsonb('resolution').$type<Resolution>().notNull(),
  verificationOtp: jsonb('verification_otp').$type<OtpRecord>(),
  resolutionOtp: jsonb('resolution_otp').$type<OtpRecord>(),
  ticketActivity: jsonb('ticket_activity').$type<TicketActivity[]>().notNull().default([]),
  unsafeWorkingConditionReported: text('unsafe_working_condition_reported'),
  createdOn: varchar('created_on', { length: 32 }).notNull(),
});
