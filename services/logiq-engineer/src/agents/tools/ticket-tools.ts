import { Type } from '@google/genai';
import type { ServiceRequestRepository } from '../../repositories/service-request-repository.js';
import type { ServiceRequestWorkflow } from '../../services/service-request-workflow.js';
import type { ServiceRequest } from '../../types/index.js';
import { readString } from '../args.js';
import type { AgentTool, ToolResult } from '../types.js';

export interface TicketToolDeps {
  workflow: ServiceRequestWorkflow;
  requests: ServiceRequestRepository;
}

const NO_RECORDS = 'No records found for given customer or serial number.';

function summarize(request: ServiceRequest) {
  return {
    request_id: request.requestId,
    customer_id: request.customerId,
    title: request.requestTitle,
    description: request.description,
    created_on: request.createdOn,
    type: request.requestType,
    status: request.ticketStatus,
    assignment_status: request.assignmentStatus,
  };
}

/** Ticket as shown to the model: no OTPs and no customer feedback. */
export function ticketDetails(request: ServiceRequest): ToolResult {
  return {
    ...summarize(request),
    appliance_details: {
      serial_number: request.applianceDetails.serialNumber,
      category: request.applianceDetails.category,
      sub_category: request.applianceDetails.subCategory,
      brand: request.applianceDetails.brand,
      model_number: request.applianceDetails.modelNumber,
    },
    address: request.address,
    customer_contact: {
      email: request.customerContact.email,
      phone_number: request.customerContact.phoneNumber,
    },
    engineer_assigned_on: request.engineerAssignedOn,
    resolution: {
      start_date: request.resolution.startDate,
      end_date: request.resolution.endDate,
      action_performed: request.resolution.actionPerformed,
      additional_notes: request.resolution.additionalNotes,
    },
    ticket_activity: request.ticketActivity.map((entry) => ({
      timestamp: entry.timestamp,
      added_by: entry.addedBy,
      notes: entry.notes,
    })),
    unsafe_working_condition_reported: request.unsafeWorkingConditionReported,
  };
}

const ticketParameters = (extra: Record<string, { type: Type; description: string }> = {}) => ({
  type: Type.OBJECT,
  properties: {
    customer_id: { type: Type.STRING, description: 'Customer who raised the request.' },
    service_request_id: { type: Type.STRING, description: 'Service request (ticket) id.' },
    ...extra,
  },
  required: ['customer_id', 'service_request_id', ...Object.keys(extra)],
});

const applianceParameters = {
  type: Type.OBJECT,
  properties: {
    customer_id: { type: Type.STRING },
    serial_number: { type: Type.STRING, description: 'Serial number of the appliance.' },
  },
  required: ['customer_id', 'serial_number'],
};

export function createTicketTools(deps: TicketToolDeps): AgentTool[] {
  const servesCustomer = async (engineerId: string, customerId: string): Promise<boolean> => {
    const tickets = await deps.requests.listByEngineer(engineerId);
    return tickets.some((ticket) => ticket.customerId === customerId);
  };

  const resolvedForAppliance = async (engineerId: string, args: Record<string, unknown>) => {
    const customerId = readString(args, 'customer_id');
    const serialNumber = readString(args, 'serial_number');
    if (!(await servesCustomer(engineerId, customerId))) {
      return [];
    }
    return deps.workflow.resolvedForAppliance(customerId, serialNumber);
  };

  const listActiveTickets: AgentTool = {
    declaration: {
      name: 'list_active_tickets',
      description: 'All unresolved service tickets assigned to the engineer.',
    },
    async execute(_args, { engineerId }) {
      const tickets = (await deps.requests.listByEngineer(engineerId)).filter(
        (ticket) => ticket.ticketStatus !== 'resolved'
      );
      return tickets.length > 0
        ? { status: 'success', active_tickets: tickets.map(summarize) }
        : { status: 'not_found', active_tickets: [] };
    },
  };

  const listResolvedTickets: AgentTool = {
    declaration: {
      name: 'list_resolved_tickets',
      description: 'All service tickets the engineer has resolved.',
    },
    async execute(_args, { engineerId }) {
      const tickets = await deps.workflow.listForEngineer(engineerId, 'resolved');
      return tickets.length > 0
        ? {
            status: 'success',
            resolved_tickets: tickets.map((ticket) => ({ ...summarize(ticket), resolved_on: ticket.resolution.endDate })),
          }
        : { status: 'not_found', resolved_tickets: [] };
    },
  };

  const getTicketDetails: AgentTool = {
    declaration: {
      name: 'get_ticket_details',
      description: 'Full details of one service ticket assigned to the engineer.',
      parameters: ticketParameters(),
    },
    async execute(args, { engineerId }) {
      const request = await deps.workflow.getForEngineer(
        engineerId,
        readString(args, 'customer_id'),
        readString(args, 'service_request_id')
      );
      return { status: 'success', ticket: ticketDetails(request) };
    },
  };

  const addNewActivity: AgentTool = {
    declaration: {
      name: 'add_new_activity',
      description: 'Append a note to the activity log of an unresolved ticket.',
      parameters: ticketParameters({ notes: { type: Type.STRING, description: 'Activity note to record.' } }),
    },
    async execute(args, { engineerId }) {
      await deps.workflow.addActivity(
        engineerId,
        readString(args, 'customer_id'),
        readString(args, 'service_request_id'),
        readString(args, 'notes')
      );
      return { status: 'success', message: 'New activity added successfully.' };
    },
  };

  const reportUnsafeWorkingCondition: AgentTool = {
    declaration: {
      name: 'report_unsafe_working_condition',
      description: 'Report an unsafe working condition at the site of a ticket. Only the first report is kept.',
      parameters: ticketParameters({
        description: { type: Type.STRING, description: 'What makes the site unsafe.' },
      }),
    },
    async execute(args, { engineerId }) {
      const requestId = readString(args, 'service_request_id');
      const report = await deps.workflow.reportUnsafeCondition(
        engineerId,
        readString(args, 'customer_id'),
        requestId,
        readString(args, 'description')
      );
      if (report.alreadyReported) {
        return {
          status: 'already_reported',
          message: `An unsafe working condition was already reported for ${requestId}.`,
          reported_condition: report.description,
        };
      }
      return { status: 'success', message: `Unsafe conditions reported for ${requestId}.` };
    },
  };

  const getResolutionHistory: AgentTool = {
    declaration: {
      name: 'get_resolution_history',
      description: 'Resolution records of all resolved service requests for one appliance of a customer.',
      parameters: applianceParameters,
    },
    async execute(args, { engineerId }) {
      const resolved = await resolvedForAppliance(engineerId, args);
      if (resolved.length === 0) {
        return { status: 'not_found', message: NO_RECORDS };
      }

      const history: Record<string, ToolResult> = {};
      for (const request of resolved) {
        history[request.requestId] = {
          request_id: request.requestId,
          request_title: request.requestTitle,
          description: request.description,
          created_on: request.createdOn,
          start_date: request.resolution.startDate,
          end_date: request.resolution.endDate,
          action_performed: request.resolution.actionPerformed,
          additional_notes: request.resolution.additionalNotes,
        };
      }
      return { status: 'success', resolution_history: history };
    },
  };

  const getResolutionNotes: AgentTool = {
    declaration: {
      name: 'get_resolution_notes',
      description: 'What was done and noted on earlier resolved visits for one appliance of a customer.',
      parameters: applianceParameters,
    },
    async execute(args, { engineerId }) {
      const resolved = await resolvedForAppliance(engineerId, args);
      if (resolved.length === 0) {
        return { status: 'not_found', message: NO_RECORDS };
      }

      const notes: Record<string, ToolResult> = {};
      for (const request of resolved) {
        notes[request.requestId] = {
          request_title: request.requestTitle,
          description: request.description,
          action_performed: request.resolution.actionPerformed,
          additional_notes: request.resolution.additionalNotes,
          end_date: request.resolution.endDate,
        };
      }
      return { status: 'success', resolution_notes: notes };
    },
  };

  return [
    listActiveTickets,
    getTicketDetails,
    addNewActivity,
    reportUnsafeWorkingCondition,
    listResolvedTickets,
    getResolutionHistory,
    getResolutionNotes,
  ];
}
