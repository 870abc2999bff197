import { expect } from 'chai';
import { CustomerNotifier } from '../notifications/customer-notifier.js';
import { ServiceRequestWorkflow } from '../services/service-request-workflow.js';
import type { ServiceRequest } from '../types/index.js';
import { ConflictError, ForbiddenError, OtpError, ValidationError } from '../utils/errors.js';
import {
  FakeClock,
  InMemoryCustomerRepository,
  InMemoryEngineerRepository,
  InMemoryServiceRequestRepository,
  RecordingEmailSender,
  RecordingSmsSender,
  makeCustomer,
  makeEngineer,
  makeRequest,
  rejectionOf,
} from './fakes.js';

// 2025-11-06T04:30:00Z in IST
const NOW_IST = '2025-11-06 10:00:00';
const FUTURE = '2025-11-06T04:35:00.000Z';
const PAST = '2025-11-06T04:29:00.000Z';

function setup(requests: ServiceRequest[]) {
  const clock = new FakeClock();
  const engineers = new InMemoryEngineerRepository([makeEngineer()]);
  const repository = new InMemoryServiceRequestRepository(requests);
  const email = new RecordingEmailSender();
  const sms = new RecordingSmsSender();
  const workflow = new ServiceRequestWorkflow({
    requests: repository,
    engineers,
    customers: new InMemoryCustomerRepository([makeCustomer()]),
    notifier: new CustomerNotifier(email, sms),
    clock,
    timezoneOffsetMinutes: 330,
    otpTtlMinutes: 10,
    generateId: () => 'req-new',
    generateOtp: () => '654321',
  });
  return { workflow, repository, engineers, email, sms, clock };
}

const confirmed = (overrides: Partial<ServiceRequest> = {}) =>
  makeRequest({ assignmentStatus: 'confirmed', ...overrides });

const started = (overrides: Partial<ServiceRequest> = {}) =>
  confirmed({
    ticketStatus: 'in_progress',
    resolution: { startDate: '2025-11-06 09:30:00', endDate: null, actionPerformed: null, additionalNotes: null, feedback: null },
    ...overrides,
  });

describe('ServiceRequestWorkflow', () => {
  describe('accept', () => {
    it('confirms the assignment, logs it and notifies the customer', async () => {
      const { workflow, engineers, email, sms } = setup([makeRequest()]);

      const updated = await workflow.accept('eng-1', 'cust-1', 'req-1');

      expect(updated.assignmentStatus).to.equal('confirmed');
      expect(updated.engineerAssignedOn).to.equal(NOW_IST);
      expect(updated.ticketActivity).to.deep.equal([
        { timestamp: NOW_IST, addedBy: 'system', notes: 'Service request assigned to Asha Rao (Engineer Id: eng-1)' },
      ]);
      expect(engineers.ticketAdjustments).to.deep.equal([{ engineerId: 'eng-1', delta: 1 }]);
      expect(email.sent.map((message) => message.subject)).to.deep.equal([
        'Engineer assigned to your service request #req-1',
      ]);
      expect(email.sent[0]?.toName).to.equal('Ravi Kumar');
      expect(sms.sent.map((message) => message.to)).to.deep.equal(['+910000000002']);
    });

    it('still succeeds when the email cannot be sent', async () => {
      const { workflow, email, sms } = setup([makeRequest()]);
      email.failWith = new Error('smtp down');

      const updated = await workflow.accept('eng-1', 'cust-1', 'req-1');

      expect(updated.assignmentStatus).to.equal('confirmed');
      expect(sms.sent).to.have.length(1);
    });

    it('refuses a request that is no longer pending', async () => {
      const { workflow } = setup([confirmed()]);
      const error = await rejectionOf(workflow.accept('eng-1', 'cust-1', 'req-1'));
      expect(error).to.be.instanceOf(ConflictError);
    });

    it('refuses a request assigned to someone else', async () => {
      const { workflow } = setup([makeRequest({ assignedTo: 'eng-2' })]);
      const error = await rejectionOf(workflow.accept('eng-1', 'cust-1', 'req-1'));
      expect(error).to.be.instanceOf(ForbiddenError);
    });
  });

  describe('reject', () => {
    it('hands the request back to admin', async () => {
      const { workflow } = setup([makeRequest()]);

      const updated = await workflow.reject('eng-1', 'cust-1', 'req-1');

      expect(updated.assignmentStatus).to.equal('rejected');
      expect(updated.assignedTo).to.equal('admin');
      expect(updated.ticketActivity.map((entry) => entry.notes)).to.deep.equal(['REJECTED_BY_ENGINEER_eng-1']);
    });
  });

  describe('verify', () => {
    it('fails before the request is accepted', async () => {
      const { workflow } = setup([makeRequest({ verificationOtp: { code: '123456', expiresOn: FUTURE } })]);
      const error = await rejectionOf(workflow.verify('eng-1', 'cust-1', 'req-1', '123456'));
      expect(error).to.be.instanceOf(ConflictError);
    });

    it('answers 401 for a wrong code', async () => {
      const { workflow } = setup([confirmed({ verificationOtp: { code: '123456', expiresOn: FUTURE } })]);
      const error = await rejectionOf(workflow.verify('eng-1', 'cust-1', 'req-1', '000000'));
      expect(error).to.be.instanceOf(OtpError);
      expect(error).to.have.property('statusCode', 401);
    });

    it('answers 402 when no code was issued', async () => {
      const { workflow } = setup([confirmed()]);
      const error = await rejectionOf(workflow.verify('eng-1', 'cust-1', 'req-1', '123456'));
      expect(error).to.have.property('statusCode', 402);
    });

    it('answers 402 for an expired code, even when it matches', async () => {
      const { workflow } = setup([confirmed({ verificationOtp: { code: '123456', expiresOn: PAST } })]);
      const error = await rejectionOf(workflow.verify('eng-1', 'cust-1', 'req-1', '123456'));
      expect(error).to.have.property('statusCode', 402);
    });

    it('starts the resolution and clears the code', async () => {
      const { workflow, email } = setup([confirmed({ verificationOtp: { code: '123456', expiresOn: FUTURE } })]);

      const updated = await workflow.verify('eng-1', 'cust-1', 'req-1', ' 123456 ');

      expect(updated.ticketStatus).to.equal('in_progress');
      expect(updated.resolution.startDate).to.equal(NOW_IST);
      expect(updated.verificationOtp).to.equal(null);
      expect(email.sent.map((message) => message.subject)).to.deep.equal(['Work has started on service request #req-1']);
    });

    it('cannot be repeated once resolution has started', async () => {
      const { workflow } = setup([started({ verificationOtp: { code: '123456', expiresOn: FUTURE } })]);
      const error = await rejectionOf(workflow.verify('eng-1', 'cust-1', 'req-1', '123456'));
      expect(error).to.be.instanceOf(ConflictError);
    });
  });

  describe('resolve', () => {
    const input = { otp: '222222', actionPerformed: 'Replaced thermostat', additionalNotes: 'Advised defrost' };

    it('fails before verification', async () => {
      const { workflow } = setup([confirmed({ resolutionOtp: { code: '222222', expiresOn: FUTURE } })]);
      const error = await rejectionOf(workflow.resolve('eng-1', 'cust-1', 'req-1', input));
      expect(error).to.be.instanceOf(ConflictError);
    });

    it('requires the action performed', async () => {
      const { workflow } = setup([started({ resolutionOtp: { code: '222222', expiresOn: FUTURE } })]);
      const error = await rejectionOf(workflow.resolve('eng-1', 'cust-1', 'req-1', { ...input, actionPerformed: ' ' }));
      expect(error).to.be.instanceOf(ValidationError);
    });

    it('closes the ticket and releases the engineer', async () => {
      const { workflow, engineers, email } = setup([
        started({ resolutionOtp: { code: '222222', expiresOn: FUTURE } }),
      ]);

      const updated = await workflow.resolve('eng-1', 'cust-1', 'req-1', input);

      expect(updated.ticketStatus).to.equal('resolved');
      expect(updated.resolutionOtp).to.equal(null);
      expect(updated.resolution).to.deep.equal({
        startDate: '2025-11-06 09:30:00',
        endDate: NOW_IST,
        actionPerformed: 'Replaced thermostat',
        additionalNotes: 'Advised defrost',
        feedback: null,
      });
      expect(engineers.ticketAdjustments).to.deep.equal([{ engineerId: 'eng-1', delta: -1 }]);
      expect(email.sent.map((message) => message.subject)).to.deep.equal(['Service request #req-1 resolved']);
    });

    it('refuses a ticket that is already resolved', async () => {
      const { workflow } = setup([started({ ticketStatus: 'resolved' })]);
      const error = await rejectionOf(workflow.resolve('eng-1', 'cust-1', 'req-1', input));
      expect(error).to.be.instanceOf(ConflictError);
    });
  });

  describe('activities and safety reports', () => {
    it('appends an engineer activity', async () => {
      const { workflow } = setup([confirmed()]);
      const updated = await workflow.addActivity('eng-1', 'cust-1', 'req-1', 'Ordered spare part');
      expect(updated.ticketActivity).to.deep.equal([
        { timestamp: NOW_IST, addedBy: 'Engineer', notes: 'Ordered spare part' },
      ]);
    });

    it('rejects activities on resolved tickets', async () => {
      const { workflow } = setup([started({ ticketStatus: 'resolved' })]);
      const error = await rejectionOf(workflow.addActivity('eng-1', 'cust-1', 'req-1', 'Late note'));
      expect(error).to.be.instanceOf(ConflictError);
    });

    it('keeps the first unsafe condition report', async () => {
      const { workflow, repository } = setup([confirmed()]);

      const first = await workflow.reportUnsafeCondition('eng-1', 'cust-1', 'req-1', 'Exposed wiring');
      const second = await workflow.reportUnsafeCondition('eng-1', 'cust-1', 'req-1', 'Wet floor');

      expect(first).to.deep.equal({ alreadyReported: false, description: 'Exposed wiring' });
      expect(second).to.deep.equal({ alreadyReported: true, description: 'Exposed wiring' });
      const stored = await repository.find('cust-1', 'req-1');
      expect(stored?.unsafeWorkingConditionReported).to.equal('Exposed wiring');
    });
  });

  describe('concurrent updates', () => {
    it('lets only one of two simultaneous accepts through', async () => {
      const { workflow, engineers, repository } = setup([makeRequest()]);

      const results = await Promise.allSettled([
        workflow.accept('eng-1', 'cust-1', 'req-1'),
        workflow.accept('eng-1', 'cust-1', 'req-1'),
      ]);

      expect(results.filter((result) => result.status === 'fulfilled')).to.have.length(1);
      const failure = results.find((result) => result.status === 'rejected');
      expect(failure?.status === 'rejected' ? failure.reason : null).to.be.instanceOf(ConflictError);
      expect(engineers.ticketAdjustments).to.deep.equal([{ engineerId: 'eng-1', delta: 1 }]);
      expect((await repository.find('cust-1', 'req-1'))?.ticketActivity).to.have.length(1);
    });

    it('releases the engineer once when a ticket is resolved twice at the same time', async () => {
      const { workflow, engineers } = setup([started({ resolutionOtp: { code: '222222', expiresOn: FUTURE } })]);
      const input = { otp: '222222', actionPerformed: 'Replaced thermostat' };

      const results = await Promise.allSettled([
        workflow.resolve('eng-1', 'cust-1', 'req-1', input),
        workflow.resolve('eng-1', 'cust-1', 'req-1', input),
      ]);

      expect(results.map((result) => result.status).sort()).to.deep.equal(['fulfilled', 'rejected']);
      expect(engineers.ticketAdjustments).to.deep.equal([{ engineerId: 'eng-1', delta: -1 }]);
    });

    it('keeps every note added at the same time', async () => {
      const { workflow, repository } = setup([confirmed()]);

      await Promise.all([
        workflow.addActivity('eng-1', 'cust-1', 'req-1', 'Ordered spare part'),
        workflow.addActivity('eng-1', 'cust-1', 'req-1', 'Customer asked for a morning visit'),
      ]);

      const stored = await repository.find('cust-1', 'req-1');
      expect(stored?.ticketActivity.map((entry) => entry.notes)).to.have.members([
        'Ordered spare part',
        'Customer asked for a morning visit',
      ]);
    });

    it('stores only the first of two simultaneous unsafe condition reports', async () => {
      const { workflow, repository } = setup([confirmed()]);

      const [first, second] = await Promise.all([
        workflow.reportUnsafeCondition('eng-1', 'cust-1', 'req-1', 'Exposed wiring'),
        workflow.reportUnsafeCondition('eng-1', 'cust-1', 'req-1', 'Wet floor'),
      ]);

      expect(first).to.deep.equal({ alreadyReported: false, description: 'Exposed wiring' });
      expect(second).to.deep.equal({ alreadyReported: true, description: 'Exposed wiring' });
      const stored = await repository.find('cust-1', 'req-1');
      expect(stored?.ticketActivity).to.have.length(1);
    });
  });

  describe('listing', () => {
    it('counts tickets per view', async () => {
      const { workflow } = setup([
        makeRequest({ requestId: 'a' }),
        confirmed({ requestId: 'b' }),
        confirmed({ requestId: 'c', ticketStatus: 'resolved' }),
        confirmed({ requestId: 'd', ticketStatus: 'in_progress' }),
        confirmed({ requestId: 'e', assignedTo: 'eng-2' }),
      ]);

      expect(await workflow.countsForEngineer('eng-1')).to.deep.equal({ assigned: 2, pending: 1, resolved: 1 });
      const assigned = await workflow.listForEngineer('eng-1', 'assigned');
      expect(assigned.map((request) => request.requestId)).to.deep.equal(['b', 'd']);
    });

    it('returns resolved history for an appliance oldest first', async () => {
      const { workflow } = setup([
        confirmed({ requestId: 'new', ticketStatus: 'resolved', createdOn: '2025-10-02 10:00:00' }),
        confirmed({ requestId: 'old', ticketStatus: 'resolved', createdOn: '2025-03-01 10:00:00' }),
        confirmed({ requestId: 'open' }),
      ]);
      const history = await workflow.resolvedForAppliance('cust-1', 'SN-100');
      expect(history.map((request) => request.requestId)).to.deep.equal(['old', 'new']);
    });
  });

  describe('intake', () => {
    const base = makeRequest();
    const input = {
      customerId: base.customerId,
      requestTitle: base.requestTitle,
      description: base.description,
      requestType: base.requestType,
      applianceDetails: base.applianceDetails,
      address: base.address,
      customerContact: base.customerContact,
    };

    it('assigns to admin when no assignment strategy is configured', async () => {
      const { workflow } = setup([]);

      const created = await workflow.create(input);

      expect(created.requestId).to.equal('req-new');
      expect(created.assignedTo).to.equal('admin');
      expect(created.engineerAssignedOn).to.equal(null);
      expect(created.ticketStatus).to.equal('open');
      expect(created.assignmentStatus).to.equal('pending');
      expect(created.ticketActivity).to.deep.equal([
        { timestamp: NOW_IST, addedBy: 'Customer', notes: 'Service request raised' },
      ]);
    });

    it('requires a title', async () => {
      const { workflow } = setup([]);
      const error = await rejectionOf(workflow.create({ ...input, requestTitle: '' }));
      expect(error).to.be.instanceOf(ValidationError);
    });

    it('issues a verification code once the request is confirmed', async () => {
      const { workflow, repository } = setup([confirmed()]);

      const otp = await workflow.issueOtp('cust-1', 'req-1', 'verification');

      expect(otp).to.deep.equal({ code: '654321', expiresOn: '2025-11-06T04:40:00.000Z' });
      const stored = await repository.find('cust-1', 'req-1');
      expect(stored?.verificationOtp).to.deep.equal(otp);
    });

    it('refuses a resolution code before work has started', async () => {
      const { workflow } = setup([confirmed()]);
      const error = await rejectionOf(workflow.issueOtp('cust-1', 'req-1', 'resolution'));
      expect(error).to.be.instanceOf(ConflictError);
    });
  });
});
