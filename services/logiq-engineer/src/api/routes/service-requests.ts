import { Router } from 'express';
import { readOptionalString, readString } from '../../agents/args.js';
import { currentEngineer } from '../../middleware/auth.js';
import type { ServiceRequestWorkflow } from '../../services/service-request-workflow.js';
import type { ServiceRequest, TicketView } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { requestBody, routeParam } from '../body.js';
import { asyncRoute, ok } from '../respond.js';

const VIEWS: readonly TicketView[] = ['assigned', 'pending', 'resolved'];

export function parseView(value: unknown): TicketView {
  if (value === undefined) {
    return 'assigned';
  }
  const view = VIEWS.find((candidate) => candidate === value);
  if (!view) {
    throw new ValidationError(`view must be one of ${VIEWS.join(', ')}`);
  }
  return view;
}

/** Service request as returned to the engineer app; OTP codes stay server side. */
export function withoutOtps(request: ServiceRequest): Omit<ServiceRequest, 'verificationOtp' | 'resolutionOtp'> {
  const { verificationOtp: _verification, resolutionOtp: _resolution, ...rest } = request;
  return rest;
}

export function createServiceRequestRoutes(workflow: ServiceRequestWorkflow): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const { engineerId } = currentEngineer(req);
      const requests = await workflow.listForEngineer(engineerId, parseView(req.query['view']));
      ok(res, requests.map(withoutOtps));
    })
  );

  router.get(
    '/counts',
    asyncRoute(async (req, res) => {
      ok(res, await workflow.countsForEngineer(currentEngineer(req).engineerId));
    })
  );

  router.get(
    '/:customerId/:requestId',
    asyncRoute(async (req, res) => {
      const request = await workflow.getForEngineer(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId')
      );
      ok(res, withoutOtps(request));
    })
  );

  router.post(
    '/:customerId/:requestId/accept',
    asyncRoute(async (req, res) => {
      const request = await workflow.accept(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId')
      );
      ok(res, withoutOtps(request), 'Service request accepted');
    })
  );

  router.post(
    '/:customerId/:requestId/reject',
    asyncRoute(async (req, res) => {
      const request = await workflow.reject(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId')
      );
      ok(res, withoutOtps(request), 'Service request rejected');
    })
  );

  router.post(
    '/:customerId/:requestId/verify',
    asyncRoute(async (req, res) => {
      const request = await workflow.verify(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId'),
        readString(requestBody(req), 'otp')
      );
      ok(res, withoutOtps(request), 'OTP verified, resolution started');
    })
  );

  router.post(
    '/:customerId/:requestId/resolve',
    asyncRoute(async (req, res) => {
      const body = requestBody(req);
      const request = await workflow.resolve(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId'),
        {
          otp: readString(body, 'otp'),
          actionPerformed: readOptionalString(body, 'actionPerformed'),
          additionalNotes: readOptionalString(body, 'additionalNotes'),
        }
      );
      ok(res, withoutOtps(request), 'Service request resolved');
    })
  );

  router.post(
    '/:customerId/:requestId/activities',
    asyncRoute(async (req, res) => {
      const request = await workflow.addActivity(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId'),
        readOptionalString(requestBody(req), 'notes')
      );
      ok(res, request.ticketActivity, 'Activity added', 201);
    })
  );

  router.post(
    '/:customerId/:requestId/unsafe-condition',
    asyncRoute(async (req, res) => {
      const report = await workflow.reportUnsafeCondition(
        currentEngineer(req).engineerId,
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId'),
        readOptionalString(requestBody(req), 'description')
      );
      ok(res, report, report.alreadyReported ? 'Unsafe condition was already reported' : 'Unsafe condition reported');
    })
  );

  return router;
}
