import { Router } from 'express';
import { readOptionalString, readString } from '../../agents/args.js';
import type { ServiceRequestWorkflow } from '../../services/service-request-workflow.js';
import type { NewServiceRequest, OtpPurpose } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { readObject, requestBody, routeParam, type Body } from '../body.js';
import { asyncRoute, ok } from '../respond.js';

export function parseNewServiceRequest(body: Body): NewServiceRequest {
  const appliance = readObject(body, 'applianceDetails');
  const address = readObject(body, 'address');
  const contact = readObject(body, 'customerContact');

  return {
    customerId: readString(body, 'customerId'),
    requestTitle: readString(body, 'requestTitle'),
    description: readOptionalString(body, 'description'),
    requestType: readOptionalString(body, 'requestType') || 'Repair',
    applianceDetails: {
      serialNumber: readString(appliance, 'serialNumber'),
      category: readOptionalString(appliance, 'category'),
      subCategory: readString(appliance, 'subCategory'),
      brand: readOptionalString(appliance, 'brand'),
      modelNumber: readOptionalString(appliance, 'modelNumber'),
    },
    address: {
      street: readOptionalString(address, 'street'),
      city: readOptionalString(address, 'city'),
      district: readString(address, 'district'),
      state: readOptionalString(address, 'state'),
      zipcode: readOptionalString(address, 'zipcode'),
    },
    customerContact: {
      email: readOptionalString(contact, 'email'),
      phoneNumber: readOptionalString(contact, 'phoneNumber'),
    },
  };
}

export function parseOtpPurpose(value: unknown): OtpPurpose {
  if (value === 'verification' || value === 'resolution') {
    return value;
  }
  throw new ValidationError("purpose must be 'verification' or 'resolution'");
}

/**
 * Customer-side calls: raising a request and issuing the OTPs the customer
 * reads out to the engineer.
 */
export function createIntakeRoutes(workflow: ServiceRequestWorkflow): Router {
  const router = Router();

  router.post(
    '/service-requests',
    asyncRoute(async (req, res) => {
      const created = await workflow.create(parseNewServiceRequest(requestBody(req)));
      ok(res, created, `Service request assigned to ${created.assignedTo}`, 201);
    })
  );

  router.post(
    '/service-requests/:customerId/:requestId/otp',
    asyncRoute(async (req, res) => {
      const otp = await workflow.issueOtp(
        routeParam(req, 'customerId'),
        routeParam(req, 'requestId'),
        parseOtpPurpose(requestBody(req)['purpose'])
      );
      ok(res, otp, 'OTP issued', 201);
    })
  );

  return router;
}
