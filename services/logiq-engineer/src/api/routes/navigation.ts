import { Router } from 'express';
import { readString, readStringList } from '../../agents/args.js';
import type { LocationServices } from '../../geo/location-services.js';
import { optimizeRoute } from '../../geo/route-optimizer.js';
import { ValidationError } from '../../utils/errors.js';
import { requestBody } from '../body.js';
import { asyncRoute, ok } from '../respond.js';

export type NavigationLocation = Pick<LocationServices, 'getRoute' | 'getDistanceMatrix' | 'getTravelDistanceAndTime'>;

export function createNavigationRoutes(location: NavigationLocation, maxRouteStops: number): Router {
  const router = Router();

  router.post(
    '/route',
    asyncRoute(async (req, res) => {
      const body = requestBody(req);
      ok(res, await location.getRoute(readString(body, 'origin'), readString(body, 'destination')));
    })
  );

  /**
   * The first address is the start of the trip; the rest are visited in
   * whichever order is shortest.
   */
  router.post(
    '/optimize',
    asyncRoute(async (req, res) => {
      const addresses = readStringList(requestBody(req), 'addresses');
      if (addresses.length > maxRouteStops) {
        throw new ValidationError(`At most ${maxRouteStops} stops can be optimized at once`);
      }
      const result = await optimizeRoute(addresses, (stops) => location.getDistanceMatrix(stops));
      ok(res, result, result.status === 'success' ? undefined : 'Route could not be optimized; original order kept');
    })
  );

  router.post(
    '/travel-estimate',
    asyncRoute(async (req, res) => {
      const body = requestBody(req);
      const estimate = await location.getTravelDistanceAndTime(readString(body, 'origin'), readString(body, 'destination'));
      if (!estimate.ok) {
        ok(res, null, `No travel estimate available: ${estimate.reason}`);
        return;
      }
      ok(res, { distanceKm: estimate.distanceKm, durationMinutes: estimate.durationMinutes });
    })
  );

  return router;
}
