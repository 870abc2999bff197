import { Router } from 'express';
import { groupCatalog, type ApplianceRepository } from '../../repositories/appliance-repository.js';
import { asyncRoute, ok } from '../respond.js';

export function createCatalogRoutes(appliances: ApplianceRepository): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      ok(res, groupCatalog(await appliances.listCatalog()));
    })
  );

  router.get(
    '/specializations',
    asyncRoute(async (req, res) => {
      ok(res, Object.keys(groupCatalog(await appliances.listCatalog())));
    })
  );

  return router;
}
