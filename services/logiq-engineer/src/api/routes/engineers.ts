import { Router } from 'express';
import { readStringList } from '../../agents/args.js';
import { AVAILABLE_SKILLS, partitionByKnown } from '../../agents/tools/account-tools.js';
import { currentEngineer } from '../../middleware/auth.js';
import type { EngineerRepository } from '../../repositories/engineer-repository.js';
import type { EngineerProfileUpdate } from '../../types/index.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { readBoolean, requestBody, type Body } from '../body.js';
import { asyncRoute, ok } from '../respond.js';

const TEXT_FIELDS = [
  'firstName',
  'lastName',
  'phoneNumber',
  'street',
  'city',
  'district',
  'state',
  'zipCode',
  'country',
] as const;

/**
 * Only the fields an engineer may edit directly. Skills have their own route;
 * specializations go through the account agent, which checks the catalog.
 */
export function parseProfileUpdate(body: Body): EngineerProfileUpdate {
  const update: EngineerProfileUpdate = {};

  for (const field of TEXT_FIELDS) {
    const value = body[field];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ValidationError(`Field '${field}' must be a non-empty string`);
    }
    update[field] = value.trim();
  }
  if (body['languageProficiency'] !== undefined) {
    update.languageProficiency = readStringList(body, 'languageProficiency');
  }

  if (Object.keys(update).length === 0) {
    throw new ValidationError('No editable profile fields supplied');
  }
  return update;
}

export function createEngineerRoutes(engineers: EngineerRepository): Router {
  const router = Router();

  const saved = async (engineerId: string, changes: EngineerProfileUpdate) => {
    const engineer = await engineers.update(engineerId, changes);
    if (!engineer) {
      throw new NotFoundError(`Engineer ${engineerId} not found`);
    }
    return engineer;
  };

  router.get(
    '/me',
    asyncRoute(async (req, res) => {
      ok(res, currentEngineer(req));
    })
  );

  router.patch(
    '/me',
    asyncRoute(async (req, res) => {
      const { engineerId } = currentEngineer(req);
      ok(res, await saved(engineerId, parseProfileUpdate(requestBody(req))), 'Profile updated');
    })
  );

  router.put(
    '/me/availability',
    asyncRoute(async (req, res) => {
      const { engineerId } = currentEngineer(req);
      const availability = readBoolean(requestBody(req), 'availability');
      ok(res, await saved(engineerId, { availability }), availability ? 'Marked available' : 'Marked unavailable');
    })
  );

  router.put(
    '/me/skills',
    asyncRoute(async (req, res) => {
      const { engineerId } = currentEngineer(req);
      const { matched, unmatched } = partitionByKnown(readStringList(requestBody(req), 'skills'), AVAILABLE_SKILLS);
      if (unmatched.length > 0) {
        throw new ValidationError('Unknown skills supplied', { invalid_skills: unmatched });
      }
      ok(res, await saved(engineerId, { skills: matched }), 'Skills updated');
    })
  );

  router.get('/skills', (req, res) => {
    ok(res, [...AVAILABLE_SKILLS]);
  });

  return router;
}
