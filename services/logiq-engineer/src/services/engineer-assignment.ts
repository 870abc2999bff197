import type { EngineerRepository } from '../repositories/engineer-repository.js';
import type { Engineer, NewServiceRequest } from '../types/index.js';
import { formatAddress, formatServiceAddress } from '../utils/address.js';
import { errorMessage } from '../utils/errors.js';

/** The geo lookups assignment needs; `LocationServices` satisfies it. */
export interface AssignmentGeo {
  fetchNearbyDistricts(district: string): Promise<string[]>;
  getBatchTravelDistances(origins: string[], destination: string): Promise<number[]>;
}

function normalise(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Picks the engineer for a new service request: available, specialised in the
 * appliance sub-category, based in the request's district or a nearby one.
 * Nearest by driving distance wins; ties go to the lighter workload.
 */
export class EngineerAssignment {
  constructor(
    private readonly engineers: EngineerRepository,
    private readonly geo: AssignmentGeo
  ) {}

  async findEngineer(request: Pick<NewServiceRequest, 'applianceDetails' | 'address'>): Promise<Engineer | null> {
    const districts = new Set([normalise(request.address.district)]);
    try {
      for (const district of await this.geo.fetchNearbyDistricts(request.address.district)) {
        districts.add(normalise(district));
      }
    } catch (error) {
      console.warn(`Nearby district lookup failed for ${request.address.district}:`, errorMessage(error));
    }

    const subCategory = normalise(request.applianceDetails.subCategory);
    const candidates = (await this.engineers.listAvailable()).filter(
      (engineer) =>
        districts.has(normalise(engineer.district)) &&
        engineer.specializations.some((specialization) => normalise(specialization) === subCategory)
    );

    if (candidates.length === 0) {
      return null;
    }

    let distances: number[];
    try {
      distances = await this.geo.getBatchTravelDistances(
        candidates.map(formatAddress),
        formatServiceAddress(request.address)
      );
    } catch (error) {
      console.warn('Travel distance lookup failed, falling back to workload only:', errorMessage(error));
      distances = candidates.map(() => Infinity);
    }

    const ranked = candidates
      .map((engineer, index) => ({ engineer, distance: distances[index] ?? Infinity }))
      .sort((a, b) => {
        if (a.distance !== b.distance) {
          return a.distance < b.distance ? -1 : 1;
        }
        return a.engineer.activeTickets - b.engineer.activeTickets;
      });

    return ranked[0].engineer;
  }
}
