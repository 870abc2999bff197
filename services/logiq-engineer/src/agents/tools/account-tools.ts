import { Type } from '@google/genai';
import type { ApplianceRepository } from '../../repositories/appliance-repository.js';
import { groupCatalog } from '../../repositories/appliance-repository.js';
import type { EngineerRepository } from '../../repositories/engineer-repository.js';
import type { Engineer } from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';
import { readString, readStringList } from '../args.js';
import type { AgentTool } from '../types.js';

export const AVAILABLE_SKILLS = [
  'Installation',
  'Maintenance/Servicing',
  'Calibration',
  'Part Replacement',
  'Noise/Leakage Issue',
  'Software/Firmware Update',
  'Inspection and Diagnosis',
  'Wiring Inspection',
  'Electrical Malfunction',
  'Mechanical Repair',
  'Overheating',
  'General Appliance Troubleshooting',
  'Cooling/Heating Issue',
  'Water Drainage Problem',
  'Vibration/Imbalance',
  'Gas Leakage Detection',
  'Rust or Corrosion Repair',
  'Control Panel Malfunction',
  'Error Code Diagnosis',
  'Appliance Relocation Assistance',
  'Smart Home Integration Support',
] as const;

export interface AccountToolDeps {
  engineers: EngineerRepository;
  appliances: ApplianceRepository;
  geo: { getDistrictFromZip(zipcode: string): Promise<string | null> };
}

export interface Partition {
  matched: string[];
  unmatched: string[];
}

/**
 * Split `requested` into entries found in `known` (returned in their canonical
 * spelling) and the rest. Matching ignores case; duplicates are dropped.
 */
export function partitionByKnown(requested: string[], known: readonly string[]): Partition {
  const canonical = new Map(known.map((entry) => [entry.toLowerCase(), entry]));
  const matched: string[] = [];
  const unmatched: string[] = [];

  for (const entry of requested) {
    const found = canonical.get(entry.toLowerCase());
    if (found) {
      if (!matched.includes(found)) matched.push(found);
    } else if (!unmatched.includes(entry)) {
      unmatched.push(entry);
    }
  }

  return { matched, unmatched };
}

function orNull(values: string[]): string[] | null {
  return values.length > 0 ? values : null;
}

const stringList = (description: string) => ({
  type: Type.ARRAY,
  items: { type: Type.STRING },
  description,
});

export function createAccountTools(deps: AccountToolDeps): AgentTool[] {
  const loadEngineer = async (engineerId: string): Promise<Engineer> => {
    const engineer = await deps.engineers.findById(engineerId);
    if (!engineer) {
      throw new NotFoundError(`Engineer ${engineerId} not found`);
    }
    return engineer;
  };

  const addSkills: AgentTool = {
    declaration: {
      name: 'add_skills',
      description: `Add skills to the engineer's profile. Valid skills: ${AVAILABLE_SKILLS.join(', ')}.`,
      parameters: {
        type: Type.OBJECT,
        properties: { new_skills: stringList('Skills to add.') },
        required: ['new_skills'],
      },
    },
    async execute(args, { engineerId }) {
      const { matched, unmatched } = partitionByKnown(readStringList(args, 'new_skills'), AVAILABLE_SKILLS);
      const engineer = await loadEngineer(engineerId);
      const skills = Array.from(new Set([...engineer.skills, ...matched]));
      await deps.engineers.update(engineerId, { skills });

      return {
        status: 'success',
        message: `Skills updated for engineer ID ${engineerId}.`,
        added_skills: orNull(matched),
        invalid_skills: orNull(unmatched),
      };
    },
  };

  const removeSkills: AgentTool = {
    declaration: {
      name: 'remove_skills',
      description: "Remove skills from the engineer's profile.",
      parameters: {
        type: Type.OBJECT,
        properties: { skills_to_remove: stringList('Skills to remove.') },
        required: ['skills_to_remove'],
      },
    },
    async execute(args, { engineerId }) {
      const requested = readStringList(args, 'skills_to_remove');
      const engineer = await loadEngineer(engineerId);
      if (engineer.skills.length === 0) {
        return { status: 'not_found', message: `No skills found for engineer ID ${engineerId}.` };
      }

      const { matched, unmatched } = partitionByKnown(requested, engineer.skills);
      await deps.engineers.update(engineerId, {
        skills: engineer.skills.filter((skill) => !matched.includes(skill)),
      });

      return {
        status: 'success',
        message: `Skills removed for engineer ID ${engineerId}.`,
        removed_skills: orNull(matched),
        not_found_skills: orNull(unmatched),
      };
    },
  };

  const addSpecializations: AgentTool = {
    declaration: {
      name: 'add_specializations',
      description:
        "Add appliance specializations to the engineer's profile. Each must be an appliance sub-category from the LogIQ catalog.",
      parameters: {
        type: Type.OBJECT,
        properties: { new_specializations: stringList('Appliance sub-categories to add.') },
        required: ['new_specializations'],
      },
    },
    async execute(args, { engineerId }) {
      const requested = readStringList(args, 'new_specializations');
      const available = Object.keys(groupCatalog(await deps.appliances.listCatalog()));
      const { matched, unmatched } = partitionByKnown(requested, available);

      const engineer = await loadEngineer(engineerId);
      const specializations = Array.from(new Set([...engineer.specializations, ...matched]));
      await deps.engineers.update(engineerId, { specializations });

      return {
        status: 'success',
        message: `Specializations added for engineer ID ${engineerId}.`,
        added_specializations: orNull(matched),
        invalid_specializations: orNull(unmatched),
      };
    },
  };

  const removeSpecializations: AgentTool = {
    declaration: {
      name: 'remove_specializations',
      description: "Remove appliance specializations from the engineer's profile.",
      parameters: {
        type: Type.OBJECT,
        properties: { specializations_to_remove: stringList('Appliance sub-categories to remove.') },
        required: ['specializations_to_remove'],
      },
    },
    async execute(args, { engineerId }) {
      const requested = readStringList(args, 'specializations_to_remove');
      const engineer = await loadEngineer(engineerId);
      if (engineer.specializations.length === 0) {
        return { status: 'not_found', message: `No specializations found for engineer ID ${engineerId}.` };
      }

      const { matched, unmatched } = partitionByKnown(requested, engineer.specializations);
      await deps.engineers.update(engineerId, {
        specializations: engineer.specializations.filter((entry) => !matched.includes(entry)),
      });

      return {
        status: 'success',
        message: `Specializations removed for engineer ID ${engineerId}.`,
        removed_specializations: orNull(matched),
        not_found_specializations: orNull(unmatched),
      };
    },
  };

  const updateAddress: AgentTool = {
    declaration: {
      name: 'update_address',
      description: "Replace the engineer's registered address. All fields are required.",
      parameters: {
        type: Type.OBJECT,
        properties: {
          street: { type: Type.STRING },
          city: { type: Type.STRING },
          district: { type: Type.STRING },
          state: { type: Type.STRING },
          zipcode: { type: Type.STRING },
          country: { type: Type.STRING },
        },
        required: ['street', 'city', 'district', 'state', 'zipcode', 'country'],
      },
    },
    async execute(args, { engineerId }) {
      const zipCode = readString(args, 'zipcode');
      const requestedDistrict = readString(args, 'district');
      const district = (await deps.geo.getDistrictFromZip(zipCode)) ?? requestedDistrict;

      const address = {
        street: readString(args, 'street'),
        city: readString(args, 'city'),
        district,
        state: readString(args, 'state'),
        zipCode,
        country: readString(args, 'country'),
      };

      const updated = await deps.engineers.update(engineerId, address);
      if (!updated) {
        throw new NotFoundError(`Engineer ${engineerId} not found`);
      }

      return {
        status: 'success',
        message: `Address updated for engineer ID ${engineerId}.`,
        address: {
          street: address.street,
          city: address.city,
          district: address.district,
          state: address.state,
          zipcode: address.zipCode,
          country: address.country,
        },
        district_corrected: district !== requestedDistrict,
      };
    },
  };

  return [addSpecializations, removeSpecializations, addSkills, removeSkills, updateAddress];
}
