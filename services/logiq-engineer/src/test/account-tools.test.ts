import { expect } from 'chai';
import type { ToolContext } from '../agents/types.js';
import type { Engineer } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { createAccountTools, partitionByKnown } from '../agents/tools/account-tools.js';
import { InMemoryApplianceRepository, InMemoryEngineerRepository, makeEngineer, rejectionOf, toolNamed } from './fakes.js';

const context: ToolContext = { engineerId: 'eng-1', sessionId: 'session-1', state: {} };

function setup(districtForZip: string | null = null, overrides: Partial<Engineer> = {}) {
  const engineers = new InMemoryEngineerRepository([makeEngineer(overrides)]);
  const appliances = new InMemoryApplianceRepository([
    { category: 'Kitchen', subCategory: 'Refrigerator', brand: 'Coolio', modelNumber: 'C-200' },
    { category: 'Laundry', subCategory: 'Washing Machine', brand: 'Spinz', modelNumber: 'S-1' },
  ]);
  const tools = createAccountTools({
    engineers,
    appliances,
    geo: { getDistrictFromZip: async () => districtForZip },
  });
  return { engineers, tools };
}

describe('partitionByKnown', () => {
  it('matches case-insensitively and returns canonical spelling', () => {
    expect(partitionByKnown(['calibration', 'Juggling', 'CALIBRATION', 'juggling'], ['Installation', 'Calibration'])).to.deep.equal({
      matched: ['Calibration'],
      unmatched: ['Juggling', 'juggling'],
    });
  });
});

describe('account tools', () => {
  it('adds only known skills and reports the rest', async () => {
    const { engineers, tools } = setup();

    const result = await toolNamed(tools, 'add_skills').execute(
      { new_skills: ['overheating', 'Installation', 'Welding'] },
      context
    );

    expect(result).to.deep.equal({
      status: 'success',
      message: 'Skills updated for engineer ID eng-1.',
      added_skills: ['Overheating', 'Installation'],
      invalid_skills: ['Welding'],
    });
    expect((await engineers.findById('eng-1'))?.skills).to.deep.equal(['Installation', 'Overheating']);
  });

  it('removes skills and lists the ones the engineer did not have', async () => {
    const { engineers, tools } = setup();

    const result = await toolNamed(tools, 'remove_skills').execute(
      { skills_to_remove: ['installation', 'Calibration'] },
      context
    );

    expect(result).to.deep.equal({
      status: 'success',
      message: 'Skills removed for engineer ID eng-1.',
      removed_skills: ['Installation'],
      not_found_skills: ['Calibration'],
    });
    expect((await engineers.findById('eng-1'))?.skills).to.deep.equal([]);
  });

  it('reports not_found when there is nothing to remove', async () => {
    const { tools } = setup(null, { skills: [] });
    const result = await toolNamed(tools, 'remove_skills').execute({ skills_to_remove: ['Installation'] }, context);
    expect(result).to.deep.equal({ status: 'not_found', message: 'No skills found for engineer ID eng-1.' });
  });

  it('accepts catalog sub-categories as specializations', async () => {
    const { engineers, tools } = setup();

    const result = await toolNamed(tools, 'add_specializations').execute(
      { new_specializations: ['washing machine', 'Toaster'] },
      context
    );

    expect(result).to.deep.equal({
      status: 'success',
      message: 'Specializations added for engineer ID eng-1.',
      added_specializations: ['Washing Machine'],
      invalid_specializations: ['Toaster'],
    });
    expect((await engineers.findById('eng-1'))?.specializations).to.deep.equal(['Refrigerator', 'Washing Machine']);
  });

  it('corrects the district from the zip code', async () => {
    const { engineers, tools } = setup('Bengaluru Urban');

    const result = await toolNamed(tools, 'update_address').execute(
      {
        street: '7 Park Lane',
        city: 'Bengaluru',
        district: 'Bangalore',
        state: 'Karnataka',
        zipcode: '560003',
        country: 'India',
      },
      context
    );

    expect(result).to.deep.equal({
      status: 'success',
      message: 'Address updated for engineer ID eng-1.',
      address: {
        street: '7 Park Lane',
        city: 'Bengaluru',
        district: 'Bengaluru Urban',
        state: 'Karnataka',
        zipcode: '560003',
        country: 'India',
      },
      district_corrected: true,
    });
    expect((await engineers.findById('eng-1'))?.zipCode).to.equal('560003');
  });

  it('rejects an address with a missing field', async () => {
    const { tools } = setup();
    const error = await rejectionOf(
      toolNamed(tools, 'update_address').execute({ street: '7 Park Lane', zipcode: '560003' }, context)
    );
    expect(error).to.be.instanceOf(ValidationError);
  });
});
