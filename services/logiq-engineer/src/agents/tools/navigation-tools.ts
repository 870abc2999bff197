import { Type } from '@google/genai';
import type { LocationServices } from '../../geo/location-services.js';
import type { WeatherService } from '../../geo/weather-service.js';
import type { CustomerRepository } from '../../repositories/customer-repository.js';
import type { ServiceRequestRepository } from '../../repositories/service-request-repository.js';
import { formatAddress } from '../../utils/address.js';
import { readString } from '../args.js';
import type { AgentTool } from '../types.js';

export interface NavigationToolDeps {
  location: Pick<LocationServices, 'getDirections' | 'getTrafficEta'>;
  weather: Pick<WeatherService, 'getCurrentWeather'>;
  customers: CustomerRepository;
  requests: ServiceRequestRepository;
}

const routeParameters = {
  type: Type.OBJECT,
  properties: {
    origin: { type: Type.STRING, description: 'Start address.' },
    destination: { type: Type.STRING, description: 'Destination address.' },
  },
  required: ['origin', 'destination'],
};

export function createNavigationTools(deps: NavigationToolDeps): AgentTool[] {
  const getDirections: AgentTool = {
    declaration: {
      name: 'get_directions',
      description: 'Step-by-step driving directions between two addresses.',
      parameters: routeParameters,
    },
    async execute(args) {
      const directions = await deps.location.getDirections(readString(args, 'origin'), readString(args, 'destination'));
      return {
        status: 'success',
        start_address: directions.startAddress,
        end_address: directions.endAddress,
        directions: directions.steps,
      };
    },
  };

  const getTrafficEta: AgentTool = {
    declaration: {
      name: 'get_traffic_eta',
      description: 'Driving distance and travel time between two addresses, with and without current traffic.',
      parameters: routeParameters,
    },
    async execute(args) {
      const eta = await deps.location.getTrafficEta(readString(args, 'origin'), readString(args, 'destination'));
      return {
        status: 'success',
        origin: eta.origin,
        destination: eta.destination,
        distance: eta.distance,
        normal_duration: eta.duration,
        duration_in_traffic: eta.durationInTraffic,
      };
    },
  };

  const getWeather: AgentTool = {
    declaration: {
      name: 'get_weather',
      description: 'Current weather for a place identified by district, state and zip code.',
      parameters: {
        type: Type.OBJECT,
        properties: {
          district: { type: Type.STRING },
          state: { type: Type.STRING },
          zipcode: { type: Type.STRING },
        },
        required: ['district', 'state', 'zipcode'],
      },
    },
    async execute(args) {
      const district = typeof args['district'] === 'string' ? args['district'] : '';
      const state = typeof args['state'] === 'string' ? args['state'] : '';
      const zipcode = typeof args['zipcode'] === 'string' ? args['zipcode'] : '';

      const lookup = await deps.weather.getCurrentWeather(district, state, zipcode);
      if (lookup.status === 'error') {
        return { status: 'error', message: lookup.message };
      }
      return {
        status: 'success',
        weather: lookup.weather.description,
        temperature_celsius: lookup.weather.temperatureCelsius,
        wind_speed_kmh: lookup.weather.windSpeedKmh,
        wind_direction_degrees: lookup.weather.windDirectionDegrees,
      };
    },
  };

  const getCustomerAddress: AgentTool = {
    declaration: {
      name: 'get_customer_address',
      description: "Registered address of a customer the engineer has a ticket with.",
      parameters: {
        type: Type.OBJECT,
        properties: { customer_id: { type: Type.STRING } },
        required: ['customer_id'],
      },
    },
    async execute(args, { engineerId }) {
      const customerId = readString(args, 'customer_id');
      const tickets = await deps.requests.listByEngineer(engineerId);
      const customer = tickets.some((ticket) => ticket.customerId === customerId)
        ? await deps.customers.findById(customerId)
        : null;

      if (!customer) {
        return { status: 'error', message: "Customer's address not found." };
      }
      return { status: 'success', customer_address: formatAddress(customer) };
    },
  };

  return [getDirections, getTrafficEta, getWeather, getCustomerAddress];
}
