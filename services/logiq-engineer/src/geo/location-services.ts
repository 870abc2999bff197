import axios, { AxiosInstance, isAxiosError } from 'axios';
import polyline from '@mapbox/polyline';
import { UpstreamError, errorMessage } from '../utils/errors.js';

const MAPS_BASE_URL = 'https://maps.googleapis.com/maps/api';
const ADDRESS_VALIDATION_URL = 'https://addressvalidation.googleapis.com/v1:validateAddress';
const OPENCAGE_URL = 'https://api.opencagedata.com/geocode/v1/json';
const POSTAL_PINCODE_URL = 'https://api.postalpincode.in/pincode';

// Google caps a distance matrix request at 100 elements and 25 origins or destinations.
const MATRIX_MAX_ELEMENTS = 100;
const MATRIX_MAX_SIDE = 25;

function upstreamFor(url: string | undefined): string {
  if (url?.startsWith(OPENCAGE_URL)) {
    return 'opencage';
  }
  if (url?.startsWith(POSTAL_PINCODE_URL)) {
    return 'postal_pincode';
  }
  return 'google_maps';
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

const NEARBY_DISTRICT_RADIUS_METERS = 50000;

/* ---------- Google Maps response shapes (fields we read) ---------- */
interface LatLng {
  lat: number;
  lng: number;
}

interface TextValue {
  text: string;
  value: number;
}

interface DirectionsStep {
  html_instructions: string;
  distance: TextValue;
  duration: TextValue;
}

interface DirectionsLeg {
  start_address: string;
  end_address: string;
  distance: TextValue;
  duration: TextValue;
  duration_in_traffic?: TextValue;
  steps: DirectionsStep[];
}

interface DirectionsResponse {
  status: string;
  error_message?: string;
  routes: Array<{ overview_polyline: { points: string }; legs: DirectionsLeg[] }>;
}

interface DistanceMatrixElement {
  status: string;
  distance?: TextValue;
  duration?: TextValue;
}

interface DistanceMatrixResponse {
  status: string;
  error_message?: string;
  rows: Array<{ elements: DistanceMatrixElement[] }>;
}

interface GeocodeResponse {
  status: string;
  results: Array<{
    geometry: { location: LatLng };
    address_components: Array<{ long_name: string; types: string[] }>;
  }>;
}

interface NearbySearchResponse {
  status: string;
  results: Array<{ geometry: { location: LatLng } }>;
}

interface AddressValidationResponse {
  result?: { verdict?: { validationGranularity?: string } };
}

interface OpenCageResponse {
  results: Array<{ components: { state_district?: string; state?: string } }>;
}

type PincodeResponse = Array<{ Status: string; PostOffice: Array<{ District?: string }> | null }>;

/* ---------- Public result types ---------- */
export interface RouteGeometry {
  coordinates: Array<[number, number]>;
  center: [number, number];
  bounds: [[number, number], [number, number]];
  distance: string;
  duration: string;
}

export interface DirectionsResult {
  startAddress: string;
  endAddress: string;
  steps: string[];
}

export interface TrafficEta {
  origin: string;
  destination: string;
  distance: string;
  duration: string;
  durationInTraffic: string;
}

export type TravelEstimate =
  | { ok: true; distanceKm: number; durationMinutes: number }
  | { ok: false; reason: string };

export interface LocationServicesOptions {
  googleApiKey?: string;
  openCageApiKey?: string;
  http?: AxiosInstance;
}

export function stripHtml(value: string): string {
  return value
    .replace(/<div[^>]*>/gi, ' ')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Thin wrapper over the Google Maps web services plus the zip-code lookups the
 * engineer workflows need.
 */
export class LocationServices {
  private readonly http: AxiosInstance;
  private readonly googleApiKey?: string;
  private readonly openCageApiKey?: string;

  constructor(options: LocationServicesOptions = {}) {
    this.googleApiKey = options.googleApiKey;
    this.openCageApiKey = options.openCageApiKey;
    this.http =
      options.http ??
      axios.create({
        timeout: 15000,
        headers: { 'User-Agent': 'logiq-engineer-service/1.0.0' },
      });

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const upstream = upstreamFor(isAxiosError(error) ? error.config?.url : undefined);
        const status = isAxiosError(error) ? error.response?.status : undefined;
        console.error('Location service API error:', {
          upstream,
          message: errorMessage(error),
          status,
        });
        throw new UpstreamError(upstream, `${upstream} request failed: ${status ?? errorMessage(error)}`);
      }
    );
  }

  private requireGoogleKey(): string {
    if (!this.googleApiKey) {
      throw new UpstreamError('google_maps', 'Google Maps API key is not configured');
    }
    return this.googleApiKey;
  }

  private async directions(params: Record<string, string>): Promise<DirectionsLeg & { overview: string }> {
    const { data } = await this.http.get<DirectionsResponse>(`${MAPS_BASE_URL}/directions/json`, {
      params: { ...params, key: this.requireGoogleKey() },
    });

    const route = data.routes?.[0];
    const leg = route?.legs?.[0];
    if (data.status !== 'OK' || !route || !leg) {
      throw new UpstreamError('google_maps', `Directions request failed: ${data.status}${data.error_message ? ` (${data.error_message})` : ''}`);
    }

    return { ...leg, overview: route.overview_polyline.points };
  }

  /**
   * Route line for map display, with the middle point as map center.
   */
  async getRoute(origin: string, destination: string): Promise<RouteGeometry> {
    const leg = await this.directions({ origin, destination, mode: 'driving' });
    const coordinates = polyline.decode(leg.overview);

    if (coordinates.length === 0) {
      throw new UpstreamError('google_maps', 'Directions returned an empty route');
    }

    return {
      coordinates,
      center: coordinates[Math.floor(coordinates.length / 2)],
      bounds: [coordinates[0], coordinates[coordinates.length - 1]],
      distance: leg.distance.text,
      duration: leg.duration.text,
    };
  }

  async getDirections(origin: string, destination: string): Promise<DirectionsResult> {
    const leg = await this.directions({ origin, destination, mode: 'driving' });
    return {
      startAddress: leg.start_address,
      endAddress: leg.end_address,
      steps: leg.steps.map((step) => stripHtml(step.html_instructions)),
    };
  }

  async getTrafficEta(origin: string, destination: string): Promise<TrafficEta> {
    const leg = await this.directions({
      origin,
      destination,
      departure_time: 'now',
      traffic_model: 'best_guess',
    });

    return {
      origin: leg.start_address,
      destination: leg.end_address,
      distance: leg.distance.text,
      duration: leg.duration.text,
      durationInTraffic: (leg.duration_in_traffic ?? leg.duration).text,
    };
  }

  private async distanceMatrix(origins: string[], destinations: string[]): Promise<DistanceMatrixResponse> {
    const { data } = await this.http.get<DistanceMatrixResponse>(`${MAPS_BASE_URL}/distancematrix/json`, {
      params: {
        origins: origins.join('|'),
        destinations: destinations.join('|'),
        mode: 'driving',
        key: this.requireGoogleKey(),
      },
    });

    if (data.status !== 'OK') {
      throw new UpstreamError('google_maps', `Distance matrix request failed: ${data.status}`);
    }
    return data;
  }

  /**
   * Square matrix of driving distances in meters; failed elements are Infinity.
   */
  async getDistanceMatrix(addresses: string[]): Promise<number[][]> {
    const matrix: number[][] = addresses.map(() => []);
    for (const destinations of chunk(addresses, MATRIX_MAX_SIDE)) {
      const originsPerRequest = Math.min(MATRIX_MAX_SIDE, Math.floor(MATRIX_MAX_ELEMENTS / destinations.length));
      let offset = 0;
      for (const origins of chunk(addresses, originsPerRequest)) {
        const data = await this.distanceMatrix(origins, destinations);
        data.rows.forEach((row, index) => {
          const target = matrix[offset + index];
          target?.push(
            ...row.elements.map((element) =>
              element.status === 'OK' && element.distance ? element.distance.value : Infinity
            )
          );
        });
        offset += origins.length;
      }
    }
    return matrix;
  }

  /**
   * Distance in km from each origin to one destination.
   */
  async getBatchTravelDistances(origins: string[], destination: string): Promise<number[]> {
    if (origins.length === 0) {
      return [];
    }
    const distances: number[] = [];
    for (const batch of chunk(origins, MATRIX_MAX_SIDE)) {
      const data = await this.distanceMatrix(batch, [destination]);
      for (const row of data.rows) {
        const element = row.elements[0];
        distances.push(element?.status === 'OK' && element.distance ? element.distance.value / 1000 : Infinity);
      }
    }
    return distances;
  }

  async getTravelDistanceAndTime(origin: string, destination: string): Promise<TravelEstimate> {
    const { data } = await this.http.get<DistanceMatrixResponse>(`${MAPS_BASE_URL}/distancematrix/json`, {
      params: { origins: origin, destinations: destination, mode: 'driving', key: this.requireGoogleKey() },
    });

    if (data.status !== 'OK') {
      return { ok: false, reason: data.status };
    }

    const element = data.rows[0]?.elements[0];
    if (element?.status === 'OK' && element.distance && element.duration) {
      return {
        ok: true,
        distanceKm: Math.round(element.distance.value / 100) / 10,
        durationMinutes: Math.round(element.duration.value / 6) / 10,
      };
    }

    return { ok: false, reason: element?.status === 'NOT_FOUND' ? 'NOT_FOUND' : 'ZERO_RESULTS' };
  }

  async validateAddress(address: string): Promise<boolean> {
    const { data } = await this.http.post<AddressValidationResponse>(
      ADDRESS_VALIDATION_URL,
      { address: { addressLines: [address] } },
      { params: { key: this.requireGoogleKey() } }
    );

    const granularity = data.result?.verdict?.validationGranularity;
    return granularity !== undefined && granularity !== 'OTHER';
  }

  /**
   * Districts (administrative_area_level_3) of localities within 50 km.
   */
  async fetchNearbyDistricts(district: string): Promise<string[]> {
    const key = this.requireGoogleKey();
    const geocode = await this.http.get<GeocodeResponse>(`${MAPS_BASE_URL}/geocode/json`, {
      params: { address: district, key },
    });

    const origin = geocode.data.results?.[0]?.geometry.location;
    if (!origin) {
      return [];
    }

    const nearby = await this.http.get<NearbySearchResponse>(`${MAPS_BASE_URL}/place/nearbysearch/json`, {
      params: {
        location: `${origin.lat},${origin.lng}`,
        radius: NEARBY_DISTRICT_RADIUS_METERS,
        type: 'locality',
        key,
      },
    });

    const districts = new Set<string>();
    for (const place of nearby.data.results ?? []) {
      const { lat, lng } = place.geometry.location;
      const reverse = await this.http.get<GeocodeResponse>(`${MAPS_BASE_URL}/geocode/json`, {
        params: { latlng: `${lat},${lng}`, key },
      });

      for (const component of reverse.data.results?.[0]?.address_components ?? []) {
        if (component.types.includes('administrative_area_level_3')) {
          districts.add(component.long_name);
        }
      }
    }

    return Array.from(districts);
  }

  async getCityAndStateFromZipcode(zipcode: string): Promise<{ city: string | null; state: string | null }> {
    if (!this.openCageApiKey) {
      throw new UpstreamError('opencage', 'OpenCage API key is not configured');
    }

    const { data } = await this.http.get<OpenCageResponse>(OPENCAGE_URL, {
      params: { q: zipcode, key: this.openCageApiKey },
    });

    const components = data.results?.[0]?.components;
    return {
      city: components?.state_district ?? null,
      state: components?.state ?? null,
    };
  }

  /**
   * District for an Indian pincode, or null when the lookup has no answer.
   */
  async getDistrictFromZip(zipcode: string): Promise<string | null> {
    try {
      const { data } = await this.http.get<PincodeResponse>(`${POSTAL_PINCODE_URL}/${encodeURIComponent(zipcode)}`, {
        timeout: 5000,
      });
      return data[0]?.PostOffice?.[0]?.District || null;
    } catch (error) {
      console.warn(`Pincode lookup failed for ${zipcode}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
