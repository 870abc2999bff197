import axios, { AxiosInstance, isAxiosError } from 'axios';
import { UpstreamError, errorMessage } from '../utils/errors.js';

const NOMINATIM_URL = 'https://nominatim.openstreetmap.org/search';
const OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';

// WMO weather interpretation codes used by Open-Meteo
const WEATHER_CODES: Record<number, string> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Fog',
  48: 'Depositing rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  56: 'Light freezing drizzle',
  57: 'Dense freezing drizzle',
  61: 'Slight rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  66: 'Light freezing rain',
  67: 'Heavy freezing rain',
  71: 'Slight snow fall',
  73: 'Moderate snow fall',
  75: 'Heavy snow fall',
  77: 'Snow grains',
  80: 'Slight rain showers',
  81: 'Moderate rain showers',
  82: 'Violent rain showers',
  85: 'Slight snow showers',
  86: 'Heavy snow showers',
  95: 'Thunderstorm (slight or moderate)',
  96: 'Thunderstorm with slight hail',
  99: 'Thunderstorm with heavy hail',
};

interface NominatimResult {
  lat: string;
  lon: string;
}

interface OpenMeteoResponse {
  current_weather?: {
    temperature: number;
    windspeed: number;
    winddirection: number;
    weathercode: number;
  };
}

export interface CurrentWeather {
  description: string;
  temperatureCelsius: number;
  windSpeedKmh: number;
  windDirectionDegrees: number;
}

export type WeatherLookup =
  | { status: 'success'; weather: CurrentWeather }
  | { status: 'error'; message: string };

export function describeWeatherCode(code: number): string {
  return WEATHER_CODES[code] ?? `Unknown. Weather code: ${code}`;
}

export class WeatherService {
  private readonly http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        timeout: 10000,
        headers: { 'User-Agent': 'logiq-engineers-navigation-agent' },
      });

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        const status = isAxiosError(error) ? error.response?.status : undefined;
        throw new UpstreamError('weather', `weather request failed: ${status ?? errorMessage(error)}`);
      }
    );
  }

  /**
   * Current conditions for a district/state/zip, geocoded through Nominatim.
   */
  async getCurrentWeather(district: string, state: string, zipcode: string): Promise<WeatherLookup> {
    if (!district || !state || !zipcode) {
      return { status: 'error', message: 'District, state and zip code are required.' };
    }

    const { data: places } = await this.http.get<NominatimResult[]>(NOMINATIM_URL, {
      params: { q: `${district}, ${state}-${zipcode}`, format: 'json' },
    });

    const place = places[0];
    if (!place) {
      return { status: 'error', message: 'Location not found.' };
    }

    const { data } = await this.http.get<OpenMeteoResponse>(OPEN_METEO_URL, {
      params: { latitude: place.lat, longitude: place.lon, current_weather: true },
    });

    const current = data.current_weather;
    if (!current) {
      return { status: 'error', message: 'Weather data not available.' };
    }

    return {
      status: 'success',
      weather: {
        description: describeWeatherCode(current.weathercode),
        temperatureCelsius: current.temperature,
        windSpeedKmh: current.windspeed,
        windDirectionDegrees: current.winddirection,
      },
    };
  }
}
