import dotenv from 'dotenv';

dotenv.config();

export type Environment = 'development' | 'production' | 'test';

export interface AppConfig {
  env: Environment;
  port: number;
  urlPrefix: string;
  databaseUrl: string;
  redisUrl?: string;
  sessionTtlSeconds: number;
  timezoneOffsetMinutes: number;
  otpTtlMinutes: number;
  maxRouteStops: number;
  intakeApiKey?: string;
  genai: {
    apiKey?: string;
    useVertexAi: boolean;
    project?: string;
    location?: string;
    model: string;
    temperature: number;
    maxOutputTokens: number;
    fileSearchStore?: string;
  };
  firebase: {
    webApiKey?: string;
  };
  maps: {
    googleApiKey?: string;
    openCageApiKey?: string;
  };
  brevo: {
    apiKey?: string;
    senderEmail: string;
    senderName: string;
  };
  twilio: {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
    chatMaxRequests: number;
  };
  shutdownTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid integer for ${key}: ${raw}`);
  }
  return value;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseFloat(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid number for ${key}: ${raw}`);
  }
  return value;
}

function readOptional(env: Env, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function readEnvironment(env: Env): Environment {
  const value = env['NODE_ENV'] || 'development';
  if (value === 'development' || value === 'production' || value === 'test') {
    return value;
  }
  throw new Error(`Unsupported NODE_ENV: ${value}`);
}

/**
 * Build the service configuration from environment variables.
 *
 * The container sets `PORT`; `DEV_MODE=true` switches to `DEV_PORT` instead.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const devMode = env['DEV_MODE'] === 'true';
  const port = devMode ? readInt(env, 'DEV_PORT', 8501) : readInt(env, 'PORT', 8080);

  return {
    env: readEnvironment(env),
    port,
    urlPrefix: env['URL_PREFIX'] || '/logiq/api/v1',
    databaseUrl: env['DATABASE_URL'] || env['POSTGRES_URL'] || 'postgres://localhost:5432/logiq',
    redisUrl: readOptional(env, 'REDIS_URL'),
    sessionTtlSeconds: readInt(env, 'SESSION_TTL_SECONDS', 24 * 60 * 60),
    timezoneOffsetMinutes: readInt(env, 'SERVICE_TIMEZONE_OFFSET_MINUTES', 330),
    otpTtlMinutes: readInt(env, 'OTP_TTL_MINUTES', 10),
    maxRouteStops: readInt(env, 'MAX_ROUTE_STOPS', 12),
    intakeApiKey: readOptional(env, 'INTAKE_API_KEY'),
    genai: {
      apiKey: readOptional(env, 'GEMINI_API_KEY'),
      useVertexAi: env['GOOGLE_GENAI_USE_VERTEX_AI'] === '1' || env['GOOGLE_GENAI_USE_VERTEX_AI'] === 'true',
      project: readOptional(env, 'GOOGLE_CLOUD_PROJECT'),
      location: readOptional(env, 'GOOGLE_CLOUD_LOCATION'),
      model: env['AGENT_MODEL'] || 'gemini-2.5-flash',
      temperature: readFloat(env, 'AGENT_TEMPERATURE', 0.2),
      maxOutputTokens: readInt(env, 'AGENT_MAX_TOKENS', 4096),
      fileSearchStore: readOptional(env, 'TROUBLESHOOT_FILE_SEARCH_STORE'),
    },
    firebase: {
      webApiKey: readOptional(env, 'FIREBASE_AUTH_WEB_API_KEY'),
    },
    maps: {
      googleApiKey: readOptional(env, 'GOOGLE_MAPS_API_KEY'),
      openCageApiKey: readOptional(env, 'OPENCAGE_GEOCODING_API_KEY'),
    },
    brevo: {
      apiKey: readOptional(env, 'BREVO_API_KEY'),
      senderEmail: env['BREVO_SENDER_EMAIL'] || 'no-reply@logiq.com',
      senderName: env['BREVO_SENDER_NAME'] || 'LogIQ',
    },
    twilio: {
      accountSid: readOptional(env, 'TWILIO_ACCOUNT_SID'),
      authToken: readOptional(env, 'TWILIO_AUTH_TOKEN'),
      fromNumber: readOptional(env, 'TWILIO_FROM_NUMBER'),
    },
    rateLimit: {
      windowMs: readInt(env, 'RATE_LIMIT_WINDOW_MS', 60000),
      maxRequests: readInt(env, 'RATE_LIMIT_MAX_REQUESTS', 300),
      chatMaxRequests: readInt(env, 'CHAT_RATE_LIMIT_MAX_REQUESTS', 20),
    },
    shutdownTimeoutMs: readInt(env, 'SHUTDOWN_TIMEOUT_MS', 30000),
  };
}

/**
 * Keys the service cannot run without outside development.
 */
export function missingProductionKeys(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.genai.apiKey && !config.genai.useVertexAi) missing.push('GEMINI_API_KEY');
  if (config.genai.useVertexAi && !config.genai.project) missing.push('GOOGLE_CLOUD_PROJECT');
  if (!config.firebase.webApiKey) missing.push('FIREBASE_AUTH_WEB_API_KEY');
  if (!config.maps.googleApiKey) missing.push('GOOGLE_MAPS_API_KEY');
  if (!config.intakeApiKey) missing.push('INTAKE_API_KEY');
  return missing;
}
