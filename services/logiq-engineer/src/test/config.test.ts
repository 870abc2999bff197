import { expect } from 'chai';
import { loadConfig, missingProductionKeys } from '../config/index.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.env).to.equal('development');
    expect(config.port).to.equal(8080);
    expect(config.urlPrefix).to.equal('/logiq/api/v1');
    expect(config.sessionTtlSeconds).to.equal(86400);
    expect(config.timezoneOffsetMinutes).to.equal(330);
    expect(config.maxRouteStops).to.equal(12);
    expect(config.redisUrl).to.equal(undefined);
    expect(config.genai).to.include({ model: 'gemini-2.5-flash', temperature: 0.2, maxOutputTokens: 4096, useVertexAi: false });
    expect(config.rateLimit).to.deep.equal({ windowMs: 60000, maxRequests: 300, chatMaxRequests: 20 });
  });

  it('uses DEV_PORT in dev mode', () => {
    expect(loadConfig({ DEV_MODE: 'true', PORT: '9000' }).port).to.equal(8501);
    expect(loadConfig({ DEV_MODE: 'true', DEV_PORT: '7000' }).port).to.equal(7000);
    expect(loadConfig({ PORT: '9000' }).port).to.equal(9000);
  });

  it('treats blank optional values as unset', () => {
    const config = loadConfig({ REDIS_URL: '  ', GEMINI_API_KEY: ' test-key ' });
    expect(config.redisUrl).to.equal(undefined);
    expect(config.genai.apiKey).to.equal('test-key');
  });

  it('rejects malformed numbers and environments', () => {
    expect(() => loadConfig({ OTP_TTL_MINUTES: 'ten' })).to.throw('Invalid integer for OTP_TTL_MINUTES: ten');
    expect(() => loadConfig({ AGENT_TEMPERATURE: 'warm' })).to.throw('Invalid number for AGENT_TEMPERATURE: warm');
    expect(() => loadConfig({ NODE_ENV: 'staging' })).to.throw('Unsupported NODE_ENV: staging');
  });
});

describe('missingProductionKeys', () => {
  it('lists every key a production deployment needs', () => {
    expect(missingProductionKeys(loadConfig({}))).to.deep.equal([
      'GEMINI_API_KEY',
      'FIREBASE_AUTH_WEB_API_KEY',
      'GOOGLE_MAPS_API_KEY',
      'INTAKE_API_KEY',
    ]);
  });

  it('asks for a project instead of an API key on Vertex AI', () => {
    const config = loadConfig({
      GOOGLE_GENAI_USE_VERTEX_AI: 'true',
      FIREBASE_AUTH_WEB_API_KEY: 'test-firebase-key',
      GOOGLE_MAPS_API_KEY: 'test-maps-key',
      INTAKE_API_KEY: 'test-intake-key',
    });
    expect(missingProductionKeys(config)).to.deep.equal(['GOOGLE_CLOUD_PROJECT']);
  });
});
