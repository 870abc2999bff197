import { createApp } from './src/app.js';
import { createEngineerAgent } from './src/agents/engineer-agent.js';
import { GLOBAL_INSTRUCTION } from './src/agents/prompts.js';
import { AgentRuntime } from './src/agents/runtime.js';
import { createAccountTools } from './src/agents/tools/account-tools.js';
import { createNavigationTools } from './src/agents/tools/navigation-tools.js';
import { createTicketTools } from './src/agents/tools/ticket-tools.js';
import { createTroubleshootTools } from './src/agents/tools/troubleshoot-tools.js';
import { GenAiModelClient } from './src/clients/genai-client.js';
import { FirebaseIdentityClient } from './src/clients/identity-client.js';
import { loadConfig, missingProductionKeys } from './src/config/index.js';
import { createDatabase } from './src/db/client.js';
import { runDatabaseMigrations } from './src/db/migrate.js';
import { LocationServices } from './src/geo/location-services.js';
import { WeatherService } from './src/geo/weather-service.js';
import { RateLimitPresets } from './src/middleware/rate-limiter.js';
import { ErrorHandler } from './src/monitoring/error-handler.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { HealthMonitor } from './src/monitoring/health-monitor.js';
import { CustomerNotifier } from './src/notifications/customer-notifier.js';
import { BrevoEmailClient } from './src/notifications/email-client.js';
import { TwilioSmsClient } from './src/notifications/sms-client.js';
import { DrizzleApplianceRepository } from './src/repositories/appliance-repository.js';
import { DrizzleCustomerRepository } from './src/repositories/customer-repository.js';
import { DrizzleEngineerRepository } from './src/repositories/engineer-repository.js';
import { DrizzleServiceRequestRepository } from './src/repositories/service-request-repository.js';
import { AgentManager } from './src/services/agent-manager.js';
import { AuthService } from './src/services/auth-service.js';
import { EngineerAssignment } from './src/services/engineer-assignment.js';
import { createSessionStore } from './src/services/session-store.js';
import { ServiceRequestWorkflow } from './src/services/service-request-workflow.js';

const config = loadConfig();

const gracefulShutdown = new GracefulShutdown({ timeout: config.shutdownTimeoutMs });
gracefulShutdown.setupSignalHandlers();

async function startService(): Promise<void> {
  console.log('🚀 Starting LogIQ Engineer Service...');
  console.log(`Environment: ${config.env}`);
  console.log(`Port: ${config.port}`);
  console.log(`URL Prefix: ${config.urlPrefix}`);

  if (config.env === 'production') {
    const missing = missingProductionKeys(config);
    if (missing.length > 0) {
      throw new Error(`Missing required configuration: ${missing.join(', ')}`);
    }
  }

  console.log('🗄️ Connecting to PostgreSQL...');
  const database = createDatabase(config.databaseUrl);
  await runDatabaseMigrations(database.pool);
  console.log('✅ Database ready');

  const sessionStore = await createSessionStore(config.redisUrl);

  // Data and upstream clients
  const engineers = new DrizzleEngineerRepository(database.db);
  const customers = new DrizzleCustomerRepository(database.db);
  const appliances = new DrizzleApplianceRepository(database.db);
  const requests = new DrizzleServiceRequestRepository(database.db);
  const location = new LocationServices({
    googleApiKey: config.maps.googleApiKey,
    openCageApiKey: config.maps.openCageApiKey,
  });
  const weather = new WeatherService();
  const model = new GenAiModelClient(config.genai);

  const notifier = new CustomerNotifier(
    config.brevo.apiKey
      ? new BrevoEmailClient({
          apiKey: config.brevo.apiKey,
          senderEmail: config.brevo.senderEmail,
          senderName: config.brevo.senderName,
        })
      : null,
    config.twilio.accountSid && config.twilio.authToken && config.twilio.fromNumber
      ? new TwilioSmsClient({
          accountSid: config.twilio.accountSid,
          authToken: config.twilio.authToken,
          fromNumber: config.twilio.fromNumber,
        })
      : null
  );

  const workflow = new ServiceRequestWorkflow({
    requests,
    engineers,
    customers,
    notifier,
    assignment: new EngineerAssignment(engineers, location),
    timezoneOffsetMinutes: config.timezoneOffsetMinutes,
    otpTtlMinutes: config.otpTtlMinutes,
  });

  // Agents
  console.log('🤖 Building engineer agent tree...');
  const rootAgent = createEngineerAgent({
    engineers,
    timezoneOffsetMinutes: config.timezoneOffsetMinutes,
    tools: {
      account: createAccountTools({ engineers, appliances, geo: location }),
      navigation: createNavigationTools({ location, weather, customers, requests }),
      tickets: createTicketTools({ workflow, requests }),
      troubleshoot: createTroubleshootTools({
        model,
        modelName: config.genai.model,
        fileSearchStore: config.genai.fileSearchStore,
      }),
    },
  });
  const runtime = new AgentRuntime(rootAgent, model, {
    model: config.genai.model,
    temperature: config.genai.temperature,
    maxOutputTokens: config.genai.maxOutputTokens,
    globalInstruction: GLOBAL_INSTRUCTION,
  });
  const agentManager = new AgentManager(runtime, sessionStore, config.sessionTtlSeconds);

  const auth = new AuthService(new FirebaseIdentityClient(config.firebase.webApiKey ?? ''), engineers, sessionStore);
  const errorHandler = new ErrorHandler({ exposeStack: config.env === 'development' });
  const healthMonitor = new HealthMonitor(agentManager, {
    database: async () => {
      await database.pool.query('SELECT 1');
    },
  });
  const globalRateLimiter = RateLimitPresets.global(config.rateLimit.windowMs, config.rateLimit.maxRequests);

  const app = createApp({
    urlPrefix: config.urlPrefix,
    globalRateLimiter,
    auth,
    engineers,
    appliances,
    workflow,
    location,
    agentManager,
    sessionStore,
    healthMonitor,
    errorHandler,
    maxRouteStops: config.maxRouteStops,
    intakeApiKey: config.intakeApiKey,
    chatRateLimit: { windowMs: config.rateLimit.windowMs, maxRequests: config.rateLimit.chatMaxRequests },
  });

  const server = app.listen(config.port, () => {
    console.log('🌐 LogIQ Engineer service running on port', config.port);
    console.log(`📡 API endpoints available at: http://localhost:${config.port}${config.urlPrefix}`);
    console.log(`🔍 Health check available at: http://localhost:${config.port}${config.urlPrefix}/health`);
  });

  // Cleanup runs in this order on shutdown
  gracefulShutdown.addCleanupTask('Closing HTTP server', () => {
    return new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });
  gracefulShutdown.addCleanupTask('Stopping rate limiters', async () => {
    globalRateLimiter.stop();
  });
  gracefulShutdown.addCleanupTask('Stopping error store pruning', async () => {
    errorHandler.stop();
  });
  gracefulShutdown.addCleanupTask('Closing session store', () => sessionStore.close());
  gracefulShutdown.addCleanupTask('Closing database pool', () => database.close());

  console.log('🎉 LogIQ Engineer Service started successfully!');
}

startService().catch((error: unknown) => {
  console.error('💥 Failed to start service:', error);
  process.exit(1);
});
