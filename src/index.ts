import { config, validateConfig } from './config/env';
import { createApp } from './app';
import { GuideService } from './services/guide.service';
import { HazardScanner } from './services/hazard.service';
import { OpenAIService } from './services/openai.service';
import { StorageService } from './services/storage.service';
import { errorMessage } from './utils/errors';

function bootstrap() {
  try {
    validateConfig();
  } catch (error) {
    console.error(`⚠️  ${errorMessage(error)}`);
    process.exit(1);
  }

  let scanner: HazardScanner;
  try {
    scanner = HazardScanner.fromFile(config.guide.hazardRulesPath);
  } catch (error) {
    console.error(`⚠️  ${errorMessage(error)}`);
    process.exit(1);
  }

  const guideService = new GuideService({
    generator: new OpenAIService(),
    scanner,
    storage: new StorageService(config.guide.tempDir),
    sessionTtl: config.guide.sessionTtlMinutes * 60 * 1000,
  });

  const app = createApp({ guideService });

  const server = app.listen(config.server.port, () => {
    console.log(`🩺 Visit Guide API running on port ${config.server.port}`);
    console.log(`📝 Environment: ${config.server.nodeEnv}`);
    console.log(`🚨 ${scanner.size} hazard rules loaded from ${config.guide.hazardRulesPath}`);
  });

  const shutdown = () => {
    guideService.shutdown();
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

bootstrap();
