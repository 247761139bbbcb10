import { Logger, Module } from "@nestjs/common";

import { SignalAnalyzer } from "./analysis/signal-analyzer.js";
import { AnthropicVisionClient, OpenAiVisionClient } from "./clients/vision.client.js";
import type { VisionClient } from "./clients/vision.client.js";
import { HealthController } from "./controllers/health.controller.js";
import { VerifyController } from "./controllers/verify.controller.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { CritiqueEngine } from "./critique/critique.engine.js";
import { CritiqueHistory } from "./critique/critique.history.js";
import { PlaceholderOpinionProvider } from "./providers/opinion-provider.js";
import type { OpinionProvider, VisionSourceKind } from "./providers/opinion-provider.js";
import { VisionOpinionProvider } from "./providers/vision.provider.js";
import { InMemoryCaseRepository } from "./repository/memory.repository.js";
import { PostgresCaseRepository } from "./repository/postgres.repository.js";
import { AnalysisService } from "./services/analysis.service.js";
import { VerificationService } from "./services/verification.service.js";
import { APP_CONFIG, CASE_REPOSITORY, CRITIQUE_HISTORY, OPINION_PROVIDERS, VISION_CLIENTS } from "./tokens.js";

const VISION_SOURCES: readonly VisionSourceKind[] = ["physical", "contextual", "ai_generation"];

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const repositoryProvider = {
  provide: CASE_REPOSITORY,
  inject: [APP_CONFIG],
  useFactory: async (config: AppConfig) => {
    if (config.database.url) {
      const repo = new PostgresCaseRepository(config.database.url);
      await repo.init();
      return repo;
    }
    return new InMemoryCaseRepository();
  },
};

const historyProvider = {
  provide: CRITIQUE_HISTORY,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => new CritiqueHistory(config.critique.historyCapacity),
};

const visionClientsProvider = {
  provide: VISION_CLIENTS,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig): VisionClient[] => {
    const { anthropic, openai, timeoutMs } = config.vision;
    const clients: VisionClient[] = [];
    if (anthropic.apiKey) {
      clients.push(new AnthropicVisionClient({ apiKey: anthropic.apiKey, model: anthropic.model, timeoutMs }));
    }
    if (openai.apiKey) {
      clients.push(new OpenAiVisionClient({ apiKey: openai.apiKey, model: openai.model, timeoutMs }));
    }
    return clients;
  },
};

const opinionProvidersProvider = {
  provide: OPINION_PROVIDERS,
  inject: [SignalAnalyzer, VISION_CLIENTS],
  useFactory: (signalAnalyzer: SignalAnalyzer, clients: VisionClient[]): OpinionProvider[] => {
    if (clients.length === 0) {
      new Logger("OpinionProviders").warn("No vision API key configured; using placeholder opinions");
      return [signalAnalyzer, ...VISION_SOURCES.map((kind) => new PlaceholderOpinionProvider(kind))];
    }
    return [signalAnalyzer, ...VISION_SOURCES.map((kind) => new VisionOpinionProvider(kind, clients))];
  },
};

@Module({
  imports: [],
  controllers: [VerifyController, HealthController],
  providers: [
    configProvider,
    repositoryProvider,
    historyProvider,
    visionClientsProvider,
    opinionProvidersProvider,
    SignalAnalyzer,
    CritiqueEngine,
    AnalysisService,
    VerificationService,
  ],
})
export class AppModule {}
