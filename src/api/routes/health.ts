// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTE — Liveness and Provider Availability
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type RequestHandler } from 'express';

export interface ProviderStatus {
  isAvailable(): boolean;
}

export interface HealthProviders {
  readonly llm: ProviderStatus;
  readonly webSearch: ProviderStatus;
  readonly encyclopedia: ProviderStatus;
}

export interface HealthCheck {
  readonly status: 'ok';
  readonly timestamp: string;
  readonly providers: {
    readonly llm: boolean;
    readonly webSearch: boolean;
    readonly encyclopedia: boolean;
  };
}

export function healthHandler(providers: HealthProviders): RequestHandler {
  return (_req, res) => {
    const health: HealthCheck = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      providers: {
        llm: providers.llm.isAvailable(),
        webSearch: providers.webSearch.isAvailable(),
        encyclopedia: providers.encyclopedia.isAvailable(),
      },
    };
    res.json(health);
  };
}

export function createHealthRouter(providers: HealthProviders): Router {
  const router = Router();
  router.get('/health', healthHandler(providers));
  return router;
}
