/* src/config.ts
   Centralized service config */
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const parsed = Number.parseInt(env(name), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── HTTP ─────────────────────────────────────────────────────────
  server: {
    host: env('HOST', '0.0.0.0'),
    port: envInt('PORT', 4100),
    bodyLimit: envInt('BODY_LIMIT_BYTES', 1_048_576),
  },

  // ── CORS origins ─────────────────────────────────────────────────
  cors: {
    origins: env('CORS_ORIGINS', 'http://localhost:8000,http://127.0.0.1:8000')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
  },

  // ── Checklists ───────────────────────────────────────────────────
  checklists: {
    // Upper bound on uploaded (parsed) checklists accepted over HTTP
    maxCustomRules: envInt('MAX_CUSTOM_RULES', 500),
  },

  // ── Metrics ──────────────────────────────────────────────────────
  metrics: {
    enabled: env('METRICS_ENABLED', 'true') !== 'false',
    prefix: env('METRICS_PREFIX', 'compliance'),
  },
} as const;
