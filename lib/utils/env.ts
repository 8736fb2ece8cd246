/**
 * Environment configuration
 * Reads and validates the settings the API understands
 */

export type AuthMode = 'mock' | 'secure';

export type CorsOrigins = '*' | string[];

export interface AppConfig {
  authMode: AuthMode;
  bcryptRounds: number;
  seedDemoData: boolean;
  corsOrigins: CorsOrigins;
}

const knownEnvVars = [
  'AUTH_MODE',
  'BCRYPT_ROUNDS',
  'SEED_DEMO_DATA',
  'CORS_ORIGINS',
] as const;

export type EnvSource = Partial<Record<(typeof knownEnvVars)[number], string>>;

const DEFAULT_BCRYPT_ROUNDS = 10;

function parseAuthMode(raw: string | undefined, problems: string[]): AuthMode {
  if (!raw) return 'mock';
  if (raw === 'mock' || raw === 'secure') return raw;
  problems.push(`AUTH_MODE must be "mock" or "secure" (got "${raw}")`);
  return 'mock';
}

function parseRounds(raw: string | undefined, problems: string[]): number {
  if (!raw) return DEFAULT_BCRYPT_ROUNDS;
  const rounds = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  // bcryptjs only accepts cost factors in this range
  if (Number.isNaN(rounds) || rounds < 4 || rounds > 31) {
    problems.push(`BCRYPT_ROUNDS must be an integer between 4 and 31 (got "${raw}")`);
    return DEFAULT_BCRYPT_ROUNDS;
  }
  return rounds;
}

function parseFlag(name: string, raw: string | undefined, fallback: boolean, problems: string[]): boolean {
  if (!raw) return fallback;
  const value = raw.toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  problems.push(`${name} must be true or false (got "${raw}")`);
  return fallback;
}

function parseOrigins(raw: string | undefined, authMode: AuthMode): CorsOrigins {
  if (raw === undefined) return authMode === 'mock' ? '*' : [];
  if (raw.trim() === '*') return '*';
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

/**
 * Build the app configuration from an environment.
 * Every invalid variable is reported in a single error.
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const problems: string[] = [];

  const authMode = parseAuthMode(env.AUTH_MODE, problems);
  const bcryptRounds = parseRounds(env.BCRYPT_ROUNDS, problems);
  // The demo account only makes sense against the mock credential rules
  const seedDemoData = parseFlag('SEED_DEMO_DATA', env.SEED_DEMO_DATA, authMode === 'mock', problems);
  const corsOrigins = parseOrigins(env.CORS_ORIGINS, authMode);

  if (problems.length > 0) {
    throw new Error(
      `Invalid environment configuration: ${problems.join('; ')}\n` +
      'Please check your .env.local file or environment configuration.'
    );
  }

  return { authMode, bcryptRounds, seedDemoData, corsOrigins };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
