import { ConfigurationError } from './errors';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export function readRequiredEnv(name: string, env: EnvSource = process.env): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is required`);
  }
  return value;
}

export function readOptionalEnv(name: string, env: EnvSource = process.env): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function readOptionalNumberEnv(name: string, env: EnvSource = process.env): number | undefined {
  const raw = readOptionalEnv(name, env);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return parsed;
}
