import { UploadFlow } from '../types';

export const DEFAULT_BASE_URL = 'http://localhost:8080';
export const API_KEY_PREFIX = 'mk_';
export const DEFAULT_CONTROL_TIMEOUT_MS = 30_000;
export const DEFAULT_TRANSFER_TIMEOUT_MS = 30 * 60 * 1000;

export type Env = Record<string, string | undefined>;

export interface ClientEnvironmentConfig {
  baseUrl: string;
  apiKey?: string;
  webhookSecret?: string;
  uploadFlow: UploadFlow;
  controlPlaneTimeoutMs: number;
  transferTimeoutMs: number;
}

export interface ApiKeyFormatChecks {
  hasPrefix: boolean;
  minLength: boolean;
  noSpaces: boolean;
  noQuotes: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseUploadFlow(value: string | undefined): UploadFlow {
  const flow = (value || 'legacy').trim().toLowerCase();
  if (flow === 'legacy' || flow === 'upfront') return flow;
  throw new ConfigError(`Unknown upload flow "${value}" (expected legacy or upfront)`);
}

export class ClientConfigLoader {
  /**
   * Load configuration from the environment
   */
  static loadConfig(env: Env = process.env): ClientEnvironmentConfig {
    return {
      baseUrl: (env.MOSAIC_BASE_URL || DEFAULT_BASE_URL).trim().replace(/\/+$/, ''),
      apiKey: env.MOSAIC_API_KEY?.trim() || undefined,
      webhookSecret: env.MOSAIC_WEBHOOK_SECRET || undefined,
      uploadFlow: parseUploadFlow(env.MOSAIC_UPLOAD_FLOW),
      controlPlaneTimeoutMs: parsePositiveInt(env.MOSAIC_CONTROL_TIMEOUT_MS, DEFAULT_CONTROL_TIMEOUT_MS),
      transferTimeoutMs: parsePositiveInt(env.MOSAIC_TRANSFER_TIMEOUT_MS, DEFAULT_TRANSFER_TIMEOUT_MS),
    };
  }

  /**
   * Explicit key wins over MOSAIC_API_KEY. The key must carry the platform prefix.
   */
  static resolveApiKey(explicitKey?: string, env: Env = process.env): string {
    const apiKey = explicitKey?.trim() || env.MOSAIC_API_KEY?.trim();
    if (!apiKey) {
      throw new ConfigError('API key required. Use --api-key or set MOSAIC_API_KEY');
    }
    if (!apiKey.startsWith(API_KEY_PREFIX)) {
      throw new ConfigError(`Invalid API key format (must start with '${API_KEY_PREFIX}')`);
    }
    return apiKey;
  }

  static validateApiKeyFormat(apiKey: string): ApiKeyFormatChecks {
    return {
      hasPrefix: apiKey.startsWith(API_KEY_PREFIX),
      minLength: apiKey.length > 10,
      noSpaces: !apiKey.includes(' '),
      noQuotes: !apiKey.includes('"') && !apiKey.includes("'"),
    };
  }

  static maskApiKey(apiKey: string): string {
    if (apiKey.length > 20) return `${apiKey.slice(0, 10)}...${apiKey.slice(-4)}`;
    if (apiKey.length > 6) return `${apiKey.slice(0, 6)}...`;
    return '***';
  }

  /**
   * Get configuration summary for debugging
   */
  static getConfigSummary(env: Env = process.env): {
    baseUrl: string;
    apiKey: string;
    uploadFlow: UploadFlow;
    webhookSecretConfigured: boolean;
    controlPlaneTimeout: string;
    transferTimeout: string;
  } {
    const config = this.loadConfig(env);

    return {
      baseUrl: config.baseUrl,
      apiKey: config.apiKey ? this.maskApiKey(config.apiKey) : 'Not configured',
      uploadFlow: config.uploadFlow,
      webhookSecretConfigured: !!config.webhookSecret,
      controlPlaneTimeout: `${Math.round(config.controlPlaneTimeoutMs / 1000)}s`,
      transferTimeout: `${Math.round(config.transferTimeoutMs / 60000)}min`,
    };
  }
}
