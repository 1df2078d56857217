/**
 * LOAN GATEWAY: Configuration
 *
 * Types and loader for the HTTP gateway configuration.
 */

// ════════════════════════════════════════════════════════════════════════════
// TYPES
// ════════════════════════════════════════════════════════════════════════════

const NODE_ENVS = ['development', 'production', 'test'] as const;
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

type NodeEnv = typeof NODE_ENVS[number];
type LogLevel = typeof LOG_LEVELS[number];

export interface GatewayConfig {
  /**
   * HTTP port (default: 3000)
   */
  port: number;

  /**
   * Bind address (default: '0.0.0.0')
   */
  host: string;

  /**
   * Allowed CORS origins (default: ['*'])
   */
  corsOrigins: string[];

  nodeEnv: NodeEnv;

  /**
   * Log level (default: 'info')
   */
  logLevel: LogLevel;
}

// ════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ════════════════════════════════════════════════════════════════════════════

const DEFAULT_CONFIG: GatewayConfig = {
  port: 3000,
  host: '0.0.0.0',
  corsOrigins: ['*'],
  nodeEnv: 'development',
  logLevel: 'info'
};

// ════════════════════════════════════════════════════════════════════════════
// HELPERS
// ════════════════════════════════════════════════════════════════════════════

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// ════════════════════════════════════════════════════════════════════════════
// LOADER
// ════════════════════════════════════════════════════════════════════════════

/**
 * Loads configuration from the environment.
 * Variables:
 * - LOAN_GATEWAY_PORT
 * - LOAN_GATEWAY_HOST
 * - LOAN_GATEWAY_CORS_ORIGINS (comma-separated)
 * - LOAN_GATEWAY_LOG_LEVEL
 * - NODE_ENV
 *
 * @throws Error on an unknown NODE_ENV or log level
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const nodeEnv = env.NODE_ENV || DEFAULT_CONFIG.nodeEnv;
  if (!isNodeEnv(nodeEnv)) {
    throw new Error(`Invalid NODE_ENV: ${nodeEnv}`);
  }

  const logLevel = env.LOAN_GATEWAY_LOG_LEVEL || DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid log level: ${logLevel}`);
  }

  const corsOriginsEnv = env.LOAN_GATEWAY_CORS_ORIGINS;
  const corsOrigins = corsOriginsEnv
    ? corsOriginsEnv.split(',').map(s => s.trim()).filter(s => s.length > 0)
    : DEFAULT_CONFIG.corsOrigins;

  return {
    port: parseInt(env.LOAN_GATEWAY_PORT || String(DEFAULT_CONFIG.port), 10),
    host: env.LOAN_GATEWAY_HOST || DEFAULT_CONFIG.host,
    corsOrigins,
    nodeEnv,
    logLevel
  };
}

/**
 * Validates a loaded configuration.
 * @throws Error if the configuration is invalid
 */
export function validateConfig(config: GatewayConfig): void {
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    throw new Error(`Invalid port: ${config.port}`);
  }

  if (!config.host) {
    throw new Error('host is required');
  }

  if (config.corsOrigins.length === 0) {
    throw new Error('At least one CORS origin is required');
  }
}

export { DEFAULT_CONFIG, NodeEnv, LogLevel };
