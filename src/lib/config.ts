import { EDGE_MARGIN, HANDLE_RADIUS, MIN_SIZE } from '@/lib/constants';
import { isLogLevel, log, type LogLevel } from '@/lib/logger';

/** Engine settings; every field has a default */
export interface EngineConfig {
  /** Directory holding one JSON file per image key */
  annotationDir: string;
  minSize: number;
  handleRadius: number;
  edgeMargin: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
  annotationDir: 'annotations',
  minSize: MIN_SIZE,
  handleRadius: HANDLE_RADIUS,
  edgeMargin: EDGE_MARGIN,
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

function fromEnv(env: Env): Partial<EngineConfig> {
  const config: Partial<EngineConfig> = {};

  const dir = env['ANNOTATE_DIR']?.trim();
  if (dir) config.annotationDir = dir;

  const level = env['ANNOTATE_LOG_LEVEL']?.trim().toLowerCase();
  if (level) {
    if (isLogLevel(level)) {
      config.logLevel = level;
    } else {
      log.warn(`Ignoring unknown ANNOTATE_LOG_LEVEL "${level}"`);
    }
  }

  return config;
}

function checkThreshold(name: keyof EngineConfig, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Merge defaults, environment and explicit overrides (later wins) and apply the
 * resulting log level.
 */
export function resolveConfig(
  overrides: Partial<EngineConfig> = {},
  env: Env = process.env
): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_CONFIG, ...fromEnv(env), ...overrides };

  checkThreshold('minSize', config.minSize);
  checkThreshold('handleRadius', config.handleRadius);
  checkThreshold('edgeMargin', config.edgeMargin);

  log.setLevel(config.logLevel);
  return config;
}
