import type { ClassifierSlot } from '../analyzers/PoseClassifier';
import {
  type AnalysisConfig,
  type AnalysisConfigOverrides,
  resolveAnalysisConfig,
} from '../config/analysisConfig';
import { defaultGeometry, type GeometryKit } from '../models/Geometry';
import { createLogger } from '../utils/logger';
import { SessionAggregator } from './SessionAggregator';

const logger = createLogger({ component: 'SessionFactory' });

/**
 * Options for session factory creation
 */
export interface CreateSessionFactoryOptions {
  /** Model trained on the legs-family exercises */
  legs: ClassifierSlot;

  /** Model trained on the standing (arms) exercises */
  arms: ClassifierSlot;

  /**
   * Overrides merged onto the default analysis config.
   * Validated once, when the factory is created.
   */
  config?: AnalysisConfigOverrides;

  /**
   * Vector math used by every session. Defaults to full 3D geometry.
   */
  geometry?: GeometryKit;
}

export interface SessionFactory {
  /** The resolved config every session shares */
  readonly config: AnalysisConfig;

  /** A fresh aggregator with its own buffers and smoothing state */
  createSession(): SessionAggregator;
}

/**
 * Create a factory that hands out independent analysis sessions.
 *
 * The injected classifiers are the only state sessions share.
 *
 * @throws AnalysisConfigError if the config overrides are invalid
 */
export function createSessionFactory(options: CreateSessionFactoryOptions): SessionFactory {
  const config = resolveAnalysisConfig(options.config);
  const geometry = options.geometry ?? defaultGeometry;
  const models = { legs: options.legs, arms: options.arms };

  logger.info('Session factory ready', {
    action: 'create',
    legs: options.legs.status,
    arms: options.arms.status,
    windowSize: config.windowSize,
    step: config.step,
  });

  return {
    config,
    createSession: () => new SessionAggregator(models, config, geometry),
  };
}
