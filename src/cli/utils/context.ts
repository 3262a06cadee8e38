// Wires configured services for CLI commands

import * as path from 'path';
import { Logger, LogLevel, parseLogLevel } from '../../core/logger.js';
import type { DriftwatchConfig } from '../../core/schemas.js';
import { AlertSystem } from '../../services/alerts/alert-system.js';
import { CONFIG_DIR, ConfigService } from '../../services/config/config-service.js';
import { BaselineStore } from '../../services/drift/baseline-store.js';
import { DriftDetector } from '../../services/drift/drift-detector.js';
import { RealignmentEngine } from '../../services/realignment/realignment-engine.js';
import { JsonSignatureExtractor } from '../../services/specs/json-signature-extractor.js';
import { SpecificationRegistry } from '../../services/specs/specification-registry.js';
import { AlertStore } from '../../services/storage/alert-store.js';

export const BASELINE_FILE = 'baselines.json';

export interface GlobalOptions {
  path: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface DriftwatchContext {
  projectRoot: string;
  config: DriftwatchConfig;
  specifications: SpecificationRegistry;
  extractor: JsonSignatureExtractor;
  baselines: BaselineStore;
  detector: DriftDetector;
  alerts: AlertSystem;
  realignment: RealignmentEngine;
}

function configureLogging(config: DriftwatchConfig, options: GlobalOptions): void {
  let level = parseLogLevel(config.logging.level) ?? LogLevel.INFO;
  if (options.verbose) level = LogLevel.DEBUG;
  if (options.quiet) level = LogLevel.ERROR;
  Logger.configure({ level, timestamps: config.logging.timestamps });
}

/**
 * Loads configuration and builds every service a command may need
 */
export async function createContext(options: GlobalOptions): Promise<DriftwatchContext> {
  const projectRoot = path.resolve(options.path);
  const configService = new ConfigService({ projectRoot, configPath: options.config });
  const config = await configService.load();
  configureLogging(config, options);
  Logger.getInstance().child('cli').debug('Configuration loaded', { file: configService.getConfigPath() });

  const specifications = new SpecificationRegistry();
  await specifications.loadDirectory(configService.resolvePath(config.specifications.directory));

  const baselines = new BaselineStore({ filePath: path.join(projectRoot, CONFIG_DIR, BASELINE_FILE) });
  await baselines.load();

  const alerts = new AlertSystem({
    settings: config.alerts,
    store: new AlertStore({ filePath: configService.resolvePath(config.alerts.storePath) }),
    projectRoot
  });
  await alerts.initialize();

  return {
    projectRoot,
    config,
    specifications,
    extractor: new JsonSignatureExtractor(configService.resolvePath(config.signatures.indexFile)),
    baselines,
    detector: new DriftDetector({ ...config.drift, enabledChecks: config.monitor.enabledChecks }),
    alerts,
    realignment: new RealignmentEngine({ settings: config.realignment })
  };
}
