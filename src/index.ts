export * from './shared/engine';
export * from './shared/errors';
export { config, loadConfig, parseEnv } from './shared/config';
export type { AppConfig, LogLevel, LogFormat, NodeEnv } from './shared/config';
export { logger, createLogger } from './shared/utils/logger';
export type { LogMeta } from './shared/utils/logger';
export {
  PositionSchema,
  PlayerColorSchema,
  PlayerOrderSchema,
  ShapeTransformSchema,
  PieceCatalogSchema,
} from './shared/validation/schemas';
