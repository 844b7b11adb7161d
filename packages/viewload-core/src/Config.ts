export {
  DEFAULT_CONFIG,
  ViewLoaderConfig,
  ViewLoaderConfigTag,
  resolveViewLoaderConfig,
  type TraceLevel,
  type ViewLoaderConfigShape,
} from './internal/config.js'
