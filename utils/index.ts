/**
 * Utils Module Exports
 * 统一导出工具模块
 */

// Configuration
export { appConfigSchema, ConfigManager, type DeepPartial } from './config-manager';
// Export Utilities
export * from './export';
// File Utilities
export {
  createRunContext,
  ensureDirExists,
  getDefaultOutputRoot,
  type RunContext,
  type RunContextOptions,
  sanitizeSegment,
} from './fileutils';
// Logging
export {
  closeLogger,
  configureLogger,
  createEnhancedLogger,
  createModuleLogger,
  EnhancedLogger,
  LOG_LEVELS,
  type LogContext,
  logger,
  type ModuleLogger,
  setLogLevel,
} from './logger';
// Reports
export * from './report';
// Date & Time
export * from './time';
