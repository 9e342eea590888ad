export * from './printer';
export { PrintDocumentSchema, PrintNodeSchema, safeValidate } from './schemas';
export type { PrintDocument, PrintNodeInput } from './schemas';
export { debugLogger, LogLevel } from './shared/utils/debug-logger';
export { environment, loadEnvironment } from './config/environment';
export type { EnvironmentConfig } from './config/environment';
