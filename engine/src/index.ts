export { DEFAULT_PROGRAM, DEFAULT_STDERR_LINES, describeIssues, engineConfigSchema, parseEngineConfig } from './core/config.js';
export type { EngineConfig, EngineConfigInput } from './core/config.js';
export { LOG_THRESHOLDS, logger, parseThreshold } from './core/logger.js';
export type { LogLevel, LogThreshold } from './core/logger.js';
export { formatError, InterruptedError, readIntegerEnv, serializeError, StructuredError, tokenizeCommandLine } from './core/utils.js';
export type { ErrorCode } from './core/utils.js';
export { formatDashboard, TerminalDashboard } from './render/dashboard.js';
export type { DashboardOutput, Renderer } from './render/dashboard.js';
export { multiplex, Multiplexer } from './task/multiplexer.js';
export type { MultiplexerHooks } from './task/multiplexer.js';
export type { MultiplexerResult, ResultMetadata, ResultTask, TaskOutcome, TaskRecord, TaskStatus } from './task/types.js';
