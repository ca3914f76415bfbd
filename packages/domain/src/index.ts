/** biome-ignore-all assist/source/organizeImports: grouped by layer */
// Errors
export type { ScanErrorKind } from './errors/scan-error';
export {
  BodyMismatchError,
  ConfigError,
  CursorMismatchError,
  DeserializeError,
  errorCode,
  FileSystemError,
  ProbeNetworkError,
  ProcessLaunchError,
  ScanError,
  toError,
} from './errors/scan-error';

// Domain Events
export type { BatchCompletedEventData } from './events/batch-completed.event';
export { batchCompletedEvent } from './events/batch-completed.event';

// Infrastructure
export type { LoggerPort, LogLevel } from './infrastructure/logger.port';
export { createChildLogger, createPinoLogger, isLogLevel, PinoLogger } from './infrastructure/pino-logger';

// Ports (Interfaces)
export type { ProbePort, ProbeTarget } from './ports/probe.port';
export type { ProgressPort } from './ports/progress.port';
export type { ScanStatePort } from './ports/storage.port';
export type { TunnelHandle, TunnelPort, TunnelTarget } from './ports/tunnel.port';
export { withTunnel } from './ports/tunnel.port';

// Value Objects
export type { AddressFamily, NumericAddress } from './value-objects/address-range.vo';
export { AddressRange, formatAddress, parseAddress } from './value-objects/address-range.vo';
export { LatencyRecord } from './value-objects/latency-record.vo';

// Services
export {
  AddressRangeMatcher,
  enableCoveredRanges,
  maxRangeOffset,
  parseAddressRanges,
  selectRanges,
} from './services/address-space.service';
export type { RankedResult } from './services/result-store.service';
export { ResultStore } from './services/result-store.service';
export type {
  BatchEntry,
  CursorBatch,
  CursorOptions,
  CursorPosition,
  ScanProgress,
} from './services/scan-cursor.service';
export { INITIAL_POSITION, ScanCursor } from './services/scan-cursor.service';
