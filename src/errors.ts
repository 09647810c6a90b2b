export type ErrorKind =
  | 'config'
  | 'url'
  | 'transport'
  | 'timeout'
  | 'snapshot'
  | 'storage'
  | 'parse'
  | 'output'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

const ERROR_NAMES: Record<ErrorKind, string> = {
  config: 'ConfigError',
  url: 'InvalidURL',
  transport: 'TransportError',
  timeout: 'Timeout',
  snapshot: 'IncompatibleSnapshot',
  storage: 'StorageError',
  parse: 'ParseError',
  output: 'OutputError',
  internal: 'InternalError',
};

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = ERROR_NAMES[kind];
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

type FactoryOptions = { severity?: ErrorSeverity; cause?: unknown };

function factory(kind: ErrorKind, defaultSeverity: ErrorSeverity) {
  return (
    message: string,
    details: Record<string, unknown> = {},
    options: FactoryOptions = {},
  ): CrawlerError =>
    new CrawlerError({
      message,
      kind,
      severity: options.severity ?? defaultSeverity,
      details,
      cause: options.cause,
    });
}

export const createConfigurationError = factory('config', 'fatal');
export const createInvalidUrlError = factory('url', 'recoverable');
export const createTransportError = factory('transport', 'recoverable');
export const createTimeoutError = factory('timeout', 'recoverable');
export const createIncompatibleSnapshotError = factory('snapshot', 'fatal');
export const createStorageError = factory('storage', 'recoverable');
export const createParseError = factory('parse', 'recoverable');
export const createOutputError = factory('output', 'recoverable');
export const createInternalError = factory('internal', 'fatal');
