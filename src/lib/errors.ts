// error kinds that cross module boundaries

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class FetchError extends Error {
  readonly endpoint: string;
  readonly status?: number;

  constructor(message: string, endpoint: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'FetchError';
    this.endpoint = endpoint;
    this.status = options?.status;
  }
}

export type ResolutionFailure = 'NotFound' | 'DanglingReference' | 'NoAddresses';

export class ResolutionError extends Error {
  readonly reason: ResolutionFailure;
  readonly hardwareAddress: string;

  constructor(reason: ResolutionFailure, hardwareAddress: string, message: string) {
    super(message);
    this.name = 'ResolutionError';
    this.reason = reason;
    this.hardwareAddress = hardwareAddress;
  }
}

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class PacketError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PacketError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
