import { TimeoutError, ValidationError } from '../utils/errors.js';

/**
 * Timeout levels
 */
export enum TimeoutLevel {
  CONNECTION = 'CONNECTION',     // 10s
  REQUEST = 'REQUEST',           // 15s
}

/**
 * Timeout configuration
 */
export interface TimeoutConfig {
  /**
   * Connection establishment timeout (ms)
   * @default 10000
   */
  connection: number;

  /**
   * Per-request response timeout (ms), applied to every wait in a batch
   * @default 15000
   */
  request: number;
}

export const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
  connection: 10_000,
  request: 15_000,
};

/**
 * Bounds async operations by the configured timeout for their level
 */
export class TimeoutManager {
  private config: TimeoutConfig;

  constructor(config: Partial<TimeoutConfig> = {}) {
    this.config = {
      connection: config.connection ?? DEFAULT_TIMEOUT_CONFIG.connection,
      request: config.request ?? DEFAULT_TIMEOUT_CONFIG.request,
    };

    this.validate();
  }

  /**
   * Wraps an operation with the timeout for `level`
   * @param endpoint - host:port the operation runs against, for the error
   * @throws TimeoutError if the operation does not settle in time
   */
  async execute<T>(
    operation: () => Promise<T>,
    level: TimeoutLevel,
    operationName: string,
    endpoint: string,
  ): Promise<T> {
    const timeoutMs = this.getTimeout(level);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(endpoint, timeoutMs, operationName));
      }, timeoutMs);
    });

    try {
      return await Promise.race([operation(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  getTimeout(level: TimeoutLevel): number {
    switch (level) {
      case TimeoutLevel.CONNECTION:
        return this.config.connection;
      case TimeoutLevel.REQUEST:
        return this.config.request;
    }
  }

  setTimeout(level: TimeoutLevel, ms: number): void {
    switch (level) {
      case TimeoutLevel.CONNECTION:
        this.config.connection = ms;
        break;
      case TimeoutLevel.REQUEST:
        this.config.request = ms;
        break;
    }

    this.validate();
  }

  private validate(): void {
    for (const [level, ms] of Object.entries(this.config)) {
      if (!Number.isFinite(ms) || ms <= 0) {
        throw ValidationError.invalidParameter(`${level}Timeout`, 'positive number of milliseconds', ms);
      }
    }
  }
}
