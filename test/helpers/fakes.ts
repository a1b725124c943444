import { ResourceNotFoundError } from '../../src/core/errors.js';
import type { IngressLogger } from '../../src/core/logging/index.js';
import type { IngressMetrics, RouteKindLabel, ValidationOutcome } from '../../src/core/metrics/index.js';
import type {
  BackendService,
  Reference,
  ReferenceValidator,
  ServiceReader,
} from '../../src/core/types/index.js';

export interface LogEntry {
  level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  msg: string;
  meta: Record<string, unknown>;
}

/**
 * Logger that keeps every entry in memory; children share the parent's list
 */
export class RecordingLogger implements IngressLogger {
  constructor(
    public readonly entries: LogEntry[] = [],
    private readonly bindings: Record<string, unknown> = {}
  ) {}

  private push(level: LogEntry['level'], msg: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level, msg, meta: { ...this.bindings, ...meta } });
  }

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.push('trace', msg, meta);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.push('debug', msg, meta);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.push('info', msg, meta);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.push('warn', msg, meta);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.push('error', msg, { ...meta, error: error?.message });
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.push('fatal', msg, { ...meta, error: error?.message });
  }

  child(bindings: Record<string, unknown>): IngressLogger {
    return new RecordingLogger(this.entries, { ...this.bindings, ...bindings });
  }

  reasons(): unknown[] {
    return this.entries.map((entry) => entry.meta.reason).filter((reason) => reason !== undefined);
  }
}

/**
 * Service reader over a fixed map keyed `namespace/name`. Entries mapped to
 * an Error reject with it; missing entries reject with ResourceNotFoundError.
 */
export class FakeServiceReader implements ServiceReader {
  readonly calls: string[] = [];

  constructor(private readonly services: Record<string, BackendService | Error> = {}) {}

  async getService(namespace: string, name: string): Promise<BackendService> {
    const key = `${namespace}/${name}`;
    this.calls.push(key);

    const service = this.services[key];
    if (service === undefined) {
      throw new ResourceNotFoundError('Service', namespace, name);
    }
    if (service instanceof Error) {
      throw service;
    }
    return service;
  }
}

/**
 * Validator allowing exactly the listed `fromNamespace->toNamespace/toName` pairs
 */
export class FakeReferenceValidator implements ReferenceValidator {
  readonly calls: { from: Reference; to: Reference }[] = [];

  constructor(
    private readonly allowed: string[] = [],
    private readonly failure?: Error
  ) {}

  async isReferenceAllowed(from: Reference, to: Reference): Promise<boolean> {
    this.calls.push({ from, to });
    if (this.failure) {
      throw this.failure;
    }
    return this.allowed.includes(`${from.namespace}->${to.namespace}/${to.name}`);
  }
}

export interface ValidationRecord {
  routeKind: RouteKindLabel;
  outcome: ValidationOutcome;
  reason: string;
}

export class RecordingMetrics implements IngressMetrics {
  readonly durations: { routeKind: RouteKindLabel; durationMs: number }[] = [];
  readonly validations: ValidationRecord[] = [];

  recordBuildDuration(routeKind: RouteKindLabel, durationMs: number): void {
    this.durations.push({ routeKind, durationMs });
  }

  recordBackendRefValidation(routeKind: RouteKindLabel, outcome: ValidationOutcome, reason: string): void {
    this.validations.push({ routeKind, outcome, reason });
  }
}
