/**
 * ExecutionClient for a REST job service.
 *
 *   POST {baseUrl}/v1/jobs        { program, format: "qasm2", shots, device }
 *   GET  {baseUrl}/v1/jobs/{id}   { job_id, status, counts?, error_message? }
 *
 * A job is polled until it reaches a final status or the timeout elapses.
 */

import {
  Circuit,
  ExecutionError,
  type CircuitDescription,
  type ExecutionFailureKind,
  type MeasurementHistogram,
} from '@qsweep/core';
import { z } from 'zod';
import { systemClock, type Clock } from './clock';
import { isAbortError, type ExecutionClient } from './execution-client';
import { silentLogger, type Logger } from './logger';

const jobStatusSchema = z.enum(['QUEUED', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELED']);

const submitResponseSchema = z.object({
  job_id: z.string().min(1),
  status: jobStatusSchema,
});

const jobResponseSchema = z.object({
  job_id: z.string().min(1),
  status: jobStatusSchema,
  counts: z.record(z.string(), z.number()).optional(),
  error_message: z.string().nullish(),
});

export type JobStatus = z.infer<typeof jobStatusSchema>;

export interface HttpExecutionClientOptions {
  baseUrl: string;
  token: string;
  /** Target device name understood by the service (default `quantum`) */
  device?: string;
  pollIntervalMs?: number;
  timeoutMs?: number;
  clock?: Clock;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Statuses that reject every job alike: the credentials are at fault
 */
export function isHaltingStatus(status: number): boolean {
  return status === 401 || status === 403;
}

/**
 * Statuses worth another attempt: timeouts, rate limits and server errors
 */
export function classifyStatus(status: number): ExecutionFailureKind {
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return 'transient';
  }
  return 'terminal';
}

export class HttpExecutionClient implements ExecutionClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly device: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpExecutionClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.device = options.device ?? 'quantum';
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.timeoutMs = options.timeoutMs ?? 600_000;
    this.clock = options.clock ?? systemClock;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger();
  }

  async execute(
    circuit: CircuitDescription,
    shots: number,
    signal?: AbortSignal
  ): Promise<MeasurementHistogram> {
    const program = Circuit.fromJSON(circuit).toQASM();
    const submitted = await this.request(
      'POST',
      '/v1/jobs',
      submitResponseSchema,
      { program, format: 'qasm2', shots, device: this.device },
      signal
    );
    const jobId = submitted.job_id;
    this.logger.debug({ jobId, circuit: circuit.name, shots }, 'job submitted');

    const started = this.clock.now();
    for (;;) {
      const job = await this.request(
        'GET',
        `/v1/jobs/${encodeURIComponent(jobId)}`,
        jobResponseSchema,
        undefined,
        signal
      );

      switch (job.status) {
        case 'COMPLETED':
          if (!job.counts) {
            throw new ExecutionError(`job ${jobId} completed without counts`, 'terminal');
          }
          return job.counts;
        case 'FAILED':
          throw new ExecutionError(
            `job ${jobId} failed: ${job.error_message ?? 'no reason given'}`,
            'transient'
          );
        case 'CANCELED':
          throw new ExecutionError(`job ${jobId} was canceled`, 'terminal');
        case 'QUEUED':
        case 'RUNNING':
          break;
      }

      if (this.clock.now() - started >= this.timeoutMs) {
        throw new ExecutionError(
          `job ${jobId} still ${job.status} after ${this.timeoutMs}ms`,
          'transient'
        );
      }
      this.logger.debug({ jobId, status: job.status }, 'job pending');
      await this.clock.sleep(this.pollIntervalMs, signal);
    }
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T>,
    body: unknown,
    signal: AbortSignal | undefined
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.token}`,
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExecutionError(`${method} ${url} failed: ${reason}`, 'transient', {
        cause: error,
      });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new ExecutionError(
        `http ${res.status} ${res.statusText}: ${text}`,
        classifyStatus(res.status),
        { status: res.status, halt: isHaltingStatus(res.status) }
      );
    }

    let payload: unknown;
    try {
      payload = text ? JSON.parse(text) : {};
    } catch (error) {
      throw new ExecutionError(`${method} ${url} returned non-JSON body`, 'terminal', {
        cause: error,
        status: res.status,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ExecutionError(
        `${method} ${url} returned an unexpected body: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join('; ')}`,
        'terminal',
        { status: res.status }
      );
    }
    return parsed.data;
  }
}
