import { describe, it, expect } from 'vitest';
import { ConfigError, ExecutionError, InsufficientDataError, sweepParameters } from '@qsweep/core';
import { loadConfig } from '../config';
import { silentLogger } from '../logger';
import { createOrchestrator, runValidation } from '../validation';
import { DELTA, FakeClock, jobServiceFetch, ScriptedClient } from './fakes';

const logger = silentLogger();

describe('createOrchestrator', () => {
  it('requires the service URL and token without an injected client', () => {
    expect(() => createOrchestrator(loadConfig({}), { logger })).toThrow(
      new ConfigError(['QSWEEP_API_URL: required', 'QSWEEP_API_TOKEN: required'])
    );
    expect(() =>
      createOrchestrator(loadConfig({ QSWEEP_API_URL: 'https://qpu.test' }), { logger })
    ).toThrow('Invalid configuration: QSWEEP_API_TOKEN: required');
  });

  it('applies retry, pacing and circuit settings', async () => {
    const client = new ScriptedClient(() => {
      throw new ExecutionError('http 502 Bad Gateway: ', 'transient', { status: 502 });
    });
    const clock = new FakeClock();
    const config = loadConfig({
      QSWEEP_MAX_ATTEMPTS: '2',
      QSWEEP_RETRY_DELAY_MS: '100',
      QSWEEP_PACING_MS: '0',
      QSWEEP_READOUT: 'flat',
    });
    const outcome = await runValidation(createOrchestrator(config, { client, clock, logger }), {
      parameters: [0.5],
    });

    expect(outcome.result.entries[0]).toMatchObject({ status: 'failed', attempts: 2 });
    expect(clock.sleeps).toEqual([100]);
    expect(client.calls[0].circuit.policy).toEqual({ decayLaw: 'halving', readout: 'flat' });
  });
});

describe('runValidation', () => {
  it('sweeps through the HTTP client and analyzes the results', async () => {
    const clock = new FakeClock();
    const config = loadConfig({
      QSWEEP_API_URL: 'https://qpu.test',
      QSWEEP_API_TOKEN: 'test-secret',
      QSWEEP_PACING_MS: '0',
    });
    const orchestrator = createOrchestrator(config, {
      fetch: jobServiceFetch(() => DELTA),
      clock,
      logger,
    });

    const outcome = await runValidation(orchestrator, { parameters: [0.5, 1.0, 1.5] });

    expect(outcome.result.entries.map((entry) => entry.status)).toEqual([
      'succeeded',
      'succeeded',
      'succeeded',
    ]);
    expect(outcome.analysis?.points).toBe(3);
    expect(outcome.analysis?.metrics.temporalCorrelation.values).toEqual([6, 6, 6]);
    expect(clock.sleeps).toEqual([]);
  });

  it('analyzes the six parameters left when two fail for good', async () => {
    const parameters = sweepParameters();
    const failing = new Set([parameters[3], parameters[6]]);
    const client = new ScriptedClient((circuit) => {
      if (failing.has(circuit.parameter)) {
        throw new ExecutionError('http 503 Service Unavailable: busy', 'transient', {
          status: 503,
        });
      }
      return DELTA;
    });
    const clock = new FakeClock();
    const orchestrator = createOrchestrator(loadConfig({ QSWEEP_PACING_MS: '0' }), {
      client,
      clock,
      logger,
    });

    const outcome = await runValidation(orchestrator);

    const statuses = outcome.result.entries.map((entry) => entry.status);
    expect(statuses.filter((status) => status === 'succeeded')).toHaveLength(6);
    expect(statuses.filter((status) => status === 'failed')).toHaveLength(2);
    expect(outcome.result.entries[3]).toMatchObject({ status: 'failed', attempts: 3 });
    expect(outcome.result.entries[6]).toMatchObject({ status: 'failed', attempts: 3 });
    expect(outcome.result.halted).toBeUndefined();
    expect(outcome.analysis?.points).toBe(6);
    expect(outcome.analysis?.parameters).toEqual(
      parameters.filter((parameter) => !failing.has(parameter))
    );
    expect(clock.sleeps).toEqual([5000, 10000, 5000, 10000]);
  });

  it('keeps the sweep result when too few parameters succeed', async () => {
    const client = new ScriptedClient(() => {
      throw new ExecutionError('http 401 Unauthorized: bad token', 'terminal', {
        status: 401,
        halt: true,
      });
    });
    const orchestrator = createOrchestrator(loadConfig({ QSWEEP_PACING_MS: '0' }), {
      client,
      clock: new FakeClock(),
      logger,
    });

    const outcome = await runValidation(orchestrator);

    expect(outcome.analysis).toBeNull();
    if (outcome.analysis === null) {
      expect(outcome.error).toBeInstanceOf(InsufficientDataError);
      expect(outcome.error.available).toBe(0);
    }
    expect(outcome.result.halted).toEqual({
      cause: 'terminal-failure',
      message: 'http 401 Unauthorized: bad token',
    });
    expect(outcome.result.entries).toHaveLength(8);
  });
});
