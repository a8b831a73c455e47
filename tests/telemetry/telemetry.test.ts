import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import {
  TelemetryEvent,
  emitTelemetry,
  getTelemetryLevel,
  parseTelemetryLevel,
  registerTelemetryHandler,
  setTelemetryLevel,
} from '../../src/telemetry/telemetry';

const stalled: TelemetryEvent = {
  type: 'iteration_stalled',
  agentId: 'worker',
  sessionId: 'session-1',
  phase: 'LOOPING',
  iteration: 1,
  durableHash: 'abc123',
};

const started: TelemetryEvent = {
  type: 'iteration_started',
  agentId: 'worker',
  sessionId: 'session-1',
  phase: 'WORK',
  iteration: 2,
};

describe('telemetry', () => {
  beforeEach(() => {
    registerTelemetryHandler(null);
    setTelemetryLevel('warning');
  });

  afterEach(() => {
    registerTelemetryHandler(null);
  });

  it('hands warning events and their level to the registered handler', () => {
    const handler = jest.fn();
    registerTelemetryHandler(handler);

    emitTelemetry(stalled);

    expect(handler).toHaveBeenCalledWith(stalled, 'warning');
  });

  it('falls back to the console when the handler throws', () => {
    registerTelemetryHandler(() => {
      throw new Error('handler failure');
    });
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    emitTelemetry(stalled);

    expect(warnSpy).toHaveBeenCalledWith('[Telemetry handler error] handler failure');
    expect(warnSpy).toHaveBeenCalledWith('[Telemetry] iteration_stalled worker/session-1 in LOOPING', stalled);
    warnSpy.mockRestore();
  });

  it('drops events below the configured level', () => {
    const handler = jest.fn();
    registerTelemetryHandler(handler);

    emitTelemetry(started);
    setTelemetryLevel('error');
    emitTelemetry(stalled);

    expect(handler).not.toHaveBeenCalled();
  });

  it('emits info events once the level is lowered', () => {
    const infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    setTelemetryLevel('info');

    emitTelemetry(started);

    expect(infoSpy).toHaveBeenCalledWith('[Telemetry] iteration_started worker/session-1 in WORK', started);
    infoSpy.mockRestore();
  });

  it('uses console.error for failed sessions without a handler', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failed: TelemetryEvent = {
      type: 'session_failed',
      agentId: 'worker',
      sessionId: 'session-1',
      phase: 'BROKEN',
      keys: ['fatal_error'],
    };

    emitTelemetry(failed);

    expect(errorSpy).toHaveBeenCalledWith('[Telemetry] session_failed worker/session-1 in BROKEN', failed);
    errorSpy.mockRestore();
  });

  it('reports the current level', () => {
    expect(getTelemetryLevel()).toBe('warning');
    setTelemetryLevel('info');
    expect(getTelemetryLevel()).toBe('info');
  });

  it('parses level names from the environment', () => {
    expect(parseTelemetryLevel(' INFO ')).toBe('info');
    expect(parseTelemetryLevel('error')).toBe('error');
    expect(parseTelemetryLevel('verbose')).toBeNull();
    expect(parseTelemetryLevel(undefined)).toBeNull();
  });
});
