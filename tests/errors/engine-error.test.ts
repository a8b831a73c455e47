import { describe, expect, test } from '@jest/globals';
import { ConfigError } from '../../src/errors/config-error';
import { EngineError } from '../../src/errors/engine-error';
import { ExecutionError } from '../../src/errors/execution-error';
import { IOError } from '../../src/errors/io-error';
import { SpecError } from '../../src/errors/spec-error';
import { StorageError } from '../../src/errors/storage-error';
import { ValidationError } from '../../src/errors/validation-error';
import { ErrorContext } from '../../src/errors/types';

const baseOptions = {
  message: 'Something went wrong',
  code: 'ACTION_FAILED' as const,
  category: 'execution' as const,
};

describe('EngineError', () => {
  test('serializes cause variants', () => {
    const json = new EngineError({ ...baseOptions, cause: new Error('Root cause') }).toJSON();
    expect(json.cause).toBe('Error: Root cause');

    const nested = new EngineError({ ...baseOptions, message: 'Nested' });
    const nestedJson = new EngineError({ ...baseOptions, cause: nested }).toJSON();
    expect(nestedJson.cause).toEqual(expect.objectContaining({ message: 'Nested', name: 'EngineError' }));

    const stringCause = new EngineError({ ...baseOptions, cause: 'string-cause' }).toJSON();
    expect(stringCause.cause).toBe('string-cause');

    const objectCause = new EngineError({ ...baseOptions, cause: { foo: 'bar' } }).toJSON();
    expect(objectCause.cause).toBe('{"foo":"bar"}');

    const circular: Record<string, unknown> = {};
    circular.self = circular;
    const circularCause = new EngineError({ ...baseOptions, cause: circular }).toJSON();
    expect(circularCause.cause).toMatch(/^Unserializable value \(/);

    expect(new EngineError(baseOptions).toJSON().cause).toBeUndefined();
  });

  test('copies and freezes the context it is given', () => {
    const context: ErrorContext = { agentId: 'worker', iteration: 2 };
    const error = new EngineError({ ...baseOptions, context });
    context.iteration = 3;

    expect(error.context).toEqual({ agentId: 'worker', iteration: 2 });
    expect(Object.isFrozen(error.context)).toBe(true);
    expect(error.toJSON().context).toEqual({ agentId: 'worker', iteration: 2 });
  });

  test('defaults to a non-retryable error', () => {
    const error = new EngineError(baseOptions);
    expect(error.severity).toBe('error');
    expect(error.retryable).toBe(false);
    expect(error.context).toEqual({});
  });

  test('subclasses carry their own name, category and default code', () => {
    const cases: Array<[EngineError, string, string, string]> = [
      [new ValidationError('bad'), 'ValidationError', 'validation', 'VALIDATION_INVALID_INPUT'],
      [new SpecError('bad'), 'SpecError', 'spec', 'SPEC_INVALID'],
      [new ConfigError('bad'), 'ConfigError', 'config', 'CONFIG_INVALID'],
      [new IOError('bad', '/tmp/agent.yaml'), 'IOError', 'io', 'IO_NOT_FOUND'],
      [new StorageError('bad'), 'StorageError', 'storage', 'STORAGE_FAILURE'],
      [new ExecutionError('bad'), 'ExecutionError', 'execution', 'ACTION_FAILED'],
    ];

    for (const [error, name, category, code] of cases) {
      expect(error).toBeInstanceOf(EngineError);
      expect(error.name).toBe(name);
      expect(error.category).toBe(category);
      expect(error.code).toBe(code);
    }
  });

  test('spec and storage errors are never retryable', () => {
    expect(new SpecError('bad').severity).toBe('fatal');
    expect(new SpecError('bad').retryable).toBe(false);
    expect(new StorageError('bad', { code: 'STORAGE_CORRUPT' }).retryable).toBe(false);
  });

  test('execution errors can be marked retryable when they are created', () => {
    const cause = new StorageError('disk full');
    const error = new ExecutionError('wrapped', { cause, retryable: true });
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(cause);
    expect(cause.retryable).toBe(false);
  });
});

describe('ConfigError', () => {
  test('keeps the source and issues', () => {
    const error = new ConfigError('Invalid agent.yaml', {
      source: 'agent.yaml',
      issues: ['Field "goal" must be of type string'],
    });

    expect(error.source).toBe('agent.yaml');
    expect(error.issues).toEqual(['Field "goal" must be of type string']);
    expect(Object.isFrozen(error.issues)).toBe(true);
    expect(error.context).toEqual({
      module: 'config',
      data: { source: 'agent.yaml', issues: ['Field "goal" must be of type string'] },
    });
  });

  test('has no source when none is given', () => {
    const error = new ConfigError('state.path is required', { code: 'CONFIG_MISSING' });
    expect(error.code).toBe('CONFIG_MISSING');
    expect(error.source).toBeUndefined();
    expect(error.context.data).toEqual({ source: null, issues: [] });
  });
});
