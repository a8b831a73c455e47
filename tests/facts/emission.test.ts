import { describe, expect, test } from '@jest/globals';
import { ValidationError } from '../../src/errors/validation-error';
import { Emission, EmissionSpec, checkEmissionDrift, emission } from '../../src/facts/emission';
import { createFact } from '../../src/facts/fact';
import { Facts } from '../../src/facts/facts';

const spec = () =>
  new EmissionSpec({
    said_hello: emission('session', 'progress'),
    note: emission('iteration', 'diagnostic', { required: false }),
    repo: new EmissionSpec({
      root: emission('session'),
      file_count: emission('session', 'progress'),
    }),
  });

function buildError(values: Record<string, unknown>): ValidationError | undefined {
  try {
    spec().build(values);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('Emission', () => {
  test('defaults to knowledge and required', () => {
    const declared = new Emission('session');
    expect(declared.kind).toBe('knowledge');
    expect(declared.required).toBe(true);
    expect(Object.isFrozen(declared)).toBe(true);
  });

  test('toString marks optional emissions', () => {
    expect(emission('session', 'progress').toString()).toBe('progress@session');
    expect(emission('iteration', 'diagnostic', { required: false }).toString()).toBe(
      'diagnostic@iteration?'
    );
  });
});

describe('EmissionSpec.build', () => {
  test('produces facts with the declared scope and kind', () => {
    const facts = spec().build({ said_hello: true, repo: { root: '/work/app', file_count: 2 } });
    const declared = spec().toDict();

    expect(facts.keys()).toEqual(['said_hello', 'repo.root', 'repo.file_count']);
    for (const [key, fact] of facts) {
      expect(fact.scope).toBe(declared[key].scope);
      expect(fact.kind).toBe(declared[key].kind);
    }
    expect(facts.group('repo')?.value('file_count')).toBe(2);
  });

  test('includes an optional key when given', () => {
    const facts = spec().build({
      said_hello: true,
      note: 'first run',
      repo: { root: '/work/app', file_count: 2 },
    });
    expect(facts.get('note')?.scope).toBe('iteration');
  });

  test('raises on an undeclared key', () => {
    const error = buildError({ said_hello: true, repo: { root: '/r', file_count: 1 }, extra: 1 });
    expect(error?.code).toBe('EMISSION_UNDECLARED_KEY');
    expect(error?.message).toBe("Undeclared emission 'extra' (declared: said_hello, note, repo)");
  });

  test('raises on an undeclared nested key with its qualified name', () => {
    const error = buildError({ said_hello: true, repo: { root: '/r', file_count: 1, size: 4 } });
    expect(error?.code).toBe('EMISSION_UNDECLARED_KEY');
    expect(error?.message).toBe(
      "Undeclared emission 'repo.size' (declared: repo.root, repo.file_count)"
    );
  });

  test('raises on a missing required key', () => {
    const error = buildError({ repo: { root: '/r', file_count: 1 } });
    expect(error?.code).toBe('EMISSION_MISSING_KEY');
    expect(error?.message).toBe("Missing required emission 'said_hello'");
  });

  test('raises on a missing nested key', () => {
    expect(buildError({ said_hello: true, repo: { root: '/r' } })?.message).toBe(
      "Missing required emission 'repo.file_count'"
    );
  });

  test('raises on values that are not fact values', () => {
    expect(buildError({ said_hello: null, repo: { root: '/r', file_count: 1 } })?.code).toBe(
      'EMISSION_INVALID_VALUE'
    );
    expect(buildError({ said_hello: true, repo: 'flat' })?.message).toBe(
      "Emission group 'repo' expects a record of values"
    );
  });

  test('rejects declaration keys with the separator', () => {
    expect(() => new EmissionSpec({ 'repo.root': emission('session') })).toThrow(ValidationError);
  });
});

describe('EmissionSpec.toDict', () => {
  test('flattens nested declarations with the separator', () => {
    const dict = spec().toDict();
    expect(Object.keys(dict)).toEqual(['said_hello', 'note', 'repo.root', 'repo.file_count']);
    expect(dict['repo.file_count'].kind).toBe('progress');
    expect(spec().keys()).toEqual(Object.keys(dict));
  });
});

describe('checkEmissionDrift', () => {
  test('reports nothing for facts produced by build', () => {
    const facts = spec().build({ said_hello: true, repo: { root: '/r', file_count: 1 } });
    expect(checkEmissionDrift(spec(), facts)).toEqual([]);
  });

  test('reports undeclared, mismatched and missing keys', () => {
    const facts = Facts.of(
      createFact('said_hello', true, 'iteration', 'progress'),
      createFact('surprise', 1, 'session')
    );

    expect(checkEmissionDrift(spec(), facts)).toEqual([
      {
        key: 'said_hello',
        problem: 'scope_mismatch',
        severity: 'error',
        message: "Declared 'said_hello' with scope 'session' but emitted scope 'iteration'",
      },
      {
        key: 'surprise',
        problem: 'undeclared',
        severity: 'error',
        message: "Emitted 'surprise' without declaring it",
      },
      {
        key: 'repo.root',
        problem: 'missing',
        severity: 'warning',
        message: "Declared 'repo.root' but did not emit it",
      },
      {
        key: 'repo.file_count',
        problem: 'missing',
        severity: 'warning',
        message: "Declared 'repo.file_count' but did not emit it",
      },
    ]);
  });

  test('reports kind mismatches', () => {
    const facts = Facts.of(createFact('said_hello', true, 'session'));
    const drift = checkEmissionDrift(new EmissionSpec({ said_hello: emission('session', 'progress') }), facts);
    expect(drift).toEqual([
      {
        key: 'said_hello',
        problem: 'kind_mismatch',
        severity: 'error',
        message: "Declared 'said_hello' with kind 'progress' but emitted kind 'knowledge'",
      },
    ]);
  });
});
