import { describe, expect, it } from 'vitest';
import { ValidationError } from '../error/validationError.js';
import { assertIrisInvestigateParams, IRIS_INVESTIGATE_PARAMS } from './irisInvestigate.js';

describe('IRIS_INVESTIGATE_PARAMS', () => {
  it('holds the 60 recognised names', () => {
    expect(IRIS_INVESTIGATE_PARAMS.size).toBe(60);
    expect(IRIS_INVESTIGATE_PARAMS.has('google_analytics_4')).toBe(true);
    expect(IRIS_INVESTIGATE_PARAMS.has('yandex_metrica')).toBe(true);
  });
});

describe('assertIrisInvestigateParams', () => {
  it('accepts allow-listed names', () => {
    expect(() => assertIrisInvestigateParams({ domain: 'example.com', risk_score: 70, active: true })).not.toThrow();
  });

  it('requires at least one parameter', () => {
    expect(() => assertIrisInvestigateParams({})).toThrow('At least one Iris Investigate parameter is required.');
  });

  it('names every unknown parameter, sorted', () => {
    let caught: unknown;
    try {
      assertIrisInvestigateParams({ nope: 1, domain: 'example.com', also_nope: 2 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.message).toBe(
      'Invalid Iris Investigate parameters: also_nope, nope',
    );
    expect(caught instanceof ValidationError && caught.issues).toHaveLength(1);
  });
});
