import { z } from 'zod';
import type { QueryParams } from '../utils/url.js';
import { validator } from '../utils/validator.js';
import irisInvestigateParams from './irisInvestigateParams.json' with { type: 'json' };

/** Search and filter parameter names Iris Investigate accepts. */
export const IRIS_INVESTIGATE_PARAMS: ReadonlySet<string> = new Set(irisInvestigateParams);

/**
 * Requires at least one parameter and rejects names outside {@link IRIS_INVESTIGATE_PARAMS}.
 */
export const irisInvestigateParamsSchema = z.record(z.string(), z.unknown()).superRefine((params, ctx) => {
  const names = Object.keys(params);
  if (names.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one Iris Investigate parameter is required.' });
    return;
  }

  const invalid = names.filter((name) => !IRIS_INVESTIGATE_PARAMS.has(name)).sort();
  if (invalid.length > 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid Iris Investigate parameters: ${invalid.join(', ')}`,
      params: { invalid },
    });
  }
});

/**
 * Throws a {@link ValidationError} unless `params` is a valid Iris Investigate search.
 */
export function assertIrisInvestigateParams(params: QueryParams): void {
  const [err] = validator(params, irisInvestigateParamsSchema);
  if (err) {
    throw err;
  }
}
