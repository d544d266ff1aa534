import { ValidationException } from './exceptions';

type RouteParam = string | string[] | undefined;

/** First value of an Express route param, or '' when it is absent */
export function getParam(value: RouteParam): string {
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

/**
 * Integer route param (roster id, week). Routes validate these with zod
 * first; this still refuses anything that does not parse.
 */
export function parseIntParam(value: RouteParam, name = 'parameter'): number {
  const parsed = parseInt(getParam(value), 10);
  if (Number.isNaN(parsed)) {
    throw new ValidationException(`${name} must be an integer`);
  }
  return parsed;
}
